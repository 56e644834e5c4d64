export interface ReadmeTemplateOptions {
	bucketName: string
	repoUrl: string
	startMarker: string
	endMarker: string
}

/**
 * README written when a bucket has none yet. The package list goes between
 * the markers on the next run.
 */
export function renderDefaultReadme(options: ReadmeTemplateOptions): string {
	return [
		`# Scoop Bucket: ${options.bucketName}`,
		"",
		"This is a personal Scoop bucket for easily installing software.",
		"",
		"## How to Use",
		"",
		"To add this bucket to Scoop, run the following command in PowerShell:",
		"",
		`\`scoop bucket add ${options.bucketName} ${options.repoUrl}\``,
		"",
		"## Available Applications",
		"",
		options.startMarker,
		"The list of applications will be populated here when the updater runs next.",
		options.endMarker,
		"",
	].join("\n")
}
