const VERSION_TOKEN_PATTERN = /^\d+(\.\d+)*([-.].+)?/

export interface CleanTagOptions {
	/** Cut the tag down to its leading version token when trailing text follows it. */
	truncateNoise: boolean
}

/**
 * Turn a release tag into a version string: strip the configured prefix, trim,
 * and optionally keep only the leading version token.
 *
 * @example
 * cleanVersionFromTag("v1.4.0", "v", { truncateNoise: true }) // "1.4.0"
 * cleanVersionFromTag("2.0.1 (stable)", "", { truncateNoise: true }) // "2.0.1"
 */
export function cleanVersionFromTag(
	tag: string,
	prefix: string,
	options: CleanTagOptions,
): string {
	let cleaned = prefix && tag.startsWith(prefix) ? tag.slice(prefix.length) : tag
	cleaned = cleaned.trim()

	if (options.truncateNoise) {
		const match = VERSION_TOKEN_PATTERN.exec(cleaned)
		if (match) {
			cleaned = match[0]
		}
	}

	return cleaned
}
