import { readFile, stat } from "node:fs/promises"
import { type ConfigurationError, parseTrackingConfig, type Result, type TrackingEntry } from "@bucket-sync/core"
import { describeError, isNotFound, toRawError } from "@/types/errors"

export async function loadTrackingEntries(
	configFile: string,
): Promise<Result<TrackingEntry[], ConfigurationError>> {
	let contents: string
	try {
		contents = await readFile(configFile, "utf8")
	} catch (error) {
		return {
			error: {
				message: isNotFound(error)
					? "Tracking configuration not found."
					: `Cannot read tracking configuration: ${describeError(error)}`,
				path: configFile,
				rawError: toRawError(error),
				type: "configuration",
			},
			ok: false,
		}
	}

	return parseTrackingConfig(contents, configFile)
}

export async function ensureBucketDir(
	bucketDir: string,
): Promise<Result<void, ConfigurationError>> {
	try {
		const stats = await stat(bucketDir)
		if (stats.isDirectory()) {
			return { ok: true, value: undefined }
		}
	} catch (error) {
		if (!isNotFound(error)) {
			return {
				error: {
					message: `Cannot access bucket directory: ${describeError(error)}`,
					path: bucketDir,
					rawError: toRawError(error),
					type: "configuration",
				},
				ok: false,
			}
		}
	}

	return {
		error: { message: "Bucket directory not found.", path: bucketDir, type: "configuration" },
		ok: false,
	}
}
