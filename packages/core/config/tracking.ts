import { z } from "zod"
import type { ManifestId } from "../types/branded"
import { coerceManifestFileName, coerceRepoSlug } from "../types/coerce"
import type { ConfigurationError, Result, ValidationError } from "../types/error"
import type { TrackingEntry } from "../types/tracking"

const RawTrackingEntrySchema = z.object({
	allow_prerelease: z.boolean().default(false),
	asset_keywords: z.array(z.string().trim().min(1)).default([]),
	manifest_file: z.string().trim().min(1),
	repo: z.string().trim().min(1),
	version_strip_prefix: z.string().default(""),
})

const RawTrackingConfigSchema = z.array(RawTrackingEntrySchema)

export type RawTrackingEntry = z.infer<typeof RawTrackingEntrySchema>

/**
 * Parse `apps_config.json`. Any problem here is fatal for the run, so every
 * failure comes back as a configuration error.
 */
export function parseTrackingConfig(
	contents: string,
	configPath: string,
): Result<TrackingEntry[], ConfigurationError> {
	let parsed: unknown
	try {
		parsed = JSON.parse(contents)
	} catch (error) {
		return configurationFailure("Invalid JSON in tracking configuration.", configPath, {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	const result = RawTrackingConfigSchema.safeParse(parsed)
	if (!result.success) {
		const cause: ValidationError = {
			field: "apps",
			message: result.error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
				.join("; "),
			path: configPath,
			source: "zod",
			type: "validation",
			zodError: result.error,
		}
		return configurationFailure("Tracking configuration validation failed.", configPath, {
			cause,
		})
	}

	if (result.data.length === 0) {
		return configurationFailure("Tracking configuration lists no packages.", configPath)
	}

	const entries: TrackingEntry[] = []
	const seen = new Set<ManifestId>()
	for (const [index, raw] of result.data.entries()) {
		const manifestId = coerceManifestFileName(raw.manifest_file)
		if (!manifestId) {
			return configurationFailure(
				`Entry ${index}: invalid manifest_file "${raw.manifest_file}".`,
				configPath,
			)
		}
		const repo = coerceRepoSlug(raw.repo)
		if (!repo) {
			return configurationFailure(
				`Entry ${index}: repo must look like owner/name, got "${raw.repo}".`,
				configPath,
			)
		}
		if (seen.has(manifestId)) {
			return configurationFailure(
				`Entry ${index}: manifest "${manifestId}" is tracked more than once.`,
				configPath,
			)
		}
		seen.add(manifestId)

		entries.push({
			allowPrerelease: raw.allow_prerelease,
			assetKeywords: raw.asset_keywords,
			manifestFile: `${manifestId}.json`,
			manifestId,
			repo,
			tagPrefix: raw.version_strip_prefix,
		})
	}

	return { ok: true, value: entries }
}

function configurationFailure(
	message: string,
	configPath: string,
	extra: Pick<ConfigurationError, "cause" | "rawError"> = {},
): Result<never, ConfigurationError> {
	return {
		error: { ...extra, message, path: configPath, type: "configuration" },
		ok: false,
	}
}
