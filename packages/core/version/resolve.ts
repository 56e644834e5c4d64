import type { Result, VersionParseError } from "../types/error"
import type { Release } from "../types/release"
import type { ReleasePolicy, TrackingEntry } from "../types/tracking"
import { cleanVersionFromTag } from "./clean"
import { compareParsedVersions, parseVersion } from "./compare"

export interface ResolveOptions {
	truncateTagNoise: boolean
}

export type ReleaseResolution =
	| { kind: "none_found"; releaseCount: number }
	| {
			kind: "up_to_date"
			release: Release
			version: string
			currentVersion: string
	  }
	| {
			kind: "newer"
			release: Release
			version: string
			currentVersion: string
	  }

/**
 * Pick the release a package should track. Releases are taken in the order
 * given (newest first) and never re-sorted.
 */
export function selectRelease(
	releases: readonly Release[],
	policy: ReleasePolicy,
): Release | null {
	for (const release of releases) {
		if (release.isPrerelease && !policy.allowPrerelease) {
			continue
		}
		return release
	}

	return null
}

export function resolveRelease(
	releases: readonly Release[],
	entry: Pick<TrackingEntry, "allowPrerelease" | "tagPrefix">,
	currentVersion: string,
	options: ResolveOptions,
): Result<ReleaseResolution, VersionParseError> {
	const release = selectRelease(releases, entry)
	if (!release) {
		return { ok: true, value: { kind: "none_found", releaseCount: releases.length } }
	}

	const version = cleanVersionFromTag(release.tag, entry.tagPrefix, {
		truncateNoise: options.truncateTagNoise,
	})
	if (!version) {
		return {
			error: {
				message: `Release tag "${release.tag}" leaves an empty version after cleaning.`,
				type: "version_parse",
				version: release.tag,
			},
			ok: false,
		}
	}

	const latest = parseVersion(version)
	if (!latest.ok) {
		return latest
	}
	const current = parseVersion(currentVersion)
	if (!current.ok) {
		return {
			error: {
				...current.error,
				message: `Manifest version "${currentVersion}" cannot be compared.`,
			},
			ok: false,
		}
	}

	if (compareParsedVersions(latest.value, current.value) > 0) {
		return { ok: true, value: { currentVersion, kind: "newer", release, version } }
	}
	return { ok: true, value: { currentVersion, kind: "up_to_date", release, version } }
}
