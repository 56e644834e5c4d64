import type { ManifestId, RepoSlug } from "./branded"

export interface TrackingEntry {
	manifestId: ManifestId
	/** File name inside the bucket directory, e.g. `ripgrep.json`. */
	manifestFile: string
	repo: RepoSlug
	assetKeywords: string[]
	tagPrefix: string
	allowPrerelease: boolean
}

export interface ReleasePolicy {
	allowPrerelease: boolean
}
