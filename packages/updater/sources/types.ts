import type { Release, ReleaseQueryError, RepoSlug, Result } from "@bucket-sync/core"

/**
 * Lists the releases of one upstream repository, newest first.
 */
export interface ReleaseSource {
	listReleases(repo: RepoSlug): Promise<Result<Release[], ReleaseQueryError>>
}

export type FetchFn = typeof fetch
