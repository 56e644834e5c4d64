import type { ConsolaInstance } from "consola"
import type { ArtifactFetcher } from "@/artifacts/download"
import type { CheckverRunner } from "@/checkver/runner"
import type { SyncConfig } from "@/config"
import type { ReleaseSource } from "@/sources/types"

/**
 * Digests computed during this run, keyed by download URL, so an artifact
 * fetched for a version update is not downloaded again by the hash pass.
 */
export type DigestCache = Map<string, string>

export interface SyncContext {
	config: SyncConfig
	releases: ReleaseSource
	fetcher: ArtifactFetcher
	checkver?: CheckverRunner
	digests: DigestCache
	logger: ConsolaInstance
}
