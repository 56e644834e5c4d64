import type { Result } from "@bucket-sync/core"
import { consola } from "consola"
import { HttpArtifactFetcher } from "@/artifacts/download"
import { ScoopCheckverRunner } from "@/checkver/runner"
import { createSyncConfig, type SyncConfigOverrides } from "@/config"
import { env, githubToken } from "@/env"
import { GithubReleaseSource } from "@/sources/github"
import { type RunPasses, runBucketSync } from "@/sync/run"
import type { RunSummary } from "@/sync/types"
import type { FatalError } from "@/types/errors"

export interface RunCommandOptions {
	root: string
	overrides: SyncConfigOverrides
	passes: RunPasses
}

/**
 * Wire the real GitHub source, HTTP fetcher and optional checkver runner
 * into a bucket run. Environment settings fill in what the flags left unset.
 */
export async function runCommand(
	options: RunCommandOptions,
): Promise<Result<RunSummary, FatalError>> {
	const { overrides } = options
	const config = createSyncConfig(options.root, {
		...overrides,
		apiTimeoutMs: overrides.apiTimeoutMs ?? env.BUCKET_SYNC_API_TIMEOUT_MS,
		concurrency: overrides.concurrency ?? env.BUCKET_SYNC_CONCURRENCY,
		downloadTimeoutMs: overrides.downloadTimeoutMs ?? env.BUCKET_SYNC_DOWNLOAD_TIMEOUT_MS,
	})

	const token = githubToken()
	if (!token && options.passes.versions) {
		consola.warn("No GH_API_TOKEN or GITHUB_TOKEN set; GitHub requests are rate limited.")
	}

	return runBucketSync(
		config,
		{
			checkver: config.runCheckver
				? new ScoopCheckverRunner({ cwd: config.rootDir, timeoutMs: config.apiTimeoutMs * 4 })
				: undefined,
			fetcher: new HttpArtifactFetcher({
				timeoutMs: config.downloadTimeoutMs,
				userAgent: config.userAgent,
			}),
			githubRepository: env.GITHUB_REPOSITORY,
			logger: consola,
			releases: new GithubReleaseSource({
				timeoutMs: config.apiTimeoutMs,
				token,
				userAgent: config.userAgent,
			}),
		},
		options.passes,
	)
}
