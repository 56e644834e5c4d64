import {
	collectPackageNames,
	type ConfigurationError,
	type Result,
	type TrackingEntry,
} from "@bucket-sync/core"
import type { ConsolaInstance } from "consola"
import type { ArtifactFetcher } from "@/artifacts/download"
import type { CheckverRunner } from "@/checkver/runner"
import type { SyncConfig } from "@/config"
import { listBucketManifests } from "@/manifest/store"
import { type RepoInfo, resolveRepoInfo } from "@/readme/repo-info"
import { updateReadme } from "@/readme/update"
import type { ReleaseSource } from "@/sources/types"
import type { SyncContext } from "@/sync/context"
import { syncTrackedPackage } from "@/sync/driver"
import { repairManifestHash } from "@/sync/hash-repair"
import { mapWithConcurrency } from "@/sync/pool"
import { ensureBucketDir, loadTrackingEntries } from "@/sync/preconditions"
import type { PackageReport, ReadmeOutcome, RunSummary } from "@/sync/types"

export interface RunDependencies {
	releases: ReleaseSource
	fetcher: ArtifactFetcher
	logger: ConsolaInstance
	checkver?: CheckverRunner
	/** `owner/name` for the README; looked up from git when absent. */
	githubRepository?: string
	repoInfo?: RepoInfo
}

export interface RunPasses {
	versions: boolean
	hashes: boolean
	readme: boolean
}

/**
 * One bucket run: version/URL updates for tracked packages, then the hash pass
 * over every manifest in the bucket, then the README list. Configuration
 * problems stop the run before any package is touched; everything after that
 * is reported per package.
 */
export async function runBucketSync(
	config: SyncConfig,
	deps: RunDependencies,
	passes: RunPasses,
): Promise<Result<RunSummary, ConfigurationError>> {
	const bucket = await ensureBucketDir(config.bucketDir)
	if (!bucket.ok) {
		return bucket
	}

	let entries: TrackingEntry[] = []
	if (passes.versions) {
		const loaded = await loadTrackingEntries(config.configFile)
		if (!loaded.ok) {
			return loaded
		}
		entries = loaded.value
	}

	const manifests = await listBucketManifests(config.bucketDir)
	if (!manifests.ok) {
		return {
			error: {
				cause: manifests.error,
				message: "Cannot list bucket manifests.",
				path: config.bucketDir,
				type: "configuration",
			},
			ok: false,
		}
	}

	const context: SyncContext = {
		checkver: deps.checkver,
		config,
		digests: new Map(),
		fetcher: deps.fetcher,
		logger: deps.logger,
		releases: deps.releases,
	}
	const reports: PackageReport[] = []

	if (passes.versions) {
		deps.logger.start(`Checking ${entries.length} tracked package(s) for new releases...`)
		const outcomes = await mapWithConcurrency(entries, config.concurrency, (entry) =>
			syncTrackedPackage(entry, context),
		)
		reports.push(...outcomes.map((outcome) => ({ outcome, pass: "versions" as const })))
	}

	if (passes.hashes) {
		deps.logger.start(`Checking hashes of ${manifests.value.length} manifest(s)...`)
		const outcomes = await mapWithConcurrency(manifests.value, config.concurrency, (file) =>
			repairManifestHash(file, context),
		)
		reports.push(...outcomes.map((outcome) => ({ outcome, pass: "hashes" as const })))
	}

	const packageNames = collectPackageNames(manifests.value.map((file) => file.manifestId))

	let readme: ReadmeOutcome | null = null
	if (passes.readme) {
		readme = await writeReadme(config, deps, packageNames)
	}

	return { ok: true, value: { packageNames, readme, reports } }
}

async function writeReadme(
	config: SyncConfig,
	deps: RunDependencies,
	packageNames: string[],
): Promise<ReadmeOutcome | null> {
	let repo = deps.repoInfo
	if (!repo) {
		const resolved = await resolveRepoInfo({
			cwd: config.rootDir,
			githubRepository: deps.githubRepository,
		})
		if (resolved.warning) {
			deps.logger.warn(`${resolved.warning} Using default README info.`)
		}
		repo = resolved.info
	}

	const result = await updateReadme(packageNames, {
		endMarker: config.readmeEndMarker,
		readmePath: config.readmeFile,
		repo,
		startMarker: config.readmeStartMarker,
	})
	if (!result.ok) {
		deps.logger.error(`[${result.error.type}] ${result.error.message}`)
		return null
	}

	switch (result.value) {
		case "created":
			deps.logger.success(`Created ${config.readmeFile} with ${packageNames.length} package(s).`)
			break
		case "updated":
			deps.logger.success("README package list updated.")
			break
		case "unchanged":
			deps.logger.info("README package list already up to date.")
			break
		case "markers_missing":
			deps.logger.warn(
				`README markers ${config.readmeStartMarker} / ${config.readmeEndMarker} not found; list not written.`,
			)
			break
	}
	return result.value
}
