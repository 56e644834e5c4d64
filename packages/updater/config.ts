import path from "node:path"
import { README_LIST_END, README_LIST_START } from "@bucket-sync/core"

/**
 * Run-level settings. Everything that used to be a module constant in the
 * bucket scripts lives here and is passed to the driver explicitly.
 */
export interface SyncConfig {
	/** Repository root; relative directories below resolve against it. */
	rootDir: string
	/** Directory holding one `<id>.json` manifest per package. */
	bucketDir: string
	/** Tracking configuration (`apps_config.json`). */
	configFile: string
	readmeFile: string
	/** Scratch directory for downloads; removed again once it is empty. */
	tempDir: string
	readmeStartMarker: string
	readmeEndMarker: string
	userAgent: string
	/** Timeout for one GitHub API request. */
	apiTimeoutMs: number
	/** Timeout for one artifact download, body included. */
	downloadTimeoutMs: number
	/** Packages processed at the same time. 1 keeps the run sequential. */
	concurrency: number
	/** Cut tags like `1.2.3 (stable)` down to `1.2.3` before comparing. */
	truncateTagNoise: boolean
	/** Re-hash every manifest, not only those with an empty hash. */
	verifyHashes: boolean
	/** Run the external version check for each tracked package first. */
	runCheckver: boolean
}

export const DEFAULT_USER_AGENT =
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36"

export const DEFAULTS = {
	apiTimeoutMs: 30_000,
	bucketDir: "bucket",
	concurrency: 1,
	configFile: "apps_config.json",
	downloadTimeoutMs: 300_000,
	readmeFile: "README.md",
	runCheckver: false,
	tempDir: ".bucket-sync-tmp",
	truncateTagNoise: true,
	verifyHashes: false,
} as const

export type SyncConfigOverrides = Partial<Omit<SyncConfig, "rootDir">>

export function createSyncConfig(rootDir: string, overrides: SyncConfigOverrides = {}): SyncConfig {
	const root = path.resolve(rootDir)
	const resolve = (value: string) => path.resolve(root, value)
	return {
		apiTimeoutMs: overrides.apiTimeoutMs ?? DEFAULTS.apiTimeoutMs,
		bucketDir: resolve(overrides.bucketDir ?? DEFAULTS.bucketDir),
		concurrency: overrides.concurrency ?? DEFAULTS.concurrency,
		configFile: resolve(overrides.configFile ?? DEFAULTS.configFile),
		downloadTimeoutMs: overrides.downloadTimeoutMs ?? DEFAULTS.downloadTimeoutMs,
		readmeEndMarker: overrides.readmeEndMarker ?? README_LIST_END,
		readmeFile: resolve(overrides.readmeFile ?? DEFAULTS.readmeFile),
		readmeStartMarker: overrides.readmeStartMarker ?? README_LIST_START,
		rootDir: root,
		runCheckver: overrides.runCheckver ?? DEFAULTS.runCheckver,
		tempDir: resolve(overrides.tempDir ?? DEFAULTS.tempDir),
		truncateTagNoise: overrides.truncateTagNoise ?? DEFAULTS.truncateTagNoise,
		userAgent: overrides.userAgent ?? DEFAULT_USER_AGENT,
		verifyHashes: overrides.verifyHashes ?? DEFAULTS.verifyHashes,
	}
}
