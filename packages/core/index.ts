/**
 * @bucket-sync/core
 *
 * Types and pure logic for keeping bucket manifests in step with upstream
 * releases: version resolution, asset selection, manifest layouts and the
 * README package list.
 */

export { assetMatchesKeywords, selectAsset } from "./assets/select"
export type { RawTrackingEntry } from "./config/tracking"
export { parseTrackingConfig } from "./config/tracking"
export {
	ARCH_64BIT,
	DEFAULT_MANIFEST_VERSION,
	EMPTY_LIST_MESSAGE,
	MANIFEST_EXTENSION,
	MANIFEST_INDENT,
	README_LIST_END,
	README_LIST_START,
} from "./constants"
export {
	extractUrlAndHash,
	parseManifest,
	readArchitectureEntry,
	stripByteOrderMark,
	toManifestRecord,
} from "./manifest/parse"
export { applyHash, applyVersionUpdate } from "./manifest/transform"
export type {
	JsonObject,
	ManifestDownload,
	ManifestLayout,
	ManifestRecord,
} from "./manifest/types"
export { serializeManifest } from "./manifest/write"
export type { RegionReplacement } from "./readme/region"
export { collectPackageNames, renderPackageList, replaceRegion } from "./readme/region"
export type { ReadmeTemplateOptions } from "./readme/template"
export { renderDefaultReadme } from "./readme/template"
export type { ManifestId, RepoSlug } from "./types/branded"
export {
	coerceManifestFileName,
	coerceManifestId,
	coerceRepoSlug,
} from "./types/coerce"
export type {
	AssetNotFoundError,
	BaseError,
	ConfigurationError,
	CoreError,
	DownloadError,
	HashError,
	IoError,
	ManifestParseError,
	ManifestWriteError,
	PackageError,
	ReleaseQueryError,
	Result,
	UnexpectedError,
	ValidationError,
	VersionParseError,
} from "./types/error"
export { isPlainObject } from "./types/guards"
export type { Release, ReleaseAsset } from "./types/release"
export type { ReleasePolicy, TrackingEntry } from "./types/tracking"
export type { CleanTagOptions } from "./version/clean"
export { cleanVersionFromTag } from "./version/clean"
export type { ParsedVersion, PrereleaseIdentifier } from "./version/compare"
export { compareParsedVersions, compareVersions, parseVersion } from "./version/compare"
export type { ReleaseResolution, ResolveOptions } from "./version/resolve"
export { resolveRelease, selectRelease } from "./version/resolve"
