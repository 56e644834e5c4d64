import type { ARCH_64BIT } from "../constants"

export type JsonObject = Record<string, unknown>

/**
 * Where a manifest keeps its download URL and hash. Resolved once when the
 * manifest is parsed; every later read and write goes through the same layout.
 */
export type ManifestLayout =
	| { kind: "architecture"; arch: typeof ARCH_64BIT }
	| { kind: "root" }

export interface ManifestDownload {
	layout: ManifestLayout
	url: string
	/** Empty when the manifest has no hash yet. */
	hash: string
}

export interface ManifestRecord {
	/** Source file the record was read from. */
	path: string
	/** The full document. Fields the updater does not know about are kept as-is. */
	data: JsonObject
	version: string
	hasVersion: boolean
	/** `null` when neither layout carries a non-empty URL. */
	download: ManifestDownload | null
}
