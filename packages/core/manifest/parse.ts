import { ARCH_64BIT, DEFAULT_MANIFEST_VERSION } from "../constants"
import type { ManifestParseError, Result } from "../types/error"
import { isPlainObject } from "../types/guards"
import type { JsonObject, ManifestDownload, ManifestRecord } from "./types"

const BYTE_ORDER_MARK = "\uFEFF"

export function stripByteOrderMark(contents: string): string {
	return contents.startsWith(BYTE_ORDER_MARK) ? contents.slice(1) : contents
}

export function parseManifest(
	contents: string,
	manifestPath: string,
): Result<ManifestRecord, ManifestParseError> {
	let parsed: unknown
	try {
		parsed = JSON.parse(stripByteOrderMark(contents))
	} catch (error) {
		return {
			error: {
				message: "Invalid JSON in manifest.",
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				type: "manifest_parse",
			},
			ok: false,
		}
	}

	if (!isPlainObject(parsed)) {
		return {
			error: {
				message: "Manifest must be a JSON object.",
				path: manifestPath,
				type: "manifest_parse",
			},
			ok: false,
		}
	}

	return { ok: true, value: toManifestRecord(parsed, manifestPath) }
}

/**
 * Build the typed view of a manifest document.
 */
export function toManifestRecord(data: JsonObject, manifestPath: string): ManifestRecord {
	const version = typeof data.version === "string" ? data.version.trim() : ""
	return {
		data,
		download: readDownload(data),
		hasVersion: version.length > 0,
		path: manifestPath,
		version: version || DEFAULT_MANIFEST_VERSION,
	}
}

/**
 * Locate the download URL and hash. The 64-bit architecture entry wins over
 * the top-level fields when both are present.
 */
export function extractUrlAndHash(record: ManifestRecord): ManifestDownload | null {
	return record.download
}

export function readArchitectureEntry(data: JsonObject): JsonObject | null {
	const architecture = data.architecture
	if (!isPlainObject(architecture)) return null
	const entry = architecture[ARCH_64BIT]
	return isPlainObject(entry) ? entry : null
}

function readDownload(data: JsonObject): ManifestDownload | null {
	const archEntry = readArchitectureEntry(data)
	if (archEntry && isUsableUrl(archEntry.url)) {
		return {
			hash: readHash(archEntry.hash),
			layout: { arch: ARCH_64BIT, kind: "architecture" },
			url: archEntry.url,
		}
	}

	if (isUsableUrl(data.url)) {
		return { hash: readHash(data.hash), layout: { kind: "root" }, url: data.url }
	}

	return null
}

function isUsableUrl(value: unknown): value is string {
	return typeof value === "string" && value.trim().length > 0
}

function readHash(value: unknown): string {
	return typeof value === "string" ? value.trim() : ""
}
