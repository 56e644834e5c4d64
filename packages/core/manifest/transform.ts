import { isPlainObject } from "../types/guards"
import type { JsonObject, ManifestLayout, ManifestRecord } from "./types"

/**
 * Pure transformation functions for ManifestRecord.
 * These return new records - no mutation of the source document.
 */

/**
 * Point the manifest at a new release. The hash is cleared so the stale value
 * of the previous artifact is never kept next to the new URL.
 * Returns null when the manifest has no download layout to write to.
 */
export function applyVersionUpdate(
	record: ManifestRecord,
	version: string,
	url: string,
): ManifestRecord | null {
	if (!record.download) return null
	const layout = record.download.layout
	const data = writeDownload({ ...record.data, version }, layout, { hash: "", url })
	return {
		...record,
		data,
		download: { hash: "", layout, url },
		hasVersion: true,
		version,
	}
}

/**
 * Set the hash alone, on the layout the URL was read from.
 */
export function applyHash(record: ManifestRecord, hash: string): ManifestRecord | null {
	if (!record.download) return null
	const { layout, url } = record.download
	return {
		...record,
		data: writeDownload(record.data, layout, { hash }),
		download: { hash, layout, url },
	}
}

function writeDownload(
	data: JsonObject,
	layout: ManifestLayout,
	fields: { url?: string; hash: string },
): JsonObject {
	switch (layout.kind) {
		case "root":
			return { ...data, ...fields }
		case "architecture": {
			const architecture = asObject(data.architecture)
			const entry = asObject(architecture[layout.arch])
			return {
				...data,
				architecture: { ...architecture, [layout.arch]: { ...entry, ...fields } },
			}
		}
	}
}

function asObject(value: unknown): JsonObject {
	return isPlainObject(value) ? { ...value } : {}
}
