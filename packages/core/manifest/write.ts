import { MANIFEST_INDENT } from "../constants"
import type { ManifestRecord } from "./types"

/**
 * Serialize a manifest for disk. Key order follows the source document, so a
 * record that was not modified serializes to the same fields in the same order.
 */
export function serializeManifest(record: ManifestRecord): string {
	return `${JSON.stringify(record.data, null, MANIFEST_INDENT)}\n`
}
