import { createHash } from "node:crypto"
import { createReadStream } from "node:fs"
import type { HashError, Result } from "@bucket-sync/core"

export const HASH_ALGORITHM = "sha256"

/**
 * SHA-256 of a file, read as a stream. Lowercase hex.
 */
export async function hashFile(filePath: string): Promise<Result<string, HashError>> {
	return new Promise((resolve) => {
		const hash = createHash(HASH_ALGORITHM)
		const stream = createReadStream(filePath)
		stream.on("data", (chunk) => hash.update(chunk))
		stream.on("error", (error) =>
			resolve({
				error: {
					message: `Failed to hash ${filePath}: ${error.message}`,
					path: filePath,
					rawError: error,
					type: "hash",
				},
				ok: false,
			}),
		)
		stream.on("end", () => resolve({ ok: true, value: hash.digest("hex").toLowerCase() }))
	})
}

export function hashBytes(bytes: Uint8Array | string): string {
	return createHash(HASH_ALGORITHM).update(bytes).digest("hex").toLowerCase()
}
