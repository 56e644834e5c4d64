import { randomBytes } from "node:crypto"
import { readFile, readdir, rename, rm, writeFile } from "node:fs/promises"
import path from "node:path"
import {
	coerceManifestFileName,
	type IoError,
	MANIFEST_EXTENSION,
	type ManifestId,
	type ManifestParseError,
	type ManifestRecord,
	type ManifestWriteError,
	parseManifest,
	type Result,
	serializeManifest,
} from "@bucket-sync/core"
import { describeError, isNotFound, toRawError } from "@/types/errors"

export interface BucketManifestFile {
	manifestId: ManifestId
	path: string
}

export interface SaveOutcome {
	/** False when the file already held exactly the serialized content. */
	written: boolean
}

export async function loadManifest(
	manifestPath: string,
): Promise<Result<ManifestRecord, ManifestParseError | IoError>> {
	let contents: string
	try {
		contents = await readFile(manifestPath, "utf8")
	} catch (error) {
		if (isNotFound(error)) {
			return {
				error: { message: "Manifest file not found.", path: manifestPath, type: "manifest_parse" },
				ok: false,
			}
		}
		return {
			error: {
				message: `Cannot read manifest: ${describeError(error)}`,
				operation: "readFile",
				path: manifestPath,
				rawError: toRawError(error),
				type: "io",
			},
			ok: false,
		}
	}

	return parseManifest(contents, manifestPath)
}

/**
 * Persist a manifest. The document goes to a temporary file next to the target
 * and is renamed over it, so the file on disk is always one complete version.
 */
export async function saveManifest(
	manifestPath: string,
	record: ManifestRecord,
): Promise<Result<SaveOutcome, ManifestWriteError>> {
	const serialized = serializeManifest(record)

	const current = await readCurrent(manifestPath)
	if (current === serialized) {
		return { ok: true, value: { written: false } }
	}

	const tempPath = `${manifestPath}.${randomBytes(6).toString("hex")}.tmp`
	try {
		await writeFile(tempPath, serialized, "utf8")
	} catch (error) {
		await rm(tempPath, { force: true })
		return writeFailure(manifestPath, "writeFile", error)
	}

	try {
		await rename(tempPath, manifestPath)
	} catch (error) {
		await rm(tempPath, { force: true })
		return writeFailure(manifestPath, "rename", error)
	}

	return { ok: true, value: { written: true } }
}

/**
 * Every `*.json` manifest directly inside the bucket directory, sorted by id.
 */
export async function listBucketManifests(
	bucketDir: string,
): Promise<Result<BucketManifestFile[], IoError>> {
	let names: string[]
	try {
		names = await readdir(bucketDir)
	} catch (error) {
		return {
			error: {
				message: `Cannot list bucket directory: ${describeError(error)}`,
				operation: "readdir",
				path: bucketDir,
				rawError: toRawError(error),
				type: "io",
			},
			ok: false,
		}
	}

	const manifests: BucketManifestFile[] = []
	for (const name of names) {
		if (!name.toLowerCase().endsWith(MANIFEST_EXTENSION)) continue
		const manifestId = coerceManifestFileName(name)
		if (!manifestId) continue
		manifests.push({ manifestId, path: path.join(bucketDir, name) })
	}
	manifests.sort((a, b) => (a.manifestId < b.manifestId ? -1 : a.manifestId > b.manifestId ? 1 : 0))
	return { ok: true, value: manifests }
}

async function readCurrent(manifestPath: string): Promise<string | null> {
	// Unreadable counts as different; the write below reports the real problem.
	try {
		return await readFile(manifestPath, "utf8")
	} catch {
		return null
	}
}

function writeFailure(
	manifestPath: string,
	operation: string,
	error: unknown,
): Result<never, ManifestWriteError> {
	return {
		error: {
			message: `Cannot write manifest: ${describeError(error)}`,
			operation,
			path: manifestPath,
			rawError: toRawError(error),
			type: "manifest_write",
		},
		ok: false,
	}
}
