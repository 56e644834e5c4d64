import { mkdir, mkdtemp, rm, rmdir } from "node:fs/promises"
import path from "node:path"
import type { DownloadError, HashError, IoError, Result } from "@bucket-sync/core"
import { consola } from "consola"
import type { ArtifactFetcher } from "@/artifacts/download"
import { hashFile } from "@/artifacts/hash"
import { describeError, toRawError } from "@/types/errors"

export type ArtifactError = DownloadError | HashError | IoError

export interface DownloadedArtifact {
	url: string
	hash: string
}

/**
 * Download `url` into a private directory under `tempRoot`, hash it, and
 * remove the file, its directory and (when nothing else is left) `tempRoot`
 * on every exit path.
 */
export async function downloadAndHash(
	fetcher: ArtifactFetcher,
	url: string,
	options: { tempRoot: string; label: string },
): Promise<Result<DownloadedArtifact, ArtifactError>> {
	const dirResult = await createTempDir(options.tempRoot, options.label)
	if (!dirResult.ok) {
		return dirResult
	}
	const tempDir = dirResult.value
	const filePath = path.join(tempDir, artifactFileName(url))

	try {
		const downloaded = await fetcher.download(url, filePath)
		if (!downloaded.ok) {
			return downloaded
		}
		const hashed = await hashFile(filePath)
		if (!hashed.ok) {
			return hashed
		}
		return { ok: true, value: { hash: hashed.value, url } }
	} finally {
		await cleanupTempDir(tempDir, options.tempRoot)
	}
}

const TEMP_DIR_ATTEMPTS = 5

/**
 * Private directory for one download under `tempRoot`. The root is shared
 * with packages running in parallel, which remove it when they finish and
 * find it empty; an ENOENT in between means it went away, so it is recreated.
 */
export async function createTempDir(
	tempRoot: string,
	label: string,
): Promise<Result<string, IoError>> {
	const prefix = path.join(tempRoot, `${sanitizeSegment(label)}-`)
	let lastError: unknown
	for (let attempt = 0; attempt < TEMP_DIR_ATTEMPTS; attempt += 1) {
		try {
			await mkdir(tempRoot, { recursive: true })
			return { ok: true, value: await mkdtemp(prefix) }
		} catch (error) {
			lastError = error
			if (!hasCode(error, "ENOENT")) break
		}
	}

	return {
		error: {
			message: `Cannot create temporary directory: ${describeError(lastError)}`,
			operation: "mkdtemp",
			path: prefix,
			rawError: toRawError(lastError),
			type: "io",
		},
		ok: false,
	}
}

export async function cleanupTempDir(tempDir: string, tempRoot: string): Promise<void> {
	try {
		await rm(tempDir, { force: true, recursive: true })
	} catch (error) {
		consola.warn(`Could not remove ${tempDir}: ${describeError(error)}`)
		return
	}

	try {
		await rmdir(tempRoot)
	} catch (error) {
		// Another package is still using the root, or it is already gone.
		if (!hasCode(error, "ENOTEMPTY") && !hasCode(error, "ENOENT") && !hasCode(error, "EEXIST")) {
			consola.warn(`Could not remove ${tempRoot}: ${describeError(error)}`)
		}
	}
}

/**
 * File name for a downloaded artifact, derived from the URL path.
 */
export function artifactFileName(url: string): string {
	let base = ""
	try {
		base = path.posix.basename(new URL(url).pathname)
	} catch {
		base = path.posix.basename(url.split("?")[0] ?? "")
	}
	const safe = sanitizeSegment(base)
	return `${safe || "artifact"}.tmp`
}

function sanitizeSegment(value: string): string {
	return value.replace(/[^A-Za-z0-9._-]/g, "_")
}

function hasCode(error: unknown, code: string): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === code
}
