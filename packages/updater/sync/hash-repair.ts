import { applyHash } from "@bucket-sync/core"
import { downloadAndHash } from "@/artifacts/temp"
import { type BucketManifestFile, loadManifest, saveManifest } from "@/manifest/store"
import type { SyncContext } from "@/sync/context"
import { fail, unexpectedError } from "@/sync/outcome"
import type { PackageOutcome, PackageState } from "@/sync/types"

/**
 * Fill in a manifest's hash from its current URL. Only manifests with an empty
 * or missing hash are downloaded, unless `verifyHashes` is set; the file is
 * rewritten only when the digest differs from what it already holds.
 */
export async function repairManifestHash(
	file: BucketManifestFile,
	context: SyncContext,
): Promise<PackageOutcome> {
	const { manifestId } = file
	const logger = context.logger.withTag(manifestId)
	let state: PackageState = "start"

	try {
		const loaded = await loadManifest(file.path)
		if (!loaded.ok) {
			return fail(manifestId, state, loaded.error, logger)
		}
		const record = loaded.value
		state = "manifest_loaded"

		const download = record.download
		if (!download) {
			const reason = "Manifest has no url field; hash not checked."
			logger.warn(reason)
			return { kind: "skipped", manifestId, reason }
		}

		if (download.hash && !context.config.verifyHashes) {
			return {
				detail: "Hash present.",
				kind: "no_change",
				manifestId,
				version: record.version,
			}
		}

		let hash = context.digests.get(download.url)
		if (hash === undefined) {
			const artifact = await downloadAndHash(context.fetcher, download.url, {
				label: manifestId,
				tempRoot: context.config.tempDir,
			})
			if (!artifact.ok) {
				const reached = artifact.error.type === "hash" ? "downloaded" : state
				return fail(manifestId, reached, artifact.error, logger)
			}
			hash = artifact.value.hash
			context.digests.set(download.url, hash)
		}
		state = "hashed"

		if (hash === download.hash) {
			logger.info("Hash matches the manifest.")
			return { detail: "Hash matches.", kind: "no_change", manifestId, version: record.version }
		}

		const updated = applyHash(record, hash)
		if (!updated) {
			return { kind: "skipped", manifestId, reason: "Manifest has no url field." }
		}
		const saved = await saveManifest(file.path, updated)
		if (!saved.ok) {
			return fail(manifestId, state, saved.error, logger)
		}

		logger.success(
			download.hash ? `Hash changed: ${download.hash} -> ${hash}` : `Hash set: ${hash}`,
		)
		return {
			hash,
			kind: "hash_repaired",
			manifestId,
			previousHash: download.hash,
			url: download.url,
		}
	} catch (error) {
		return fail(manifestId, state, unexpectedError(error), logger)
	}
}
