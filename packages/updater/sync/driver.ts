import path from "node:path"
import {
	applyVersionUpdate,
	resolveRelease,
	selectAsset,
	type TrackingEntry,
} from "@bucket-sync/core"
import { downloadAndHash } from "@/artifacts/temp"
import { loadManifest, saveManifest } from "@/manifest/store"
import type { SyncContext } from "@/sync/context"
import { fail, unexpectedError } from "@/sync/outcome"
import type { PackageOutcome, PackageState } from "@/sync/types"

/**
 * Bring one tracked manifest up to the latest applicable upstream release.
 *
 * Start -> releases fetched -> version decided -> asset resolved -> downloaded
 * -> hashed -> manifest written. Any failure ends the cycle for this package
 * only; the manifest is written once, and only after the artifact hashed.
 * The hash is written empty here and filled in by the hash pass from
 * `context.digests`.
 */
export async function syncTrackedPackage(
	entry: TrackingEntry,
	context: SyncContext,
): Promise<PackageOutcome> {
	const { manifestId } = entry
	const logger = context.logger.withTag(manifestId)
	let state: PackageState = "start"

	try {
		if (context.checkver) {
			const checked = await context.checkver.run(manifestId)
			if (checked.ok) {
				if (checked.value) logger.debug(checked.value)
			} else {
				logger.warn(`External version check failed: ${checked.error.message}`)
			}
		}

		const manifestPath = path.join(context.config.bucketDir, entry.manifestFile)
		const loaded = await loadManifest(manifestPath)
		if (!loaded.ok) {
			return fail(manifestId, state, loaded.error, logger)
		}
		const record = loaded.value
		state = "manifest_loaded"
		if (!record.hasVersion) {
			logger.info(`No version in manifest, assuming ${record.version}.`)
		}

		const releases = await context.releases.listReleases(entry.repo)
		if (!releases.ok) {
			return fail(manifestId, state, releases.error, logger)
		}
		state = "releases_fetched"

		const resolution = resolveRelease(releases.value, entry, record.version, {
			truncateTagNoise: context.config.truncateTagNoise,
		})
		if (!resolution.ok) {
			return fail(manifestId, state, resolution.error, logger)
		}
		state = "version_decided"

		const decision = resolution.value
		if (decision.kind === "none_found") {
			const reason = `No ${entry.allowPrerelease ? "" : "stable "}release among ${decision.releaseCount} from ${entry.repo}.`
			logger.info(reason)
			return { kind: "skipped", manifestId, reason }
		}
		if (decision.kind === "up_to_date") {
			const detail = `Up to date (${record.version}; latest ${decision.release.tag} -> ${decision.version}).`
			logger.info(detail)
			return { detail, kind: "no_change", manifestId, version: record.version }
		}

		logger.info(`Newer version found: ${decision.version} > ${record.version}`)
		state = "asset_needed"
		if (!record.download) {
			const reason = "Manifest has no url field to update."
			logger.warn(reason)
			return { kind: "skipped", manifestId, reason }
		}

		const asset = selectAsset(decision.release.assets, entry.assetKeywords)
		if (!asset.ok) {
			logger.warn(`${asset.error.message} (release ${decision.release.tag})`)
			return { error: asset.error, kind: "skipped", manifestId, reason: asset.error.message }
		}
		state = "asset_resolved"
		logger.info(`Selected asset ${asset.value.filename}`)

		const artifact = await downloadAndHash(context.fetcher, asset.value.downloadUrl, {
			label: manifestId,
			tempRoot: context.config.tempDir,
		})
		if (!artifact.ok) {
			const reached = artifact.error.type === "hash" ? "downloaded" : state
			return fail(manifestId, reached, artifact.error, logger)
		}
		state = "hashed"

		const updated = applyVersionUpdate(record, decision.version, artifact.value.url)
		if (!updated) {
			const reason = "Manifest has no url field to update."
			logger.warn(reason)
			return { kind: "skipped", manifestId, reason }
		}

		const saved = await saveManifest(manifestPath, updated)
		if (!saved.ok) {
			return fail(manifestId, state, saved.error, logger)
		}
		context.digests.set(artifact.value.url, artifact.value.hash)
		logger.success(`Updated to ${decision.version}; hash cleared pending repair.`)

		return {
			hash: artifact.value.hash,
			kind: "version_updated",
			manifestId,
			previousVersion: record.version,
			url: artifact.value.url,
			version: decision.version,
		}
	} catch (error) {
		return fail(manifestId, state, unexpectedError(error), logger)
	}
}
