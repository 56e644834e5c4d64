import { readFile, writeFile } from "node:fs/promises"
import {
	type IoError,
	renderDefaultReadme,
	renderPackageList,
	replaceRegion,
	type Result,
} from "@bucket-sync/core"
import type { RepoInfo } from "@/readme/repo-info"
import type { ReadmeOutcome } from "@/sync/types"
import { describeError, isNotFound, toRawError } from "@/types/errors"

export interface ReadmeOptions {
	readmePath: string
	startMarker: string
	endMarker: string
	repo: RepoInfo
}

/**
 * Write the package list between the README markers. A missing README is
 * created from the default template and filled on the same call.
 */
export async function updateReadme(
	packageNames: readonly string[],
	options: ReadmeOptions,
): Promise<Result<ReadmeOutcome, IoError>> {
	let current: string
	let created = false
	try {
		current = await readFile(options.readmePath, "utf8")
	} catch (error) {
		if (!isNotFound(error)) {
			return ioFailure(options.readmePath, "readFile", error)
		}
		current = renderDefaultReadme({
			bucketName: options.repo.bucketName,
			endMarker: options.endMarker,
			repoUrl: options.repo.cloneUrl,
			startMarker: options.startMarker,
		})
		created = true
	}

	const replaced = replaceRegion(
		current,
		options.startMarker,
		options.endMarker,
		renderPackageList(packageNames),
	)
	if (replaced.kind === "markers_missing") {
		return { ok: true, value: "markers_missing" }
	}
	if (replaced.kind === "unchanged" && !created) {
		return { ok: true, value: "unchanged" }
	}

	try {
		await writeFile(options.readmePath, replaced.content, "utf8")
	} catch (error) {
		return ioFailure(options.readmePath, "writeFile", error)
	}

	return { ok: true, value: created ? "created" : "updated" }
}

function ioFailure(targetPath: string, operation: string, error: unknown): Result<never, IoError> {
	return {
		error: {
			message: `README ${operation} failed: ${describeError(error)}`,
			operation,
			path: targetPath,
			rawError: toRawError(error),
			type: "io",
		},
		ok: false,
	}
}
