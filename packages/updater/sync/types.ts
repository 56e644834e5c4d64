import type { ManifestId, PackageError } from "@bucket-sync/core"

/**
 * Steps of one package's cycle. A failure records the last step it reached.
 */
export type PackageState =
	| "start"
	| "manifest_loaded"
	| "releases_fetched"
	| "version_decided"
	| "asset_needed"
	| "asset_resolved"
	| "downloaded"
	| "hashed"

export type PackageOutcome =
	| { kind: "no_change"; manifestId: ManifestId; version: string; detail: string }
	| {
			kind: "version_updated"
			manifestId: ManifestId
			previousVersion: string
			version: string
			url: string
			/** Digest of the new artifact; written to disk by the hash pass. */
			hash: string
	  }
	| {
			kind: "hash_repaired"
			manifestId: ManifestId
			url: string
			previousHash: string
			hash: string
	  }
	| { kind: "skipped"; manifestId: ManifestId; reason: string; error?: PackageError }
	| { kind: "failed"; manifestId: ManifestId; state: PackageState; error: PackageError }

export type SyncPass = "versions" | "hashes"

export interface PackageReport {
	pass: SyncPass
	outcome: PackageOutcome
}

export type ReadmeOutcome = "created" | "updated" | "unchanged" | "markers_missing"

export interface RunSummary {
	reports: PackageReport[]
	/** Sorted, de-duplicated ids of every manifest the run looked at. */
	packageNames: string[]
	readme: ReadmeOutcome | null
}

/** Per-package totals; each package lands in exactly one bucket. */
export interface SummaryCounts {
	changed: number
	unchanged: number
	skipped: number
	failed: number
}

type SummaryBucket = keyof SummaryCounts

// A package seen by both passes is reported under its most significant result.
const BUCKET_RANK: Record<SummaryBucket, number> = {
	changed: 2,
	failed: 3,
	skipped: 1,
	unchanged: 0,
}

function bucketOf(outcome: PackageOutcome): SummaryBucket {
	switch (outcome.kind) {
		case "version_updated":
		case "hash_repaired":
			return "changed"
		case "no_change":
			return "unchanged"
		case "skipped":
			return "skipped"
		case "failed":
			return "failed"
	}
}

export function countOutcomes(reports: readonly PackageReport[]): SummaryCounts {
	const perPackage = new Map<string, SummaryBucket>()
	for (const { outcome } of reports) {
		const bucket = bucketOf(outcome)
		const previous = perPackage.get(outcome.manifestId)
		if (previous === undefined || BUCKET_RANK[bucket] > BUCKET_RANK[previous]) {
			perPackage.set(outcome.manifestId, bucket)
		}
	}

	const counts: SummaryCounts = { changed: 0, failed: 0, skipped: 0, unchanged: 0 }
	for (const bucket of perPackage.values()) {
		counts[bucket] += 1
	}
	return counts
}
