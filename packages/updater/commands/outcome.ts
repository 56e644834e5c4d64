import type { BaseError } from "@bucket-sync/core"
import { consola } from "consola"
import type { ZodError } from "zod"
import { countOutcomes, type PackageReport, type RunSummary } from "@/sync/types"

type PrintableError = BaseError & {
	field?: string
	path?: string
	operation?: string
	status?: number
	source?: string
	target?: string
	version?: string
	zodError?: ZodError
}

export function formatErrorChain(error: PrintableError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

/** Report a fatal error and mark the process as failed. */
export function printError(error: PrintableError): void {
	consola.error(formatErrorChain(error))
	printRawErrorChain(error)
	process.exitCode = 1
}

function formatErrorChainLines(error: PrintableError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	if (error.zodError) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of error.zodError.issues) {
			const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${pathLabel}: ${issue.message}`)
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

export function printRawErrorChain(error: PrintableError): void {
	if (error.rawError) {
		consola.debug(error.rawError)
	}
	if (error.cause) {
		printRawErrorChain(error.cause)
	}
}

function buildDetailParts(error: PrintableError): string[] {
	const details: string[] = []
	if (typeof error.field === "string") {
		details.push(`field=${error.field}`)
	}
	if (typeof error.path === "string") {
		details.push(`path=${error.path}`)
	}
	if (typeof error.operation === "string") {
		details.push(`operation=${error.operation}`)
	}
	if (typeof error.status === "number") {
		details.push(`status=${error.status}`)
	}
	if (typeof error.source === "string") {
		details.push(`source=${error.source}`)
	}
	if (typeof error.target === "string") {
		details.push(`target=${error.target}`)
	}
	if (typeof error.version === "string") {
		details.push(`version=${error.version}`)
	}
	return details
}

export function describeReport({ outcome, pass }: PackageReport): string {
	const label = `${outcome.manifestId} (${pass})`
	switch (outcome.kind) {
		case "version_updated":
			return `${label}: ${outcome.previousVersion} -> ${outcome.version}`
		case "hash_repaired":
			return `${label}: hash ${outcome.previousHash || "<empty>"} -> ${outcome.hash}`
		case "no_change":
			return `${label}: ${outcome.detail}`
		case "skipped":
			return `${label}: skipped, ${outcome.reason}`
		case "failed":
			return `${label}: failed at ${outcome.state}\n${formatErrorChain(outcome.error)}`
	}
}

/**
 * Closing report of a run. Package failures are listed but leave the exit
 * code alone.
 */
export function printSummary(summary: RunSummary): void {
	const counts = countOutcomes(summary.reports)

	for (const report of summary.reports) {
		if (report.outcome.kind === "failed") {
			consola.error(describeReport(report))
		} else if (report.outcome.kind !== "no_change") {
			consola.info(describeReport(report))
		}
	}

	consola.box(
		[
			`Changed: ${counts.changed}`,
			`Unchanged: ${counts.unchanged}`,
			`Skipped: ${counts.skipped}`,
			`Failed: ${counts.failed}`,
			`Packages listed in README: ${summary.packageNames.length}`,
		].join("\n"),
	)

	if (counts.failed > 0) {
		consola.warn("Errors occurred; see the messages above.")
	} else if (counts.changed > 0 || summary.readme === "created" || summary.readme === "updated") {
		consola.success("Changes made.")
	} else {
		consola.success("No changes needed.")
	}
}
