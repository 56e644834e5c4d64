import type { Result, VersionParseError } from "../types/error"

export type PrereleaseIdentifier = number | string

export interface ParsedVersion {
	raw: string
	numbers: number[]
	prerelease: PrereleaseIdentifier[]
}

const VERSION_PATTERN = /^[vV]?(\d+(?:\.\d+)*)(?:[-._]?([0-9A-Za-z][0-9A-Za-z._-]*))?(?:\+[0-9A-Za-z.-]+)?$/
const NUMERIC_IDENTIFIER = /^\d+$/

export function parseVersion(value: string): Result<ParsedVersion, VersionParseError> {
	const trimmed = value.trim()
	const match = VERSION_PATTERN.exec(trimmed)
	if (!match?.[1]) {
		return {
			error: {
				message: `Invalid version string "${value}".`,
				type: "version_parse",
				version: value,
			},
			ok: false,
		}
	}

	const numbers = match[1].split(".").map((segment) => Number.parseInt(segment, 10))
	const prerelease = match[2]
		? match[2]
				.split(/[._-]/)
				.filter((part) => part.length > 0)
				.map((part) =>
					NUMERIC_IDENTIFIER.test(part) ? Number.parseInt(part, 10) : part,
				)
		: []

	return { ok: true, value: { numbers, prerelease, raw: trimmed } }
}

/**
 * Semantic-version ordering: numeric segments compare as numbers with missing
 * trailing segments treated as zero, and a version carrying a pre-release
 * suffix sorts below the same numbers without one.
 */
export function compareParsedVersions(a: ParsedVersion, b: ParsedVersion): -1 | 0 | 1 {
	const len = Math.max(a.numbers.length, b.numbers.length)
	for (let i = 0; i < len; i++) {
		const va = a.numbers[i] ?? 0
		const vb = b.numbers[i] ?? 0
		if (va < vb) return -1
		if (va > vb) return 1
	}

	if (a.prerelease.length === 0 && b.prerelease.length === 0) return 0
	if (a.prerelease.length === 0) return 1
	if (b.prerelease.length === 0) return -1

	const preLen = Math.max(a.prerelease.length, b.prerelease.length)
	for (let i = 0; i < preLen; i++) {
		const ia = a.prerelease[i]
		const ib = b.prerelease[i]
		if (ia === undefined) return -1
		if (ib === undefined) return 1
		const order = compareIdentifiers(ia, ib)
		if (order !== 0) return order
	}

	return 0
}

export function compareVersions(
	a: string,
	b: string,
): Result<-1 | 0 | 1, VersionParseError> {
	const left = parseVersion(a)
	if (!left.ok) return left
	const right = parseVersion(b)
	if (!right.ok) return right
	return { ok: true, value: compareParsedVersions(left.value, right.value) }
}

function compareIdentifiers(a: PrereleaseIdentifier, b: PrereleaseIdentifier): -1 | 0 | 1 {
	if (typeof a === "number" && typeof b === "number") {
		return a === b ? 0 : a < b ? -1 : 1
	}
	// Numeric identifiers have lower precedence than alphanumeric ones.
	if (typeof a === "number") return -1
	if (typeof b === "number") return 1
	const la = a.toLowerCase()
	const lb = b.toLowerCase()
	return la === lb ? 0 : la < lb ? -1 : 1
}
