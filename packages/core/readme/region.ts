import { EMPTY_LIST_MESSAGE } from "../constants"

export type RegionReplacement =
	| { kind: "replaced"; content: string }
	| { kind: "unchanged"; content: string }
	| { kind: "markers_missing" }

/**
 * Sorted, de-duplicated package names for the README listing.
 */
export function collectPackageNames(ids: Iterable<string>): string[] {
	return [...new Set(ids)].sort()
}

export function renderPackageList(names: readonly string[]): string {
	if (names.length === 0) {
		return `${EMPTY_LIST_MESSAGE}\n`
	}
	return names.map((name) => `- \`${name}\`\n`).join("")
}

/**
 * Replace everything between the start and end markers with `body`. The
 * markers themselves stay in place.
 */
export function replaceRegion(
	document: string,
	startMarker: string,
	endMarker: string,
	body: string,
): RegionReplacement {
	const startIndex = document.indexOf(startMarker)
	const endIndex = document.indexOf(endMarker, startIndex === -1 ? 0 : startIndex)
	if (startIndex === -1 || endIndex === -1 || endIndex < startIndex + startMarker.length) {
		return { kind: "markers_missing" }
	}

	let before = document.slice(0, startIndex + startMarker.length)
	if (!before.endsWith("\n")) {
		before += "\n"
	}
	const middle = body === "" || body.endsWith("\n") ? body : `${body}\n`
	const after = document.slice(endIndex)

	const content = `${before}${middle}${after}`
	return content === document ? { content, kind: "unchanged" } : { content, kind: "replaced" }
}
