import type { ManifestId, RepoSlug } from "./branded"

const MANIFEST_ID_INVALID_CHARS = /[/\\:*?"<>|]/

export function coerceManifestId(value: string): ManifestId | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (MANIFEST_ID_INVALID_CHARS.test(trimmed)) return null
	if (trimmed === "." || trimmed === "..") return null
	return trimmed as ManifestId
}

/**
 * Derive a manifest id from a bucket file name (`app.json` -> `app`).
 */
export function coerceManifestFileName(value: string): ManifestId | null {
	const trimmed = value.trim()
	const stem = trimmed.toLowerCase().endsWith(".json")
		? trimmed.slice(0, -".json".length)
		: trimmed
	return coerceManifestId(stem)
}

const REPO_SLUG_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/

export function coerceRepoSlug(value: string): RepoSlug | null {
	const trimmed = value.trim().replace(/\.git$/, "")
	if (!REPO_SLUG_PATTERN.test(trimmed)) return null
	const [owner, name] = trimmed.split("/")
	if (owner === "." || owner === ".." || name === "." || name === "..") {
		return null
	}
	return trimmed as RepoSlug
}
