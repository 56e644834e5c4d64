import { execFile } from "node:child_process"
import { promisify } from "node:util"
import { coerceRepoSlug } from "@bucket-sync/core"

const execFileAsync = promisify(execFile)

export interface RepoInfo {
	/** `owner/name`, or a placeholder when it cannot be determined. */
	slug: string
	bucketName: string
	cloneUrl: string
}

const GITHUB_REMOTE_PATTERN = /github\.com[/:]([\w.-]+)\/([\w.-]+?)(?:\.git)?$/

export const FALLBACK_REPO_INFO: RepoInfo = {
	bucketName: "MyScoopBucket",
	cloneUrl: "https://github.com/YourUsername/YourRepoName.git",
	slug: "YourUsername/YourRepoName",
}

export function repoInfoFromSlug(value: string): RepoInfo | null {
	const slug = coerceRepoSlug(value)
	if (!slug) return null
	const name = slug.split("/")[1] ?? slug
	return { bucketName: name, cloneUrl: `https://github.com/${slug}.git`, slug }
}

export function repoInfoFromRemoteUrl(remoteUrl: string): RepoInfo | null {
	const match = GITHUB_REMOTE_PATTERN.exec(remoteUrl.trim())
	if (!match?.[1] || !match[2]) return null
	return repoInfoFromSlug(`${match[1]}/${match[2]}`)
}

/**
 * Repository identity for the README: `GITHUB_REPOSITORY` when set, otherwise
 * the `origin` remote of the git checkout at `cwd`.
 */
export async function resolveRepoInfo(options: {
	githubRepository?: string
	cwd: string
}): Promise<{ info: RepoInfo; warning?: string }> {
	if (options.githubRepository) {
		const info = repoInfoFromSlug(options.githubRepository)
		if (info) return { info }
		return {
			info: FALLBACK_REPO_INFO,
			warning: `GITHUB_REPOSITORY "${options.githubRepository}" is not owner/name.`,
		}
	}

	try {
		const { stdout } = await execFileAsync("git", ["remote", "get-url", "origin"], {
			cwd: options.cwd,
			encoding: "utf8",
		})
		const info = repoInfoFromRemoteUrl(stdout)
		if (info) return { info }
		return {
			info: FALLBACK_REPO_INFO,
			warning: "Could not parse a GitHub repository from the origin remote.",
		}
	} catch (error) {
		return {
			info: FALLBACK_REPO_INFO,
			warning: `git remote get-url origin failed: ${error instanceof Error ? error.message : String(error)}`,
		}
	}
}
