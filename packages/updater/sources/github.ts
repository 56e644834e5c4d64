import type { Release, ReleaseQueryError, RepoSlug, Result } from "@bucket-sync/core"
import { consola } from "consola"
import { z } from "zod"
import type { FetchFn, ReleaseSource } from "@/sources/types"

const GITHUB_API_BASE = "https://api.github.com"

const GithubAssetSchema = z.object({
	browser_download_url: z.string().min(1),
	name: z.string(),
})

const GithubReleaseSchema = z.object({
	assets: z.array(GithubAssetSchema).default([]),
	draft: z.boolean().default(false),
	prerelease: z.boolean().default(false),
	tag_name: z.string().nullable().default(null),
})

const GithubReleaseListSchema = z.array(GithubReleaseSchema)

export interface GithubReleaseSourceOptions {
	/** Optional credential; without it requests go out unauthenticated. */
	token?: string
	timeoutMs: number
	userAgent: string
	/** Releases requested per call (GitHub caps this at 100). */
	perPage?: number
	apiBase?: string
	fetch?: FetchFn
}

export class GithubReleaseSource implements ReleaseSource {
	private readonly fetchFn: FetchFn
	private readonly apiBase: string
	private readonly perPage: number

	constructor(private readonly options: GithubReleaseSourceOptions) {
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
		this.apiBase = options.apiBase ?? GITHUB_API_BASE
		this.perPage = options.perPage ?? 30
	}

	get authenticated(): boolean {
		return Boolean(this.options.token)
	}

	async listReleases(repo: RepoSlug): Promise<Result<Release[], ReleaseQueryError>> {
		const url = `${this.apiBase}/repos/${repo}/releases?per_page=${this.perPage}`
		const responseResult = await this.fetchGithubApi(url)
		if (!responseResult.ok) {
			return responseResult
		}

		let payload: unknown
		try {
			payload = await responseResult.value.json()
		} catch (error) {
			return {
				error: {
					message: "GitHub response parsing failed.",
					rawError: error instanceof Error ? error : undefined,
					source: url,
					type: "release_query",
				},
				ok: false,
			}
		}

		const parsed = GithubReleaseListSchema.safeParse(payload)
		if (!parsed.success) {
			return {
				error: {
					message: `GitHub release list has an unexpected shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}.`,
					source: url,
					type: "release_query",
				},
				ok: false,
			}
		}

		const releases: Release[] = []
		for (const release of parsed.data) {
			// Drafts are only visible to authenticated maintainers and have no public assets.
			if (release.draft || !release.tag_name) {
				continue
			}
			releases.push({
				assets: release.assets.map((asset) => ({
					downloadUrl: asset.browser_download_url,
					filename: asset.name,
				})),
				isPrerelease: release.prerelease,
				tag: release.tag_name,
			})
		}

		return { ok: true, value: releases }
	}

	/**
	 * Low-level GitHub API fetch with standard error handling.
	 * Handles network errors, timeouts, rate limiting (403/429), and non-2xx responses.
	 */
	private async fetchGithubApi(url: string): Promise<Result<Response, ReleaseQueryError>> {
		let response: Response
		try {
			response = await this.fetchFn(url, {
				headers: this.buildHeaders(),
				method: "GET",
				signal: AbortSignal.timeout(this.options.timeoutMs),
			})
		} catch (error) {
			return {
				error: {
					message: isTimeout(error)
						? `GitHub request timed out after ${this.options.timeoutMs} ms.`
						: "GitHub request failed.",
					rawError: error instanceof Error ? error : undefined,
					source: url,
					type: "release_query",
				},
				ok: false,
			}
		}

		if (response.ok) {
			return { ok: true, value: response }
		}

		const message = extractGithubMessage(await readGithubResponseBody(response))
		consola.debug(`[github] ${response.status} response from ${url}`)

		if (response.status === 404) {
			return {
				error: {
					message: "GitHub repo not found (404).",
					source: url,
					status: response.status,
					type: "release_query",
				},
				ok: false,
			}
		}

		if (
			response.status === 429 ||
			(response.status === 403 && isRateLimitResponse(response, message))
		) {
			return {
				error: {
					message: this.authenticated
						? "GitHub rate limit exceeded."
						: "GitHub rate limit exceeded. Set GH_API_TOKEN for a higher limit.",
					retryable: true,
					source: url,
					status: response.status,
					type: "release_query",
				},
				ok: false,
			}
		}

		if (response.status === 401 || response.status === 403) {
			const label = response.status === 401 ? "unauthorized" : "forbidden"
			return {
				error: {
					message: message
						? `GitHub request ${label} (${response.status}): ${message}`
						: `GitHub request ${label} (${response.status}).`,
					source: url,
					status: response.status,
					type: "release_query",
				},
				ok: false,
			}
		}

		return {
			error: {
				message: `GitHub request failed with status ${response.status}.`,
				source: url,
				status: response.status,
				type: "release_query",
			},
			ok: false,
		}
	}

	private buildHeaders(): Record<string, string> {
		const headers: Record<string, string> = {
			Accept: "application/vnd.github+json",
			"User-Agent": this.options.userAgent,
			"X-GitHub-Api-Version": "2022-11-28",
		}

		if (this.options.token) {
			headers.Authorization = `Bearer ${this.options.token}`
		}

		return headers
	}
}

export function isTimeout(error: unknown): boolean {
	return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")
}

function isRateLimitResponse(response: Response, message: string | null): boolean {
	if (response.headers.get("x-ratelimit-remaining") === "0") {
		return true
	}
	return message?.toLowerCase().includes("rate limit") ?? false
}

async function readGithubResponseBody(response: Response): Promise<string | null> {
	try {
		const text = await response.text()
		const trimmed = text.trim()
		return trimmed.length > 0 ? trimmed : null
	} catch {
		return null
	}
}

function extractGithubMessage(body: string | null): string | null {
	if (!body) {
		return null
	}

	try {
		const parsed: unknown = JSON.parse(body)
		if (
			typeof parsed === "object" &&
			parsed !== null &&
			"message" in parsed &&
			typeof parsed.message === "string"
		) {
			return parsed.message
		}
	} catch {
		// fall through to raw body
	}

	return body
}
