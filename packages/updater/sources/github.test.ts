import { coerceRepoSlug, type RepoSlug } from "@bucket-sync/core"
import { describe, expect, it } from "vitest"
import { GithubReleaseSource } from "@/sources/github"
import type { FetchFn } from "@/sources/types"

interface RecordedRequest {
	url: string
	headers: Headers
}

function repo(value: string): RepoSlug {
	const slug = coerceRepoSlug(value)
	if (!slug) throw new Error(`bad slug ${value}`)
	return slug
}

function fakeFetch(
	respond: () => Response | Promise<Response>,
	requests: RecordedRequest[] = [],
): FetchFn {
	return async (input: string | URL | Request, init?: RequestInit) => {
		requests.push({ headers: new Headers(init?.headers), url: String(input) })
		return respond()
	}
}

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
	return new Response(JSON.stringify(body), {
		headers: { "content-type": "application/json", ...headers },
		status,
	})
}

const githubRelease = (tag: string | null, extra: Record<string, unknown> = {}) => ({
	assets: [{ browser_download_url: `https://github.test/${tag}/tool.zip`, name: "tool.zip" }],
	draft: false,
	prerelease: false,
	tag_name: tag,
	...extra,
})

function createSource(fetch: FetchFn, token?: string): GithubReleaseSource {
	return new GithubReleaseSource({
		apiBase: "https://api.github.test",
		fetch,
		timeoutMs: 1000,
		token,
		userAgent: "bucket-sync-test",
	})
}

describe("GithubReleaseSource", () => {
	it("maps releases in the order GitHub returns them", async () => {
		const requests: RecordedRequest[] = []
		const source = createSource(
			fakeFetch(
				() =>
					jsonResponse([
						githubRelease("v2.0.0-beta", { prerelease: true }),
						githubRelease("v1.9.0"),
					]),
				requests,
			),
		)

		const result = await source.listReleases(repo("acme/tool"))

		expect(result).toEqual({
			ok: true,
			value: [
				{
					assets: [{ downloadUrl: "https://github.test/v2.0.0-beta/tool.zip", filename: "tool.zip" }],
					isPrerelease: true,
					tag: "v2.0.0-beta",
				},
				{
					assets: [{ downloadUrl: "https://github.test/v1.9.0/tool.zip", filename: "tool.zip" }],
					isPrerelease: false,
					tag: "v1.9.0",
				},
			],
		})
		expect(requests[0]?.url).toBe("https://api.github.test/repos/acme/tool/releases?per_page=30")
	})

	it("drops drafts and releases without a tag", async () => {
		const source = createSource(
			fakeFetch(() =>
				jsonResponse([
					githubRelease("v3.0.0", { draft: true }),
					githubRelease(null),
					githubRelease("v2.0.0"),
				]),
			),
		)

		const result = await source.listReleases(repo("acme/tool"))

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.value.map((release) => release.tag)).toEqual(["v2.0.0"])
	})

	it("sends the token as a bearer credential", async () => {
		const requests: RecordedRequest[] = []
		const source = createSource(fakeFetch(() => jsonResponse([]), requests), "test-token")

		await source.listReleases(repo("acme/tool"))

		expect(requests[0]?.headers.get("authorization")).toBe("Bearer test-token")
		expect(requests[0]?.headers.get("user-agent")).toBe("bucket-sync-test")
	})

	it("sends no credential without a token", async () => {
		const requests: RecordedRequest[] = []
		const source = createSource(fakeFetch(() => jsonResponse([]), requests))

		await source.listReleases(repo("acme/tool"))

		expect(requests[0]?.headers.get("authorization")).toBeNull()
	})

	it("reports a missing repository", async () => {
		const source = createSource(
			fakeFetch(() => jsonResponse({ message: "Not Found" }, 404)),
		)

		const result = await source.listReleases(repo("acme/gone"))

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error).toMatchObject({
			message: "GitHub repo not found (404).",
			status: 404,
			type: "release_query",
		})
	})

	it("flags rate limiting as retryable", async () => {
		const source = createSource(
			fakeFetch(() =>
				jsonResponse({ message: "API rate limit exceeded" }, 403, {
					"x-ratelimit-remaining": "0",
				}),
			),
		)

		const result = await source.listReleases(repo("acme/tool"))

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.retryable).toBe(true)
		expect(result.error.message).toBe(
			"GitHub rate limit exceeded. Set GH_API_TOKEN for a higher limit.",
		)
	})

	it("includes GitHub's message for other forbidden responses", async () => {
		const source = createSource(
			fakeFetch(() => jsonResponse({ message: "Resource not accessible" }, 403)),
		)

		const result = await source.listReleases(repo("acme/tool"))

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.message).toBe("GitHub request forbidden (403): Resource not accessible")
	})

	it("turns a network failure into a release query error", async () => {
		const source = createSource(
			fakeFetch(() => {
				throw new TypeError("fetch failed")
			}),
		)

		const result = await source.listReleases(repo("acme/tool"))

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.message).toBe("GitHub request failed.")
		expect(result.error.rawError?.message).toBe("fetch failed")
	})

	it("rejects a payload that is not a release list", async () => {
		const source = createSource(fakeFetch(() => jsonResponse({ releases: [] })))

		const result = await source.listReleases(repo("acme/tool"))

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.type).toBe("release_query")
	})
})
