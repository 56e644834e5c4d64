import { describe, expect, it } from "vitest"
import {
	FALLBACK_REPO_INFO,
	repoInfoFromRemoteUrl,
	repoInfoFromSlug,
	resolveRepoInfo,
} from "@/readme/repo-info"

describe("repoInfoFromRemoteUrl", () => {
	it("parses https remotes", () => {
		expect(repoInfoFromRemoteUrl("https://github.com/acme/tools.git\n")).toEqual({
			bucketName: "tools",
			cloneUrl: "https://github.com/acme/tools.git",
			slug: "acme/tools",
		})
	})

	it("parses ssh remotes", () => {
		expect(repoInfoFromRemoteUrl("git@github.com:acme/tools.git")?.slug).toBe("acme/tools")
	})

	it("rejects other hosts", () => {
		expect(repoInfoFromRemoteUrl("https://gitlab.test/acme/tools.git")).toBeNull()
	})
})

describe("repoInfoFromSlug", () => {
	it("rejects values that are not owner/name", () => {
		expect(repoInfoFromSlug("just-a-name")).toBeNull()
	})
})

describe("resolveRepoInfo", () => {
	it("prefers GITHUB_REPOSITORY", async () => {
		const resolved = await resolveRepoInfo({ cwd: ".", githubRepository: "acme/tools" })

		expect(resolved).toEqual({
			info: {
				bucketName: "tools",
				cloneUrl: "https://github.com/acme/tools.git",
				slug: "acme/tools",
			},
		})
	})

	it("falls back with a warning for a malformed GITHUB_REPOSITORY", async () => {
		const resolved = await resolveRepoInfo({ cwd: ".", githubRepository: "tools" })

		expect(resolved.info).toBe(FALLBACK_REPO_INFO)
		expect(resolved.warning).toBe('GITHUB_REPOSITORY "tools" is not owner/name.')
	})
})
