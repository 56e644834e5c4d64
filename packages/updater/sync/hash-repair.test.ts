import { readFile } from "node:fs/promises"
import { coerceManifestId, type ManifestId } from "@bucket-sync/core"
import { describe, expect, it } from "vitest"
import { hashBytes } from "@/artifacts/hash"
import type { BucketManifestFile } from "@/manifest/store"
import { repairManifestHash } from "@/sync/hash-repair"
import {
	createTestContext,
	FakeArtifactFetcher,
	readJson,
	withTempDir,
	writeBucketManifest,
} from "@/tests/helpers"

const assetUrl = "https://downloads.test/v1.0.0/tool.zip"

function manifestId(value: string): ManifestId {
	const id = coerceManifestId(value)
	if (!id) throw new Error(`bad id ${value}`)
	return id
}

async function bucketFile(root: string, data: Record<string, unknown>): Promise<BucketManifestFile> {
	const filePath = await writeBucketManifest(root, "tool", data)
	return { manifestId: manifestId("tool"), path: filePath }
}

describe("repairManifestHash", () => {
	it("downloads and writes the hash when it is empty", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { hash: "", url: assetUrl, version: "1.0.0" })
			const fetcher = new FakeArtifactFetcher({ [assetUrl]: "tool-bytes" })
			const context = createTestContext(root, { fetcher })

			const outcome = await repairManifestHash(file, context)

			const expected = hashBytes("tool-bytes")
			expect(expected).toMatch(/^[0-9a-f]{64}$/)
			expect(outcome).toEqual({
				hash: expected,
				kind: "hash_repaired",
				manifestId: "tool",
				previousHash: "",
				url: assetUrl,
			})
			expect(await readJson(file.path)).toEqual({
				hash: expected,
				url: assetUrl,
				version: "1.0.0",
			})
		})
	})

	it("is idempotent", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { url: assetUrl, version: "1.0.0" })
			const fetcher = new FakeArtifactFetcher({ [assetUrl]: "tool-bytes" })

			const first = await repairManifestHash(file, createTestContext(root, { fetcher }))
			const afterFirst = await readFile(file.path, "utf8")
			const second = await repairManifestHash(file, createTestContext(root, { fetcher }))

			expect(first.kind).toBe("hash_repaired")
			expect(second).toEqual({
				detail: "Hash present.",
				kind: "no_change",
				manifestId: "tool",
				version: "1.0.0",
			})
			expect(await readFile(file.path, "utf8")).toBe(afterFirst)
			expect(fetcher.calls).toEqual([assetUrl])
		})
	})

	it("uses a digest computed earlier in the run instead of downloading", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { hash: "", url: assetUrl, version: "1.0.0" })
			const fetcher = new FakeArtifactFetcher({})
			const context = createTestContext(root, { fetcher })
			context.digests.set(assetUrl, hashBytes("cached"))

			const outcome = await repairManifestHash(file, context)

			expect(outcome.kind).toBe("hash_repaired")
			expect(fetcher.calls).toEqual([])
			expect(await readJson(file.path)).toEqual({
				hash: hashBytes("cached"),
				url: assetUrl,
				version: "1.0.0",
			})
		})
	})

	it("leaves a matching hash alone when verifying", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, {
				hash: hashBytes("tool-bytes"),
				url: assetUrl,
				version: "1.0.0",
			})
			const before = await readFile(file.path, "utf8")
			const fetcher = new FakeArtifactFetcher({ [assetUrl]: "tool-bytes" })
			const context = createTestContext(root, { fetcher }, { verifyHashes: true })

			const outcome = await repairManifestHash(file, context)

			expect(outcome.kind).toBe("no_change")
			if (outcome.kind !== "no_change") return
			expect(outcome.detail).toBe("Hash matches.")
			expect(fetcher.calls).toEqual([assetUrl])
			expect(await readFile(file.path, "utf8")).toBe(before)
		})
	})

	it("replaces a stale hash when verifying", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { hash: "deadbeef", url: assetUrl, version: "1.0.0" })
			const context = createTestContext(
				root,
				{ fetcher: new FakeArtifactFetcher({ [assetUrl]: "tool-bytes" }) },
				{ verifyHashes: true },
			)

			const outcome = await repairManifestHash(file, context)

			expect(outcome.kind).toBe("hash_repaired")
			if (outcome.kind !== "hash_repaired") return
			expect(outcome.previousHash).toBe("deadbeef")
			expect(outcome.hash).toBe(hashBytes("tool-bytes"))
		})
	})

	it("writes the hash into the 64bit entry for architecture manifests", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, {
				architecture: { "64bit": { url: assetUrl } },
				version: "1.0.0",
			})
			const context = createTestContext(root, {
				fetcher: new FakeArtifactFetcher({ [assetUrl]: "tool-bytes" }),
			})

			await repairManifestHash(file, context)

			expect(await readJson(file.path)).toEqual({
				architecture: { "64bit": { hash: hashBytes("tool-bytes"), url: assetUrl } },
				version: "1.0.0",
			})
		})
	})

	it("skips manifests without a url", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { version: "1.0.0" })

			const outcome = await repairManifestHash(file, createTestContext(root, {}))

			expect(outcome.kind).toBe("skipped")
		})
	})

	it("fails and keeps the empty hash when the download fails", async () => {
		await withTempDir(async (root) => {
			const file = await bucketFile(root, { hash: "", url: assetUrl, version: "1.0.0" })
			const before = await readFile(file.path, "utf8")

			const outcome = await repairManifestHash(
				file,
				createTestContext(root, { fetcher: new FakeArtifactFetcher({}) }),
			)

			expect(outcome.kind).toBe("failed")
			if (outcome.kind !== "failed") return
			expect(outcome.error.type).toBe("download")
			expect(await readFile(file.path, "utf8")).toBe(before)
		})
	})
})
