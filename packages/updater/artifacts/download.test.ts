import { readFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { HttpArtifactFetcher, streamToWriter } from "@/artifacts/download"
import type { FetchFn } from "@/sources/types"
import { withTempDir } from "@/tests/helpers"

const url = "https://downloads.test/tool.zip"

function fetcherFor(respond: () => Response, seen: RequestInit[] = []): HttpArtifactFetcher {
	const fetch: FetchFn = async (_input: string | URL | Request, init?: RequestInit) => {
		seen.push(init ?? {})
		return respond()
	}
	return new HttpArtifactFetcher({ fetch, timeoutMs: 1000, userAgent: "bucket-sync-test" })
}

function chunkedBody(chunks: string[]): ReadableStream<Uint8Array> {
	const encoder = new TextEncoder()
	return new ReadableStream({
		start(controller) {
			for (const chunk of chunks) {
				controller.enqueue(encoder.encode(chunk))
			}
			controller.close()
		},
	})
}

describe("HttpArtifactFetcher", () => {
	it("streams the body to the destination file", async () => {
		await withTempDir(async (dir) => {
			const destination = path.join(dir, "tool.zip.tmp")
			const seen: RequestInit[] = []
			const fetcher = fetcherFor(() => new Response(chunkedBody(["part-1,", "part-2"])), seen)

			const result = await fetcher.download(url, destination)

			expect(result).toEqual({ ok: true, value: undefined })
			expect(await readFile(destination, "utf8")).toBe("part-1,part-2")
			expect(new Headers(seen[0]?.headers).get("user-agent")).toBe("bucket-sync-test")
			expect(seen[0]?.redirect).toBe("follow")
		})
	})

	it("fails on a non-2xx status", async () => {
		await withTempDir(async (dir) => {
			const fetcher = fetcherFor(() => new Response("missing", { status: 404 }))

			const result = await fetcher.download(url, path.join(dir, "out.tmp"))

			expect(result).toEqual({
				error: {
					message: "Download failed with status 404.",
					rawError: undefined,
					source: url,
					status: 404,
					type: "download",
				},
				ok: false,
			})
		})
	})

	it("fails when the response has no body", async () => {
		await withTempDir(async (dir) => {
			const fetcher = fetcherFor(() => new Response(null, { status: 200 }))

			const result = await fetcher.download(url, path.join(dir, "out.tmp"))

			expect(result.ok).toBe(false)
			if (result.ok) return
			expect(result.error.message).toBe("Download returned an empty body.")
		})
	})

	it("reports a timeout", async () => {
		await withTempDir(async (dir) => {
			const fetcher = fetcherFor(() => {
				const error = new Error("The operation was aborted due to timeout")
				error.name = "TimeoutError"
				throw error
			})

			const result = await fetcher.download(url, path.join(dir, "out.tmp"))

			expect(result.ok).toBe(false)
			if (result.ok) return
			expect(result.error.message).toBe("Download timed out after 1000 ms.")
		})
	})
})

describe("streamToWriter", () => {
	it("cancels the body when a write fails", async () => {
		const encoder = new TextEncoder()
		let cancelReason: unknown = null
		const body = new ReadableStream<Uint8Array>({
			cancel(reason) {
				cancelReason = reason
			},
			pull(controller) {
				controller.enqueue(encoder.encode("chunk"))
			},
		})
		const diskFull = new Error("ENOSPC: no space left on device")
		let writes = 0

		await expect(
			streamToWriter(body, async () => {
				writes += 1
				if (writes === 2) throw diskFull
			}),
		).rejects.toBe(diskFull)

		expect(writes).toBe(2)
		expect(cancelReason).toBe(diskFull)
	})

	it("passes every chunk to the writer in order", async () => {
		const chunks: string[] = []
		const decoder = new TextDecoder()

		await streamToWriter(chunkedBody(["a", "b", "c"]), async (chunk) => {
			chunks.push(decoder.decode(chunk))
		})

		expect(chunks).toEqual(["a", "b", "c"])
	})
})
