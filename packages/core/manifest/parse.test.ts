import { describe, expect, it } from "vitest"
import { extractUrlAndHash, parseManifest } from "./parse"

const testPath = "/bucket/app.json"

describe("parseManifest", () => {
	it("rejects invalid JSON", () => {
		const result = parseManifest("{ version: 1 }", testPath)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.type).toBe("manifest_parse")
			expect(result.error.path).toBe(testPath)
		}
	})

	it("rejects a document that is not an object", () => {
		const result = parseManifest("[1, 2]", testPath)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.message).toBe("Manifest must be a JSON object.")
		}
	})

	it("tolerates a byte-order mark", () => {
		const result = parseManifest('\uFEFF{"version": "1.0.0"}', testPath)

		expect(result.ok && result.value.version).toBe("1.0.0")
	})

	it("defaults a missing version to 0.0.0", () => {
		const result = parseManifest('{"url": "https://example.test/a.zip"}', testPath)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.version).toBe("0.0.0")
			expect(result.value.hasVersion).toBe(false)
		}
	})

	it("reads the root layout", () => {
		const result = parseManifest(
			JSON.stringify({ hash: "abc", url: "https://example.test/a.zip", version: "1.0.0" }),
			testPath,
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(extractUrlAndHash(result.value)).toEqual({
				hash: "abc",
				layout: { kind: "root" },
				url: "https://example.test/a.zip",
			})
		}
	})

	it("prefers the 64-bit architecture layout", () => {
		const result = parseManifest(
			JSON.stringify({
				architecture: {
					"64bit": { hash: "def", url: "https://example.test/a64.zip" },
				},
				url: "https://example.test/root.zip",
				version: "1.0.0",
			}),
			testPath,
		)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(extractUrlAndHash(result.value)).toEqual({
				hash: "def",
				layout: { arch: "64bit", kind: "architecture" },
				url: "https://example.test/a64.zip",
			})
		}
	})

	it("falls back to the root layout when the architecture entry has no url", () => {
		const result = parseManifest(
			JSON.stringify({
				architecture: { "64bit": { hash: "def" } },
				url: "https://example.test/root.zip",
			}),
			testPath,
		)

		expect(result.ok && result.value.download?.layout).toEqual({ kind: "root" })
	})

	it("treats a missing hash as empty", () => {
		const result = parseManifest('{"url": "https://example.test/a.zip"}', testPath)

		expect(result.ok && result.value.download?.hash).toBe("")
	})

	it("returns no download when neither layout has a url", () => {
		const result = parseManifest('{"version": "1.0.0", "url": "  "}', testPath)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(extractUrlAndHash(result.value)).toBeNull()
		}
	})
})
