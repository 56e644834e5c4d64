import { describe, expect, it } from "vitest"
import { mapWithConcurrency } from "@/sync/pool"

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}

describe("mapWithConcurrency", () => {
	it("keeps the input order in the results", async () => {
		const results = await mapWithConcurrency([30, 10, 20], 3, async (ms) => {
			await delay(ms)
			return ms * 2
		})

		expect(results).toEqual([60, 20, 40])
	})

	it("never runs more than the limit at once", async () => {
		let active = 0
		let peak = 0

		await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
			active += 1
			peak = Math.max(peak, active)
			await delay(5)
			active -= 1
		})

		expect(peak).toBe(2)
	})

	it("runs sequentially with a limit of one", async () => {
		const order: string[] = []

		await mapWithConcurrency(["a", "b"], 1, async (item) => {
			order.push(`start ${item}`)
			await delay(1)
			order.push(`end ${item}`)
		})

		expect(order).toEqual(["start a", "end a", "start b", "end b"])
	})

	it("returns an empty list for no items", async () => {
		expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([])
	})
})
