#!/usr/bin/env node

import { Command } from "commander"
import { z } from "zod"
import { printError, printSummary } from "@/commands/outcome"
import { runCommand } from "@/commands/run"
import type { SyncConfigOverrides } from "@/config"
import type { RunPasses } from "@/sync/run"

const RunOptionsSchema = z.object({
	checkver: z.boolean().default(false),
	concurrency: z.coerce.number().int().positive().max(16).optional(),
	keepTagNoise: z.boolean().default(false),
	readme: z.boolean().default(true),
	root: z.string().trim().min(1).default("."),
	verifyHashes: z.boolean().default(false),
})

type RawRunOptions = Record<string, unknown>

async function run(rawOptions: RawRunOptions, passes: RunPasses): Promise<void> {
	const parsed = RunOptionsSchema.safeParse(rawOptions)
	if (!parsed.success) {
		printError({
			field: "options",
			message: parsed.error.message,
			source: "zod",
			type: "validation",
			zodError: parsed.error,
		})
		return
	}

	const options = parsed.data
	const overrides: SyncConfigOverrides = {
		concurrency: options.concurrency,
		runCheckver: options.checkver,
		truncateTagNoise: !options.keepTagNoise,
		verifyHashes: options.verifyHashes,
	}

	const result = await runCommand({
		overrides,
		passes: { ...passes, readme: passes.readme && options.readme },
		root: options.root,
	})
	if (!result.ok) {
		printError(result.error)
		return
	}
	printSummary(result.value)
}

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("bucket-sync")
		.description("Keep bucket manifests in step with upstream GitHub releases")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("sync", { isDefault: true })
		.description("Update versions and URLs, repair hashes, refresh the README list")
		.option("--root <dir>", "Repository root", ".")
		.option("--concurrency <count>", "Packages processed at once")
		.option("--verify-hashes", "Re-hash every manifest, not only empty hashes")
		.option("--no-readme", "Leave the README untouched")
		.option("--checkver", "Run `scoop checkver` for each tracked package first")
		.option("--keep-tag-noise", "Compare tags without cutting trailing text")
		.action(async (options: RawRunOptions) => {
			await run(options, { hashes: true, readme: true, versions: true })
		})

	program
		.command("hashes")
		.description("Fill in missing manifest hashes")
		.option("--root <dir>", "Repository root", ".")
		.option("--concurrency <count>", "Packages processed at once")
		.option("--verify-hashes", "Re-hash every manifest, not only empty hashes")
		.action(async (options: RawRunOptions) => {
			await run(options, { hashes: true, readme: false, versions: false })
		})

	program
		.command("readme")
		.description("Regenerate the README package list")
		.option("--root <dir>", "Repository root", ".")
		.action(async (options: RawRunOptions) => {
			await run(options, { hashes: false, readme: true, versions: false })
		})

	await program.parseAsync(process.argv)
}

void main()
