import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"
import dotenv from "dotenv"
import { z } from "zod"

function findEnvFile(): string | undefined {
	const candidates: string[] = []

	// Package directory first, then the directory the tool was started from
	const sourceDir = path.dirname(fileURLToPath(import.meta.url))
	candidates.push(path.resolve(sourceDir, ".env"))
	candidates.push(path.resolve(process.cwd(), ".env"))

	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate
		}
	}

	return undefined
}

const envPath = findEnvFile()
const dotenvResult = envPath ? dotenv.config({ path: envPath }) : { parsed: {} }

const str = () => z.string().trim().min(1)

export const schema = z.object({
	BUCKET_SYNC_API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	BUCKET_SYNC_CONCURRENCY: z.coerce.number().int().positive().max(16).optional(),
	BUCKET_SYNC_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
	GH_API_TOKEN: str().optional(),
	GITHUB_REPOSITORY: str().optional(),
	GITHUB_TOKEN: str().optional(),
})

export type Env = z.infer<typeof schema>

const mergedEnv = {
	...(dotenvResult.parsed ?? {}),
	...process.env,
}

export const env: Env = schema.parse(mergedEnv)

/**
 * Token for the GitHub API. `GH_API_TOKEN` wins so a dedicated token can be
 * used in CI where `GITHUB_TOKEN` is always present.
 */
export function githubToken(source: Env = env): string | undefined {
	return source.GH_API_TOKEN ?? source.GITHUB_TOKEN
}
