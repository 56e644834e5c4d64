import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { IoError, ManifestId, Result } from "@bucket-sync/core"
import { describeError, toRawError } from "@/types/errors"

const execFileAsync = promisify(execFile)

/**
 * An external version check run before a package is processed. Best-effort:
 * callers log a failure and carry on.
 */
export interface CheckverRunner {
	run(manifestId: ManifestId): Promise<Result<string, IoError>>
}

export interface ScoopCheckverOptions {
	/** Repository root; scoop resolves the bucket from here. */
	cwd: string
	timeoutMs: number
	shell?: string
}

/**
 * Runs `scoop checkver <id> -u` through PowerShell.
 */
export class ScoopCheckverRunner implements CheckverRunner {
	constructor(private readonly options: ScoopCheckverOptions) {}

	async run(manifestId: ManifestId): Promise<Result<string, IoError>> {
		const shell = this.options.shell ?? "pwsh"
		const command = `scoop checkver '${manifestId.replace(/'/g, "''")}' -u`
		try {
			const { stdout } = await execFileAsync(shell, ["-NoProfile", "-Command", command], {
				cwd: this.options.cwd,
				encoding: "utf8",
				timeout: this.options.timeoutMs,
				windowsHide: true,
			})
			return { ok: true, value: stdout.trim() }
		} catch (error) {
			return {
				error: {
					message: `${shell} ${command} failed: ${describeError(error)}`,
					operation: "execFile",
					path: this.options.cwd,
					rawError: toRawError(error),
					type: "io",
				},
				ok: false,
			}
		}
	}
}
