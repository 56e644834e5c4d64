import type { ConfigurationError, ValidationError } from "@bucket-sync/core"

/** Errors that stop the run before any package is processed. */
export type FatalError = ConfigurationError | ValidationError

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}
	return String(error)
}

export function toRawError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}

export function isNotFound(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
}
