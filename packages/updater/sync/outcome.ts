import type { ManifestId, PackageError, UnexpectedError } from "@bucket-sync/core"
import type { ConsolaInstance } from "consola"
import type { PackageOutcome, PackageState } from "@/sync/types"
import { describeError, toRawError } from "@/types/errors"

export function fail(
	manifestId: ManifestId,
	state: PackageState,
	error: PackageError,
	logger: ConsolaInstance,
): PackageOutcome {
	logger.error(`[${error.type}] ${error.message}`)
	return { error, kind: "failed", manifestId, state }
}

export function unexpectedError(error: unknown): UnexpectedError {
	return {
		message: `Unexpected error: ${describeError(error)}`,
		rawError: toRawError(error),
		type: "unexpected",
	}
}
