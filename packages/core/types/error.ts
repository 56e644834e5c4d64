import type { ZodError } from "zod"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: string
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: string
	  })

export type ConfigurationError = BaseError & {
	type: "configuration"
	path?: string
}

export type ReleaseQueryError = BaseError & {
	type: "release_query"
	source: string
	status?: number
	retryable?: boolean
}

export type VersionParseError = BaseError & {
	type: "version_parse"
	version: string
}

export type AssetNotFoundError = BaseError & {
	type: "asset_not_found"
	target: string
	keywords: readonly string[]
}

export type DownloadError = BaseError & {
	type: "download"
	source: string
	status?: number
}

export type HashError = BaseError & {
	type: "hash"
	path: string
}

export type ManifestParseError = BaseError & {
	type: "manifest_parse"
	path: string
}

export type ManifestWriteError = BaseError & {
	type: "manifest_write"
	path: string
	operation: string
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

/** Anything thrown where a Result was expected. */
export type UnexpectedError = BaseError & {
	type: "unexpected"
}

export type CoreError =
	| ValidationError
	| ConfigurationError
	| VersionParseError
	| AssetNotFoundError
	| ManifestParseError

/** Errors that end one package's cycle without stopping the run. */
export type PackageError =
	| ReleaseQueryError
	| VersionParseError
	| AssetNotFoundError
	| DownloadError
	| HashError
	| ManifestParseError
	| ManifestWriteError
	| IoError
	| UnexpectedError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
