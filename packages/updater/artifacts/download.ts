import { open } from "node:fs/promises"
import type { DownloadError, Result } from "@bucket-sync/core"
import { consola } from "consola"
import { isTimeout } from "@/sources/github"
import type { FetchFn } from "@/sources/types"
import { describeError, toRawError } from "@/types/errors"

/**
 * Retrieves the bytes behind a URL into a local file.
 */
export interface ArtifactFetcher {
	download(url: string, destination: string): Promise<Result<void, DownloadError>>
}

export interface HttpArtifactFetcherOptions {
	timeoutMs: number
	userAgent: string
	fetch?: FetchFn
}

export class HttpArtifactFetcher implements ArtifactFetcher {
	private readonly fetchFn: FetchFn

	constructor(private readonly options: HttpArtifactFetcherOptions) {
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
	}

	async download(url: string, destination: string): Promise<Result<void, DownloadError>> {
		let response: Response
		try {
			response = await this.fetchFn(url, {
				headers: { "User-Agent": this.options.userAgent },
				redirect: "follow",
				signal: AbortSignal.timeout(this.options.timeoutMs),
			})
		} catch (error) {
			return downloadFailure(url, this.describeFailure(error), error)
		}

		if (!response.ok) {
			return downloadFailure(
				url,
				`Download failed with status ${response.status}.`,
				undefined,
				response.status,
			)
		}
		if (!response.body) {
			return downloadFailure(url, "Download returned an empty body.")
		}

		let handle: Awaited<ReturnType<typeof open>>
		try {
			handle = await open(destination, "w")
		} catch (error) {
			return downloadFailure(url, `Cannot create ${destination}: ${describeError(error)}`, error)
		}

		try {
			await streamToWriter(response.body, (chunk) => handle.write(chunk))
		} catch (error) {
			return downloadFailure(url, this.describeFailure(error), error)
		} finally {
			await handle.close()
		}

		return { ok: true, value: undefined }
	}

	private describeFailure(error: unknown): string {
		if (isTimeout(error)) {
			return `Download timed out after ${this.options.timeoutMs} ms.`
		}
		return `Download failed: ${describeError(error)}`
	}
}

/**
 * Copy a response body chunk by chunk. When a read or write fails the body is
 * cancelled, so the connection is released instead of idling until the
 * timeout, and the original error is rethrown.
 */
export async function streamToWriter(
	body: ReadableStream<Uint8Array>,
	write: (chunk: Uint8Array) => Promise<unknown>,
): Promise<void> {
	const reader = body.getReader()
	try {
		while (true) {
			const { done, value } = await reader.read()
			if (done) return
			await write(value)
		}
	} catch (error) {
		await reader.cancel(error).catch((cancelError: unknown) => {
			consola.debug(`Cancelling download body failed: ${describeError(cancelError)}`)
		})
		throw error
	}
}

function downloadFailure(
	url: string,
	message: string,
	error?: unknown,
	status?: number,
): Result<never, DownloadError> {
	return {
		error: {
			message,
			rawError: toRawError(error),
			source: url,
			status,
			type: "download",
		},
		ok: false,
	}
}
