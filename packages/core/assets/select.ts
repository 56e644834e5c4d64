import type { AssetNotFoundError, Result } from "../types/error"
import type { ReleaseAsset } from "../types/release"

/**
 * Case-insensitive substring match of every keyword against the file name.
 */
export function assetMatchesKeywords(asset: ReleaseAsset, keywords: readonly string[]): boolean {
	const name = asset.filename.toLowerCase()
	return keywords.every((keyword) => name.includes(keyword.toLowerCase()))
}

/**
 * First asset, in release order, whose file name contains all keywords.
 * An empty keyword list matches the first asset.
 */
export function selectAsset(
	assets: readonly ReleaseAsset[],
	keywords: readonly string[],
): Result<ReleaseAsset, AssetNotFoundError> {
	const match = assets.find((asset) => assetMatchesKeywords(asset, keywords))
	if (match) {
		return { ok: true, value: match }
	}

	return {
		error: {
			keywords,
			message:
				assets.length === 0
					? "Release has no assets."
					: `No asset matches keywords [${keywords.join(", ")}] among ${assets.length} asset(s).`,
			target: "asset",
			type: "asset_not_found",
		},
		ok: false,
	}
}
