export interface ReleaseAsset {
	filename: string
	downloadUrl: string
}

/**
 * One published upstream release. Release sources return these newest-first,
 * in the forge's own order.
 */
export interface Release {
	tag: string
	isPrerelease: boolean
	assets: ReleaseAsset[]
}
