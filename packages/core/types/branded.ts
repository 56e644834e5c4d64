/**
 * Branded types used across core.
 */

declare const ManifestIdBrand: unique symbol
declare const RepoSlugBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

/** File stem of a bucket manifest, e.g. `ripgrep` for `bucket/ripgrep.json`. */
export type ManifestId = Brand<string, typeof ManifestIdBrand>
/** `owner/name` of a GitHub repository. */
export type RepoSlug = Brand<string, typeof RepoSlugBrand>
