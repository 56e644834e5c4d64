/**
 * Shared constants for bucket manifests and the bucket README.
 */

/** Version assumed for a manifest that has no `version` field */
export const DEFAULT_MANIFEST_VERSION = "0.0.0"

/** Architecture key holding the 64-bit download in the nested layout */
export const ARCH_64BIT = "64bit"

export const MANIFEST_EXTENSION = ".json"

export const README_LIST_START = "<!-- BUCKET_APPS_START -->"
export const README_LIST_END = "<!-- BUCKET_APPS_END -->"

/** Body written between the README markers when the bucket is empty */
export const EMPTY_LIST_MESSAGE = "No applications have been added to this bucket yet."

/** Indentation used when manifests are written back to disk */
export const MANIFEST_INDENT = 4
