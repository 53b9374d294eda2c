/**
 * Path utilities for the metadata folder
 *
 * @module
 */

/**
 * Name of the persisted index file inside the metadata folder
 */
export const INDEX_FILE_NAME = "thumbnail.index"

/**
 * Name of the thumbnail folder inside the metadata folder
 */
export const THUMBNAILS_DIRECTORY = "thumbnails"

/**
 * Join path segments, keeping a leading `/` of the first segment
 *
 * @example
 * ```ts
 * joinPath("/var/meta/", "thumbnails") // => "/var/meta/thumbnails"
 * ```
 */
export const joinPath = (...segments: Array<string>): string =>
  segments
    .filter((s) => s.length > 0)
    .join("/")
    .replace(/\/+/g, "/")
