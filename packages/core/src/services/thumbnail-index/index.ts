/**
 * ThumbnailIndex exports
 *
 * @module
 */

export * as ThumbnailIndex from "./ThumbnailIndex.js"
export * from "./ThumbnailIndexStore.js"
