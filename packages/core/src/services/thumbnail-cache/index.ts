/**
 * ThumbnailCache exports
 *
 * @module
 */

export * from "./ThumbnailCache.js"
