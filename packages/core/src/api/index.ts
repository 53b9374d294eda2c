/**
 * Promise-based API
 *
 * Simple, non-Effect API for the thumbnail cache.
 *
 * @module
 */

export {
  createThumbnailCache,
  type CreateThumbnailCacheConfig,
  type ThumbnailCacheInstance,
  type ThumbnailCacheStartupError
} from "./createThumbnailCache.js"
