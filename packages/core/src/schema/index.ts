/**
 * Effect Schema definitions for the thumbnail cache
 *
 * These schemas are the single source of truth for the thumbnail model and
 * for the on-disk index format. The index file is JSON:
 *
 * ```json
 * {
 *   "thumbnails": [
 *     {
 *       "sourceRoute": "documents/sample/files/image.jpg",
 *       "dimensions": { "maxWidth": 200, "maxHeight": 0 },
 *       "fileName": "3f2a...-200-0.jpg"
 *     }
 *   ]
 * }
 * ```
 *
 * Properties not listed here are ignored when decoding, so files written by
 * newer versions still load.
 *
 * @module
 */

import { Schema } from "effect"

// ============================================
// Schema Definitions (Source of Truth)
// ============================================

/**
 * A non-negative pixel bound, 0 meaning unconstrained
 */
export const PixelBoundSchema = Schema.Int.pipe(Schema.nonNegative())

/**
 * Target bounds of a thumbnail
 */
export const DimensionsSchema = Schema.Struct({
  maxWidth: PixelBoundSchema,
  maxHeight: PixelBoundSchema
})

/**
 * Logical identity of a thumbnail: the source file and its target bounds
 */
export const ThumbnailIdentitySchema = Schema.Struct({
  sourceRoute: Schema.String,
  dimensions: DimensionsSchema
})

/**
 * A built thumbnail as stored in the index
 */
export const ThumbnailRecordSchema = Schema.Struct({
  ...ThumbnailIdentitySchema.fields,
  fileName: Schema.String
})

/**
 * Root document of the persisted index file
 */
export const ThumbnailIndexFileSchema = Schema.Struct({
  thumbnails: Schema.Array(ThumbnailRecordSchema)
})

/**
 * JSON text <-> index document
 */
export const ThumbnailIndexFileJson = Schema.parseJson(ThumbnailIndexFileSchema)

export const decodeThumbnailIndexFile = Schema.decodeUnknown(ThumbnailIndexFileJson)

export const encodeThumbnailIndexFile = Schema.encode(ThumbnailIndexFileJson)
