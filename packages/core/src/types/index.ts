/**
 * Core types for the thumbnail cache
 *
 * Model types are derived from Effect Schema definitions to ensure
 * a single source of truth.
 *
 * @module
 */

import type { Effect } from "effect"

import type { OutputWriteError, SourceReadError } from "../errors/index.js"
import type {
  DimensionsSchema,
  ThumbnailIdentitySchema,
  ThumbnailIndexFileSchema,
  ThumbnailRecordSchema
} from "../schema/index.js"

// ============================================
// Schema-Derived Types
// ============================================

/**
 * Target bounds of a thumbnail in pixels; 0 on an axis means unconstrained
 */
export type Dimensions = typeof DimensionsSchema.Type

/**
 * Identity of one desired thumbnail.
 * Two identities with the same source route and dimensions are the same cache entry.
 */
export type ThumbnailIdentity = typeof ThumbnailIdentitySchema.Type

/**
 * A built, indexed thumbnail
 */
export type ThumbnailRecord = typeof ThumbnailRecordSchema.Type

/**
 * Persisted index document
 */
export type ThumbnailIndexFile = typeof ThumbnailIndexFileSchema.Type

// ============================================
// Content Access
// ============================================

/**
 * Seekable read access to the content of a repository file.
 * Only valid while the `data` callback that received it is running.
 */
export interface FileContent {
  /**
   * Total size in bytes
   */
  readonly size: () => Effect.Effect<number, SourceReadError>

  /**
   * Read up to `length` bytes starting at `offset`.
   * Returns fewer bytes at the end of the content.
   */
  readonly readAt: (offset: number, length: number) => Effect.Effect<Uint8Array, SourceReadError>

  /**
   * Read the whole content from the beginning
   */
  readonly readAll: () => Effect.Effect<Uint8Array, SourceReadError>
}

/**
 * Destination of a resize: an opened thumbnail file
 */
export interface OutputTarget {
  readonly path: string
  readonly write: (data: Uint8Array) => Effect.Effect<void, OutputWriteError>
}

// ============================================
// Events
// ============================================

/**
 * What started a conversion pass
 */
export type PassTrigger = "startup" | "reindex" | "manual"

/**
 * Outcome counters of one conversion pass
 */
export interface PassSummary {
  /** Files looked at, whether or not work was done */
  readonly filesVisited: number
  /** Thumbnails resized and added to the index */
  readonly created: number
  /** Thumbnails already present in the index */
  readonly cached: number
  /** Files skipped because their media type is not supported */
  readonly unsupported: number
  /** Files skipped because media type detection or route composition failed */
  readonly skipped: number
  /** Thumbnails whose build failed; retried on the next pass */
  readonly failed: number
  /** True if the pass ended early because the cache was stopped */
  readonly stopped: boolean
}

/**
 * Thumbnail cache event types
 */
export type ThumbnailCacheEvent =
  | { readonly type: "pass-started"; readonly trigger: PassTrigger }
  | { readonly type: "pass-completed"; readonly trigger: PassTrigger; readonly summary: PassSummary }
  | { readonly type: "thumbnail-created"; readonly record: ThumbnailRecord }
  | { readonly type: "thumbnail-failed"; readonly identity: ThumbnailIdentity; readonly error: string }

export type ThumbnailCacheEventCallback = (event: ThumbnailCacheEvent) => void
