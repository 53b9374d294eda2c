/**
 * createThumbnailCache - Promise-based thumbnail cache factory
 *
 * Wraps the ThumbnailCache service in a managed runtime for callers that do
 * not use Effect. The cache starts on `start()` or on the first call that
 * needs it, and shuts down (stop, then index save) on `dispose()`.
 *
 * @module
 */

import type { FileSystem } from "@effect/platform/FileSystem"
import { Cause, Effect, Exit, Layer, ManagedRuntime, Option } from "effect"

import type { OutputDirectoryUnavailableError, RepositoryScanError } from "../errors/index.js"
import type { ImageConverter } from "../services/image-converter/index.js"
import type { ContentRepository } from "../services/repository/index.js"
import {
  ThumbnailCache,
  ThumbnailCacheLive,
  type ThumbnailCacheOptions,
  type ThumbnailCacheService
} from "../services/thumbnail-cache/index.js"
import { ThumbnailIndexStoreLive } from "../services/thumbnail-index/index.js"
import type { Dimensions, PassSummary, ThumbnailRecord } from "../types/index.js"

/**
 * Configuration for createThumbnailCache
 */
export interface CreateThumbnailCacheConfig extends ThumbnailCacheOptions {
  /** Source of the files to build thumbnails for */
  readonly repository: Layer.Layer<ContentRepository, RepositoryScanError>

  /** Image resizer */
  readonly imageConverter: Layer.Layer<ImageConverter>

  /** Filesystem holding the index and the thumbnails */
  readonly fileSystem: Layer.Layer<FileSystem>
}

/**
 * Thumbnail cache instance returned by createThumbnailCache
 */
export interface ThumbnailCacheInstance {
  /** Create the thumbnail folder, load the index and start the startup pass */
  start: () => Promise<void>

  /** Find a built thumbnail */
  lookup: (sourceRoute: string, dimensions: Dimensions) => Promise<ThumbnailRecord | null>

  /** Location of a built thumbnail on disk */
  thumbnailPath: (sourceRoute: string, dimensions: Dimensions) => Promise<string | null>

  /** Run a pass now and wait for it */
  runPass: () => Promise<PassSummary>

  /** Save the index now */
  flush: () => Promise<void>

  /** Stop scheduling passes; the index is still saved on dispose */
  stop: () => Promise<void>

  /** Stop, save the index and release resources */
  dispose: () => Promise<void>
}

/**
 * Errors that prevent the cache from starting
 */
export type ThumbnailCacheStartupError = OutputDirectoryUnavailableError | RepositoryScanError

// ============================================================================
// Main Factory
// ============================================================================

/**
 * Create a thumbnail cache instance
 *
 * @example
 * ```typescript
 * import { NodeFileSystem } from "@effect/platform-node"
 * import { Layer } from "effect"
 * import { DirectoryRepositoryLive } from "@thumbnail-cache/adapter-node"
 * import { createThumbnailCache } from "@thumbnail-cache/core"
 * import { VipsImageConverterLive } from "@thumbnail-cache/image"
 *
 * const thumbnails = createThumbnailCache({
 *   metadataRoot: "/srv/notes/.thumbnail-cache",
 *   repository: DirectoryRepositoryLive({ root: "/srv/notes" }).pipe(Layer.provide(NodeFileSystem.layer)),
 *   imageConverter: VipsImageConverterLive,
 *   fileSystem: NodeFileSystem.layer
 * })
 *
 * await thumbnails.start()
 * const path = await thumbnails.thumbnailPath("trip/files/beach.jpg", { maxWidth: 400, maxHeight: 0 })
 *
 * await thumbnails.dispose()
 * ```
 */
export function createThumbnailCache(config: CreateThumbnailCacheConfig): ThumbnailCacheInstance {
  const { fileSystem, imageConverter, repository, ...options } = config

  let disposed = false
  let cacheService: ThumbnailCacheService | null = null

  const IndexStoreLayer = Layer.provide(fileSystem)(ThumbnailIndexStoreLive)
  const MainLayer = Layer.provide(
    Layer.mergeAll(fileSystem, repository, imageConverter, IndexStoreLayer)
  )(ThumbnailCacheLive(options))

  const runtime = ManagedRuntime.make(MainLayer)

  // Helper to run Effect and get result
  const runEffect = async <A, E>(
    effect: Effect.Effect<A, E, ThumbnailCache>
  ): Promise<A> => {
    const exit = await runtime.runPromiseExit(effect)
    if (Exit.isSuccess(exit)) {
      return exit.value
    }
    throw Cause.squash(exit.cause)
  }

  const getCacheService = async (): Promise<ThumbnailCacheService> => {
    if (disposed) throw new Error("Thumbnail cache has been disposed")
    if (cacheService) return cacheService
    cacheService = await runEffect(Effect.gen(function*() {
      return yield* ThumbnailCache
    }))
    return cacheService
  }

  const start = async () => {
    await getCacheService()
  }

  const lookup = async (sourceRoute: string, dimensions: Dimensions): Promise<ThumbnailRecord | null> => {
    const cache = await getCacheService()
    const record = await runEffect(cache.lookup(sourceRoute, dimensions))
    return Option.getOrNull(record)
  }

  const thumbnailPath = async (sourceRoute: string, dimensions: Dimensions): Promise<string | null> => {
    const cache = await getCacheService()
    const record = await lookup(sourceRoute, dimensions)
    return record === null ? null : cache.thumbnailPath(record)
  }

  const runPass = async (): Promise<PassSummary> => {
    const cache = await getCacheService()
    return runEffect(cache.runPass())
  }

  const flush = async () => {
    const cache = await getCacheService()
    await runEffect(cache.flush())
  }

  const stop = async () => {
    const cache = await getCacheService()
    await runEffect(cache.stop())
  }

  const dispose = async () => {
    if (disposed) return
    disposed = true
    cacheService = null
    await runtime.dispose()
  }

  return {
    start,
    lookup,
    thumbnailPath,
    runPass,
    flush,
    stop,
    dispose
  }
}
