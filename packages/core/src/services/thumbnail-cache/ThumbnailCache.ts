/**
 * ThumbnailCache - lifecycle of the thumbnail conversion
 *
 * On construction:
 * - creates the thumbnail folder (the only fatal failure)
 * - loads the index, starting empty if it is missing or corrupt
 * - forks the conversion loop: one pass at startup, then one pass per
 *   repository reindex signal
 *
 * Shutdown is the closing of the construction scope. Two independent
 * finalizers run then: one stops the loop, one saves the index.
 *
 * Reindex signals go through a sliding queue of capacity 1: a signal that
 * arrives during a pass is kept, repeated signals collapse into one pass.
 *
 * @module
 */

import { FileSystem } from "@effect/platform/FileSystem"
import type { Duration, Option, Scope } from "effect"
import { Context, Effect, Layer, Queue, Ref } from "effect"

import type { IndexPersistError } from "../../errors/index.js"
import { OutputDirectoryUnavailableError } from "../../errors/index.js"
import type {
  Dimensions,
  PassSummary,
  PassTrigger,
  ThumbnailCacheEventCallback,
  ThumbnailRecord
} from "../../types/index.js"
import { INDEX_FILE_NAME, joinPath, THUMBNAILS_DIRECTORY } from "../../utils/path.js"
import { defaultWorkerConfig, makeConversionWorker } from "../conversion-worker/index.js"
import type { ImageConverter } from "../image-converter/index.js"
import { ContentRepository } from "../repository/index.js"
import { ThumbnailIndex, ThumbnailIndexStore } from "../thumbnail-index/index.js"

// ============================================
// Configuration
// ============================================

/**
 * ThumbnailCache configuration
 */
export interface ThumbnailCacheConfig {
  /**
   * Folder holding the index file and the thumbnail folder
   */
  readonly metadataRoot: string

  /**
   * Bounds built for every supported file (default: 200x0, 400x0, 800x0)
   */
  readonly dimensions: ReadonlyArray<Dimensions>

  /**
   * Pause between files during a pass (default: 5 seconds)
   */
  readonly interItemDelay: Duration.DurationInput

  /**
   * Index file name inside metadataRoot (default: "thumbnail.index")
   */
  readonly indexFileName: string

  /**
   * Thumbnail folder name inside metadataRoot (default: "thumbnails")
   */
  readonly thumbnailDirectoryName: string

  readonly onEvent?: ThumbnailCacheEventCallback | undefined
}

/**
 * Caller-facing configuration: everything but metadataRoot has a default
 */
export type ThumbnailCacheOptions =
  & Pick<ThumbnailCacheConfig, "metadataRoot">
  & Partial<Omit<ThumbnailCacheConfig, "metadataRoot">>

/**
 * Default configuration
 */
export const defaultConfig: Omit<ThumbnailCacheConfig, "metadataRoot"> = {
  ...defaultWorkerConfig,
  indexFileName: INDEX_FILE_NAME,
  thumbnailDirectoryName: THUMBNAILS_DIRECTORY
}

/**
 * Merge caller options over the defaults
 */
export const resolveConfig = (options: ThumbnailCacheOptions): ThumbnailCacheConfig => ({
  metadataRoot: options.metadataRoot,
  dimensions: options.dimensions ?? defaultConfig.dimensions,
  interItemDelay: options.interItemDelay ?? defaultConfig.interItemDelay,
  indexFileName: options.indexFileName ?? defaultConfig.indexFileName,
  thumbnailDirectoryName: options.thumbnailDirectoryName ?? defaultConfig.thumbnailDirectoryName,
  onEvent: options.onEvent
})

// ============================================
// Service Interface
// ============================================

/**
 * ThumbnailCache service interface
 */
export interface ThumbnailCacheService {
  /**
   * Resolved locations of the index file and the thumbnail folder
   */
  readonly paths: {
    readonly indexFile: string
    readonly thumbnailDirectory: string
  }

  /**
   * Find a built thumbnail
   */
  readonly lookup: (sourceRoute: string, dimensions: Dimensions) => Effect.Effect<Option.Option<ThumbnailRecord>>

  /**
   * Location of a built thumbnail on disk
   */
  readonly thumbnailPath: (record: ThumbnailRecord) => string

  /**
   * Snapshot of the current index
   */
  readonly index: () => Effect.Effect<ThumbnailIndex.ThumbnailIndex>

  /**
   * Run one pass now. Waits for a pass already in progress.
   */
  readonly runPass: () => Effect.Effect<PassSummary>

  /**
   * Stop scheduling passes. The current file is finished first.
   */
  readonly stop: () => Effect.Effect<void>

  /**
   * Whether passes are still being scheduled
   */
  readonly isRunning: () => Effect.Effect<boolean>

  /**
   * Save the index now instead of waiting for shutdown
   */
  readonly flush: () => Effect.Effect<void, IndexPersistError>
}

/**
 * ThumbnailCache service tag
 */
export class ThumbnailCache extends Context.Tag("ThumbnailCache")<
  ThumbnailCache,
  ThumbnailCacheService
>() {}

// ============================================
// Implementation
// ============================================

/**
 * Create the ThumbnailCache and start converting in the background
 */
export const makeThumbnailCache = (
  options: ThumbnailCacheOptions
): Effect.Effect<
  ThumbnailCacheService,
  OutputDirectoryUnavailableError,
  Scope.Scope | FileSystem | ContentRepository | ImageConverter | ThumbnailIndexStore
> =>
  Effect.gen(function*() {
    const config = resolveConfig(options)
    const fs = yield* FileSystem
    const repository = yield* ContentRepository
    const store = yield* ThumbnailIndexStore

    const indexFile = joinPath(config.metadataRoot, config.indexFileName)
    const thumbnailDirectory = joinPath(config.metadataRoot, config.thumbnailDirectoryName)

    // prepare the target folder
    yield* Effect.logDebug(`Creating a thumbnail folder at ${thumbnailDirectory}`)
    yield* fs.makeDirectory(thumbnailDirectory, { recursive: true }).pipe(
      Effect.mapError((cause) => new OutputDirectoryUnavailableError({ path: thumbnailDirectory, cause })),
      Effect.tapError((error) => Effect.logWarning(error.message))
    )

    const initialIndex = yield* store.load(indexFile).pipe(
      Effect.catchAll((error) =>
        Effect.logDebug(`No thumbnail index loaded (${error.message}). Creating a new one.`).pipe(
          Effect.as(ThumbnailIndex.empty)
        )
      )
    )

    const runningRef = yield* Ref.make(true)
    const passLock = yield* Effect.makeSemaphore(1)
    const reindexSignal = yield* Queue.sliding<void>(1)

    // Helper to emit events
    const emitEvent: ThumbnailCacheEventCallback = (event) => {
      config.onEvent?.(event)
    }

    const worker = yield* makeConversionWorker({
      thumbnailDirectory,
      dimensions: config.dimensions,
      interItemDelay: config.interItemDelay,
      initialIndex,
      isRunning: Ref.get(runningRef),
      onEvent: config.onEvent
    })

    const runPass = (trigger: PassTrigger): Effect.Effect<PassSummary> =>
      Effect.gen(function*() {
        emitEvent({ type: "pass-started", trigger })
        const summary = yield* worker.runOnePass(repository)
        yield* Effect.logDebug(
          `Thumbnail pass finished: ${summary.created} created, ${summary.cached} cached, ${summary.failed} failed`
        )
        emitEvent({ type: "pass-completed", trigger, summary })
        return summary
      }).pipe(
        passLock.withPermits(1),
        Effect.annotateLogs({ trigger })
      )

    const flush: ThumbnailCacheService["flush"] = () =>
      worker.index().pipe(Effect.flatMap((index) => store.save(index, indexFile)))

    const stop: ThumbnailCacheService["stop"] = () =>
      Effect.gen(function*() {
        yield* Effect.logInfo("Stopping the conversion process")
        yield* Ref.set(runningRef, false)
        // wake the loop if it is waiting for a reindex signal
        yield* Queue.offer(reindexSignal, undefined)
      })

    // save the index on shutdown; registered first so it runs after the loop has ended
    yield* Effect.addFinalizer(() =>
      Effect.logInfo("Saving the index").pipe(
        Effect.zipRight(flush()),
        Effect.catchAll((error) => Effect.logError(error.message, error))
      )
    )

    yield* repository.afterReindex(reindexSignal)

    const conversionLoop = Effect.gen(function*() {
      yield* runPass("startup")

      while (yield* Ref.get(runningRef)) {
        yield* Queue.take(reindexSignal)
        if (!(yield* Ref.get(runningRef))) break

        yield* Effect.logDebug("Refreshing thumbnails")
        yield* runPass("reindex")
      }
    })

    yield* Effect.forkScoped(conversionLoop)

    // stop the conversion on shutdown
    yield* Effect.addFinalizer(() => stop())

    return {
      paths: { indexFile, thumbnailDirectory },
      lookup: worker.lookup,
      thumbnailPath: (record) => joinPath(thumbnailDirectory, record.fileName),
      index: worker.index,
      runPass: () => runPass("manual"),
      stop,
      isRunning: () => Ref.get(runningRef),
      flush
    }
  })

// ============================================
// Layer
// ============================================

/**
 * Live layer for ThumbnailCache. The cache shuts down with the layer's scope.
 */
export const ThumbnailCacheLive = (
  options: ThumbnailCacheOptions
): Layer.Layer<
  ThumbnailCache,
  OutputDirectoryUnavailableError,
  FileSystem | ContentRepository | ImageConverter | ThumbnailIndexStore
> => Layer.scoped(ThumbnailCache, makeThumbnailCache(options))
