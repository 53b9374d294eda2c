/**
 * ThumbnailIndexStore Service
 *
 * Loads and saves the thumbnail index. A save writes a temporary file next
 * to the target and renames it over the target, so a crash mid-write leaves
 * the previous index intact.
 *
 * @module
 */

import { FileSystem } from "@effect/platform/FileSystem"
import { Context, Effect, Layer } from "effect"

import { IndexPersistError, IndexUnavailableError } from "../../errors/index.js"
import { decodeThumbnailIndexFile, encodeThumbnailIndexFile } from "../../schema/index.js"
import * as ThumbnailIndex from "./ThumbnailIndex.js"

// ============================================
// Service Interface
// ============================================

/**
 * ThumbnailIndexStore service interface
 */
export interface ThumbnailIndexStoreService {
  /**
   * Read the index at `path`. Fails if the file is missing, unreadable or corrupt;
   * callers start with an empty index in that case.
   */
  readonly load: (path: string) => Effect.Effect<ThumbnailIndex.ThumbnailIndex, IndexUnavailableError>

  /**
   * Replace the index at `path`. The parent directory must exist.
   */
  readonly save: (index: ThumbnailIndex.ThumbnailIndex, path: string) => Effect.Effect<void, IndexPersistError>
}

/**
 * ThumbnailIndexStore service tag
 */
export class ThumbnailIndexStore extends Context.Tag("ThumbnailIndexStore")<
  ThumbnailIndexStore,
  ThumbnailIndexStoreService
>() {}

// ============================================
// Implementation
// ============================================

const TEMP_SUFFIX = ".tmp"

/**
 * Create the ThumbnailIndexStore service
 */
export const makeThumbnailIndexStore = (): Effect.Effect<ThumbnailIndexStoreService, never, FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem

    // One save at a time, even if several caches share a store
    const saveLock = yield* Effect.makeSemaphore(1)

    const load: ThumbnailIndexStoreService["load"] = (path) =>
      Effect.gen(function*() {
        const exists = yield* fs.exists(path).pipe(
          Effect.mapError((cause) => new IndexUnavailableError({ path, reason: "unreadable", cause }))
        )
        if (!exists) {
          return yield* Effect.fail(new IndexUnavailableError({ path, reason: "missing" }))
        }

        const text = yield* fs.readFileString(path).pipe(
          Effect.mapError((cause) => new IndexUnavailableError({ path, reason: "unreadable", cause }))
        )

        const document = yield* decodeThumbnailIndexFile(text).pipe(
          Effect.mapError((cause) => new IndexUnavailableError({ path, reason: "corrupt", cause }))
        )

        return ThumbnailIndex.fromRecords(document.thumbnails)
      })

    const save: ThumbnailIndexStoreService["save"] = (index, path) => {
      const tempPath = `${path}${TEMP_SUFFIX}`

      const write = Effect.gen(function*() {
        const text = yield* encodeThumbnailIndexFile({ thumbnails: ThumbnailIndex.records(index) })
        yield* fs.writeFileString(tempPath, text)
        yield* fs.rename(tempPath, path)
      })

      return write.pipe(
        Effect.tapError(() =>
          fs.remove(tempPath).pipe(
            Effect.catchAll((error) =>
              Effect.logDebug(`Unable to remove temporary index file ${tempPath}`, error)
            )
          )
        ),
        Effect.mapError((cause) => new IndexPersistError({ path, cause })),
        saveLock.withPermits(1)
      )
    }

    return { load, save }
  })

// ============================================
// Layer
// ============================================

/**
 * Live layer for ThumbnailIndexStore
 */
export const ThumbnailIndexStoreLive: Layer.Layer<ThumbnailIndexStore, never, FileSystem> = Layer.effect(
  ThumbnailIndexStore,
  makeThumbnailIndexStore()
)
