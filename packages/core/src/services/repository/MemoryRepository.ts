/**
 * In-memory ContentRepository implementation
 *
 * Holds items and file bytes in memory. Suitable for embedders whose content
 * does not live on disk, and for testing.
 *
 * @module
 */

import { Context, Effect, Layer, Ref } from "effect"

import { MediaTypeDetectionError, SourceReadError } from "../../errors/index.js"
import type { FileContent } from "../../types/index.js"
import {
  ContentRepository,
  type ContentRepositoryService,
  type RepositoryFile,
  type RepositoryItem
} from "./ContentRepository.js"
import { makeReindexNotifier } from "./ReindexNotifier.js"

// ============================================
// Files
// ============================================

/**
 * Read access over a byte array
 */
export const makeMemoryFileContent = (data: Uint8Array): FileContent => ({
  size: () => Effect.succeed(data.byteLength),
  readAt: (offset, length) =>
    offset < 0 || length < 0
      ? Effect.fail(new SourceReadError({ message: `Invalid read range ${offset}+${length}` }))
      : Effect.succeed(data.slice(offset, offset + length)),
  readAll: () => Effect.succeed(data.slice())
})

/**
 * Options for an in-memory repository file
 */
export interface MemoryFileOptions {
  readonly id: string
  readonly parent: string
  readonly route: string
  readonly data: Uint8Array
  /**
   * Media type reported by `mimeType()`.
   * An Error value makes detection fail with it as the cause.
   */
  readonly mimeType: string | Error
}

/**
 * Create an in-memory repository file
 */
export const makeMemoryFile = (options: MemoryFileOptions): RepositoryFile => {
  const { data, id, mimeType, parent, route } = options

  return {
    id,
    parent,
    route,
    mimeType: () =>
      typeof mimeType === "string"
        ? Effect.succeed(mimeType)
        : Effect.fail(
          new MediaTypeDetectionError({
            message: `Unable to detect mime type: ${mimeType.message}`,
            route,
            cause: mimeType
          })
        ),
    data: (consume) => consume(makeMemoryFileContent(data))
  }
}

// ============================================
// Repository
// ============================================

/**
 * In-memory repository service, with controls for embedders and tests
 */
export interface MemoryRepositoryService extends ContentRepositoryService {
  /**
   * Replace all items. Does not signal; call `reindex` for that.
   */
  readonly setItems: (items: ReadonlyArray<RepositoryItem>) => Effect.Effect<void>

  /**
   * Signal every registered sink that the listing may have changed
   */
  readonly reindex: () => Effect.Effect<void>

  /**
   * Number of sinks currently registered through `afterReindex`
   */
  readonly subscriberCount: () => Effect.Effect<number>
}

/**
 * MemoryRepository service tag
 */
export class MemoryRepository extends Context.Tag("MemoryRepository")<
  MemoryRepository,
  MemoryRepositoryService
>() {}

/**
 * Create an in-memory repository
 */
export const makeMemoryRepository = (
  initialItems: ReadonlyArray<RepositoryItem> = []
): Effect.Effect<MemoryRepositoryService> =>
  Effect.gen(function*() {
    const itemsRef = yield* Ref.make(initialItems)
    const notifier = yield* makeReindexNotifier()

    return {
      items: () => Ref.get(itemsRef),
      afterReindex: notifier.register,
      setItems: (items) => Ref.set(itemsRef, items),
      reindex: () => notifier.notify(),
      subscriberCount: () => notifier.sinkCount()
    }
  })

// ============================================
// Layer
// ============================================

/**
 * Layer providing both ContentRepository and MemoryRepository
 */
export const MemoryRepositoryLive = (
  initialItems: ReadonlyArray<RepositoryItem> = []
): Layer.Layer<ContentRepository | MemoryRepository> =>
  Layer.effectContext(
    Effect.map(makeMemoryRepository(initialItems), (repository) =>
      Context.make(MemoryRepository, repository).pipe(Context.add(ContentRepository, repository)))
  )
