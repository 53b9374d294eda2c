/**
 * ContentRepository Service
 *
 * The content repository whose files get thumbnails. Implementations
 * enumerate items and their files, give scoped access to file content and
 * signal registered sinks after every reindex.
 *
 * @module
 */

import type { Effect, Queue, Scope } from "effect"
import { Context } from "effect"

import type { MediaTypeDetectionError, SourceReadError } from "../../errors/index.js"
import type { FileContent } from "../../types/index.js"

// ============================================
// Service Interface
// ============================================

/**
 * A file that belongs to a repository item
 */
export interface RepositoryFile {
  /**
   * Stable identifier, used to name the file's thumbnails
   */
  readonly id: string

  /**
   * Route of the item the file belongs to
   */
  readonly parent: string

  /**
   * Route of the file relative to its item
   */
  readonly route: string

  /**
   * Detect the media type of the file
   */
  readonly mimeType: () => Effect.Effect<string, MediaTypeDetectionError>

  /**
   * Run `consume` with read access to the file's content.
   * The content handle is closed when `consume` completes.
   */
  readonly data: <A, E, R>(
    consume: (content: FileContent) => Effect.Effect<A, E, R>
  ) => Effect.Effect<A, E | SourceReadError, R>
}

/**
 * A repository item and its files
 */
export interface RepositoryItem {
  readonly route: string
  readonly files: ReadonlyArray<RepositoryFile>
}

/**
 * ContentRepository service interface
 */
export interface ContentRepositoryService {
  /**
   * Current items, in enumeration order
   */
  readonly items: () => Effect.Effect<ReadonlyArray<RepositoryItem>>

  /**
   * Offer a signal to `sink` after every reindex.
   * The registration is removed when the scope closes.
   */
  readonly afterReindex: (sink: Queue.Enqueue<void>) => Effect.Effect<void, never, Scope.Scope>
}

/**
 * ContentRepository service tag
 */
export class ContentRepository extends Context.Tag("ContentRepository")<
  ContentRepository,
  ContentRepositoryService
>() {}
