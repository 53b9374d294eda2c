/**
 * DirectoryRepository - content repository backed by a directory tree
 *
 * Every directory under the root (the root included) that has a `files`
 * subdirectory is an item. The item's files are the regular files below
 * `files`, recursively. Hidden directories and excluded names are skipped.
 *
 * ```
 * root/
 *   trip/
 *     files/beach.jpg      -> item "trip", route "files/beach.jpg"
 *     day-1/
 *       files/map.png      -> item "trip/day-1", route "files/map.png"
 * ```
 *
 * File ids are derived from the full route, so a file keeps its thumbnails
 * across restarts as long as it is not moved.
 *
 * @module
 */

import { createHash } from "node:crypto"
import path from "node:path"

import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type File } from "@effect/platform/FileSystem"
import {
  combineRoutes,
  ContentRepository,
  type ContentRepositoryService,
  type FileContent,
  makeReindexNotifier,
  MediaTypeDetectionError,
  RepositoryScanError,
  type RepositoryFile,
  type RepositoryItem,
  SourceReadError
} from "@thumbnail-cache/core"
import { Context, Effect, Either, Layer, Option, Ref, Scope } from "effect"

import { mediaTypeFromBytes, mediaTypeFromPath, SIGNATURE_LENGTH, UNKNOWN_MEDIA_TYPE } from "./mime.js"

// ============================================
// Configuration
// ============================================

export interface DirectoryRepositoryOptions {
  /**
   * Directory to scan for items
   */
  readonly root: string

  /**
   * Name of the subdirectory that marks an item and holds its files (default: "files")
   */
  readonly filesDirectoryName?: string | undefined

  /**
   * Directory names never visited, in addition to hidden ones
   */
  readonly exclude?: ReadonlyArray<string> | undefined
}

export const DEFAULT_FILES_DIRECTORY = "files"

// ============================================
// Service Interface
// ============================================

/**
 * DirectoryRepository service interface
 */
export interface DirectoryRepositoryService extends ContentRepositoryService {
  /**
   * Absolute path of the scanned directory
   */
  readonly root: string

  /**
   * Rescan the directory, replace the listing and signal every registered sink.
   * On failure the previous listing is kept and no signal is sent.
   */
  readonly reindex: () => Effect.Effect<void, RepositoryScanError>
}

/**
 * DirectoryRepository service tag
 */
export class DirectoryRepository extends Context.Tag("DirectoryRepository")<
  DirectoryRepository,
  DirectoryRepositoryService
>() {}

// ============================================
// Implementation
// ============================================

/**
 * Stable file id: the first 32 hex characters of the SHA-256 of the route
 */
export const fileIdForRoute = (route: string): string =>
  createHash("sha256").update(route).digest("hex").slice(0, 32)

const isHidden = (name: string): boolean => name.startsWith(".")

const joinRoute = (route: string, name: string): string => route === "" ? name : `${route}/${name}`

/**
 * Create a DirectoryRepository. Fails if the initial scan fails.
 */
export const makeDirectoryRepository = (
  options: DirectoryRepositoryOptions
): Effect.Effect<DirectoryRepositoryService, RepositoryScanError, FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem
    const root = path.resolve(options.root)
    const filesDirectoryName = options.filesDirectoryName ?? DEFAULT_FILES_DIRECTORY
    const exclude = new Set(options.exclude ?? [])

    /**
     * Seekable view of an open file handle
     */
    const makeHandleContent = (handle: File, absolutePath: string, route: string): FileContent => {
      const readError = (cause: PlatformError) =>
        new SourceReadError({ message: `Unable to read ${absolutePath}`, route, cause })

      return {
        size: () =>
          handle.stat.pipe(
            Effect.map((info) => Number(info.size)),
            Effect.mapError(readError)
          ),
        readAt: (offset, length) =>
          length <= 0
            ? Effect.succeed(new Uint8Array(0))
            : handle.seek(offset, "start").pipe(
              Effect.zipRight(handle.readAlloc(length)),
              Effect.map(Option.getOrElse(() => new Uint8Array(0))),
              Effect.mapError(readError)
            ),
        readAll: () => fs.readFile(absolutePath).pipe(Effect.mapError(readError))
      }
    }

    const readSignature = (absolutePath: string) =>
      Effect.scoped(
        fs.open(absolutePath, { flag: "r" }).pipe(
          Effect.flatMap((handle) => handle.readAlloc(SIGNATURE_LENGTH)),
          Effect.map(Option.getOrElse(() => new Uint8Array(0)))
        )
      )

    const makeFile = (parent: string, route: string, absolutePath: string): RepositoryFile => {
      const fullRoute = Either.getOrElse(combineRoutes(parent, route), () => joinRoute(parent, route))

      return {
        id: fileIdForRoute(fullRoute),
        parent,
        route,
        mimeType: () => {
          const byExtension = mediaTypeFromPath(absolutePath)
          if (byExtension !== null) return Effect.succeed(byExtension)

          return readSignature(absolutePath).pipe(
            Effect.map((bytes) => mediaTypeFromBytes(bytes) ?? UNKNOWN_MEDIA_TYPE),
            Effect.mapError((cause) =>
              new MediaTypeDetectionError({ message: `Unable to read ${absolutePath}`, route, cause })
            )
          )
        },
        data: (consume) =>
          Effect.acquireUseRelease(
            Scope.make(),
            (scope) =>
              fs.open(absolutePath, { flag: "r" }).pipe(
                Scope.extend(scope),
                Effect.mapError((cause) =>
                  new SourceReadError({ message: `Unable to open ${absolutePath}`, route, cause })
                ),
                Effect.flatMap((handle) => consume(makeHandleContent(handle, absolutePath, route)))
              ),
            (scope, exit) => Scope.close(scope, exit)
          )
      }
    }

    const sortedEntries = (directory: string) =>
      fs.readDirectory(directory).pipe(Effect.map((names) => [...names].sort()))

    /**
     * Stat an entry, following links. Dangling links, link loops and entries
     * removed since the listing are logged and skipped.
     */
    const statEntry = (target: string): Effect.Effect<Option.Option<File.Info>> =>
      fs.stat(target).pipe(
        Effect.map(Option.some),
        Effect.catchAll((error) =>
          Effect.logWarning(`Skipping ${target}: ${error.message}`).pipe(Effect.as(Option.none()))
        )
      )

    const isDirectory = (target: string) =>
      statEntry(target).pipe(Effect.map(Option.exists((info) => info.type === "Directory")))

    /**
     * Regular files below `directory`, with routes relative to the item
     */
    const listFiles = (
      parent: string,
      directory: string,
      route: string
    ): Effect.Effect<Array<RepositoryFile>, PlatformError> =>
      Effect.gen(function*() {
        const files: Array<RepositoryFile> = []

        for (const name of yield* sortedEntries(directory)) {
          const absolutePath = path.join(directory, name)
          const info = yield* statEntry(absolutePath)
          if (Option.isNone(info)) continue

          if (info.value.type === "Directory") {
            if (isHidden(name)) continue
            files.push(...(yield* listFiles(parent, absolutePath, `${route}/${name}`)))
          } else if (info.value.type === "File") {
            files.push(makeFile(parent, `${route}/${name}`, absolutePath))
          }
        }

        return files
      })

    const visit = (
      directory: string,
      route: string,
      items: Array<RepositoryItem>
    ): Effect.Effect<void, PlatformError> =>
      Effect.gen(function*() {
        const entries = yield* sortedEntries(directory)

        if (entries.includes(filesDirectoryName)) {
          const filesDirectory = path.join(directory, filesDirectoryName)
          if (yield* isDirectory(filesDirectory)) {
            items.push({ route, files: yield* listFiles(route, filesDirectory, filesDirectoryName) })
          }
        }

        for (const name of entries) {
          if (name === filesDirectoryName || isHidden(name) || exclude.has(name)) continue

          const child = path.join(directory, name)
          if (yield* isDirectory(child)) {
            yield* visit(child, joinRoute(route, name), items)
          }
        }
      })

    const scan = Effect.gen(function*() {
      const items: Array<RepositoryItem> = []
      yield* visit(root, "", items)
      yield* Effect.logDebug(`Found ${items.length} items under ${root}`)
      return items
    }).pipe(
      Effect.mapError((cause) => new RepositoryScanError({ message: `Unable to scan ${root}`, path: root, cause }))
    )

    const itemsRef = yield* Ref.make<ReadonlyArray<RepositoryItem>>(yield* scan)
    const notifier = yield* makeReindexNotifier()

    const reindex: DirectoryRepositoryService["reindex"] = () =>
      scan.pipe(
        Effect.flatMap((items) => Ref.set(itemsRef, items)),
        Effect.zipRight(notifier.notify()),
        Effect.tapError((error) => Effect.logWarning(error.message, error.cause))
      )

    return {
      root,
      items: () => Ref.get(itemsRef),
      afterReindex: notifier.register,
      reindex
    }
  })

// ============================================
// Layer
// ============================================

/**
 * Layer providing both ContentRepository and DirectoryRepository
 */
export const DirectoryRepositoryLive = (
  options: DirectoryRepositoryOptions
): Layer.Layer<ContentRepository | DirectoryRepository, RepositoryScanError, FileSystem> =>
  Layer.effectContext(
    Effect.map(makeDirectoryRepository(options), (repository) =>
      Context.make(DirectoryRepository, repository).pipe(Context.add(ContentRepository, repository)))
  )
