/**
 * ConversionWorker - builds missing thumbnails
 *
 * One pass walks every file of every repository item and makes sure a
 * thumbnail exists for each configured dimension:
 * - unsupported or undetectable media types are skipped
 * - thumbnails already in the index are skipped without any I/O
 * - everything else is resized into the thumbnail folder and indexed
 *
 * A failed thumbnail leaves no index entry, so the next pass retries it.
 * Passes sleep between files to keep the load of large repositories low.
 *
 * @module
 */

import { FileSystem } from "@effect/platform/FileSystem"
import { Cause, Duration, Effect, Either, Exit, Option, Ref } from "effect"

import { OutputOpenError, OutputWriteError, UnsupportedMediaTypeError } from "../../errors/index.js"
import type {
  Dimensions,
  OutputTarget,
  PassSummary,
  ThumbnailCacheEventCallback,
  ThumbnailIdentity,
  ThumbnailRecord
} from "../../types/index.js"
import { DEFAULT_DIMENSIONS, dimensionsKey, identityToString, makeThumbnailIdentity, thumbnailFileName } from "../../utils/dimensions.js"
import { joinPath } from "../../utils/path.js"
import { ImageConverter } from "../image-converter/index.js"
import type { ContentRepositoryService, RepositoryFile } from "../repository/index.js"
import { ThumbnailIndex } from "../thumbnail-index/index.js"

// ============================================
// Configuration
// ============================================

/**
 * ConversionWorker configuration
 */
export interface ConversionWorkerConfig {
  /**
   * Folder the thumbnails are written to. Must exist.
   */
  readonly thumbnailDirectory: string

  /**
   * Bounds built for every supported file (default: 200x0, 400x0, 800x0)
   */
  readonly dimensions: ReadonlyArray<Dimensions>

  /**
   * Pause after every file, whether or not work was done (default: 5 seconds)
   */
  readonly interItemDelay: Duration.DurationInput

  /**
   * Index to start from (default: empty)
   */
  readonly initialIndex?: ThumbnailIndex.ThumbnailIndex | undefined

  /**
   * Checked before the first file and between files; a pass stops early once it yields false
   */
  readonly isRunning?: Effect.Effect<boolean> | undefined

  readonly onEvent?: ThumbnailCacheEventCallback | undefined
}

/**
 * Default configuration
 */
export const defaultWorkerConfig: Pick<ConversionWorkerConfig, "dimensions" | "interItemDelay"> = {
  dimensions: DEFAULT_DIMENSIONS,
  interItemDelay: Duration.seconds(5)
}

// ============================================
// Service Interface
// ============================================

/**
 * ConversionWorker service interface
 */
export interface ConversionWorkerService {
  /**
   * Ensure every configured thumbnail of every repository file exists.
   * Never fails: per-file and per-thumbnail errors are logged and counted.
   */
  readonly runOnePass: (repository: ContentRepositoryService) => Effect.Effect<PassSummary>

  /**
   * Snapshot of the current index
   */
  readonly index: () => Effect.Effect<ThumbnailIndex.ThumbnailIndex>

  /**
   * Find the record of a built thumbnail
   */
  readonly lookup: (sourceRoute: string, dimensions: Dimensions) => Effect.Effect<Option.Option<ThumbnailRecord>>
}

// ============================================
// Implementation
// ============================================

type ThumbnailOutcome = "created" | "cached" | "failed"

type FileOutcome =
  | { readonly kind: "skipped" }
  | { readonly kind: "unsupported" }
  | { readonly kind: "processed"; readonly thumbnails: ReadonlyArray<ThumbnailOutcome> }

type Classification =
  | { readonly kind: "skipped" }
  | { readonly kind: "unsupported" }
  | {
    readonly kind: "convertible"
    readonly mimeType: string
    readonly extension: string
    readonly identities: ReadonlyArray<ThumbnailIdentity>
  }

const countOf = (outcomes: ReadonlyArray<ThumbnailOutcome>, outcome: ThumbnailOutcome): number =>
  outcomes.filter((o) => o === outcome).length

/**
 * Create a ConversionWorker
 */
export const makeConversionWorker = (
  config: ConversionWorkerConfig
): Effect.Effect<ConversionWorkerService, never, FileSystem | ImageConverter> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem
    const converter = yield* ImageConverter

    const indexRef = yield* Ref.make(config.initialIndex ?? ThumbnailIndex.empty)
    const isRunning = config.isRunning ?? Effect.succeed(true)

    // Helper to emit events
    const emitEvent: ThumbnailCacheEventCallback = (event) => {
      config.onEvent?.(event)
    }

    const removePartialOutput = (path: string): Effect.Effect<void> =>
      fs.remove(path).pipe(
        Effect.catchAll((error) => Effect.logDebug(`Unable to remove partial thumbnail ${path}`, error))
      )

    /**
     * Open the target file and resize the source into it
     */
    const buildThumbnail = (
      file: RepositoryFile,
      identity: ThumbnailIdentity,
      mimeType: string,
      path: string
    ) =>
      Effect.scoped(
        Effect.gen(function*() {
          const handle = yield* fs.open(path, { flag: "w" }).pipe(
            Effect.mapError((cause) => new OutputOpenError({ path, cause }))
          )

          const target: OutputTarget = {
            path,
            write: (data) =>
              handle.writeAll(data).pipe(
                Effect.mapError((cause) => new OutputWriteError({ path, cause }))
              )
          }

          yield* file.data((content) => converter.resize(content, mimeType, identity.dimensions, target))
        })
      )

    /**
     * Build one thumbnail unless the index already has it.
     * Runs uninterruptibly so a stop never leaves a written file without its index entry.
     */
    const ensureThumbnail = (
      file: RepositoryFile,
      identity: ThumbnailIdentity,
      mimeType: string,
      extension: string
    ): Effect.Effect<ThumbnailOutcome> =>
      Effect.gen(function*() {
        const index = yield* Ref.get(indexRef)
        if (ThumbnailIndex.contains(index, identity)) {
          yield* Effect.logDebug(`Thumb ${identityToString(identity)} already available in the index`)
          return "cached" as const
        }

        const fileName = thumbnailFileName(file.id, identity.dimensions, extension)
        const path = joinPath(config.thumbnailDirectory, fileName)

        const exit = yield* Effect.exit(buildThumbnail(file, identity, mimeType, path))
        if (Exit.isFailure(exit)) {
          const failure = Cause.failureOption(exit.cause)
          const openFailed = Option.isSome(failure) && failure.value._tag === "OutputOpenError"

          yield* Effect.logWarning(
            openFailed
              ? `Unable to open thumbnail target for ${identityToString(identity)}`
              : `Unable to create thumbnail ${identityToString(identity)}`,
            exit.cause
          )
          if (!openFailed) {
            yield* removePartialOutput(path)
          }

          emitEvent({
            type: "thumbnail-failed",
            identity,
            error: Option.match(failure, {
              onNone: () => Cause.pretty(exit.cause),
              onSome: (error) => error.message
            })
          })
          return "failed" as const
        }

        const record: ThumbnailRecord = { ...identity, fileName }
        yield* Ref.update(indexRef, (current) => ThumbnailIndex.insert(current, record))
        yield* Effect.logDebug(`Adding thumb ${identityToString(identity)} to index`)
        emitEvent({ type: "thumbnail-created", record })
        return "created" as const
      }).pipe(
        Effect.annotateLogs({
          sourceRoute: identity.sourceRoute,
          dimensions: dimensionsKey(identity.dimensions),
          mimeType
        }),
        Effect.uninterruptible
      )

    /**
     * Detect the media type and work out which thumbnails a file needs
     */
    const classifyFile = (file: RepositoryFile): Effect.Effect<Classification> =>
      Effect.gen(function*() {
        const detected = yield* Effect.either(file.mimeType())
        if (Either.isLeft(detected)) {
          yield* Effect.logWarning(`Unable to detect mime type for file. Error: ${detected.left.message}`)
          return { kind: "skipped" } as const
        }

        const mimeType = detected.right
        if (!converter.isSupported(mimeType)) {
          yield* Effect.logDebug(new UnsupportedMediaTypeError({ mimeType }).message)
          return { kind: "unsupported" } as const
        }

        const identities = Either.all(
          config.dimensions.map((dimensions) => makeThumbnailIdentity(file.parent, file.route, dimensions))
        )
        if (Either.isLeft(identities)) {
          yield* Effect.logWarning(identities.left.message)
          return { kind: "skipped" } as const
        }

        return {
          kind: "convertible",
          mimeType,
          extension: converter.fileExtension(mimeType),
          identities: identities.right
        } as const
      })

    /**
     * Classify a file, then ensure each of its thumbnails
     */
    const processFile = (file: RepositoryFile): Effect.Effect<FileOutcome> =>
      Effect.gen(function*() {
        const exit = yield* Effect.exit(classifyFile(file))
        if (Exit.isFailure(exit)) {
          yield* Effect.logWarning("Unable to classify file", exit.cause)
          return { kind: "skipped" } as const
        }

        const classification = exit.value
        if (classification.kind !== "convertible") {
          return classification
        }

        const thumbnails: Array<ThumbnailOutcome> = []
        for (const identity of classification.identities) {
          thumbnails.push(
            yield* ensureThumbnail(file, identity, classification.mimeType, classification.extension)
          )
        }

        return { kind: "processed", thumbnails } as const
      }).pipe(
        Effect.annotateLogs({ fileId: file.id, parent: file.parent, route: file.route })
      )

    const runOnePass: ConversionWorkerService["runOnePass"] = (repository) =>
      Effect.gen(function*() {
        let filesVisited = 0
        let created = 0
        let cached = 0
        let unsupported = 0
        let skipped = 0
        let failed = 0
        let stopped = false

        const items = yield* repository.items()
        const files = items.flatMap((item) => item.files)

        if (!(yield* isRunning)) {
          yield* Effect.logDebug("Not running, skipping the pass")
          return { filesVisited, created, cached, unsupported, skipped, failed, stopped: true }
        }

        for (const file of files) {
          const outcome = yield* processFile(file)
          filesVisited++

          switch (outcome.kind) {
            case "skipped":
              skipped++
              break
            case "unsupported":
              unsupported++
              break
            case "processed":
              created += countOf(outcome.thumbnails, "created")
              cached += countOf(outcome.thumbnails, "cached")
              failed += countOf(outcome.thumbnails, "failed")
              break
          }

          // wait before processing the next file
          yield* Effect.sleep(config.interItemDelay)

          if (!(yield* isRunning)) {
            stopped = true
            break
          }
        }

        return { filesVisited, created, cached, unsupported, skipped, failed, stopped }
      })

    const index: ConversionWorkerService["index"] = () => Ref.get(indexRef)

    const lookup: ConversionWorkerService["lookup"] = (sourceRoute, dimensions) =>
      Ref.get(indexRef).pipe(Effect.map((current) => ThumbnailIndex.get(current, sourceRoute, dimensions)))

    return { runOnePass, index, lookup }
  })
