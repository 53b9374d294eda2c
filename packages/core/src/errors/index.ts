/**
 * Error types for the thumbnail cache
 *
 * Uses Effect's Data.TaggedError for typed error handling.
 * Per-thumbnail errors are isolated by the conversion worker; only
 * OutputDirectoryUnavailableError escapes service construction.
 *
 * @module
 */

import { Data } from "effect"

/**
 * A parent and child route could not be combined into a source route
 */
export class InvalidRouteError extends Data.TaggedError("InvalidRouteError")<{
  readonly parent: string
  readonly route: string
  readonly reason: string
}> {
  get message(): string {
    return `Unable to combine routes "${this.parent}" and "${this.route}": ${this.reason}`
  }
}

/**
 * The media type was detected but no thumbnail can be built for it
 */
export class UnsupportedMediaTypeError extends Data.TaggedError("UnsupportedMediaTypeError")<{
  readonly mimeType: string
}> {
  get message(): string {
    return `The mime-type "${this.mimeType}" is currently not supported`
  }
}

/**
 * The media type of a repository file could not be detected
 */
export class MediaTypeDetectionError extends Data.TaggedError("MediaTypeDetectionError")<{
  readonly message: string
  readonly route?: string
  readonly cause?: unknown
}> {}

/**
 * Reading the content of a repository file failed
 */
export class SourceReadError extends Data.TaggedError("SourceReadError")<{
  readonly message: string
  readonly route?: string
  readonly cause?: unknown
}> {}

/**
 * The thumbnail target file could not be created or opened
 */
export class OutputOpenError extends Data.TaggedError("OutputOpenError")<{
  readonly path: string
  readonly cause?: unknown
}> {
  get message(): string {
    return `Unable to open thumbnail target: ${this.path}`
  }
}

/**
 * Writing resized bytes into the thumbnail target failed
 */
export class OutputWriteError extends Data.TaggedError("OutputWriteError")<{
  readonly path: string
  readonly cause?: unknown
}> {
  get message(): string {
    return `Unable to write thumbnail: ${this.path}`
  }
}

/**
 * Decoding, resizing or encoding an image failed
 */
export class ResizeError extends Data.TaggedError("ResizeError")<{
  readonly message: string
  readonly mimeType?: string
  readonly cause?: unknown
}> {}

/**
 * The persisted index could not be loaded.
 * Callers treat this as "start with an empty index".
 */
export class IndexUnavailableError extends Data.TaggedError("IndexUnavailableError")<{
  readonly path: string
  readonly reason: "missing" | "unreadable" | "corrupt"
  readonly cause?: unknown
}> {
  get message(): string {
    return `Thumbnail index at ${this.path} is ${this.reason}`
  }
}

/**
 * The index could not be written to disk
 */
export class IndexPersistError extends Data.TaggedError("IndexPersistError")<{
  readonly path: string
  readonly cause?: unknown
}> {
  get message(): string {
    return `Unable to save thumbnail index: ${this.path}`
  }
}

/**
 * The thumbnail output directory could not be created
 */
export class OutputDirectoryUnavailableError extends Data.TaggedError("OutputDirectoryUnavailableError")<{
  readonly path: string
  readonly cause?: unknown
}> {
  get message(): string {
    return `Could not create the thumbnail folder: ${this.path}`
  }
}

/**
 * A repository could not enumerate its content
 */
export class RepositoryScanError extends Data.TaggedError("RepositoryScanError")<{
  readonly message: string
  readonly path?: string
  readonly cause?: unknown
}> {}
