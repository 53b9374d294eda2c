/**
 * ImageConverter Service
 *
 * Decodes, resizes and encodes images. The thumbnail cache only talks to
 * this interface; see @thumbnail-cache/image for the wasm-vips implementation.
 *
 * @module
 */

import type { Effect } from "effect"
import { Context } from "effect"

import type { OutputWriteError, ResizeError, SourceReadError } from "../../errors/index.js"
import type { Dimensions, FileContent, OutputTarget } from "../../types/index.js"

// ============================================
// Service Interface
// ============================================

/**
 * ImageConverter service interface
 */
export interface ImageConverterService {
  /**
   * Whether thumbnails can be built for files of this media type
   */
  readonly isSupported: (mimeType: string) => boolean

  /**
   * File extension (without dot) of thumbnails built from this media type
   */
  readonly fileExtension: (mimeType: string) => string

  /**
   * Resize `content` to fit within `bounds` and write the result into `target`.
   * A bound of 0 leaves that axis unconstrained.
   */
  readonly resize: (
    content: FileContent,
    mimeType: string,
    bounds: Dimensions,
    target: OutputTarget
  ) => Effect.Effect<void, ResizeError | OutputWriteError | SourceReadError>
}

/**
 * ImageConverter service tag
 */
export class ImageConverter extends Context.Tag("ImageConverter")<
  ImageConverter,
  ImageConverterService
>() {}
