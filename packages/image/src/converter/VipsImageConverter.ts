/**
 * Vips-based ImageConverter implementation
 *
 * Decodes the whole source into wasm-vips, scales it to fit the bounds and
 * encodes it back into the source format.
 *
 * @module
 */

import { ImageConverter, type ImageConverterService, ResizeError, UnsupportedMediaTypeError } from "@thumbnail-cache/core"
import type { Dimensions } from "@thumbnail-cache/core"
import { Effect, Layer } from "effect"

import { initVips, type VipsInitOptions, type VipsInstance } from "../vips.js"
import { computeResizeScale } from "./bounds.js"
import { isSupportedMediaType, type OutputFormat, outputFormat, thumbnailExtension } from "./mime.js"

type VipsImage = VipsInstance["Image"]["prototype"]

/**
 * Options for the vips converter
 */
export interface VipsImageConverterOptions extends VipsInitOptions {
  /**
   * JPEG output quality (1-100)
   * @default 85
   */
  quality?: number
}

const DEFAULT_QUALITY = 85

/**
 * Write image to buffer in the given format
 */
const writeImageToBuffer = (image: VipsImage, format: OutputFormat, quality: number): Uint8Array => {
  if (format === "jpeg") {
    return image.jpegsaveBuffer({ Q: quality })
  } else if (format === "png") {
    return image.pngsaveBuffer()
  }

  return image.writeToBuffer(`.${format}`)
}

/**
 * Decode, scale and re-encode one image
 */
const renderThumbnail = (
  vips: VipsInstance,
  input: Uint8Array,
  format: OutputFormat,
  bounds: Dimensions,
  quality: number
): Uint8Array => {
  const image = vips.Image.newFromBuffer(input)

  try {
    const scale = computeResizeScale(image.width, image.height, bounds)

    // Resize if needed
    let processed = image
    if (scale < 1) {
      processed = image.resize(scale)
    }

    try {
      return writeImageToBuffer(processed, format, quality)
    } finally {
      // Clean up resized image if we created one
      if (processed !== image) {
        processed.delete()
      }
    }
  } finally {
    image.delete()
  }
}

/**
 * Create a vips-based ImageConverter
 *
 * @example
 * ```typescript
 * const converter = makeVipsImageConverter({ quality: 80 })
 * ```
 */
export const makeVipsImageConverter = (options: VipsImageConverterOptions = {}): ImageConverterService => {
  const { quality = DEFAULT_QUALITY, ...initOptions } = options

  return {
    isSupported: isSupportedMediaType,

    fileExtension: thumbnailExtension,

    resize: (content, mimeType, bounds, target) =>
      Effect.gen(function*() {
        const format = outputFormat(mimeType)
        if (format === null) {
          return yield* Effect.fail(
            new ResizeError({ message: new UnsupportedMediaTypeError({ mimeType }).message, mimeType })
          )
        }

        const input = yield* content.readAll()

        const vips = yield* Effect.tryPromise({
          try: () => initVips(initOptions),
          catch: (cause) => new ResizeError({ message: "Unable to load wasm-vips", mimeType, cause })
        })

        const output = yield* Effect.try({
          try: () => renderThumbnail(vips, input, format, bounds, quality),
          catch: (cause) => new ResizeError({ message: `Unable to resize ${mimeType} image`, mimeType, cause })
        })

        yield* target.write(output)
      })
  }
}

/**
 * Layer providing the vips converter with custom options
 */
export const VipsImageConverter = (options: VipsImageConverterOptions = {}): Layer.Layer<ImageConverter> =>
  Layer.succeed(ImageConverter, makeVipsImageConverter(options))

/**
 * Layer providing the vips converter with default options
 */
export const VipsImageConverterLive: Layer.Layer<ImageConverter> = VipsImageConverter()
