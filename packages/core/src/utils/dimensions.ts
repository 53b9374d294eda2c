/**
 * Thumbnail dimension and identity helpers
 *
 * @module
 */

import { Either } from "effect"

import { InvalidRouteError } from "../errors/index.js"
import type { Dimensions, ThumbnailIdentity } from "../types/index.js"
import { combineRoutes } from "./route.js"

/**
 * Dimensions built for every eligible file unless configured otherwise
 */
export const DEFAULT_DIMENSIONS: ReadonlyArray<Dimensions> = [
  { maxWidth: 200, maxHeight: 0 },
  { maxWidth: 400, maxHeight: 0 },
  { maxWidth: 800, maxHeight: 0 }
]

const isPixelBound = (value: number): boolean => Number.isInteger(value) && value >= 0

/**
 * Canonical key of a dimension pair, used as the index's inner key.
 * Two pairs render identically iff they are numerically equal.
 *
 * @example
 * ```ts
 * dimensionsKey({ maxWidth: 200, maxHeight: 0 }) // => "200x0"
 * ```
 */
export const dimensionsKey = (dimensions: Dimensions): string => `${dimensions.maxWidth}x${dimensions.maxHeight}`

/**
 * Build the identity of the thumbnail of a repository file
 */
export const makeThumbnailIdentity = (
  parent: string,
  route: string,
  dimensions: Dimensions
): Either.Either<ThumbnailIdentity, InvalidRouteError> => {
  if (!isPixelBound(dimensions.maxWidth) || !isPixelBound(dimensions.maxHeight)) {
    return Either.left(
      new InvalidRouteError({
        parent,
        route,
        reason: `invalid dimensions ${dimensionsKey(dimensions)}`
      })
    )
  }

  return Either.map(combineRoutes(parent, route), (sourceRoute) => ({
    sourceRoute,
    dimensions: { maxWidth: dimensions.maxWidth, maxHeight: dimensions.maxHeight }
  }))
}

/**
 * Diagnostic rendering of an identity, e.g. `"documents/a/files/b.jpg@200x0"`
 */
export const identityToString = (identity: ThumbnailIdentity): string =>
  `${identity.sourceRoute}@${dimensionsKey(identity.dimensions)}`

/**
 * File name of a generated thumbnail: `<fileId>-<maxWidth>-<maxHeight>.<ext>`
 *
 * @example
 * ```ts
 * thumbnailFileName("abc123", { maxWidth: 200, maxHeight: 0 }, "jpg") // => "abc123-200-0.jpg"
 * ```
 */
export const thumbnailFileName = (fileId: string, dimensions: Dimensions, extension: string): string =>
  `${fileId}-${dimensions.maxWidth}-${dimensions.maxHeight}.${extension.replace(/^\./, "")}`
