/**
 * Resize scale computation
 *
 * @module
 */

import type { Dimensions } from "@thumbnail-cache/core"

/**
 * Largest scale (at most 1) at which an image of `width` x `height` fits the
 * bounds. An axis bounded by 0 is unconstrained. Images are never enlarged.
 *
 * @example
 * ```ts
 * computeResizeScale(1600, 1200, { maxWidth: 400, maxHeight: 0 }) // => 0.25
 * ```
 */
export const computeResizeScale = (width: number, height: number, bounds: Dimensions): number => {
  let scale = 1

  if (bounds.maxWidth > 0 && width > 0) {
    scale = Math.min(scale, bounds.maxWidth / width)
  }
  if (bounds.maxHeight > 0 && height > 0) {
    scale = Math.min(scale, bounds.maxHeight / height)
  }

  return scale
}
