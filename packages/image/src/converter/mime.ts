/**
 * Media types the vips converter can build thumbnails for
 *
 * @module
 */

export type OutputFormat = "jpeg" | "png" | "gif"

const FORMATS: Record<string, OutputFormat> = {
  "image/jpeg": "jpeg",
  "image/jpg": "jpeg",
  "image/pjpeg": "jpeg",
  "image/png": "png",
  "image/gif": "gif"
}

/**
 * Supported media types
 */
export const SUPPORTED_MEDIA_TYPES: ReadonlyArray<string> = Object.keys(FORMATS)

/**
 * Normalize a media type for lookups: `"Image/JPEG; charset=binary"` => `"image/jpeg"`
 */
export const normalizeMediaType = (mimeType: string): string =>
  (mimeType.split(";")[0] ?? "").trim().toLowerCase()

/**
 * Output format for a media type, or null if unsupported
 */
export const outputFormat = (mimeType: string): OutputFormat | null =>
  FORMATS[normalizeMediaType(mimeType)] ?? null

export const isSupportedMediaType = (mimeType: string): boolean => outputFormat(mimeType) !== null

/**
 * Thumbnail file extension for a media type, without the dot.
 * The JPEG family maps to `jpg`; anything else to its subtype.
 */
export const thumbnailExtension = (mimeType: string): string => {
  const format = outputFormat(mimeType)
  if (format === "jpeg") return "jpg"
  if (format !== null) return format

  const normalized = normalizeMediaType(mimeType)
  const slash = normalized.indexOf("/")
  return slash >= 0 ? normalized.slice(slash + 1) : normalized
}
