/**
 * Media type detection for files on disk
 *
 * @module
 */

/**
 * Fallback when neither the extension nor the content identify a file
 */
export const UNKNOWN_MEDIA_TYPE = "application/octet-stream"

interface Signature {
  readonly mimeType: string
  readonly bytes: ReadonlyArray<number>
}

// formats the converter builds thumbnails from
const SIGNATURES: ReadonlyArray<Signature> = [
  { mimeType: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { mimeType: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
  { mimeType: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38] }
]

/**
 * Number of leading bytes needed by `mediaTypeFromBytes`
 */
export const SIGNATURE_LENGTH = Math.max(...SIGNATURES.map((signature) => signature.bytes.length))

const EXTENSIONS: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  jpe: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
  bmp: "image/bmp",
  tiff: "image/tiff",
  tif: "image/tiff",
  svg: "image/svg+xml",
  md: "text/markdown",
  txt: "text/plain",
  html: "text/html",
  pdf: "application/pdf",
  json: "application/json",
  zip: "application/zip"
}

/**
 * Get a file's media type from its path extension
 */
export const mediaTypeFromPath = (path: string): string | null => {
  const name = path.split(/[\\/]/).pop() ?? ""
  const dot = name.lastIndexOf(".")
  if (dot <= 0) return null

  return EXTENSIONS[name.slice(dot + 1).toLowerCase()] ?? null
}

/**
 * Detect an image type from the leading bytes of a file, or null
 */
export const mediaTypeFromBytes = (bytes: Uint8Array): string | null =>
  SIGNATURES.find((signature) => signature.bytes.every((byte, i) => bytes[i] === byte))?.mimeType ?? null
