import { describe, expect, it } from "vitest"
import { mediaTypeFromBytes, mediaTypeFromPath, SIGNATURE_LENGTH } from "./mime.js"

const padded = (...bytes: Array<number>) => {
  const data = new Uint8Array(12)
  data.set(bytes)
  return data
}

describe("mediaTypeFromPath", () => {
  it("should map known extensions regardless of case", () => {
    expect(mediaTypeFromPath("/srv/notes/files/Beach.JPG")).toBe("image/jpeg")
    expect(mediaTypeFromPath("files/map.png")).toBe("image/png")
    expect(mediaTypeFromPath("files/readme.md")).toBe("text/markdown")
  })

  it("should return null without a known extension", () => {
    expect(mediaTypeFromPath("files/blob")).toBeNull()
    expect(mediaTypeFromPath("files/.hidden")).toBeNull()
    expect(mediaTypeFromPath("files/archive.xyz")).toBeNull()
  })
})

describe("mediaTypeFromBytes", () => {
  it("should detect the signatures of convertible images", () => {
    expect(mediaTypeFromBytes(padded(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a))).toBe("image/png")
    expect(mediaTypeFromBytes(padded(0xff, 0xd8, 0xff, 0xe0))).toBe("image/jpeg")
    expect(mediaTypeFromBytes(padded(0x47, 0x49, 0x46, 0x38, 0x39, 0x61))).toBe("image/gif")
  })

  it("should need the whole signature", () => {
    expect(mediaTypeFromBytes(padded(0x89, 0x50, 0x4e, 0x47))).toBeNull()
    expect(mediaTypeFromBytes(new Uint8Array([0xff, 0xd8]))).toBeNull()
  })

  it("should return null for other content", () => {
    expect(mediaTypeFromBytes(padded(0x42, 0x4d))).toBeNull()
    expect(mediaTypeFromBytes(new TextEncoder().encode("hello world!"))).toBeNull()
    expect(mediaTypeFromBytes(new Uint8Array(0))).toBeNull()
  })

  it("should read no more bytes than the longest signature", () => {
    expect(SIGNATURE_LENGTH).toBe(8)
  })
})
