import { existsSync, readFileSync } from "node:fs"
import { join } from "node:path"

import { NodeFileSystem } from "@effect/platform-node"
import type { FileSystem } from "@effect/platform/FileSystem"
import { Chunk, Duration, Effect, Fiber, Layer, Option, TestClock, TestContext } from "effect"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  converterLayer,
  jpegFile,
  makeFakeConverter,
  makeTempDir,
  textFile,
  trackDetection,
  type FakeConverter,
  type TempDir
} from "../../../test/helpers/thumbnails.js"
import type { ThumbnailCacheEvent } from "../../types/index.js"
import { ImageConverter, type ImageConverterService } from "../image-converter/index.js"
import { makeMemoryFile, makeMemoryRepository } from "../repository/index.js"
import type { RepositoryFile, RepositoryItem } from "../repository/index.js"
import * as ThumbnailIndex from "../thumbnail-index/ThumbnailIndex.js"
import { type ConversionWorkerConfig, makeConversionWorker } from "./ConversionWorker.js"

const IMAGE_ROUTE = "documents/sample/files/image.jpg"

const sampleItems: ReadonlyArray<RepositoryItem> = [
  {
    route: "documents/sample",
    files: [jpegFile("abc123", "files/image.jpg"), textFile("txt001", "files/notes.txt")]
  }
]

describe("ConversionWorker", () => {
  let dir: TempDir
  let converter: FakeConverter

  beforeEach(() => {
    dir = makeTempDir()
    converter = makeFakeConverter()
  })

  afterEach(() => {
    dir.cleanup()
  })

  const run = <A, E>(effect: Effect.Effect<A, E, FileSystem | ImageConverter>) =>
    Effect.runPromise(effect.pipe(Effect.provide(converterLayer(converter))))

  const makeWorker = (config: Partial<ConversionWorkerConfig> = {}) =>
    makeConversionWorker({
      thumbnailDirectory: dir.path,
      dimensions: [
        { maxWidth: 200, maxHeight: 0 },
        { maxWidth: 400, maxHeight: 0 },
        { maxWidth: 800, maxHeight: 0 }
      ],
      interItemDelay: Duration.zero,
      ...config
    })

  it("should build one thumbnail per dimension and skip unsupported files", async () => {
    const { summary, record } = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker()
        const summary = yield* worker.runOnePass(repository)
        const record = yield* worker.lookup(IMAGE_ROUTE, { maxWidth: 400, maxHeight: 0 })
        return { summary, record }
      })
    )

    expect(summary).toEqual({
      filesVisited: 2,
      created: 3,
      cached: 0,
      unsupported: 1,
      skipped: 0,
      failed: 0,
      stopped: false
    })
    expect(record).toEqual(
      Option.some({
        sourceRoute: IMAGE_ROUTE,
        dimensions: { maxWidth: 400, maxHeight: 0 },
        fileName: "abc123-400-0.jpg"
      })
    )
    expect(readFileSync(join(dir.path, "abc123-200-0.jpg"), "utf8")).toBe("200x0:4")
    expect(readFileSync(join(dir.path, "abc123-400-0.jpg"), "utf8")).toBe("400x0:4")
    expect(readFileSync(join(dir.path, "abc123-800-0.jpg"), "utf8")).toBe("800x0:4")
    expect(converter.calls.map((call) => call.mimeType)).toEqual(["image/jpeg", "image/jpeg", "image/jpeg"])
  })

  it("should do no work on a second pass", async () => {
    const summaries = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker()
        const first = yield* worker.runOnePass(repository)
        const second = yield* worker.runOnePass(repository)
        return [first, second]
      })
    )

    expect(summaries[1]).toEqual({
      filesVisited: 2,
      created: 0,
      cached: 3,
      unsupported: 1,
      skipped: 0,
      failed: 0,
      stopped: false
    })
    expect(converter.calls).toHaveLength(3)
  })

  it("should skip thumbnails already in the initial index", async () => {
    const initialIndex = ThumbnailIndex.fromRecords([
      { sourceRoute: IMAGE_ROUTE, dimensions: { maxWidth: 200, maxHeight: 0 }, fileName: "abc123-200-0.jpg" }
    ])

    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker({ initialIndex })
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary.created).toBe(2)
    expect(summary.cached).toBe(1)
    expect(converter.calls.map((call) => call.bounds.maxWidth)).toEqual([400, 800])
    expect(existsSync(join(dir.path, "abc123-200-0.jpg"))).toBe(false)
  })

  it("should leave a failed thumbnail out of the index and retry it on the next pass", async () => {
    converter.failWhen((bounds) => bounds.maxWidth === 400)

    const result = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker()

        const first = yield* worker.runOnePass(repository)
        const missing = yield* worker.lookup(IMAGE_ROUTE, { maxWidth: 400, maxHeight: 0 })
        const partialLeft = existsSync(join(dir.path, "abc123-400-0.jpg"))

        converter.failWhen(() => false)
        const second = yield* worker.runOnePass(repository)
        const found = yield* worker.lookup(IMAGE_ROUTE, { maxWidth: 400, maxHeight: 0 })

        return { first, missing, partialLeft, second, found }
      })
    )

    expect(result.first.created).toBe(2)
    expect(result.first.failed).toBe(1)
    expect(Option.isNone(result.missing)).toBe(true)
    expect(result.partialLeft).toBe(false)

    expect(result.second.created).toBe(1)
    expect(result.second.cached).toBe(2)
    expect(result.second.failed).toBe(0)
    expect(Option.isSome(result.found)).toBe(true)
  })

  it("should skip files whose media type cannot be detected", async () => {
    const broken = makeMemoryFile({
      id: "bad001",
      parent: "documents/sample",
      route: "files/broken",
      data: new Uint8Array(0),
      mimeType: new Error("no magic")
    })

    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([{ route: "documents/sample", files: [broken] }])
        const worker = yield* makeWorker()
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary.skipped).toBe(1)
    expect(summary.created).toBe(0)
    expect(converter.calls).toHaveLength(0)
  })

  it("should skip files whose route cannot be combined", async () => {
    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([
          { route: "documents/sample", files: [jpegFile("esc001", "../outside.jpg")] }
        ])
        const worker = yield* makeWorker()
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary.skipped).toBe(1)
    expect(converter.calls).toHaveLength(0)
  })

  it("should stop between files once no longer running", async () => {
    let checks = 0

    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([
          {
            route: "documents/sample",
            files: [jpegFile("one001", "files/one.jpg"), jpegFile("two002", "files/two.jpg")]
          }
        ])
        // running for the check before the first file only
        const worker = yield* makeWorker({ isRunning: Effect.sync(() => checks++ === 0) })
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary.filesVisited).toBe(1)
    expect(summary.created).toBe(3)
    expect(summary.stopped).toBe(true)
    expect(checks).toBe(2)
  })

  it("should visit no file when not running at the start of a pass", async () => {
    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker({ isRunning: Effect.succeed(false) })
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary).toEqual({
      filesVisited: 0,
      created: 0,
      cached: 0,
      unsupported: 0,
      skipped: 0,
      failed: 0,
      stopped: true
    })
    expect(converter.calls).toHaveLength(0)
  })

  it("should skip a file whose detection dies and keep going", async () => {
    const dying: RepositoryFile = {
      ...jpegFile("die001", "files/dying.jpg"),
      mimeType: () => Effect.die(new Error("detector crashed"))
    }

    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([
          { route: "documents/sample", files: [dying, jpegFile("abc123", "files/image.jpg")] }
        ])
        const worker = yield* makeWorker()
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary).toEqual({
      filesVisited: 2,
      created: 3,
      cached: 0,
      unsupported: 0,
      skipped: 1,
      failed: 0,
      stopped: false
    })
  })

  it("should skip a file whose classification throws in the converter", async () => {
    const throwing: ImageConverterService = {
      ...converter.service,
      fileExtension: (mimeType) => {
        if (mimeType === "image/gif") throw new Error("no extension for gif")
        return converter.service.fileExtension(mimeType)
      }
    }
    const gif = makeMemoryFile({
      id: "gif001",
      parent: "documents/sample",
      route: "files/anim.gif",
      data: new Uint8Array([0x47, 0x49, 0x46]),
      mimeType: "image/gif"
    })

    const summary = await Effect.runPromise(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([
          { route: "documents/sample", files: [gif, jpegFile("abc123", "files/image.jpg")] }
        ])
        const worker = yield* makeWorker()
        return yield* worker.runOnePass(repository)
      }).pipe(
        Effect.provide(Layer.mergeAll(NodeFileSystem.layer, Layer.succeed(ImageConverter, throwing)))
      )
    )

    expect(summary.skipped).toBe(1)
    expect(summary.created).toBe(3)
    expect(converter.calls.map((call) => call.path)).toEqual([
      join(dir.path, "abc123-200-0.jpg"),
      join(dir.path, "abc123-400-0.jpg"),
      join(dir.path, "abc123-800-0.jpg")
    ])
  })

  it("should pause after every file, whether or not it needed work", async () => {
    const visited: Array<string> = []
    const initialIndex = ThumbnailIndex.fromRecords(
      [200, 400, 800].map((maxWidth) => ({
        sourceRoute: "documents/sample/files/cached.jpg",
        dimensions: { maxWidth, maxHeight: 0 },
        fileName: `old001-${maxWidth}-0.jpg`
      }))
    )

    // polls with a real timer, the test clock only moves when adjusted
    const awaitSleeping = Effect.gen(function*() {
      while (Chunk.isEmpty(yield* TestClock.sleeps())) {
        yield* Effect.promise(() => new Promise<void>((resolve) => setTimeout(resolve, 1)))
      }
    })

    const result = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository([
          {
            route: "documents/sample",
            files: [
              trackDetection(textFile("txt001", "files/notes.txt"), visited),
              trackDetection(jpegFile("old001", "files/cached.jpg"), visited),
              trackDetection(jpegFile("new001", "files/fresh.jpg"), visited)
            ]
          }
        ])
        const worker = yield* makeWorker({ interItemDelay: Duration.seconds(5), initialIndex })
        const fiber = yield* Effect.fork(worker.runOnePass(repository))
        const seen: Array<number> = []

        yield* awaitSleeping
        seen.push(visited.length)

        yield* TestClock.adjust(Duration.seconds(5))
        yield* awaitSleeping
        seen.push(visited.length)

        yield* TestClock.adjust(Duration.millis(4999))
        seen.push(visited.length)

        yield* TestClock.adjust(Duration.millis(1))
        yield* awaitSleeping
        seen.push(visited.length)

        yield* TestClock.adjust(Duration.seconds(5))
        const summary = yield* Fiber.join(fiber)
        return { seen, summary }
      }).pipe(Effect.provide(TestContext.TestContext))
    )

    expect(result.seen).toEqual([1, 2, 2, 3])
    expect(visited).toEqual(["files/notes.txt", "files/cached.jpg", "files/fresh.jpg"])
    expect(result.summary).toEqual({
      filesVisited: 3,
      created: 3,
      cached: 3,
      unsupported: 1,
      skipped: 0,
      failed: 0,
      stopped: false
    })
  })

  it("should report every thumbnail as failed when the target folder is missing", async () => {
    const events: Array<ThumbnailCacheEvent> = []

    const summary = await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker({
          thumbnailDirectory: join(dir.path, "missing"),
          onEvent: (event) => events.push(event)
        })
        return yield* worker.runOnePass(repository)
      })
    )

    expect(summary.failed).toBe(3)
    expect(converter.calls).toHaveLength(0)
    expect(events.map((event) => event.type)).toEqual(["thumbnail-failed", "thumbnail-failed", "thumbnail-failed"])
  })

  it("should emit an event for every created thumbnail", async () => {
    const events: Array<ThumbnailCacheEvent> = []

    await run(
      Effect.gen(function*() {
        const repository = yield* makeMemoryRepository(sampleItems)
        const worker = yield* makeWorker({ onEvent: (event) => events.push(event) })
        return yield* worker.runOnePass(repository)
      })
    )

    expect(events.flatMap((event) => event.type === "thumbnail-created" ? [event.record.fileName] : [])).toEqual([
      "abc123-200-0.jpg",
      "abc123-400-0.jpg",
      "abc123-800-0.jpg"
    ])
  })
})
