import path from "node:path"

import { NodeFileSystem, NodeRuntime } from "@effect/platform-node"
import { Config, Duration, Effect, Layer, Logger, LogLevel, Option } from "effect"

import { DirectoryRepository, DirectoryRepositoryLive } from "@thumbnail-cache/adapter-node"
import { ThumbnailCache, ThumbnailCacheLive, ThumbnailIndexStoreLive } from "@thumbnail-cache/core"
import { VipsImageConverterLive } from "@thumbnail-cache/image"

const AppConfig = Config.all({
  contentRoot: Config.string("THUMBNAIL_CONTENT_ROOT"),
  metadataRoot: Config.option(Config.string("THUMBNAIL_METADATA_ROOT")),
  itemDelay: Config.duration("THUMBNAIL_ITEM_DELAY").pipe(Config.withDefault(Duration.seconds(5))),
  reindexInterval: Config.duration("THUMBNAIL_REINDEX_INTERVAL").pipe(Config.withDefault(Duration.minutes(1))),
  logLevel: Config.logLevel("THUMBNAIL_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
})

const program = Effect.gen(function*() {
  const config = yield* AppConfig
  const contentRoot = path.resolve(config.contentRoot)
  const metadataRoot = Option.getOrElse(config.metadataRoot, () => path.join(contentRoot, ".thumbnail-cache"))

  const RepositoryLayer = DirectoryRepositoryLive({
    root: contentRoot,
    exclude: [path.basename(metadataRoot)]
  })

  const MainLayer = ThumbnailCacheLive({ metadataRoot, interItemDelay: config.itemDelay }).pipe(
    Layer.provideMerge(RepositoryLayer),
    Layer.provide(Layer.mergeAll(VipsImageConverterLive, ThumbnailIndexStoreLive)),
    Layer.provide(NodeFileSystem.layer)
  )

  const serve = Effect.gen(function*() {
    const cache = yield* ThumbnailCache
    const repository = yield* DirectoryRepository

    yield* Effect.logInfo(`Building thumbnails for ${repository.root} into ${cache.paths.thumbnailDirectory}`)

    if (Duration.lessThanOrEqualTo(config.reindexInterval, Duration.zero)) {
      return yield* Effect.never
    }

    // rescan periodically; scan failures are logged by the repository
    return yield* Effect.sleep(config.reindexInterval).pipe(
      Effect.zipRight(Effect.ignore(repository.reindex())),
      Effect.forever
    )
  })

  // interruption (SIGINT / SIGTERM) closes the layer: conversion stops, then the index is saved
  yield* serve.pipe(
    Effect.provide(MainLayer),
    Logger.withMinimumLogLevel(config.logLevel)
  )
})

NodeRuntime.runMain(program)
