/**
 * ContentRepository exports
 *
 * @module
 */

export * from "./ContentRepository.js"
export * from "./MemoryRepository.js"
export * from "./ReindexNotifier.js"
