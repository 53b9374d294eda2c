/**
 * Node adapter exports
 *
 * @module
 */

export * from "./DirectoryRepository.js"
export * from "./mime.js"
