/**
 * Services exports
 *
 * @module
 */

export * from "./repository/index.js"
export * from "./image-converter/index.js"
export * from "./thumbnail-index/index.js"
export * from "./conversion-worker/index.js"
export * from "./thumbnail-cache/index.js"
