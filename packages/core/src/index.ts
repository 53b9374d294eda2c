/**
 * Thumbnail Cache
 *
 * Restart-safe thumbnail generation for content repositories.
 *
 * @module
 */

// Errors
export * from "./errors/index.js"

// Utils
export * from "./utils/index.js"

// Types
export * from "./types/index.js"

// Services
export * from "./services/index.js"

// Schema
export * from "./schema/index.js"

// Promise-based API
export * from "./api/index.js"
