/**
 * Utility functions for the thumbnail cache
 *
 * @module
 */

export * from "./dimensions.js"
export * from "./path.js"
export * from "./route.js"
