/**
 * ConversionWorker exports
 *
 * @module
 */

export * from "./ConversionWorker.js"
