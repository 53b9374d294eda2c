/**
 * ImageConverter exports
 *
 * @module
 */

export * from "./ImageConverter.js"
