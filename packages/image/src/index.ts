/**
 * wasm-vips image converter for the thumbnail cache
 *
 * @module
 */

export * from "./converter/bounds.js"
export * from "./converter/mime.js"
export * from "./converter/VipsImageConverter.js"
export { initVips, isVipsInitialized, type VipsInitOptions } from "./vips.js"
