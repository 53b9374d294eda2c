/**
 * wasm-vips initialization and lazy loading
 *
 * The WASM module is loaded on the first resize and shared by every
 * converter in the process.
 *
 * @module
 */

// @ts-ignore - wasm-vips module requires special import handling
import Vips from "wasm-vips"

// Vips instance type - inferred from the module
export type VipsInstance = Awaited<ReturnType<typeof Vips>>

let vipsInstance: VipsInstance | null = null
let vipsInitPromise: Promise<VipsInstance> | null = null

/**
 * Options for initializing wasm-vips
 */
export interface VipsInitOptions {
  /**
   * Custom function to locate the WASM file.
   * By default wasm-vips looks next to its own module in node_modules.
   *
   * @example
   * ```typescript
   * locateFile: (path) => `/opt/wasm/${path}`
   * ```
   */
  locateFile?: (path: string) => string
}

/**
 * Initialize wasm-vips lazily (only when the first image is processed).
 * A failed initialization is not cached, so the next call retries.
 *
 * @example
 * ```typescript
 * const vips = await initVips()
 * const image = vips.Image.newFromBuffer(buffer)
 * ```
 */
export async function initVips(options: VipsInitOptions = {}): Promise<VipsInstance> {
  if (vipsInstance) {
    return vipsInstance
  }

  if (vipsInitPromise) {
    return vipsInitPromise
  }

  vipsInitPromise = Vips({
    // Disable dynamic libraries to reduce complexity
    dynamicLibraries: [],
    ...(options.locateFile ? { locateFile: options.locateFile } : {})
  }).then(
    (instance: VipsInstance) => {
      vipsInstance = instance
      return instance
    },
    (error: unknown) => {
      vipsInitPromise = null
      throw error
    }
  )

  return vipsInitPromise
}

/**
 * Check if wasm-vips is initialized
 */
export function isVipsInitialized(): boolean {
  return vipsInstance !== null
}
