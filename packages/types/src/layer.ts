/**
 * @module layer
 * Layer type definitions for the canvas model.
 *
 * Layers live in a flat, ordered list (bottom to top) and are never removed:
 * deletion only flips the state, so indices stored in history stay valid.
 */

import type { PixelBuffer } from './surface';

/** Lifecycle state of a layer. */
export type LayerState = 'visible' | 'hidden' | 'deleted';

/** A raster layer. */
export interface EditorLayer {
  /** Visibility / deletion state. */
  state: LayerState;
  /** Pixel content, always canvas-sized. */
  image: PixelBuffer;
}
