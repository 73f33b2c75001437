/**
 * @module surface
 * The pixel read/write capability every raster algorithm works against.
 *
 * Algorithms never assume a storage layout; they only see a {@link PixelSurface}.
 * The display layer implements the same capability over its own buffer and is
 * responsible for uploading after a batch of writes.
 */

import type { Color } from './common';

/** Abstract readable/writable pixel grid. */
export interface PixelSurface {
  /** Width in pixels. */
  readonly width: number;
  /** Height in pixels. */
  readonly height: number;
  /** Read the pixel at (x, y). Out-of-bounds reads return transparent black. */
  readPixel(x: number, y: number): Color;
  /** Overwrite the pixel at (x, y). Out-of-bounds writes are dropped. */
  writePixel(x: number, y: number, color: Color): void;
  /**
   * Alpha-composite `color` over the pixel at (x, y).
   * Optional: callers fall back to read + blend + write when absent.
   */
  blendPixel?(x: number, y: number, color: Color): void;
}

/** Flat row-major RGBA image. */
export interface RgbaImage {
  /** Width in pixels. */
  readonly width: number;
  /** Height in pixels. */
  readonly height: number;
  /** RGBA bytes. Length = width * height * 4. */
  readonly data: Uint8ClampedArray;
}

/** An owned RGBA buffer that can also be drawn on. */
export interface PixelBuffer extends RgbaImage, PixelSurface {
  /** Deep copy of the buffer. */
  clone(): PixelBuffer;
}
