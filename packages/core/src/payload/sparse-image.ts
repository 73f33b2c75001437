/**
 * @module payload/sparse-image
 * Coordinate-keyed pixel map used as the undo payload of scattered writes.
 */

import type { Color, SparseImage, SparsePixel } from '@layerpaint/types';

/** Coordinates must lie in [0, KEY_STRIDE) on both axes. */
const KEY_STRIDE = 2 ** 26;

function pixelKey(x: number, y: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= KEY_STRIDE || y >= KEY_STRIDE) {
    throw new RangeError(`Sparse pixel (${x}, ${y}) out of range`);
  }
  return y * KEY_STRIDE + x;
}

/** Map-backed {@link SparseImage}. Iteration follows insertion order. */
export class SparseImageImpl implements SparseImage {
  private readonly pixelMap = new Map<number, SparsePixel>();

  get size(): number {
    return this.pixelMap.size;
  }

  has(x: number, y: number): boolean {
    return this.pixelMap.has(pixelKey(x, y));
  }

  get(x: number, y: number): Color | undefined {
    return this.pixelMap.get(pixelKey(x, y))?.color;
  }

  set(x: number, y: number, color: Color): void {
    const key = pixelKey(x, y);
    const existing = this.pixelMap.get(key);
    if (existing) {
      existing.color = { ...color };
    } else {
      this.pixelMap.set(key, { x, y, color: { ...color } });
    }
  }

  pixels(): IterableIterator<SparsePixel> {
    return this.pixelMap.values();
  }
}
