/**
 * @module payload/optional-image
 * Dense grid of optional colors used as the undo payload of flood fills.
 *
 * Colors are packed into one RGBA byte array plus a presence mask, so an
 * untouched pixel is distinguishable from a transparent one.
 */

import type { Color, OptionalImage, SparsePixel } from '@layerpaint/types';

export class OptionalImageImpl implements OptionalImage {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8ClampedArray;
  private readonly defined: Uint8Array;
  private count = 0;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Invalid optional image size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);
    this.defined = new Uint8Array(width * height);
  }

  get size(): number {
    return this.count;
  }

  get(x: number, y: number): Color | undefined {
    const index = this.indexOf(x, y);
    if (index < 0 || this.defined[index] === 0) {
      return undefined;
    }
    const offset = index * 4;
    return {
      r: this.data[offset],
      g: this.data[offset + 1],
      b: this.data[offset + 2],
      a: this.data[offset + 3],
    };
  }

  /** Store a color. Coordinates outside the grid are ignored. */
  set(x: number, y: number, color: Color): void {
    const index = this.indexOf(x, y);
    if (index < 0) {
      return;
    }
    if (this.defined[index] === 0) {
      this.defined[index] = 1;
      this.count++;
    }
    const offset = index * 4;
    this.data[offset] = color.r;
    this.data[offset + 1] = color.g;
    this.data[offset + 2] = color.b;
    this.data[offset + 3] = color.a;
  }

  /** Defined pixels in row-major order. */
  *pixels(): IterableIterator<SparsePixel> {
    for (let index = 0; index < this.defined.length; index++) {
      if (this.defined[index] === 1) {
        const x = index % this.width;
        const y = (index - x) / this.width;
        const offset = index * 4;
        yield {
          x,
          y,
          color: {
            r: this.data[offset],
            g: this.data[offset + 1],
            b: this.data[offset + 2],
            a: this.data[offset + 3],
          },
        };
      }
    }
  }

  private indexOf(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return -1;
    }
    return y * this.width + x;
  }
}
