/**
 * @module rgba-buffer
 * Owned row-major RGBA pixel buffer implementing {@link PixelSurface}.
 *
 * Node has no `ImageData`, so layers store their pixels here. The buffer knows
 * nothing about displays; the host uploads it after a commit.
 */

import type { Color, PixelBuffer, RgbaImage } from '@layerpaint/types';
import { blendColors, TRANSPARENT } from './color';

/** Canvas-sized RGBA storage for one layer or scratch image. */
export class RgbaBuffer implements PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  /**
   * @param width  - Width in pixels (non-negative integer).
   * @param height - Height in pixels (non-negative integer).
   * @param data   - Existing RGBA bytes to adopt. Zero-filled when omitted.
   */
  constructor(width: number, height: number, data?: Uint8ClampedArray) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Invalid buffer size ${width}x${height}`);
    }
    const expectedLength = width * height * 4;
    if (data && data.length !== expectedLength) {
      throw new Error(
        `Pixel data length ${data.length} does not match ${width}x${height} (expected ${expectedLength})`,
      );
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Uint8ClampedArray(expectedLength);
  }

  /** Copy any {@link RgbaImage} into a new buffer. */
  static from(image: RgbaImage): RgbaBuffer {
    return new RgbaBuffer(image.width, image.height, new Uint8ClampedArray(image.data));
  }

  /** A buffer filled with one color. */
  static filled(width: number, height: number, color: Color): RgbaBuffer {
    const buffer = new RgbaBuffer(width, height);
    buffer.fill(color);
    return buffer;
  }

  /** Whether (x, y) is inside the buffer. */
  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  readPixel(x: number, y: number): Color {
    if (!this.contains(x, y)) {
      return { ...TRANSPARENT };
    }
    const offset = (y * this.width + x) * 4;
    return {
      r: this.data[offset],
      g: this.data[offset + 1],
      b: this.data[offset + 2],
      a: this.data[offset + 3],
    };
  }

  writePixel(x: number, y: number, color: Color): void {
    if (!this.contains(x, y)) {
      return;
    }
    const offset = (y * this.width + x) * 4;
    this.data[offset] = color.r;
    this.data[offset + 1] = color.g;
    this.data[offset + 2] = color.b;
    this.data[offset + 3] = color.a;
  }

  blendPixel(x: number, y: number, color: Color): void {
    if (!this.contains(x, y)) {
      return;
    }
    this.writePixel(x, y, blendColors(this.readPixel(x, y), color));
  }

  /** Overwrite every pixel. */
  fill(color: Color): void {
    for (let i = 0; i < this.data.length; i += 4) {
      this.data[i] = color.r;
      this.data[i + 1] = color.g;
      this.data[i + 2] = color.b;
      this.data[i + 3] = color.a;
    }
  }

  clone(): RgbaBuffer {
    return new RgbaBuffer(this.width, this.height, new Uint8ClampedArray(this.data));
  }
}

/** Read a pixel from a plain {@link RgbaImage}; out-of-bounds reads are transparent. */
export function imagePixel(image: RgbaImage, x: number, y: number): Color {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    return { ...TRANSPARENT };
  }
  const offset = (y * image.width + x) * 4;
  return {
    r: image.data[offset],
    g: image.data[offset + 1],
    b: image.data[offset + 2],
    a: image.data[offset + 3],
  };
}
