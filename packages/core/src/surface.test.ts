import { describe, it, expect } from 'vitest';
import type { Color, PixelSurface } from '@layerpaint/types';
import { rgba } from './color';
import { RgbaBuffer } from './rgba-buffer';
import { MaskedSurface, putColor, readRegion } from './surface';

describe('RgbaBuffer', () => {
  it('starts fully transparent', () => {
    const buffer = new RgbaBuffer(2, 2);
    expect(Array.from(buffer.data)).toEqual(new Array(16).fill(0));
  });

  it('rejects data of the wrong length', () => {
    expect(() => new RgbaBuffer(2, 2, new Uint8ClampedArray(3))).toThrow(Error);
  });

  it('rejects negative sizes', () => {
    expect(() => new RgbaBuffer(-1, 2)).toThrow(RangeError);
  });

  it('reads transparent and drops writes outside the bounds', () => {
    const buffer = new RgbaBuffer(2, 2);
    buffer.writePixel(5, 5, rgba(255, 0, 0));
    expect(buffer.readPixel(5, 5)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
    expect(buffer.readPixel(-1, 0)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  it('writes row-major RGBA', () => {
    const buffer = new RgbaBuffer(3, 2);
    buffer.writePixel(1, 1, rgba(1, 2, 3, 4));
    expect(Array.from(buffer.data.subarray(16, 20))).toEqual([1, 2, 3, 4]);
  });

  it('clone is independent', () => {
    const buffer = RgbaBuffer.filled(1, 1, rgba(9, 9, 9));
    const copy = buffer.clone();
    copy.writePixel(0, 0, rgba(1, 1, 1));
    expect(buffer.readPixel(0, 0)).toEqual(rgba(9, 9, 9));
  });
});

describe('putColor', () => {
  it('falls back to read-blend-write on surfaces without blendPixel', () => {
    const backing = RgbaBuffer.filled(1, 1, rgba(0, 0, 0));
    const plain: PixelSurface = {
      width: 1,
      height: 1,
      readPixel: (x, y) => backing.readPixel(x, y),
      writePixel: (x: number, y: number, color: Color) => backing.writePixel(x, y, color),
    };
    putColor(plain, 0, 0, rgba(255, 255, 255, 128), true);
    expect(backing.readPixel(0, 0)).toEqual(rgba(128, 128, 128));
  });
});

describe('MaskedSurface', () => {
  it('filters writes outside the valid region and tracks dirty bounds', () => {
    const buffer = new RgbaBuffer(4, 4);
    const masked = new MaskedSurface(buffer, { x: 1, y: 1, width: 2, height: 2 });

    masked.writePixel(0, 0, rgba(255, 0, 0));
    masked.writePixel(1, 2, rgba(255, 0, 0));
    masked.blendPixel(2, 1, rgba(0, 255, 0));

    expect(buffer.readPixel(0, 0).a).toBe(0);
    expect(buffer.readPixel(1, 2)).toEqual(rgba(255, 0, 0));
    expect(buffer.readPixel(2, 1)).toEqual(rgba(0, 255, 0));
    expect(masked.dirtyBounds).toEqual({ x: 1, y: 1, width: 2, height: 2 });
  });

  it('reads pass through outside the region', () => {
    const buffer = RgbaBuffer.filled(2, 2, rgba(7, 7, 7));
    const masked = new MaskedSurface(buffer, { x: 0, y: 0, width: 1, height: 1 });
    expect(masked.readPixel(1, 1)).toEqual(rgba(7, 7, 7));
  });

  it('has no dirty bounds until something is written', () => {
    const masked = new MaskedSurface(new RgbaBuffer(2, 2));
    expect(masked.dirtyBounds).toBeNull();
  });

  it('readRegion copies a sub-rectangle', () => {
    const buffer = new RgbaBuffer(3, 3);
    buffer.writePixel(2, 1, rgba(5, 6, 7));
    const region = readRegion(buffer, { x: 1, y: 1, width: 2, height: 2 });
    expect(region.width).toBe(2);
    expect(region.readPixel(1, 0)).toEqual(rgba(5, 6, 7));
  });
});
