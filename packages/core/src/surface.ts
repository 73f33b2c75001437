/**
 * @module surface
 * Surface helpers and the valid-region decorator.
 *
 * A {@link MaskedSurface} wraps the surface of a layer for the duration of one
 * apply. Writes outside the valid region are filtered out; reads always pass
 * through. It also records the bounds of what was written so the owner can
 * commit them in one batch afterwards.
 */

import type { Color, PixelSurface, Rect } from '@layerpaint/types';
import { blendColors } from './color';
import { clipRect, includePixel, intersectRects, rectContains } from './rect';
import { RgbaBuffer } from './rgba-buffer';

/** Whether (x, y) lies on the surface. */
export function inBounds(surface: PixelSurface, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < surface.width && y < surface.height;
}

/**
 * Write a color, alpha-blending when `blend` is set.
 * Surfaces without `blendPixel` fall back to read + composite + write.
 */
export function putColor(surface: PixelSurface, x: number, y: number, color: Color, blend: boolean): void {
  if (!inBounds(surface, x, y)) {
    return;
  }
  if (!blend) {
    surface.writePixel(x, y, color);
  } else if (surface.blendPixel) {
    surface.blendPixel(x, y, color);
  } else {
    surface.writePixel(x, y, blendColors(surface.readPixel(x, y), color));
  }
}

/** Copy a rectangle (already clipped to the surface) into a new buffer. */
export function readRegion(surface: PixelSurface, rect: Rect): RgbaBuffer {
  const region = new RgbaBuffer(rect.width, rect.height);
  for (let y = 0; y < rect.height; y++) {
    for (let x = 0; x < rect.width; x++) {
      region.writePixel(x, y, surface.readPixel(rect.x + x, rect.y + y));
    }
  }
  return region;
}

/** Restricts writes to an optional rectangle and tracks what was written. */
export class MaskedSurface implements PixelSurface {
  private readonly inner: PixelSurface;
  private readonly validRegion: Rect | null;
  private dirty: Rect | null = null;

  /**
   * @param inner       - The surface being edited.
   * @param validRegion - Writable rectangle, or null to allow the whole surface.
   */
  constructor(inner: PixelSurface, validRegion: Rect | null = null) {
    this.inner = inner;
    this.validRegion = validRegion;
  }

  get width(): number {
    return this.inner.width;
  }

  get height(): number {
    return this.inner.height;
  }

  /** Bounds of every write that reached the inner surface, or null if none did. */
  get dirtyBounds(): Rect | null {
    return this.dirty;
  }

  /** Whether a write to (x, y) would reach the inner surface. */
  canWrite(x: number, y: number): boolean {
    return inBounds(this.inner, x, y) && (this.validRegion === null || rectContains(this.validRegion, x, y));
  }

  /** Part of `rect` that writes can reach, or null when none of it can. */
  clip(rect: Rect): Rect | null {
    const onSurface = clipRect(rect, this.inner.width, this.inner.height);
    if (!onSurface || this.validRegion === null) {
      return onSurface;
    }
    return intersectRects(onSurface, this.validRegion);
  }

  readPixel(x: number, y: number): Color {
    return this.inner.readPixel(x, y);
  }

  writePixel(x: number, y: number, color: Color): void {
    if (!this.canWrite(x, y)) {
      return;
    }
    this.inner.writePixel(x, y, color);
    this.dirty = includePixel(this.dirty, x, y);
  }

  blendPixel(x: number, y: number, color: Color): void {
    if (!this.canWrite(x, y)) {
      return;
    }
    putColor(this.inner, x, y, color, true);
    this.dirty = includePixel(this.dirty, x, y);
  }
}

/** Whether a write to (x, y) would land, honoring a {@link MaskedSurface} region. */
export function canWriteTo(surface: PixelSurface, x: number, y: number): boolean {
  return surface instanceof MaskedSurface ? surface.canWrite(x, y) : inBounds(surface, x, y);
}

/** Part of `rect` writable on `surface`, or null. */
export function clipToWritable(surface: PixelSurface, rect: Rect): Rect | null {
  return surface instanceof MaskedSurface ? surface.clip(rect) : clipRect(rect, surface.width, surface.height);
}
