/**
 * @module rect
 * Integer rectangle helpers used for clipping and dirty tracking.
 */

import type { Rect } from '@layerpaint/types';

/** Rectangle spanning two inclusive corners given in any order. */
export function rectFromCorners(x0: number, y0: number, x1: number, y1: number): Rect {
  const minX = Math.min(x0, x1);
  const minY = Math.min(y0, y1);
  return { x: minX, y: minY, width: Math.max(x0, x1) - minX + 1, height: Math.max(y0, y1) - minY + 1 };
}

/** Intersection of a rectangle with `[0, width) x [0, height)`, or null when empty. */
export function clipRect(rect: Rect, width: number, height: number): Rect | null {
  const minX = Math.max(0, rect.x);
  const minY = Math.max(0, rect.y);
  const maxX = Math.min(width, rect.x + rect.width);
  const maxY = Math.min(height, rect.y + rect.height);
  if (maxX <= minX || maxY <= minY) {
    return null;
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Overlap of two rectangles, or null when they do not overlap. */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const minX = Math.max(a.x, b.x);
  const minY = Math.max(a.y, b.y);
  const maxX = Math.min(a.x + a.width, b.x + b.width);
  const maxY = Math.min(a.y + a.height, b.y + b.height);
  if (maxX <= minX || maxY <= minY) {
    return null;
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Whether (x, y) lies inside `rect`. */
export function rectContains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && y >= rect.y && x < rect.x + rect.width && y < rect.y + rect.height;
}

/** Smallest rectangle covering `rect` and the pixel (x, y). */
export function includePixel(rect: Rect | null, x: number, y: number): Rect {
  if (!rect) {
    return { x, y, width: 1, height: 1 };
  }
  const minX = Math.min(rect.x, x);
  const minY = Math.min(rect.y, y);
  const maxX = Math.max(rect.x + rect.width, x + 1);
  const maxY = Math.max(rect.y + rect.height, y + 1);
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Smallest rectangle covering both. */
export function unionRects(a: Rect | null, b: Rect): Rect {
  if (!a) {
    return { ...b };
  }
  const minX = Math.min(a.x, b.x);
  const minY = Math.min(a.y, b.y);
  const maxX = Math.max(a.x + a.width, b.x + b.width);
  const maxY = Math.max(a.y + a.height, b.y + b.height);
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Structural equality of two optional rectangles. */
export function rectsEqual(a: Rect | null, b: Rect | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}
