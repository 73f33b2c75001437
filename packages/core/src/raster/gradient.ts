/**
 * @module raster/gradient
 * Two-color gradient interpolation factor.
 */

import type { GradientType } from '@layerpaint/types';

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

/**
 * Interpolation factor in [0, 1] for pixel (x, y).
 *
 * - `linear`: projection of the pixel onto the start→end axis divided by the
 *   axis length.
 * - `radial`: Euclidean distance from the start point divided by the axis length.
 *
 * A zero-length axis yields 0 everywhere.
 */
export function gradientFactor(
  type: GradientType,
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  x: number,
  y: number,
): number {
  const axisX = endX - startX;
  const axisY = endY - startY;
  const lengthSq = axisX * axisX + axisY * axisY;
  if (lengthSq === 0) {
    return 0;
  }

  const px = x - startX;
  const py = y - startY;

  switch (type) {
    case 'linear':
      return clamp01((px * axisX + py * axisY) / lengthSq);
    case 'radial':
      return clamp01(Math.hypot(px, py) / Math.sqrt(lengthSq));
  }
}
