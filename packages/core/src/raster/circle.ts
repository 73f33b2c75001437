/**
 * @module raster/circle
 * Circle rasterizers: the integer midpoint circle (outline or filled spans)
 * and Wu's anti-aliased circle.
 *
 * @see https://en.wikipedia.org/wiki/Midpoint_circle_algorithm
 */

import { bresenhamLine } from './line';
import type { CoveragePlotFn, PlotFn } from './line';

/**
 * Midpoint circle with 8-way symmetry.
 * The filled variant draws the horizontal spans between symmetric points
 * instead of the points themselves. Pixels may be plotted more than once.
 */
export function midpointCircle(
  centerX: number,
  centerY: number,
  radius: number,
  filled: boolean,
  plot: PlotFn,
): void {
  if (radius < 0) {
    return;
  }
  if (radius === 0) {
    plot(centerX, centerY);
    return;
  }

  const emit = (x: number, y: number): void => {
    if (filled) {
      bresenhamLine(centerX - x, centerY + y, centerX + x, centerY + y, plot);
      bresenhamLine(centerX - x, centerY - y, centerX + x, centerY - y, plot);
      bresenhamLine(centerX - y, centerY + x, centerX + y, centerY + x, plot);
      bresenhamLine(centerX - y, centerY - x, centerX + y, centerY - x, plot);
    } else {
      plot(centerX - x, centerY + y);
      plot(centerX + x, centerY + y);
      plot(centerX - x, centerY - y);
      plot(centerX + x, centerY - y);
      plot(centerX - y, centerY + x);
      plot(centerX + y, centerY + x);
      plot(centerX - y, centerY - x);
      plot(centerX + y, centerY - x);
    }
  };

  let x = 0;
  let y = radius;
  let d = 3 - 2 * radius;
  emit(x, y);
  while (y >= x) {
    x++;
    if (d > 0) {
      y--;
      d += 4 * (x - y) + 10;
    } else {
      d += 4 * x + 6;
    }
    emit(x, y);
  }
}

/**
 * Wu's anti-aliased circle outline.
 *
 * Steps `j` along the minor axis of one octant. The fade metric is the
 * distance from the ideal circle up to the next integer row; whenever it does
 * not grow compared with the previous step the outer index `i` moves inwards.
 * Equal fades also step: they only occur when the circle hits two integer
 * rows in a row (radius 1 next to the axis, or `(4, 3)` then `(3, 4)` for
 * radius 5), and both hits need their own row.
 * Pixel `i` gets `1 - fade` coverage and pixel `i - 1` gets `fade`, mirrored
 * to all eight octants. Steps past the diagonal (`i < j`) are mirrors of
 * pixels the previous step already plotted and are skipped, so no pixel is
 * plotted twice.
 */
export function antiAliasedCircle(
  centerX: number,
  centerY: number,
  radius: number,
  plot: CoveragePlotFn,
): void {
  if (radius < 0) {
    return;
  }
  if (radius === 0) {
    plot(centerX, centerY, 1);
    return;
  }

  const plot8 = (i: number, j: number, coverage: number): void => {
    if (coverage <= 0 || i < j) {
      return;
    }
    const seen = new Set<string>();
    const points: Array<[number, number]> = [
      [i, j], [-i, j], [i, -j], [-i, -j],
      [j, i], [-j, i], [j, -i], [-j, -i],
    ];
    for (const [dx, dy] of points) {
      const key = `${dx},${dy}`;
      if (!seen.has(key)) {
        seen.add(key);
        plot(centerX + dx, centerY + dy, coverage);
      }
    }
  };

  const r2 = radius * radius;
  let i = radius;
  let j = 0;
  let lastFade = 0;
  plot8(i, j, 1);

  while (i > j) {
    j++;
    const exact = Math.sqrt(r2 - j * j);
    const fade = Math.ceil(exact) - exact;
    if (fade <= lastFade) {
      i--;
    }
    plot8(i, j, 1 - fade);
    plot8(i - 1, j, fade);
    lastFade = fade;
  }
}
