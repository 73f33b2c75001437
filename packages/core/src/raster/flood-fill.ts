/**
 * @module raster/flood-fill
 * Iterative 8-connected flood fill over any {@link PixelSurface}.
 *
 * Uses an explicit stack (no recursion) and a visited bitmap the size of the
 * surface, so each pixel is examined once and the cost is O(filled area).
 */

import type { Color, PixelSurface } from '@layerpaint/types';
import { colorDifference } from '../color';
import type { PlotFn } from './line';

const NEIGHBOURS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0], [1, 0],
  [-1, 1], [0, 1], [1, 1],
];

/**
 * Whether `candidate` belongs to the fill region of `reference`.
 * Fully transparent pixels are always fillable.
 */
export function isFillable(candidate: Color, reference: Color, tolerance: number): boolean {
  return candidate.a === 0 || colorDifference(candidate, reference) <= tolerance;
}

/**
 * Visit every pixel connected to (startX, startY) whose color is within
 * `tolerance` of the seed color, calling `fill` once per pixel.
 *
 * The reference color is sampled once at the seed. `fill` may write to the
 * surface: only pixels that have already been visited are ever written, so
 * later comparisons still see original colors.
 *
 * @returns Number of pixels visited. 0 when the seed is off the surface.
 */
export function floodFill(
  surface: PixelSurface,
  startX: number,
  startY: number,
  tolerance: number,
  fill: PlotFn,
): number {
  const { width, height } = surface;
  if (startX < 0 || startY < 0 || startX >= width || startY >= height) {
    return 0;
  }

  const reference = surface.readPixel(startX, startY);
  const visited = new Uint8Array(width * height);
  const stack: number[] = [startY * width + startX];
  visited[startY * width + startX] = 1;
  let count = 0;

  while (stack.length > 0) {
    const index = stack.pop();
    if (index === undefined) {
      break;
    }
    const x = index % width;
    const y = (index - x) / width;

    for (const [dx, dy] of NEIGHBOURS) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
        continue;
      }
      const neighbour = ny * width + nx;
      if (visited[neighbour] === 0 && isFillable(surface.readPixel(nx, ny), reference, tolerance)) {
        visited[neighbour] = 1;
        stack.push(neighbour);
      }
    }

    fill(x, y);
    count++;
  }

  return count;
}
