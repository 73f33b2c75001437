/**
 * @module raster/resample
 * Image resampling: separable triangle-filter resize and arbitrary rotation
 * with bilinear sampling. Inputs are never modified.
 */

import type { RgbaImage } from '@layerpaint/types';
import { RgbaBuffer } from '../rgba-buffer';

interface FilterTaps {
  start: number;
  weights: number[];
}

/** Per destination index, the contributing source range and normalized weights. */
function triangleTaps(srcSize: number, dstSize: number): FilterTaps[] {
  const ratio = srcSize / dstSize;
  const scale = Math.max(1, ratio);
  const taps: FilterTaps[] = [];

  for (let i = 0; i < dstSize; i++) {
    const center = (i + 0.5) * ratio;
    const left = Math.max(0, Math.floor(center - scale));
    const right = Math.min(srcSize - 1, Math.ceil(center + scale));
    const weights: number[] = [];
    let sum = 0;
    for (let j = left; j <= right; j++) {
      const w = Math.max(0, 1 - Math.abs((j + 0.5 - center) / scale));
      weights.push(w);
      sum += w;
    }
    if (sum === 0) {
      const nearest = Math.min(srcSize - 1, Math.max(0, Math.floor(center)));
      taps.push({ start: nearest, weights: [1] });
      continue;
    }
    taps.push({ start: left, weights: weights.map((w) => w / sum) });
  }

  return taps;
}

/**
 * Resize with a triangle (tent) filter, horizontal pass then vertical pass.
 * Downscaling widens the filter so every source pixel contributes.
 */
export function resampleImage(image: RgbaImage, newWidth: number, newHeight: number): RgbaBuffer {
  if (!Number.isInteger(newWidth) || !Number.isInteger(newHeight) || newWidth < 1 || newHeight < 1) {
    throw new RangeError(`Invalid target size ${newWidth}x${newHeight}`);
  }
  const { width, height, data } = image;
  if (width === 0 || height === 0) {
    return new RgbaBuffer(newWidth, newHeight);
  }

  const horizontal = new Float64Array(newWidth * height * 4);
  const xTaps = triangleTaps(width, newWidth);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < newWidth; x++) {
      const { start, weights } = xTaps[x];
      const dst = (y * newWidth + x) * 4;
      for (let k = 0; k < weights.length; k++) {
        const src = (y * width + start + k) * 4;
        const w = weights[k];
        horizontal[dst] += data[src] * w;
        horizontal[dst + 1] += data[src + 1] * w;
        horizontal[dst + 2] += data[src + 2] * w;
        horizontal[dst + 3] += data[src + 3] * w;
      }
    }
  }

  const out = new RgbaBuffer(newWidth, newHeight);
  const yTaps = triangleTaps(height, newHeight);
  for (let y = 0; y < newHeight; y++) {
    const { start, weights } = yTaps[y];
    for (let x = 0; x < newWidth; x++) {
      const acc = [0, 0, 0, 0];
      for (let k = 0; k < weights.length; k++) {
        const src = ((start + k) * newWidth + x) * 4;
        const w = weights[k];
        acc[0] += horizontal[src] * w;
        acc[1] += horizontal[src + 1] * w;
        acc[2] += horizontal[src + 2] * w;
        acc[3] += horizontal[src + 3] * w;
      }
      const dst = (y * newWidth + x) * 4;
      out.data[dst] = Math.round(acc[0]);
      out.data[dst + 1] = Math.round(acc[1]);
      out.data[dst + 2] = Math.round(acc[2]);
      out.data[dst + 3] = Math.round(acc[3]);
    }
  }

  return out;
}

/**
 * Bilinear sample at continuous pixel coordinates (pixel centers at integers).
 * Neighbours past the edge are clamped to the edge.
 */
export function bilinearSample(image: RgbaImage, x: number, y: number): [number, number, number, number] {
  const { width, height, data } = image;
  const x0 = Math.min(width - 1, Math.max(0, Math.floor(x)));
  const y0 = Math.min(height - 1, Math.max(0, Math.floor(y)));
  const x1 = Math.min(x0 + 1, width - 1);
  const y1 = Math.min(y0 + 1, height - 1);
  const fx = Math.min(1, Math.max(0, x - x0));
  const fy = Math.min(1, Math.max(0, y - y0));

  const i00 = (y0 * width + x0) * 4;
  const i10 = (y0 * width + x1) * 4;
  const i01 = (y1 * width + x0) * 4;
  const i11 = (y1 * width + x1) * 4;

  const result: [number, number, number, number] = [0, 0, 0, 0];
  for (let c = 0; c < 4; c++) {
    const top = data[i00 + c] * (1 - fx) + data[i10 + c] * fx;
    const bottom = data[i01 + c] * (1 - fx) + data[i11 + c] * fx;
    result[c] = Math.round(top * (1 - fy) + bottom * fy);
  }
  return result;
}

/** Snap values within floating noise of an integer onto it. */
function snap(v: number): number {
  const rounded = Math.round(v);
  return Math.abs(v - rounded) < 1e-9 ? rounded : v;
}

/**
 * Rotate about the image center by `degrees` (clockwise in image space).
 * The output grows to hold all rotated corners; uncovered pixels are transparent.
 */
export function rotateImage(image: RgbaImage, degrees: number): RgbaBuffer {
  const { width, height } = image;
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const cx = width / 2;
  const cy = height / 2;

  // Compute bounding box of rotated corners
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [px, py] of [[0, 0], [width, 0], [width, height], [0, height]]) {
    const dx = px - cx;
    const dy = py - cy;
    const rx = snap(cos * dx - sin * dy + cx);
    const ry = snap(sin * dx + cos * dy + cy);
    minX = Math.min(minX, rx);
    minY = Math.min(minY, ry);
    maxX = Math.max(maxX, rx);
    maxY = Math.max(maxY, ry);
  }

  const newWidth = Math.ceil(maxX - minX);
  const newHeight = Math.ceil(maxY - minY);
  const out = new RgbaBuffer(newWidth, newHeight);
  if (width === 0 || height === 0) {
    return out;
  }

  for (let y = 0; y < newHeight; y++) {
    for (let x = 0; x < newWidth; x++) {
      const dx = x + 0.5 + minX - cx;
      const dy = y + 0.5 + minY - cy;
      const srcX = cos * dx + sin * dy + cx;
      const srcY = -sin * dx + cos * dy + cy;
      if (srcX >= 0 && srcX < width && srcY >= 0 && srcY < height) {
        const [r, g, b, a] = bilinearSample(image, srcX - 0.5, srcY - 0.5);
        out.writePixel(x, y, { r, g, b, a });
      }
    }
  }

  return out;
}
