/**
 * @module operations/region
 * Region-write operations.
 *
 * Before writing, the destination rectangle (clipped to what the surface lets
 * us write) is copied into a buffer; the inverse is a non-blending SetImage of
 * that buffer at the clipped origin. Scaled and rotated placements transform
 * their image first and then take the SetImage path.
 */

import type {
  Color,
  ColorGradientOperation,
  FillRectangleOperation,
  PixelSurface,
  Rect,
  RgbaImage,
  SetImageOperation,
  SetRotatedImageOperation,
  SetScaledImageOperation,
} from '@layerpaint/types';
import { interpolateColors } from '../color';
import { gradientFactor, resampleImage, rotateImage } from '../raster';
import { rectFromCorners } from '../rect';
import { imagePixel } from '../rgba-buffer';
import { clipToWritable, putColor, readRegion } from '../surface';

/**
 * Shared region-write path: snapshot `rect`, then paint every pixel in it.
 * @returns The restoring SetImage, or null when nothing was writable or no
 *   inverse was requested.
 */
function writeRegion(
  surface: PixelSurface,
  rect: Rect,
  computeInverse: boolean,
  paint: (x: number, y: number) => void,
): SetImageOperation | null {
  const clip = clipToWritable(surface, rect);
  if (!clip) {
    return null;
  }

  const inverse: SetImageOperation | null = computeInverse
    ? { type: 'set-image', x: clip.x, y: clip.y, image: readRegion(surface, clip), blend: false }
    : null;

  for (let y = clip.y; y < clip.y + clip.height; y++) {
    for (let x = clip.x; x < clip.x + clip.width; x++) {
      paint(x, y);
    }
  }

  return inverse;
}

export function applySetImage(
  op: SetImageOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SetImageOperation | null {
  const { x: originX, y: originY, image, blend } = op;
  const rect: Rect = { x: originX, y: originY, width: image.width, height: image.height };
  return writeRegion(surface, rect, computeInverse, (x, y) =>
    putColor(surface, x, y, imagePixel(image, x - originX, y - originY), blend),
  );
}

export function applyFillRectangle(
  op: FillRectangleOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SetImageOperation | null {
  const rect = rectFromCorners(op.startX, op.startY, op.endX, op.endY);
  return writeRegion(surface, rect, computeInverse, (x, y) => putColor(surface, x, y, op.color, op.blend));
}

/** Paints the gradient over the whole surface, overwriting. */
export function applyColorGradient(
  op: ColorGradientOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SetImageOperation | null {
  const rect: Rect = { x: 0, y: 0, width: surface.width, height: surface.height };
  return writeRegion(surface, rect, computeInverse, (x, y) => {
    const t = gradientFactor(op.gradientType, op.startX, op.startY, op.endX, op.endY, x, y);
    const color: Color = interpolateColors(op.firstColor, op.secondColor, t);
    surface.writePixel(x, y, color);
  });
}

/** Destination size of a scaled placement; never below 1x1. */
export function scaledSize(image: RgbaImage, scaleX: number, scaleY: number): { width: number; height: number } {
  return {
    width: Math.max(1, Math.round(image.width * scaleX)),
    height: Math.max(1, Math.round(image.height * scaleY)),
  };
}

export function applySetScaledImage(
  op: SetScaledImageOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SetImageOperation | null {
  const { width, height } = scaledSize(op.image, op.scaleX, op.scaleY);
  const scaled = resampleImage(op.image, width, height);
  return applySetImage({ type: 'set-image', x: op.x, y: op.y, image: scaled, blend: op.blend }, surface, computeInverse);
}

export function applySetRotatedImage(
  op: SetRotatedImageOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SetImageOperation | null {
  const rotated = rotateImage(op.image, op.rotation);
  const x = op.centerX - Math.floor(rotated.width / 2);
  const y = op.centerY - Math.floor(rotated.height / 2);
  return applySetImage({ type: 'set-image', x, y, image: rotated, blend: op.blend }, surface, computeInverse);
}
