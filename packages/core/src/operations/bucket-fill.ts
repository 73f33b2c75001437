/**
 * @module operations/bucket-fill
 * Flood fill and its dense undo payload.
 */

import type {
  BucketFillOperation,
  OptionalImageOperation,
  PixelSurface,
} from '@layerpaint/types';
import { OptionalImageImpl } from '../payload';
import { floodFill } from '../raster';
import { canWriteTo } from '../surface';

/**
 * Overwrite every pixel the flood fill reaches with `fillColor`.
 * The inverse records each written pixel's original color in an
 * {@link OptionalImageImpl} the size of the surface.
 */
export function applyBucketFill(
  op: BucketFillOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): OptionalImageOperation | null {
  const original = computeInverse ? new OptionalImageImpl(surface.width, surface.height) : null;
  let written = 0;

  floodFill(surface, op.x, op.y, op.tolerance, (x, y) => {
    if (!canWriteTo(surface, x, y)) {
      return;
    }
    if (original && original.get(x, y) === undefined) {
      original.set(x, y, surface.readPixel(x, y));
    }
    surface.writePixel(x, y, op.fillColor);
    written++;
  });

  return original && written > 0 ? { type: 'optional-image', image: original } : null;
}

/** Overwrite every defined pixel of the payload. */
export function applyOptionalImage(
  op: OptionalImageOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): OptionalImageOperation | null {
  const { image } = op;
  const original = computeInverse ? new OptionalImageImpl(image.width, image.height) : null;
  let written = 0;

  for (const { x, y, color } of image.pixels()) {
    if (!canWriteTo(surface, x, y)) {
      continue;
    }
    original?.set(x, y, surface.readPixel(x, y));
    surface.writePixel(x, y, color);
    written++;
  }

  return original && written > 0 ? { type: 'optional-image', image: original } : null;
}
