/**
 * @module operations/apply
 * Single dispatch point of the operation algebra.
 *
 * `applyOperation(op, surface, true)` returns an operation that, applied to
 * the resulting surface, restores the previous pixels exactly. It returns
 * null when no pixel was written or no inverse was requested.
 */

import type { Operation, PixelSurface, SequentialOperation } from '@layerpaint/types';
import { applyBucketFill, applyOptionalImage } from './bucket-fill';
import {
  applyColorGradient,
  applyFillRectangle,
  applySetImage,
  applySetRotatedImage,
  applySetScaledImage,
} from './region';
import {
  applyBlock,
  applyCircle,
  applyFillCircle,
  applyLine,
  applyPencilStroke,
  applyRectangle,
  applySetPixel,
  applySparseImage,
} from './sparse';

/**
 * Children run in order; their inverses are collected in reverse so that
 * overlapping footprints unwind last-in first-out.
 */
function applySequential(
  op: SequentialOperation,
  surface: PixelSurface,
  computeInverse: boolean,
): SequentialOperation | null {
  const inverses: Operation[] = [];
  for (const child of op.operations) {
    const inverse = applyOperation(child, surface, computeInverse);
    if (inverse) {
      inverses.push(inverse);
    }
  }
  if (!computeInverse || inverses.length === 0) {
    return null;
  }
  return { type: 'sequential', message: op.message, operations: inverses.reverse() };
}

export function applyOperation(op: Operation, surface: PixelSurface, computeInverse: boolean): Operation | null {
  const sparse = (inverse: Operation | null): Operation | null => (computeInverse ? inverse : null);

  switch (op.type) {
    case 'empty':
    case 'marker':
      return null;
    case 'sequential':
      return applySequential(op, surface, computeInverse);
    case 'set-image':
      return applySetImage(op, surface, computeInverse);
    case 'set-scaled-image':
      return applySetScaledImage(op, surface, computeInverse);
    case 'set-rotated-image':
      return applySetRotatedImage(op, surface, computeInverse);
    case 'fill-rectangle':
      return applyFillRectangle(op, surface, computeInverse);
    case 'color-gradient':
      return applyColorGradient(op, surface, computeInverse);
    case 'sparse-image':
      return sparse(applySparseImage(op, surface));
    case 'set-pixel':
      return sparse(applySetPixel(op, surface));
    case 'block':
      return sparse(applyBlock(op, surface));
    case 'line':
      return sparse(applyLine(op, surface));
    case 'pencil-stroke':
      return sparse(applyPencilStroke(op, surface));
    case 'rectangle':
      return sparse(applyRectangle(op, surface));
    case 'circle':
      return sparse(applyCircle(op, surface));
    case 'fill-circle':
      return sparse(applyFillCircle(op, surface));
    case 'optional-image':
      return applyOptionalImage(op, surface, computeInverse);
    case 'bucket-fill':
      return applyBucketFill(op, surface, computeInverse);
  }
}
