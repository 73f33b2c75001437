/**
 * @module selection-builder
 * Clipboard and transform operations on the selected rectangle.
 *
 * Every edit is one labeled sequential operation, so it lands in history as a
 * single entry. Moves, scales and rotations first clear the selected pixels to
 * transparent and then place the lifted copy:
 *
 * ```
 * Sequential[FillRectangle(transparent), SetImage | SetScaledImage | SetRotatedImage]
 * ```
 *
 * The placement blends, so pixels the copy leaves transparent keep what was
 * under them. A paste overwrites instead.
 */

import type { Operation, PixelSurface, Rect, RgbaImage } from '@layerpaint/types';
import { TRANSPARENT, clipRect, readRegion, rotateImage, scaledSize } from '@layerpaint/core';
import type { RgbaBuffer } from '@layerpaint/core';

/** An edit plus the selection that should be active after it. */
export interface SelectionEdit {
  operation: Operation;
  /** Bounds of the placed pixels inside the canvas, or null when none are visible. */
  selection: Rect | null;
}

/** Result of a cut: the lifted pixels and the edit that clears them. */
export interface SelectionCut {
  clipboard: RgbaBuffer;
  operation: Operation;
}

/**
 * Copy the selected pixels of `source`.
 * @returns The pixels, or null when the selection lies outside the canvas.
 */
export function copySelection(source: PixelSurface, selection: Rect): RgbaBuffer | null {
  const clip = clipRect(selection, source.width, source.height);
  return clip ? readRegion(source, clip) : null;
}

/** Clear the selected pixels to transparent. */
export function deleteSelection(selection: Rect): Operation {
  return { type: 'sequential', message: 'Delete selection', operations: [clearRect(selection)] };
}

/**
 * Copy the selected pixels and clear them.
 * @returns null when the selection lies outside the canvas.
 */
export function cutSelection(source: PixelSurface, selection: Rect): SelectionCut | null {
  const clip = clipRect(selection, source.width, source.height);
  if (!clip) {
    return null;
  }
  return {
    clipboard: readRegion(source, clip),
    operation: { type: 'sequential', message: 'Cut selection', operations: [clearRect(clip)] },
  };
}

/**
 * Overwrite the canvas with `image`, top-left corner at `(x, y)`.
 * @param canvas - Size the new selection is clipped to.
 */
export function pasteImage(
  image: RgbaImage,
  x: number,
  y: number,
  canvas: { width: number; height: number },
): SelectionEdit {
  return {
    operation: {
      type: 'sequential',
      message: 'Paste',
      operations: [{ type: 'set-image', x, y, image, blend: false }],
    },
    selection: clipRect({ x, y, width: image.width, height: image.height }, canvas.width, canvas.height),
  };
}

/**
 * Move the selected pixels by `(dx, dy)`.
 * @returns null when the selection lies outside the canvas.
 */
export function moveSelection(source: PixelSurface, selection: Rect, dx: number, dy: number): SelectionEdit | null {
  const clip = clipRect(selection, source.width, source.height);
  if (!clip) {
    return null;
  }
  const image = readRegion(source, clip);
  const x = clip.x + dx;
  const y = clip.y + dy;
  return {
    operation: {
      type: 'sequential',
      message: 'Move selection',
      operations: [clearRect(clip), { type: 'set-image', x, y, image, blend: true }],
    },
    selection: clipRect({ x, y, width: clip.width, height: clip.height }, source.width, source.height),
  };
}

/**
 * Resample the selected pixels to `width` x `height`, keeping the top-left corner.
 * @returns null when the selection lies outside the canvas.
 * @throws RangeError when either target dimension is below 1.
 */
export function scaleSelection(
  source: PixelSurface,
  selection: Rect,
  width: number,
  height: number,
): SelectionEdit | null {
  if (width < 1 || height < 1) {
    throw new RangeError(`Invalid selection size ${width}x${height}`);
  }
  const clip = clipRect(selection, source.width, source.height);
  if (!clip) {
    return null;
  }
  const image = readRegion(source, clip);
  const scaleX = width / clip.width;
  const scaleY = height / clip.height;
  const size = scaledSize(image, scaleX, scaleY);
  return {
    operation: {
      type: 'sequential',
      message: 'Scale selection',
      operations: [
        clearRect(clip),
        { type: 'set-scaled-image', x: clip.x, y: clip.y, image, scaleX, scaleY, blend: true },
      ],
    },
    selection: clipRect({ x: clip.x, y: clip.y, ...size }, source.width, source.height),
  };
}

/**
 * Rotate the selected pixels by `degrees` (clockwise) about the selection center.
 * @returns null when the selection lies outside the canvas.
 */
export function rotateSelection(source: PixelSurface, selection: Rect, degrees: number): SelectionEdit | null {
  const clip = clipRect(selection, source.width, source.height);
  if (!clip) {
    return null;
  }
  const image = readRegion(source, clip);
  const centerX = clip.x + Math.floor(clip.width / 2);
  const centerY = clip.y + Math.floor(clip.height / 2);
  const rotated = rotateImage(image, degrees);
  const bounds: Rect = {
    x: centerX - Math.floor(rotated.width / 2),
    y: centerY - Math.floor(rotated.height / 2),
    width: rotated.width,
    height: rotated.height,
  };
  return {
    operation: {
      type: 'sequential',
      message: 'Rotate selection',
      operations: [
        clearRect(clip),
        { type: 'set-rotated-image', centerX, centerY, image, rotation: degrees, blend: true },
      ],
    },
    selection: clipRect(bounds, source.width, source.height),
  };
}

// ── helpers ────────────────────────────────────────────────────────────

function clearRect(rect: Rect): Operation {
  return {
    type: 'fill-rectangle',
    startX: rect.x,
    startY: rect.y,
    endX: rect.x + rect.width - 1,
    endY: rect.y + rect.height - 1,
    color: { ...TRANSPARENT },
    blend: false,
  };
}
