/**
 * @module editor-image
 * Factory functions and whole-canvas transforms for {@link EditorImage}.
 *
 * Transforms never mutate the image; they return layer snapshots that the
 * editor installs through an undoable `replace-image` operation.
 */

import type {
  Color,
  EditorImage,
  EditorLayer,
  ImageFormat,
  LayerSnapshot,
  RgbaImage,
} from '@layerpaint/types';
import { resampleImage } from './raster';
import { RgbaBuffer } from './rgba-buffer';

/** Options for {@link createEditorImage}. */
export interface CreateEditorImageOptions {
  /** Initial color of the first layer. Defaults to transparent. */
  fill?: Color;
  sourcePath?: string | null;
  format?: ImageFormat | null;
}

function assertCanvasSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid canvas size ${width}x${height}`);
  }
}

/** A transparent, visible, canvas-sized layer. */
export function createLayer(width: number, height: number): EditorLayer {
  return { state: 'visible', image: new RgbaBuffer(width, height) };
}

/**
 * Creates a canvas with a single visible layer.
 *
 * @param width   - Canvas width in pixels (positive integer).
 * @param height  - Canvas height in pixels (positive integer).
 * @param options - Initial fill and file metadata.
 */
export function createEditorImage(
  width: number,
  height: number,
  options: CreateEditorImageOptions = {},
): EditorImage {
  assertCanvasSize(width, height);
  const layer = createLayer(width, height);
  if (options.fill) {
    layer.image = RgbaBuffer.filled(width, height, options.fill);
  }
  return {
    width,
    height,
    layers: [layer],
    sourcePath: options.sourcePath ?? null,
    format: options.format ?? null,
  };
}

/** Wraps a decoded image as a one-layer canvas. The pixels are copied. */
export function editorImageFromBuffer(
  image: RgbaImage,
  sourcePath: string | null = null,
  format: ImageFormat | null = null,
): EditorImage {
  assertCanvasSize(image.width, image.height);
  return {
    width: image.width,
    height: image.height,
    layers: [{ state: 'visible', image: RgbaBuffer.from(image) }],
    sourcePath,
    format,
  };
}

/** Composite every visible layer, bottom to top, onto a transparent buffer. */
export function flattenImage(image: EditorImage): RgbaBuffer {
  const out = new RgbaBuffer(image.width, image.height);
  for (const layer of image.layers) {
    if (layer.state !== 'visible') {
      continue;
    }
    for (let y = 0; y < image.height; y++) {
      for (let x = 0; x < image.width; x++) {
        const color = layer.image.readPixel(x, y);
        if (color.a > 0) {
          out.blendPixel(x, y, color);
        }
      }
    }
  }
  return out;
}

/** Snapshot of every layer, sharing pixel buffers with the image. */
export function snapshotLayers(image: EditorImage): LayerSnapshot[] {
  return image.layers.map((layer) => ({ state: layer.state, image: layer.image }));
}

/** Every layer resampled to the new size with a triangle filter. */
export function resampledLayers(image: EditorImage, newWidth: number, newHeight: number): LayerSnapshot[] {
  assertCanvasSize(newWidth, newHeight);
  return image.layers.map((layer) => ({
    state: layer.state,
    image: resampleImage(layer.image, newWidth, newHeight),
  }));
}

/**
 * Every layer cropped or padded to the new size. Overlapping pixels are
 * copied verbatim and exposed area is transparent.
 *
 * @param anchorX - Horizontal anchor (0=left, 0.5=center, 1=right).
 * @param anchorY - Vertical anchor (0=top, 0.5=center, 1=bottom).
 */
export function resizedCanvasLayers(
  image: EditorImage,
  newWidth: number,
  newHeight: number,
  anchorX = 0,
  anchorY = 0,
): LayerSnapshot[] {
  assertCanvasSize(newWidth, newHeight);
  const offsetX = Math.round((newWidth - image.width) * anchorX);
  const offsetY = Math.round((newHeight - image.height) * anchorY);

  return image.layers.map((layer) => {
    const src = layer.image.data;
    const dst = new RgbaBuffer(newWidth, newHeight);
    for (let y = 0; y < image.height; y++) {
      const destY = y + offsetY;
      if (destY < 0 || destY >= newHeight) continue;
      for (let x = 0; x < image.width; x++) {
        const destX = x + offsetX;
        if (destX < 0 || destX >= newWidth) continue;
        const srcIdx = (y * image.width + x) * 4;
        const dstIdx = (destY * newWidth + destX) * 4;
        dst.data[dstIdx] = src[srcIdx];
        dst.data[dstIdx + 1] = src[srcIdx + 1];
        dst.data[dstIdx + 2] = src[srcIdx + 2];
        dst.data[dstIdx + 3] = src[srcIdx + 3];
      }
    }
    return { state: layer.state, image: dst };
  });
}

/**
 * Color under (x, y): from one layer when `layer` is given, otherwise from the
 * flattened visible layers. Outside the canvas this is transparent black.
 */
export function pickColor(image: EditorImage, x: number, y: number, layer?: number): Color {
  if (layer !== undefined) {
    return layerAt(image, layer).image.readPixel(x, y);
  }
  const out: Color = { r: 0, g: 0, b: 0, a: 0 };
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    return out;
  }
  const single = new RgbaBuffer(1, 1);
  for (const candidate of image.layers) {
    if (candidate.state === 'visible') {
      const color = candidate.image.readPixel(x, y);
      if (color.a > 0) {
        single.blendPixel(0, 0, color);
      }
    }
  }
  return single.readPixel(0, 0);
}

/** Layer at `index`; an index outside the layer list is a caller error. */
export function layerAt(image: EditorImage, index: number): EditorLayer {
  const layer = image.layers[index];
  if (!Number.isInteger(index) || layer === undefined) {
    throw new RangeError(`Layer index ${index} out of range (0..${image.layers.length - 1})`);
  }
  return layer;
}

/** First non-deleted layer other than `exclude`, or -1 when none remains. */
export function firstLiveLayer(image: EditorImage, exclude = -1): number {
  return image.layers.findIndex((layer, index) => index !== exclude && layer.state !== 'deleted');
}
