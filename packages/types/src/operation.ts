/**
 * @module operation
 * The closed set of pixel-level edit primitives.
 *
 * Every edit is a plain value of the {@link Operation} union. Applying one to a
 * surface can yield another Operation that restores the previous pixels.
 */

import type { Color } from './common';
import type { RgbaImage } from './surface';

/** Stroke delimiters used to coalesce interactive edits. */
export type MarkerKind = 'begin-draw' | 'end-draw';

/** Interpolation shape for {@link ColorGradientOperation}. */
export type GradientType = 'linear' | 'radial';

/** Pixel inside a {@link SparseImage}. */
export interface SparsePixel {
  x: number;
  y: number;
  color: Color;
}

/**
 * Scattered pixel colors keyed by coordinate.
 * Holds only the pixels that were touched, so its size is not known up front.
 */
export interface SparseImage {
  /** Number of stored pixels. */
  readonly size: number;
  has(x: number, y: number): boolean;
  get(x: number, y: number): Color | undefined;
  set(x: number, y: number, color: Color): void;
  /** Iterate stored pixels in insertion order. */
  pixels(): IterableIterator<SparsePixel>;
}

/**
 * Dense width x height grid of optional colors.
 * `undefined` means "not touched", which is distinct from transparent.
 */
export interface OptionalImage {
  readonly width: number;
  readonly height: number;
  /** Number of defined pixels. */
  readonly size: number;
  get(x: number, y: number): Color | undefined;
  set(x: number, y: number, color: Color): void;
  pixels(): IterableIterator<SparsePixel>;
}

/** No-op. */
export interface EmptyOperation {
  type: 'empty';
}

/** Stroke delimiter. Never mutates pixels. */
export interface MarkerOperation {
  type: 'marker';
  marker: MarkerKind;
  /** Optional human-readable label, e.g. "Pencil stroke". */
  message: string | null;
}

/** Ordered group of operations applied as one. */
export interface SequentialOperation {
  type: 'sequential';
  message: string | null;
  operations: Operation[];
}

/** Writes a scattered set of pixels (overwrite). */
export interface SparseImageOperation {
  type: 'sparse-image';
  image: SparseImage;
}

/** Writes every defined pixel of a dense optional grid (overwrite). */
export interface OptionalImageOperation {
  type: 'optional-image';
  image: OptionalImage;
}

/** Places an image with its top-left corner at (x, y). */
export interface SetImageOperation {
  type: 'set-image';
  x: number;
  y: number;
  image: RgbaImage;
  blend: boolean;
}

/** Resamples an image by (scaleX, scaleY) then places it at (x, y). */
export interface SetScaledImageOperation {
  type: 'set-scaled-image';
  x: number;
  y: number;
  image: RgbaImage;
  scaleX: number;
  scaleY: number;
  blend: boolean;
}

/** Rotates an image by `rotation` degrees and centers it on (centerX, centerY). */
export interface SetRotatedImageOperation {
  type: 'set-rotated-image';
  centerX: number;
  centerY: number;
  image: RgbaImage;
  rotation: number;
  blend: boolean;
}

/** Fills the inclusive rectangle between the two corners. */
export interface FillRectangleOperation {
  type: 'fill-rectangle';
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  color: Color;
  blend: boolean;
}

/** Paints a two-color gradient over the whole surface. */
export interface ColorGradientOperation {
  type: 'color-gradient';
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  firstColor: Color;
  secondColor: Color;
  gradientType: GradientType;
}

/** Sets one pixel. */
export interface SetPixelOperation {
  type: 'set-pixel';
  x: number;
  y: number;
  color: Color;
}

/** Square stamp of side `2 * sideHalfWidth + 1` centered on (x, y). */
export interface BlockOperation {
  type: 'block';
  x: number;
  y: number;
  color: Color;
  sideHalfWidth: number;
  blend: boolean;
}

/** Straight line, optionally anti-aliased and thick. */
export interface LineOperation {
  type: 'line';
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  color: Color;
  sideHalfWidth: number;
  antiAliased: boolean;
  blend: boolean;
}

/** One segment of a freehand stroke. */
export interface PencilStrokeOperation {
  type: 'pencil-stroke';
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  /** Start of the previous segment, or null for the first segment of a stroke. */
  prevStartX: number | null;
  prevStartY: number | null;
  color: Color;
  sideHalfWidth: number;
  antiAliased: boolean;
  blend: boolean;
}

/** Rectangle outline between two inclusive corners. */
export interface RectangleOperation {
  type: 'rectangle';
  startX: number;
  startY: number;
  endX: number;
  endY: number;
  borderHalfWidth: number;
  color: Color;
}

/** Circle outline. */
export interface CircleOperation {
  type: 'circle';
  centerX: number;
  centerY: number;
  radius: number;
  borderHalfWidth: number;
  color: Color;
  antiAliased: boolean;
  blend: boolean;
}

/** Filled disc. */
export interface FillCircleOperation {
  type: 'fill-circle';
  centerX: number;
  centerY: number;
  radius: number;
  color: Color;
  blend: boolean;
}

/** 8-connected flood fill seeded at (x, y). */
export interface BucketFillOperation {
  type: 'bucket-fill';
  x: number;
  y: number;
  fillColor: Color;
  /** Mean absolute channel difference threshold in [0, 1]. */
  tolerance: number;
}

/** Every pixel-level edit primitive. */
export type Operation =
  | EmptyOperation
  | MarkerOperation
  | SequentialOperation
  | SparseImageOperation
  | OptionalImageOperation
  | SetImageOperation
  | SetScaledImageOperation
  | SetRotatedImageOperation
  | FillRectangleOperation
  | ColorGradientOperation
  | SetPixelOperation
  | BlockOperation
  | LineOperation
  | PencilStrokeOperation
  | RectangleOperation
  | CircleOperation
  | FillCircleOperation
  | BucketFillOperation;

/** Discriminator of {@link Operation}. */
export type OperationType = Operation['type'];
