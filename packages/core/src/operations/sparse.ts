/**
 * @module operations/sparse
 * Sparse-write operations: pixels touched by strokes and shapes whose
 * footprint is not known in advance.
 *
 * Every write goes through a {@link SparseWriter}, which records a pixel's
 * color the first time it is touched during one apply. Blended writes land
 * only on that first touch; overwriting writes always land.
 */

import type {
  BlockOperation,
  CircleOperation,
  Color,
  FillCircleOperation,
  LineOperation,
  PencilStrokeOperation,
  PixelSurface,
  RectangleOperation,
  SetPixelOperation,
  SparseImageOperation,
} from '@layerpaint/types';
import { withCoverage } from '../color';
import { SparseImageImpl } from '../payload';
import { antiAliasedCircle, bresenhamLine, midpointCircle, sweptLine } from '../raster';
import { canWriteTo, putColor } from '../surface';

/** Writes pixels and remembers what they were before. */
export class SparseWriter {
  private readonly surface: PixelSurface;
  private readonly original = new SparseImageImpl();

  constructor(surface: PixelSurface) {
    this.surface = surface;
  }

  /** Number of distinct pixels written so far. */
  get touched(): number {
    return this.original.size;
  }

  put(x: number, y: number, color: Color, blend: boolean): void {
    if (!canWriteTo(this.surface, x, y)) {
      return;
    }
    if (!this.original.has(x, y)) {
      this.original.set(x, y, this.surface.readPixel(x, y));
    } else if (blend) {
      return;
    }
    putColor(this.surface, x, y, color, blend);
  }

  /** The restoring payload, or null when nothing was written. */
  inverse(): SparseImageOperation | null {
    return this.original.size > 0 ? { type: 'sparse-image', image: this.original } : null;
  }
}

// ── helpers ──

function halfWidthOf(value: number): number {
  return Math.max(0, Math.floor(value));
}

function stampBlock(writer: SparseWriter, cx: number, cy: number, half: number, color: Color, blend: boolean): void {
  for (let y = cy - half; y <= cy + half; y++) {
    for (let x = cx - half; x <= cx + half; x++) {
      writer.put(x, y, color, blend);
    }
  }
}

/**
 * Thick line. Anti-aliased lines sweep Wu lines across the width; inner
 * offsets paint the color, the outermost ones blend it by coverage.
 * Aliased lines stamp a square block at every Bresenham pixel.
 */
function drawLine(
  writer: SparseWriter,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  halfWidth: number,
  color: Color,
  antiAliased: boolean,
  blend: boolean,
): void {
  const half = halfWidthOf(halfWidth);
  if (antiAliased) {
    sweptLine(x0, y0, x1, y1, half, (x, y, coverage, outer) => {
      if (outer) {
        writer.put(x, y, withCoverage(color, coverage), true);
      } else {
        writer.put(x, y, color, blend);
      }
    });
    return;
  }
  bresenhamLine(x0, y0, x1, y1, (x, y) => stampBlock(writer, x, y, half, color, blend));
}

/** Round cap: filled interior plus an anti-aliased rim. */
function drawCap(writer: SparseWriter, cx: number, cy: number, radius: number, color: Color, blend: boolean): void {
  midpointCircle(cx, cy, radius, true, (x, y) => writer.put(x, y, color, blend));
  antiAliasedCircle(cx, cy, radius, (x, y, coverage) => writer.put(x, y, withCoverage(color, coverage), true));
}

// ── operations ──

export function applySetPixel(op: SetPixelOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  writer.put(op.x, op.y, op.color, false);
  return writer.inverse();
}

export function applySparseImage(op: SparseImageOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  for (const { x, y, color } of op.image.pixels()) {
    writer.put(x, y, color, false);
  }
  return writer.inverse();
}

export function applyBlock(op: BlockOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  stampBlock(writer, op.x, op.y, halfWidthOf(op.sideHalfWidth), op.color, op.blend);
  return writer.inverse();
}

export function applyLine(op: LineOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  drawLine(writer, op.startX, op.startY, op.endX, op.endY, op.sideHalfWidth, op.color, op.antiAliased, op.blend);
  return writer.inverse();
}

/**
 * One freehand segment. Anti-aliased segments get a round cap at the end,
 * and at the start too when the segment opens a stroke.
 */
export function applyPencilStroke(op: PencilStrokeOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  drawLine(writer, op.startX, op.startY, op.endX, op.endY, op.sideHalfWidth, op.color, op.antiAliased, op.blend);
  if (op.antiAliased) {
    const radius = halfWidthOf(op.sideHalfWidth);
    if (op.prevStartX === null || op.prevStartY === null) {
      drawCap(writer, op.startX, op.startY, radius, op.color, op.blend);
    }
    drawCap(writer, op.endX, op.endY, radius, op.color, op.blend);
  }
  return writer.inverse();
}

/** Rectangle outline: four overwriting sides sharing one payload. */
export function applyRectangle(op: RectangleOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  const { startX, startY, endX, endY, borderHalfWidth, color } = op;
  drawLine(writer, startX, startY, endX, startY, borderHalfWidth, color, false, false);
  drawLine(writer, endX, startY, endX, endY, borderHalfWidth, color, false, false);
  drawLine(writer, endX, endY, startX, endY, borderHalfWidth, color, false, false);
  drawLine(writer, startX, endY, startX, startY, borderHalfWidth, color, false, false);
  return writer.inverse();
}

/**
 * Circle outline swept over radii `radius ± borderHalfWidth`.
 * Anti-aliased outlines blend only the two outermost radii.
 */
export function applyCircle(op: CircleOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  const { centerX, centerY, radius, color, blend } = op;
  const half = halfWidthOf(op.borderHalfWidth);

  if (!op.antiAliased) {
    for (let offset = -half; offset <= half; offset++) {
      midpointCircle(centerX, centerY, radius + offset, false, (x, y) => writer.put(x, y, color, blend));
    }
    return writer.inverse();
  }

  for (let offset = -(half - 1); offset <= half - 1; offset++) {
    antiAliasedCircle(centerX, centerY, radius + offset, (x, y) => writer.put(x, y, color, blend));
  }
  const rim = (x: number, y: number, coverage: number): void => writer.put(x, y, withCoverage(color, coverage), true);
  antiAliasedCircle(centerX, centerY, radius + half, rim);
  if (half > 0) {
    antiAliasedCircle(centerX, centerY, radius - half, rim);
  }
  return writer.inverse();
}

export function applyFillCircle(op: FillCircleOperation, surface: PixelSurface): SparseImageOperation | null {
  const writer = new SparseWriter(surface);
  midpointCircle(op.centerX, op.centerY, op.radius, true, (x, y) => writer.put(x, y, op.color, op.blend));
  return writer.inverse();
}
