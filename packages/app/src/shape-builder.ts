/**
 * @module shape-builder
 * Turns a press-drag-release gesture into one shape operation.
 *
 * Shapes are applied once, on release. While the pointer is down the host can
 * ask for a {@link ShapeBuilder.preview} of the operation and draw it on an
 * overlay; nothing touches the canvas until {@link ShapeBuilder.end}.
 *
 * - `line`: primary color, optionally anti-aliased
 * - `rectangle`: filled with the primary color, outlined in the secondary one
 * - `circle`: centered on the press point, radius out to the pointer,
 *   filled with the primary color and outlined in the secondary one
 * - `color-gradient`: primary to secondary over the whole layer
 *
 * Single-click tools (bucket fill) have plain builder functions.
 */

import type { Color, GradientType, Operation, Point } from '@layerpaint/types';
import { rectFromCorners } from '@layerpaint/core';

/** Tools that draw a shape between the press and release points. */
export type ShapeTool = 'line' | 'rectangle' | 'circle' | 'color-gradient';

/** Settings captured when a shape begins. */
export interface ShapeSettings {
  tool: ShapeTool;
  primaryColor: Color;
  secondaryColor: Color;
  /** Half of the line or border width; 0 draws single pixels. */
  halfWidth: number;
  /** Anti-alias lines and circle outlines (default false). */
  antiAliased?: boolean;
  /** Gradient shape (default linear). */
  gradientType?: GradientType;
}

/** Returns whether `tool` draws a dragged shape. */
export function isShapeTool(tool: string): tool is ShapeTool {
  return tool === 'line' || tool === 'rectangle' || tool === 'circle' || tool === 'color-gradient';
}

/** Builds one shape operation from a drag gesture. */
export class ShapeBuilder {
  private settings: ShapeSettings | null = null;
  private start: Point | null = null;

  /** True between {@link begin} and {@link end}. */
  get active(): boolean {
    return this.settings !== null;
  }

  /** Anchor a shape at `(x, y)`. Replaces any shape in progress. */
  begin(x: number, y: number, settings: ShapeSettings): void {
    this.settings = {
      ...settings,
      primaryColor: { ...settings.primaryColor },
      secondaryColor: { ...settings.secondaryColor },
    };
    this.start = { x, y };
  }

  /**
   * The operation a release at `(x, y)` would apply.
   * @returns null when no shape is in progress.
   */
  preview(x: number, y: number): Operation | null {
    if (!this.settings || !this.start) {
      return null;
    }
    return buildShape(this.settings, this.start, { x, y });
  }

  /**
   * Finish the shape at `(x, y)`.
   * @returns The operation to apply, or null when no shape is in progress.
   */
  end(x: number, y: number): Operation | null {
    const op = this.preview(x, y);
    this.cancel();
    return op;
  }

  /** Drop the shape in progress without producing an operation. */
  cancel(): void {
    this.settings = null;
    this.start = null;
  }
}

/**
 * Flood fill seeded at `(x, y)`.
 * @param tolerance - Mean channel difference accepted as "same color", in [0, 1].
 */
export function bucketFillAt(x: number, y: number, color: Color, tolerance = 0): Operation {
  return { type: 'bucket-fill', x, y, fillColor: { ...color }, tolerance };
}

// ── helpers ────────────────────────────────────────────────────────────

function buildShape(settings: ShapeSettings, start: Point, end: Point): Operation {
  const { primaryColor, secondaryColor, halfWidth } = settings;
  const antiAliased = settings.antiAliased ?? false;

  switch (settings.tool) {
    case 'line':
      return {
        type: 'line',
        startX: start.x,
        startY: start.y,
        endX: end.x,
        endY: end.y,
        color: { ...primaryColor },
        sideHalfWidth: halfWidth,
        antiAliased,
        blend: true,
      };
    case 'rectangle': {
      const rect = rectFromCorners(start.x, start.y, end.x, end.y);
      const corners = {
        startX: rect.x,
        startY: rect.y,
        endX: rect.x + rect.width - 1,
        endY: rect.y + rect.height - 1,
      };
      return {
        type: 'sequential',
        message: 'Rectangle',
        operations: [
          { type: 'fill-rectangle', ...corners, color: { ...primaryColor }, blend: false },
          { type: 'rectangle', ...corners, borderHalfWidth: halfWidth, color: { ...secondaryColor } },
        ],
      };
    }
    case 'circle': {
      const radius = Math.trunc(Math.hypot(end.x - start.x, end.y - start.y));
      return {
        type: 'sequential',
        message: 'Circle',
        operations: [
          { type: 'fill-circle', centerX: start.x, centerY: start.y, radius, color: { ...primaryColor }, blend: false },
          {
            type: 'circle',
            centerX: start.x,
            centerY: start.y,
            radius,
            borderHalfWidth: halfWidth,
            color: { ...secondaryColor },
            antiAliased,
            blend: true,
          },
        ],
      };
    }
    case 'color-gradient':
      return {
        type: 'color-gradient',
        startX: start.x,
        startY: start.y,
        endX: end.x,
        endY: end.y,
        firstColor: { ...primaryColor },
        secondColor: { ...secondaryColor },
        gradientType: settings.gradientType ?? 'linear',
      };
  }
}
