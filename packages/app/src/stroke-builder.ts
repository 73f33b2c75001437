/**
 * @module stroke-builder
 * Turns pointer samples into the operations of one interactive stroke.
 *
 * A stroke is a begin-draw marker bundled with the first segment, one
 * operation per pointer move, and a closing end-draw marker. The editor merges
 * everything between the markers into a single undo entry.
 *
 * - `pencil`: thick pencil segments, anti-aliased by default, blending
 * - `block-pencil`: square blocks stamped along each segment, blending
 * - `eraser`: square blocks of transparent pixels, overwriting
 */

import type { Color, Operation, Point } from '@layerpaint/types';
import { TRANSPARENT } from '@layerpaint/core';

/** Tools that paint freehand strokes. */
export type StrokeTool = 'pencil' | 'block-pencil' | 'eraser';

/** Settings captured when a stroke begins. */
export interface StrokeSettings {
  tool: StrokeTool;
  color: Color;
  /** Half of the brush side length; 0 paints single pixels. */
  sideHalfWidth: number;
  /** Anti-alias pencil strokes (default true). Ignored by the other tools. */
  antiAliased?: boolean;
}

const STROKE_LABELS: Record<StrokeTool, string> = {
  pencil: 'Pencil stroke',
  'block-pencil': 'Block pencil stroke',
  eraser: 'Erase',
};

/** Returns whether `tool` paints freehand strokes. */
export function isStrokeTool(tool: string): tool is StrokeTool {
  return tool === 'pencil' || tool === 'block-pencil' || tool === 'eraser';
}

/** Builds begin/segment/end operations from pointer samples. */
export class StrokeBuilder {
  private settings: StrokeSettings | null = null;
  private last: Point | null = null;
  private prevStart: Point | null = null;

  /** True between {@link begin} and {@link end}. */
  get active(): boolean {
    return this.settings !== null;
  }

  /**
   * Start a stroke at `(x, y)`.
   * @returns The begin-draw marker bundled with a dot at the start point.
   */
  begin(x: number, y: number, settings: StrokeSettings): Operation {
    this.settings = { ...settings, color: { ...settings.color } };
    this.last = null;
    this.prevStart = null;
    const dot = this.segment(x, y);
    return {
      type: 'sequential',
      message: null,
      operations: [{ type: 'marker', marker: 'begin-draw', message: STROKE_LABELS[settings.tool] }, dot],
    };
  }

  /**
   * Extend the stroke to `(x, y)`.
   * @returns The segment from the previous sample, or null when no stroke is
   *          active or the pointer did not move.
   */
  move(x: number, y: number): Operation | null {
    if (!this.settings || !this.last) {
      return null;
    }
    if (this.last.x === x && this.last.y === y) {
      return null;
    }
    return this.segment(x, y);
  }

  /**
   * Finish the stroke.
   * @returns The end-draw marker, or null when no stroke is active.
   */
  end(): Operation | null {
    if (!this.settings) {
      return null;
    }
    this.settings = null;
    this.last = null;
    this.prevStart = null;
    return { type: 'marker', marker: 'end-draw', message: null };
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private segment(x: number, y: number): Operation {
    const settings = this.settings;
    if (!settings) {
      throw new Error('No stroke in progress');
    }
    const start = this.last ?? { x, y };
    const prevStart = this.prevStart;
    this.prevStart = start;
    this.last = { x, y };

    switch (settings.tool) {
      case 'pencil':
        return {
          type: 'pencil-stroke',
          startX: start.x,
          startY: start.y,
          endX: x,
          endY: y,
          prevStartX: prevStart ? prevStart.x : null,
          prevStartY: prevStart ? prevStart.y : null,
          color: { ...settings.color },
          sideHalfWidth: settings.sideHalfWidth,
          antiAliased: settings.antiAliased ?? true,
          blend: true,
        };
      case 'block-pencil':
      case 'eraser': {
        const erasing = settings.tool === 'eraser';
        return {
          type: 'line',
          startX: start.x,
          startY: start.y,
          endX: x,
          endY: y,
          color: erasing ? { ...TRANSPARENT } : { ...settings.color },
          sideHalfWidth: settings.sideHalfWidth,
          antiAliased: false,
          blend: !erasing,
        };
      }
    }
  }
}
