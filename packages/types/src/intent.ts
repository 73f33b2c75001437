/**
 * @module intent
 * Commands produced by input handling and drained by the session once per frame.
 */

import type { Color, Rect } from './common';
import type { EditorImage } from './document';
import type { Operation } from './operation';

/** Drawing tools the host can select. */
export type ToolKind =
  | 'pencil'
  | 'block-pencil'
  | 'eraser'
  | 'line'
  | 'rectangle'
  | 'circle'
  | 'bucket-fill'
  | 'color-gradient'
  | 'color-picker'
  | 'selection';

/** Every intent the command queue carries. */
export type EditorCommand =
  | { type: 'set-tool'; tool: ToolKind }
  | { type: 'set-primary-color'; color: Color }
  | { type: 'set-secondary-color'; color: Color }
  | { type: 'swap-colors' }
  | { type: 'apply'; operation: Operation }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'new-image'; width: number; height: number }
  /** Replace the canvas, e.g. with an opened file. Clears history and the selection. */
  | { type: 'set-image'; image: EditorImage }
  | { type: 'resize-image'; width: number; height: number }
  | { type: 'resize-canvas'; width: number; height: number; anchorX?: number; anchorY?: number }
  | { type: 'set-selection'; region: Rect | null }
  | { type: 'select-all' }
  | { type: 'copy-selection' }
  | { type: 'cut-selection' }
  /** Paste the clipboard with its top-left corner at (x, y) and select it. */
  | { type: 'paste'; x: number; y: number }
  | { type: 'delete-selection' }
  | { type: 'move-selection'; dx: number; dy: number }
  | { type: 'scale-selection'; width: number; height: number }
  | { type: 'rotate-selection'; degrees: number }
  /** Take the active layer's color at (x, y) as the primary (default) or secondary color. */
  | { type: 'pick-color'; x: number; y: number; target?: 'primary' | 'secondary' }
  | { type: 'add-layer' }
  | { type: 'duplicate-layer'; layer: number }
  | { type: 'delete-layer'; layer: number }
  | { type: 'set-layer-visible'; layer: number; visible: boolean }
  | { type: 'set-active-layer'; layer: number };

/** FIFO buffer of pending items. */
export interface CommandQueue<T> {
  /** Number of pending items. */
  readonly size: number;
  /** Append an item. */
  push(item: T): void;
  /** Remove and return every pending item in FIFO order. */
  drain(): T[];
}
