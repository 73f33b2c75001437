/**
 * @module command
 * Canvas-level edits and the undo/redo history that records them.
 *
 * Pixel edits are wrapped in a `layer` operation tagged with the target layer
 * index. Layer bookkeeping (add, delete, visibility, active layer, whole-canvas
 * replace) follows the same apply/inverse discipline.
 */

import type { Rect } from './common';
import type { LayerState } from './layer';
import type { Operation } from './operation';
import type { PixelBuffer } from './surface';

/** Pixel operation targeting one layer. */
export interface LayerEditorOperation {
  type: 'layer';
  layer: number;
  operation: Operation;
}

/**
 * Creates a transparent layer at `layer`, which must equal the current layer
 * count, or revives the deleted layer already at that index.
 */
export interface AddLayerEditorOperation {
  type: 'add-layer';
  layer: number;
}

/** Copies a visible layer's pixels into a new layer at `layer`. */
export interface DuplicateLayerEditorOperation {
  type: 'duplicate-layer';
  source: number;
  layer: number;
}

/** Changes a layer's state. */
export interface SetLayerStateEditorOperation {
  type: 'set-layer-state';
  layer: number;
  state: LayerState;
}

/** Changes which layer receives edits. */
export interface SetActiveLayerEditorOperation {
  type: 'set-active-layer';
  layer: number;
}

/** Snapshot of one layer inside a {@link ReplaceImageEditorOperation}. */
export interface LayerSnapshot {
  state: LayerState;
  image: PixelBuffer;
}

/** Swaps the whole canvas for another of possibly different size. */
export interface ReplaceImageEditorOperation {
  type: 'replace-image';
  width: number;
  height: number;
  layers: LayerSnapshot[];
  activeLayer: number;
}

/** Ordered group of canvas-level operations applied atomically. */
export interface SequentialEditorOperation {
  type: 'sequential';
  message: string | null;
  operations: EditorOperation[];
}

/** Every canvas-level edit. */
export type EditorOperation =
  | LayerEditorOperation
  | AddLayerEditorOperation
  | DuplicateLayerEditorOperation
  | SetLayerStateEditorOperation
  | SetActiveLayerEditorOperation
  | ReplaceImageEditorOperation
  | SequentialEditorOperation;

/** One undo step. */
export interface HistoryEntry {
  /** The operation as it was applied. */
  readonly applied: EditorOperation;
  /** The operation that restores the state before `applied`. */
  readonly inverse: EditorOperation;
  /** Valid region in effect when `applied` ran, or null for the whole canvas. */
  readonly region: Rect | null;
}

/** A redoable operation plus the valid region it was first applied under. */
export interface RedoEntry {
  readonly operation: EditorOperation;
  readonly region: Rect | null;
}

/** Linear undo/redo stacks. */
export interface EditorHistory {
  /** Maximum number of undo entries to keep. */
  readonly maxDepth: number;
  /** Whether there are entries that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are entries that can be redone. */
  readonly canRedo: boolean;
  /** Description of the next entry to undo, or null. */
  readonly undoDescription: string | null;
  /** Description of the next entry to redo, or null. */
  readonly redoDescription: string | null;
  /** Descriptions of the undo stack, oldest first. */
  readonly entries: string[];

  /** Push an entry. Evicts the oldest entry beyond `maxDepth` unless `evict` is false. */
  push(entry: HistoryEntry, evict?: boolean): void;
  /** Pop the most recent undo entry. */
  popUndo(): HistoryEntry | undefined;
  /** Push onto the redo stack. */
  pushRedo(entry: RedoEntry): void;
  /** Pop the most recent redo entry. */
  popRedo(): RedoEntry | undefined;
  /** Drop every redo entry. */
  clearRedo(): void;
  /**
   * Merge the latest open stroke (from its begin-draw entry onwards) into a
   * single entry. Returns whether an open stroke was found.
   */
  mergeStroke(): boolean;
  /** Clear all history. */
  clear(): void;
}
