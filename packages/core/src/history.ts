/**
 * @module history
 * Linear undo/redo stacks with interactive-stroke coalescing.
 *
 * @see {@link @layerpaint/types#EditorHistory} for the interface contract
 */

import type {
  EditorHistory,
  HistoryEntry,
  LayerEditorOperation,
  Operation,
  RedoEntry,
} from '@layerpaint/types';
import { containsEditorMarker, describeEditorOperation, isLayerOperation } from './editor-operations';
import { markerMessage, removeMarkers } from './operations';
import { rectsEqual } from './rect';

/** Default maximum number of entries retained in history. */
export const DEFAULT_MAX_DEPTH = 100;

/** History entry whose both sides are pixel operations. */
interface LayerHistoryEntry extends HistoryEntry {
  readonly applied: LayerEditorOperation;
  readonly inverse: LayerEditorOperation;
}

function isLayerEntry(entry: HistoryEntry): entry is LayerHistoryEntry {
  return isLayerOperation(entry.applied) && isLayerOperation(entry.inverse);
}

/**
 * Concrete implementation of {@link EditorHistory}.
 *
 * Pushing beyond `maxDepth` discards the oldest entry, unless the caller
 * asks to keep it while a stroke is still open.
 */
export class EditorHistoryImpl implements EditorHistory {
  /** @inheritdoc */
  readonly maxDepth: number;

  private undoStack: HistoryEntry[] = [];
  private redoStack: RedoEntry[] = [];

  /**
   * @param maxDepth - Maximum number of entries to keep (default 100).
   */
  constructor(maxDepth: number = DEFAULT_MAX_DEPTH) {
    if (maxDepth < 1) {
      throw new RangeError('maxDepth must be at least 1');
    }
    this.maxDepth = maxDepth;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    const top = this.undoStack[this.undoStack.length - 1];
    return top ? describeEditorOperation(top.applied) : null;
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    const top = this.redoStack[this.redoStack.length - 1];
    return top ? describeEditorOperation(top.operation) : null;
  }

  /** @inheritdoc */
  get entries(): string[] {
    return this.undoStack.map((entry) => describeEditorOperation(entry.applied));
  }

  /** @inheritdoc */
  push(entry: HistoryEntry, evict = true): void {
    this.undoStack.push(entry);
    if (evict) {
      this.evict();
    }
  }

  /** @inheritdoc */
  popUndo(): HistoryEntry | undefined {
    return this.undoStack.pop();
  }

  /** @inheritdoc */
  pushRedo(entry: RedoEntry): void {
    this.redoStack.push(entry);
  }

  /** @inheritdoc */
  popRedo(): RedoEntry | undefined {
    return this.redoStack.pop();
  }

  /** @inheritdoc */
  clearRedo(): void {
    this.redoStack = [];
  }

  /**
   * Coalesce the latest stroke in three phases: locate the newest entry still
   * carrying a begin-draw marker, drain the contiguous run of pixel entries
   * on the same layer and valid region, then insert one merged entry where
   * the run began. A run whose inverses are all empty leaves no entry.
   */
  mergeStroke(): boolean {
    // 1. Locate
    let begin = -1;
    for (let i = this.undoStack.length - 1; i >= 0; i--) {
      if (containsEditorMarker(this.undoStack[i].applied, 'begin-draw')) {
        begin = i;
        break;
      }
    }
    const first = this.undoStack[begin];
    if (begin < 0 || !first || !isLayerEntry(first)) {
      return false;
    }

    // 2. Drain
    const run: LayerHistoryEntry[] = [];
    for (let i = begin; i < this.undoStack.length; i++) {
      const entry = this.undoStack[i];
      if (!isLayerEntry(entry) || entry.applied.layer !== first.applied.layer || !rectsEqual(entry.region, first.region)) {
        break;
      }
      run.push(entry);
    }
    this.undoStack.splice(begin, run.length);

    // 3. Merge
    const { layer } = first.applied;
    const message = markerMessage(first.applied.operation);
    const inverses: Operation[] = run
      .map((entry) => entry.inverse.operation)
      .filter((op) => op.type !== 'empty')
      .reverse();
    if (inverses.length > 0) {
      const forward: Operation = removeMarkers({
        type: 'sequential',
        message,
        operations: run.map((entry) => entry.applied.operation),
      });
      const merged: HistoryEntry = {
        applied: { type: 'layer', layer, operation: forward },
        inverse: { type: 'layer', layer, operation: { type: 'sequential', message, operations: inverses } },
        region: first.region,
      };
      this.undoStack.splice(begin, 0, merged);
    }
    this.evict();
    return true;
  }

  /** @inheritdoc */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private evict(): void {
    while (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
  }
}
