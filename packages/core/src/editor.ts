/**
 * @module editor
 * The undo/redo engine: owns the canvas, applies operations, records history
 * and coalesces interactive strokes.
 *
 * Pixel writes are not pushed anywhere while they happen. The editor keeps the
 * written bounds per layer and reports them through `layer:committed` events
 * when {@link EditorImpl.commit} is called, either automatically after each
 * apply/undo/redo or once per frame by the host.
 */

import type {
  Color,
  EditorImage,
  EditorOperation,
  EventBus,
  LayerState,
  Operation,
  Rect,
} from '@layerpaint/types';
import {
  firstLiveLayer,
  flattenImage,
  layerAt,
  pickColor,
  resampledLayers,
  resizedCanvasLayers,
} from './editor-image';
import {
  ApplyEffects,
  applyEditorOperation,
  containsEditorMarker,
  describeEditorOperation,
  emptyInverse,
} from './editor-operations';
import type { EditorState } from './editor-operations';
import { EventBusImpl } from './event-bus';
import { DEFAULT_MAX_DEPTH, EditorHistoryImpl } from './history';
import { unionRects } from './rect';
import type { RgbaBuffer } from './rgba-buffer';

/** Editor configuration. */
export interface EditorOptions {
  /** Maximum number of undo entries (default 100, at least 1). */
  maxHistoryDepth?: number;
  /** Commit after every apply, undo and redo (default true). */
  autoCommit?: boolean;
  /** Log each apply with its timing via `console.debug` (default false). */
  debug?: boolean;
  /** Bus receiving editor events. A private bus is created when omitted. */
  events?: EventBus;
}

/** Multi-layer canvas with linear undo/redo. */
export class EditorImpl {
  readonly events: EventBus;
  readonly autoCommit: boolean;
  private readonly debug: boolean;
  private readonly history: EditorHistoryImpl;
  private readonly state: EditorState;
  private region: Rect | null = null;
  private strokeOpen = false;
  private dirty = new Map<number, Rect>();

  /**
   * @param image   - Canvas to edit. The editor takes ownership.
   * @param options - See {@link EditorOptions}.
   * @throws Error when every layer of `image` is deleted.
   */
  constructor(image: EditorImage, options: EditorOptions = {}) {
    this.history = new EditorHistoryImpl(options.maxHistoryDepth ?? DEFAULT_MAX_DEPTH);
    this.autoCommit = options.autoCommit ?? true;
    this.debug = options.debug ?? false;
    this.events = options.events ?? new EventBusImpl();
    this.state = { image, activeLayer: EditorImpl.initialLayer(image) };
  }

  // ── introspection ────────────────────────────────────────────────────

  get image(): Readonly<EditorImage> {
    return this.state.image;
  }

  get width(): number {
    return this.state.image.width;
  }

  get height(): number {
    return this.state.image.height;
  }

  get activeLayer(): number {
    return this.state.activeLayer;
  }

  get validRegion(): Rect | null {
    return this.region;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  get undoDescription(): string | null {
    return this.history.undoDescription;
  }

  get redoDescription(): string | null {
    return this.history.redoDescription;
  }

  /** Undo stack labels, oldest first. */
  get historyEntries(): string[] {
    return this.history.entries;
  }

  /** Whether a begin-draw has been applied without its end-draw yet. */
  get isStrokeOpen(): boolean {
    return this.strokeOpen;
  }

  layerState(layer: number): LayerState {
    return layerAt(this.state.image, layer).state;
  }

  // ── core engine ──────────────────────────────────────────────────────

  /**
   * Apply an operation, record its inverse and clear the redo stack.
   *
   * Operations carrying a begin-draw marker are always recorded; an end-draw
   * marker merges the open stroke into a single entry.
   *
   * @returns Whether an undo entry was recorded.
   */
  apply(op: EditorOperation): boolean {
    const started = performance.now();
    const effects = new ApplyEffects();
    const region = this.region;
    const inverse = applyEditorOperation(op, this.state, region, true, effects);
    this.history.clearRedo();

    const begins = containsEditorMarker(op, 'begin-draw');
    const ends = containsEditorMarker(op, 'end-draw');
    if (begins) {
      this.strokeOpen = true;
    }

    let recorded = false;
    if (inverse || begins) {
      this.history.push({ applied: op, inverse: inverse ?? emptyInverse(op), region }, !this.strokeOpen);
      this.events.emit('history:pushed', { description: describeEditorOperation(op) });
      recorded = true;
    }

    if (ends) {
      this.strokeOpen = false;
      if (this.history.mergeStroke()) {
        this.events.emit('history:merged', { description: this.history.undoDescription ?? 'Edit' });
      }
    }

    this.settle(effects);
    this.log('apply', op, started);
    return recorded;
  }

  /** Apply a pixel operation to the active layer. */
  applyToActiveLayer(operation: Operation): boolean {
    return this.apply({ type: 'layer', layer: this.state.activeLayer, operation });
  }

  /**
   * Undo the most recent entry under the valid region it was applied with.
   * @returns false when there was nothing to undo.
   */
  undo(): boolean {
    const started = performance.now();
    const entry = this.history.popUndo();
    if (!entry) {
      return false;
    }
    const effects = new ApplyEffects();
    applyEditorOperation(entry.inverse, this.state, entry.region, false, effects);
    this.history.pushRedo({ operation: entry.applied, region: entry.region });
    this.strokeOpen = false;

    this.events.emit('history:undone', { description: describeEditorOperation(entry.applied) });
    this.settle(effects);
    this.log('undo', entry.applied, started);
    return true;
  }

  /**
   * Re-apply the most recently undone operation, computing a fresh inverse.
   * The valid region recorded with the entry is used, not the current one.
   * @returns false when there was nothing to redo.
   */
  redo(): boolean {
    const started = performance.now();
    const entry = this.history.popRedo();
    if (!entry) {
      return false;
    }
    const effects = new ApplyEffects();
    const inverse = applyEditorOperation(entry.operation, this.state, entry.region, true, effects);
    if (inverse || containsEditorMarker(entry.operation, 'begin-draw')) {
      this.history.push({
        applied: entry.operation,
        inverse: inverse ?? emptyInverse(entry.operation),
        region: entry.region,
      });
    }

    this.events.emit('history:redone', { description: describeEditorOperation(entry.operation) });
    this.settle(effects);
    this.log('redo', entry.operation, started);
    return true;
  }

  /**
   * Report every layer written since the last commit through one
   * `layer:committed` event each, then forget them.
   * @returns Number of layers committed.
   */
  commit(): number {
    const dirty = this.dirty;
    this.dirty = new Map();
    for (const [layer, bounds] of dirty) {
      this.events.emit('layer:committed', { layer, bounds });
    }
    return dirty.size;
  }

  // ── layer commands ───────────────────────────────────────────────────

  /** Append a transparent layer and make it active. Returns its index. */
  addLayer(): number {
    const index = this.state.image.layers.length;
    this.apply({
      type: 'sequential',
      message: 'Add layer',
      operations: [
        { type: 'add-layer', layer: index },
        { type: 'set-active-layer', layer: index },
      ],
    });
    return index;
  }

  /**
   * Copy a visible layer into a new layer and make it active.
   * @returns The new index, or null when the source is not visible.
   */
  duplicateLayer(source: number): number | null {
    if (layerAt(this.state.image, source).state !== 'visible') {
      return null;
    }
    const index = this.state.image.layers.length;
    this.apply({
      type: 'sequential',
      message: 'Duplicate layer',
      operations: [
        { type: 'duplicate-layer', source, layer: index },
        { type: 'set-active-layer', layer: index },
      ],
    });
    return index;
  }

  /**
   * Mark a layer deleted. When it was active, the first remaining layer
   * becomes active first.
   * @returns false when the layer is already deleted or is the last one left.
   */
  deleteLayer(layer: number): boolean {
    if (layerAt(this.state.image, layer).state === 'deleted') {
      return false;
    }
    const fallback = firstLiveLayer(this.state.image, layer);
    if (fallback < 0) {
      return false;
    }
    const operations: EditorOperation[] = [];
    if (layer === this.state.activeLayer) {
      operations.push({ type: 'set-active-layer', layer: fallback });
    }
    operations.push({ type: 'set-layer-state', layer, state: 'deleted' });
    this.apply({ type: 'sequential', message: 'Delete layer', operations });
    return true;
  }

  /** @throws RangeError when the layer is deleted. */
  setLayerVisible(layer: number, visible: boolean): boolean {
    if (layerAt(this.state.image, layer).state === 'deleted') {
      throw new RangeError(`Layer ${layer} is deleted`);
    }
    return this.apply({ type: 'set-layer-state', layer, state: visible ? 'visible' : 'hidden' });
  }

  /** @throws RangeError when the layer is deleted or out of range. */
  setActiveLayer(layer: number): boolean {
    return this.apply({ type: 'set-active-layer', layer });
  }

  /** Resample every layer to a new size. Undoable. */
  resizeImage(width: number, height: number): boolean {
    return this.apply({
      type: 'sequential',
      message: 'Resize image',
      operations: [
        {
          type: 'replace-image',
          width,
          height,
          layers: resampledLayers(this.state.image, width, height),
          activeLayer: this.state.activeLayer,
        },
      ],
    });
  }

  /**
   * Crop or pad every layer to a new size. Undoable.
   * @param anchorX - Horizontal anchor (0=left, 0.5=center, 1=right).
   * @param anchorY - Vertical anchor (0=top, 0.5=center, 1=bottom).
   */
  resizeCanvas(width: number, height: number, anchorX = 0, anchorY = 0): boolean {
    return this.apply({
      type: 'sequential',
      message: 'Resize canvas',
      operations: [
        {
          type: 'replace-image',
          width,
          height,
          layers: resizedCanvasLayers(this.state.image, width, height, anchorX, anchorY),
          activeLayer: this.state.activeLayer,
        },
      ],
    });
  }

  /**
   * Replace the canvas outright (new or opened image). History is cleared
   * and every layer is marked for commit.
   */
  setImage(image: EditorImage): void {
    const activeLayer = EditorImpl.initialLayer(image);
    this.state.image = image;
    this.state.activeLayer = activeLayer;
    this.history.clear();
    this.strokeOpen = false;
    this.region = null;
    this.dirty = new Map();
    image.layers.forEach((_layer, index) =>
      this.dirty.set(index, { x: 0, y: 0, width: image.width, height: image.height }),
    );

    this.events.emit('image:replaced', { width: image.width, height: image.height });
    this.events.emit('layers:changed');
    this.events.emit('layer:activated', { layer: activeLayer });
    if (this.autoCommit) {
      this.commit();
    }
  }

  // ── selection & queries ──────────────────────────────────────────────

  /** Restrict subsequent edits to `region` (null for the whole canvas). */
  setValidRegion(region: Rect | null): void {
    this.region = region ? { ...region } : null;
  }

  /** Visible layers composited into one buffer, e.g. for saving. */
  flatten(): RgbaBuffer {
    return flattenImage(this.state.image);
  }

  pickColor(x: number, y: number, layer?: number): Color {
    return pickColor(this.state.image, x, y, layer);
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private static initialLayer(image: EditorImage): number {
    const index = firstLiveLayer(image);
    if (index < 0) {
      throw new Error('Image has no layer that is not deleted');
    }
    return index;
  }

  /** Fold effects into the pending commit and notify listeners. */
  private settle(effects: ApplyEffects): void {
    for (const [layer, bounds] of effects.dirty) {
      this.dirty.set(layer, unionRects(this.dirty.get(layer) ?? null, bounds));
    }
    if (effects.imageReplaced) {
      this.events.emit('image:replaced', { width: this.width, height: this.height });
    }
    if (effects.layersChanged) {
      this.events.emit('layers:changed');
    }
    if (effects.activeChanged) {
      this.events.emit('layer:activated', { layer: this.state.activeLayer });
    }
    if (this.autoCommit) {
      this.commit();
    }
  }

  private log(action: string, op: EditorOperation, started: number): void {
    if (!this.debug) {
      return;
    }
    const elapsed = performance.now() - started;
    // eslint-disable-next-line no-console
    console.debug(
      `[editor] ${action} "${describeEditorOperation(op)}" ${elapsed.toFixed(2)}ms (undo ${this.history.entries.length})`,
    );
  }
}
