/**
 * @module editor-operations
 * Apply/inverse for canvas-level {@link EditorOperation}s.
 *
 * Pixel operations run against the target layer through a
 * {@link MaskedSurface}; layer bookkeeping mutates the {@link EditorState}.
 * What changed is collected in {@link ApplyEffects} so the editor can batch
 * commits and events.
 */

import type {
  EditorImage,
  EditorOperation,
  LayerEditorOperation,
  LayerState,
  MarkerKind,
  Rect,
  ReplaceImageEditorOperation,
  SequentialEditorOperation,
} from '@layerpaint/types';
import { createLayer, layerAt, snapshotLayers } from './editor-image';
import { applyOperation, containsMarker, describeOperation } from './operations';
import { unionRects } from './rect';
import { MaskedSurface } from './surface';

/** Mutable state an editor operation acts on. */
export interface EditorState {
  image: EditorImage;
  activeLayer: number;
}

/** Side effects of one or more applies, consumed by the editor. */
export class ApplyEffects {
  /** Written bounds per layer index. */
  readonly dirty = new Map<number, Rect>();
  layersChanged = false;
  activeChanged = false;
  imageReplaced = false;

  markDirty(layer: number, bounds: Rect): void {
    this.dirty.set(layer, unionRects(this.dirty.get(layer) ?? null, bounds));
  }

  markLayerDirty(state: EditorState, layer: number): void {
    this.markDirty(layer, { x: 0, y: 0, width: state.image.width, height: state.image.height });
  }
}

/** Stand-in inverse for entries that must be recorded although nothing changed. */
export function emptyInverse(op: EditorOperation): EditorOperation {
  return op.type === 'layer'
    ? { type: 'layer', layer: op.layer, operation: { type: 'empty' } }
    : { type: 'sequential', message: null, operations: [] };
}

// ── helpers ──

/** Index where a new layer may be placed: the end, or a deleted slot. */
function assertPlaceable(state: EditorState, index: number): void {
  const { layers } = state.image;
  if (index === layers.length) {
    return;
  }
  if (layerAt(state.image, index).state !== 'deleted') {
    throw new RangeError(`Layer ${index} is in use`);
  }
}

function assertActivatable(state: EditorState, index: number): void {
  if (layerAt(state.image, index).state === 'deleted') {
    throw new RangeError(`Layer ${index} is deleted and cannot be active`);
  }
}

function setLayerState(
  state: EditorState,
  layer: number,
  next: LayerState,
  effects: ApplyEffects,
): EditorOperation | null {
  const target = layerAt(state.image, layer);
  const previous = target.state;
  if (previous === next) {
    return null;
  }
  if (next === 'deleted' && layer === state.activeLayer) {
    throw new Error(`Layer ${layer} is active; activate another layer before deleting it`);
  }
  target.state = next;
  effects.layersChanged = true;
  return { type: 'set-layer-state', layer, state: previous };
}

function replaceImage(
  op: ReplaceImageEditorOperation,
  state: EditorState,
  effects: ApplyEffects,
): ReplaceImageEditorOperation {
  const { image } = state;
  const inverse: ReplaceImageEditorOperation = {
    type: 'replace-image',
    width: image.width,
    height: image.height,
    layers: snapshotLayers(image),
    activeLayer: state.activeLayer,
  };

  const target = op.layers[op.activeLayer];
  if (!target || target.state === 'deleted') {
    throw new RangeError(`Replacement active layer ${op.activeLayer} is missing or deleted`);
  }

  image.width = op.width;
  image.height = op.height;
  image.layers = op.layers.map((snapshot) => ({ state: snapshot.state, image: snapshot.image.clone() }));
  state.activeLayer = op.activeLayer;

  effects.imageReplaced = true;
  effects.layersChanged = true;
  effects.activeChanged = true;
  image.layers.forEach((_layer, index) => effects.markLayerDirty(state, index));
  return inverse;
}

function applySequential(
  op: SequentialEditorOperation,
  state: EditorState,
  region: Rect | null,
  computeInverse: boolean,
  effects: ApplyEffects,
): SequentialEditorOperation | null {
  const inverses: EditorOperation[] = [];
  for (const child of op.operations) {
    const inverse = applyEditorOperation(child, state, region, computeInverse, effects);
    if (inverse) {
      inverses.push(inverse);
    }
  }
  if (!computeInverse || inverses.length === 0) {
    return null;
  }
  return { type: 'sequential', message: op.message, operations: inverses.reverse() };
}

/**
 * Apply `op` to the canvas.
 *
 * @param region - Valid region for pixel writes, or null for the whole layer.
 * @returns The restoring operation when something changed and an inverse was
 *   requested, otherwise null.
 * @throws RangeError on an invalid layer index or when activating a deleted layer.
 */
export function applyEditorOperation(
  op: EditorOperation,
  state: EditorState,
  region: Rect | null,
  computeInverse: boolean,
  effects: ApplyEffects,
): EditorOperation | null {
  switch (op.type) {
    case 'layer': {
      const surface = new MaskedSurface(layerAt(state.image, op.layer).image, region);
      const inverse = applyOperation(op.operation, surface, computeInverse);
      if (surface.dirtyBounds) {
        effects.markDirty(op.layer, surface.dirtyBounds);
      }
      return inverse && computeInverse ? { type: 'layer', layer: op.layer, operation: inverse } : null;
    }

    case 'add-layer': {
      assertPlaceable(state, op.layer);
      const layer = createLayer(state.image.width, state.image.height);
      if (op.layer === state.image.layers.length) {
        state.image.layers.push(layer);
      } else {
        state.image.layers[op.layer] = layer;
      }
      effects.layersChanged = true;
      effects.markLayerDirty(state, op.layer);
      return computeInverse ? { type: 'set-layer-state', layer: op.layer, state: 'deleted' } : null;
    }

    case 'duplicate-layer': {
      const source = layerAt(state.image, op.source);
      if (source.state !== 'visible') {
        return null;
      }
      assertPlaceable(state, op.layer);
      const copy = { state: source.state, image: source.image.clone() };
      if (op.layer === state.image.layers.length) {
        state.image.layers.push(copy);
      } else {
        state.image.layers[op.layer] = copy;
      }
      effects.layersChanged = true;
      effects.markLayerDirty(state, op.layer);
      return computeInverse ? { type: 'set-layer-state', layer: op.layer, state: 'deleted' } : null;
    }

    case 'set-layer-state': {
      const inverse = setLayerState(state, op.layer, op.state, effects);
      return computeInverse ? inverse : null;
    }

    case 'set-active-layer': {
      assertActivatable(state, op.layer);
      const previous = state.activeLayer;
      if (previous === op.layer) {
        return null;
      }
      state.activeLayer = op.layer;
      effects.activeChanged = true;
      return computeInverse ? { type: 'set-active-layer', layer: previous } : null;
    }

    case 'replace-image': {
      const inverse = replaceImage(op, state, effects);
      return computeInverse ? inverse : null;
    }

    case 'sequential':
      return applySequential(op, state, region, computeInverse, effects);
  }
}

/** Whether `op` carries a stroke marker (of `kind`, when given) anywhere inside. */
export function containsEditorMarker(op: EditorOperation, kind?: MarkerKind): boolean {
  switch (op.type) {
    case 'layer':
      return containsMarker(op.operation, kind);
    case 'sequential':
      return op.operations.some((child) => containsEditorMarker(child, kind));
    default:
      return false;
  }
}

/** Narrowing guard for pixel operations. */
export function isLayerOperation(op: EditorOperation): op is LayerEditorOperation {
  return op.type === 'layer';
}

const STATE_LABELS: Record<LayerState, string> = {
  visible: 'Show layer',
  hidden: 'Hide layer',
  deleted: 'Delete layer',
};

/** Human-readable label for history listings. */
export function describeEditorOperation(op: EditorOperation): string {
  switch (op.type) {
    case 'layer':
      return describeOperation(op.operation);
    case 'add-layer':
      return 'Add layer';
    case 'duplicate-layer':
      return 'Duplicate layer';
    case 'set-layer-state':
      return STATE_LABELS[op.state];
    case 'set-active-layer':
      return 'Select layer';
    case 'replace-image':
      return 'Replace image';
    case 'sequential': {
      if (op.message !== null) {
        return op.message;
      }
      const [first] = op.operations;
      return first ? describeEditorOperation(first) : 'Edit';
    }
  }
}
