import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Operation } from '@layerpaint/types';
import { rgba } from './color';
import { EditorImpl } from './editor';
import { createEditorImage } from './editor-image';

const RED = rgba(255, 0, 0);
const CLEAR = rgba(0, 0, 0, 0);

function fillAll(size: number): Operation {
  return { type: 'fill-rectangle', startX: 0, startY: 0, endX: size, endY: size, color: RED, blend: false };
}

function segment(x0: number, x1: number, first: boolean): Operation {
  return {
    type: 'pencil-stroke',
    startX: x0,
    startY: 1,
    endX: x1,
    endY: 1,
    prevStartX: first ? null : x0,
    prevStartY: first ? null : 1,
    color: RED,
    sideHalfWidth: 0,
    antiAliased: false,
    blend: false,
  };
}

function begin(op: Operation): Operation {
  return {
    type: 'sequential',
    message: null,
    operations: [{ type: 'marker', marker: 'begin-draw', message: 'Pencil stroke' }, op],
  };
}

const END: Operation = { type: 'marker', marker: 'end-draw', message: null };

function snapshot(editor: EditorImpl, layer = 0): number[] {
  return Array.from(editor.image.layers[layer].image.data);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('EditorImpl', () => {
  it('throws on maxHistoryDepth < 1', () => {
    expect(() => new EditorImpl(createEditorImage(1, 1), { maxHistoryDepth: 0 })).toThrow(RangeError);
  });

  it('refuses an image without a live layer', () => {
    const image = createEditorImage(1, 1);
    image.layers[0].state = 'deleted';
    expect(() => new EditorImpl(image)).toThrow(Error);
  });

  describe('apply / undo / redo', () => {
    it('undoes a fill back to a transparent canvas', () => {
      const editor = new EditorImpl(createEditorImage(4, 4));
      expect(editor.applyToActiveLayer(fillAll(4))).toBe(true);
      expect(editor.pickColor(3, 3)).toEqual(RED);

      expect(editor.undo()).toBe(true);
      expect(snapshot(editor).every((v) => v === 0)).toBe(true);
      expect(editor.canRedo).toBe(true);

      expect(editor.redo()).toBe(true);
      expect(editor.pickColor(0, 0)).toEqual(RED);
      expect(editor.canRedo).toBe(false);
    });

    it('is a no-op on empty stacks', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      expect(editor.undo()).toBe(false);
      expect(editor.redo()).toBe(false);
    });

    it('does not record operations that change nothing', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      const recorded = editor.applyToActiveLayer({
        type: 'fill-rectangle',
        startX: 5,
        startY: 5,
        endX: 9,
        endY: 9,
        color: RED,
        blend: false,
      });
      expect(recorded).toBe(false);
      expect(editor.canUndo).toBe(false);
    });

    it('clears the redo stack on a new edit', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });
      editor.undo();
      editor.applyToActiveLayer({ type: 'set-pixel', x: 1, y: 1, color: RED });
      expect(editor.canRedo).toBe(false);
    });

    it('restores overlapping sequential edits in reverse order', () => {
      const editor = new EditorImpl(createEditorImage(6, 6));
      const before = snapshot(editor);
      editor.applyToActiveLayer({
        type: 'sequential',
        message: 'Composite',
        operations: [
          { type: 'fill-rectangle', startX: 0, startY: 0, endX: 3, endY: 3, color: RED, blend: false },
          { type: 'block', x: 3, y: 3, color: rgba(0, 0, 255, 100), sideHalfWidth: 1, blend: true },
        ],
      });
      expect(editor.undoDescription).toBe('Composite');

      editor.undo();
      expect(snapshot(editor)).toEqual(before);
    });

    it('evicts the oldest entries beyond maxHistoryDepth', () => {
      const editor = new EditorImpl(createEditorImage(4, 1), { maxHistoryDepth: 2 });
      for (let x = 0; x < 3; x++) {
        editor.applyToActiveLayer({ type: 'set-pixel', x, y: 0, color: RED });
      }
      expect(editor.historyEntries).toEqual(['Set pixel', 'Set pixel']);
      editor.undo();
      editor.undo();
      expect(editor.undo()).toBe(false);
      expect(editor.pickColor(0, 0)).toEqual(RED);
    });
  });

  describe('stroke coalescing', () => {
    it('records a whole stroke as one entry', () => {
      const editor = new EditorImpl(createEditorImage(8, 4));
      const merged = vi.fn();
      editor.events.on('history:merged', merged);

      editor.applyToActiveLayer(begin(segment(1, 1, true)));
      expect(editor.isStrokeOpen).toBe(true);
      editor.applyToActiveLayer(segment(1, 3, false));
      editor.applyToActiveLayer(segment(3, 6, false));
      editor.applyToActiveLayer(END);

      expect(editor.isStrokeOpen).toBe(false);
      expect(editor.historyEntries).toEqual(['Pencil stroke']);
      expect(merged).toHaveBeenCalledWith({ description: 'Pencil stroke' });

      const painted = snapshot(editor);
      expect(editor.pickColor(6, 1)).toEqual(RED);

      editor.undo();
      expect(snapshot(editor).every((v) => v === 0)).toBe(true);
      expect(editor.canUndo).toBe(false);

      editor.redo();
      expect(snapshot(editor)).toEqual(painted);
    });

    it('does not evict while a stroke is open', () => {
      const editor = new EditorImpl(createEditorImage(8, 4), { maxHistoryDepth: 2 });
      editor.applyToActiveLayer(begin(segment(0, 0, true)));
      editor.applyToActiveLayer(segment(0, 2, false));
      editor.applyToActiveLayer(segment(2, 4, false));
      editor.applyToActiveLayer(segment(4, 6, false));
      expect(editor.historyEntries).toHaveLength(4);

      editor.applyToActiveLayer(END);
      expect(editor.historyEntries).toEqual(['Pencil stroke']);
    });

    it('leaves no entry for a stroke that touched nothing', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.applyToActiveLayer({
        type: 'sequential',
        message: null,
        operations: [{ type: 'marker', marker: 'begin-draw', message: null }],
      });
      expect(editor.canUndo).toBe(true);

      editor.applyToActiveLayer({ type: 'set-pixel', x: -1, y: -1, color: RED });
      editor.applyToActiveLayer(END);
      expect(editor.canUndo).toBe(false);
    });
  });

  describe('valid region', () => {
    it('redoes under the region the edit was first applied with', () => {
      const editor = new EditorImpl(createEditorImage(4, 4));
      editor.setValidRegion({ x: 0, y: 0, width: 2, height: 2 });
      editor.applyToActiveLayer(fillAll(4));
      const applied = snapshot(editor);

      editor.undo();
      editor.setValidRegion(null);
      editor.redo();

      expect(snapshot(editor)).toEqual(applied);
      expect(editor.pickColor(1, 1)).toEqual(RED);
      expect(editor.pickColor(3, 3)).toEqual(CLEAR);
    });

    it('undoes under the recorded region after the selection moved', () => {
      const editor = new EditorImpl(createEditorImage(4, 4));
      editor.setValidRegion({ x: 0, y: 0, width: 2, height: 2 });
      editor.applyToActiveLayer(fillAll(4));

      editor.setValidRegion({ x: 3, y: 3, width: 1, height: 1 });
      editor.undo();
      expect(snapshot(editor).every((v) => v === 0)).toBe(true);
    });
  });

  describe('layers', () => {
    it('adds a layer, activates it and undoes both at once', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      expect(editor.addLayer()).toBe(1);
      expect(editor.activeLayer).toBe(1);
      expect(editor.undoDescription).toBe('Add layer');

      editor.undo();
      expect(editor.activeLayer).toBe(0);
      expect(editor.layerState(1)).toBe('deleted');
      expect(editor.image.layers).toHaveLength(2);

      editor.redo();
      expect(editor.activeLayer).toBe(1);
      expect(editor.layerState(1)).toBe('visible');
      expect(editor.image.layers).toHaveLength(2);
    });

    it('moves the active layer away before deleting it', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.addLayer();
      expect(editor.deleteLayer(1)).toBe(true);
      expect(editor.activeLayer).toBe(0);
      expect(editor.layerState(1)).toBe('deleted');

      editor.undo();
      expect(editor.activeLayer).toBe(1);
      expect(editor.layerState(1)).toBe('visible');
    });

    it('refuses to delete the last remaining layer', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      expect(editor.deleteLayer(0)).toBe(false);
      expect(editor.layerState(0)).toBe('visible');
    });

    it('never activates a deleted layer', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.addLayer();
      editor.deleteLayer(1);
      expect(() => editor.setActiveLayer(1)).toThrow(RangeError);
      expect(() => editor.setActiveLayer(7)).toThrow(RangeError);
      expect(editor.activeLayer).toBe(0);
    });

    it('duplicates visible layers only', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });

      expect(editor.duplicateLayer(0)).toBe(1);
      expect(editor.activeLayer).toBe(1);
      expect(editor.pickColor(0, 0, 1)).toEqual(RED);

      editor.setLayerVisible(0, false);
      expect(editor.duplicateLayer(0)).toBeNull();
    });

    it('hides layers from the flattened image', () => {
      const editor = new EditorImpl(createEditorImage(2, 2, { fill: RED }));
      editor.setLayerVisible(0, false);
      expect(editor.flatten().readPixel(0, 0)).toEqual(CLEAR);

      editor.undo();
      expect(editor.flatten().readPixel(0, 0)).toEqual(RED);
    });

    it('paints on the active layer', () => {
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.addLayer();
      editor.applyToActiveLayer({ type: 'set-pixel', x: 1, y: 0, color: RED });
      expect(editor.pickColor(1, 0, 1)).toEqual(RED);
      expect(editor.pickColor(1, 0, 0)).toEqual(CLEAR);
    });
  });

  describe('resizing', () => {
    it('resamples and restores on undo', () => {
      const editor = new EditorImpl(createEditorImage(4, 4, { fill: RED }));
      editor.resizeImage(2, 2);
      expect(editor.width).toBe(2);
      expect(editor.pickColor(1, 1)).toEqual(RED);
      expect(editor.undoDescription).toBe('Resize image');

      editor.undo();
      expect(editor.width).toBe(4);
      expect(editor.height).toBe(4);
      expect(editor.pickColor(3, 3)).toEqual(RED);

      editor.redo();
      expect(editor.width).toBe(2);
    });

    it('pads the canvas around the anchor', () => {
      const editor = new EditorImpl(createEditorImage(4, 4, { fill: RED }));
      editor.resizeCanvas(6, 6, 0.5, 0.5);
      expect(editor.pickColor(0, 0)).toEqual(CLEAR);
      expect(editor.pickColor(1, 1)).toEqual(RED);
      expect(editor.pickColor(4, 4)).toEqual(RED);
      expect(editor.pickColor(5, 5)).toEqual(CLEAR);
    });
  });

  describe('commit', () => {
    it('commits after each edit by default', () => {
      const editor = new EditorImpl(createEditorImage(4, 4));
      const committed = vi.fn();
      editor.events.on('layer:committed', committed);

      editor.applyToActiveLayer({ type: 'set-pixel', x: 1, y: 2, color: RED });
      expect(committed).toHaveBeenCalledWith({ layer: 0, bounds: { x: 1, y: 2, width: 1, height: 1 } });
    });

    it('batches writes until commit() when autoCommit is off', () => {
      const editor = new EditorImpl(createEditorImage(4, 4), { autoCommit: false });
      const committed = vi.fn();
      editor.events.on('layer:committed', committed);

      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });
      editor.applyToActiveLayer({ type: 'set-pixel', x: 2, y: 1, color: RED });
      expect(committed).not.toHaveBeenCalled();

      expect(editor.commit()).toBe(1);
      expect(committed).toHaveBeenCalledOnce();
      expect(committed).toHaveBeenCalledWith({ layer: 0, bounds: { x: 0, y: 0, width: 3, height: 2 } });
      expect(editor.commit()).toBe(0);
    });
  });

  describe('setImage', () => {
    it('replaces the canvas and clears history', () => {
      const editor = new EditorImpl(createEditorImage(4, 4));
      const replaced = vi.fn();
      editor.events.on('image:replaced', replaced);
      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });

      editor.setImage(createEditorImage(2, 3));
      expect(editor.width).toBe(2);
      expect(editor.height).toBe(3);
      expect(editor.canUndo).toBe(false);
      expect(replaced).toHaveBeenCalledWith({ width: 2, height: 3 });
    });
  });

  describe('debug logging', () => {
    it('logs each apply with its timing', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const editor = new EditorImpl(createEditorImage(2, 2), { debug: true });
      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });

      expect(debug).toHaveBeenCalledOnce();
      expect(debug).toHaveBeenCalledWith(expect.stringMatching(/^\[editor\] apply "Set pixel" \d+\.\d{2}ms \(undo 1\)$/));
    });

    it('stays quiet by default', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      const editor = new EditorImpl(createEditorImage(2, 2));
      editor.applyToActiveLayer({ type: 'set-pixel', x: 0, y: 0, color: RED });
      expect(debug).not.toHaveBeenCalled();
    });
  });
});
