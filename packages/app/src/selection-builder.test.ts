import { describe, it, expect } from 'vitest';
import type { Color, Operation } from '@layerpaint/types';
import { EditorImpl, RgbaBuffer, createEditorImage, layerAt, rgba } from '@layerpaint/core';
import {
  copySelection,
  cutSelection,
  deleteSelection,
  moveSelection,
  pasteImage,
  rotateSelection,
  scaleSelection,
} from './selection-builder';

const RED = rgba(255, 0, 0);
const BLUE = rgba(0, 0, 255);
const CLEAR = rgba(0, 0, 0, 0);

/** A 4x1 editor holding red, blue, clear, clear. */
function redBlueRow(): EditorImpl {
  const image = createEditorImage(4, 1);
  const layer = layerAt(image, 0).image;
  layer.writePixel(0, 0, RED);
  layer.writePixel(1, 0, BLUE);
  return new EditorImpl(image);
}

function row(editor: EditorImpl): Color[] {
  return Array.from({ length: editor.width }, (_, x) => editor.pickColor(x, 0, 0));
}

function surfaceOf(editor: EditorImpl): RgbaBuffer {
  return RgbaBuffer.from(layerAt(editor.image, 0).image);
}

function apply(editor: EditorImpl, op: Operation | undefined): void {
  if (!op) {
    throw new Error('expected an operation');
  }
  editor.applyToActiveLayer(op);
}

describe('copySelection', () => {
  it('copies the selected pixels clipped to the canvas', () => {
    const editor = redBlueRow();
    const copy = copySelection(surfaceOf(editor), { x: -1, y: 0, width: 3, height: 2 });

    expect(copy?.width).toBe(2);
    expect(copy?.height).toBe(1);
    expect(copy?.readPixel(0, 0)).toEqual(RED);
    expect(copy?.readPixel(1, 0)).toEqual(BLUE);
  });

  it('returns null for a selection outside the canvas', () => {
    expect(copySelection(surfaceOf(redBlueRow()), { x: 4, y: 0, width: 2, height: 1 })).toBeNull();
  });
});

describe('deleteSelection', () => {
  it('clears the selection in one undo entry', () => {
    const editor = redBlueRow();
    apply(editor, deleteSelection({ x: 1, y: 0, width: 2, height: 1 }));

    expect(editor.historyEntries).toEqual(['Delete selection']);
    expect(row(editor)).toEqual([RED, CLEAR, CLEAR, CLEAR]);

    editor.undo();
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, CLEAR]);
  });
});

describe('cutSelection', () => {
  it('lifts the pixels into the clipboard and clears them', () => {
    const editor = redBlueRow();
    const cut = cutSelection(surfaceOf(editor), { x: 0, y: 0, width: 2, height: 1 });

    expect(cut?.clipboard.readPixel(1, 0)).toEqual(BLUE);
    apply(editor, cut?.operation);
    expect(editor.historyEntries).toEqual(['Cut selection']);
    expect(row(editor)).toEqual([CLEAR, CLEAR, CLEAR, CLEAR]);

    editor.undo();
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, CLEAR]);
  });
});

describe('pasteImage', () => {
  it('overwrites at the target and selects the visible part', () => {
    const editor = redBlueRow();
    const clipboard = RgbaBuffer.filled(2, 1, RED);
    const edit = pasteImage(clipboard, 3, 0, editor);

    expect(edit.selection).toEqual({ x: 3, y: 0, width: 1, height: 1 });
    apply(editor, edit.operation);
    expect(editor.historyEntries).toEqual(['Paste']);
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, RED]);

    editor.undo();
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, CLEAR]);
  });
});

describe('moveSelection', () => {
  it('moves the pixels and round-trips through undo and redo', () => {
    const editor = redBlueRow();
    const edit = moveSelection(surfaceOf(editor), { x: 0, y: 0, width: 2, height: 1 }, 2, 0);

    expect(edit?.selection).toEqual({ x: 2, y: 0, width: 2, height: 1 });
    expect(edit?.operation).toMatchObject({
      type: 'sequential',
      message: 'Move selection',
      operations: [
        { type: 'fill-rectangle', startX: 0, startY: 0, endX: 1, endY: 0, color: CLEAR, blend: false },
        { type: 'set-image', x: 2, y: 0, blend: true },
      ],
    });

    apply(editor, edit?.operation);
    expect(editor.historyEntries).toEqual(['Move selection']);
    expect(row(editor)).toEqual([CLEAR, CLEAR, RED, BLUE]);

    editor.undo();
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, CLEAR]);
    editor.redo();
    expect(row(editor)).toEqual([CLEAR, CLEAR, RED, BLUE]);
  });

  it('keeps the pixels under transparent parts of the moved copy', () => {
    const editor = redBlueRow();
    apply(editor, moveSelection(surfaceOf(editor), { x: 1, y: 0, width: 2, height: 1 }, -1, 0)?.operation);

    expect(row(editor)).toEqual([BLUE, CLEAR, CLEAR, CLEAR]);
  });

  it('selects only what stays on the canvas', () => {
    const editor = redBlueRow();
    const edit = moveSelection(surfaceOf(editor), { x: 0, y: 0, width: 2, height: 1 }, 3, 0);

    expect(edit?.selection).toEqual({ x: 3, y: 0, width: 1, height: 1 });
    apply(editor, edit?.operation);
    expect(row(editor)).toEqual([CLEAR, CLEAR, CLEAR, RED]);
  });
});

describe('scaleSelection', () => {
  it('resamples the pixels from the selection corner', () => {
    const image = createEditorImage(4, 4);
    layerAt(image, 0).image.writePixel(0, 0, RED);
    const editor = new EditorImpl(image);
    const edit = scaleSelection(surfaceOf(editor), { x: 0, y: 0, width: 1, height: 1 }, 2, 2);

    expect(edit?.selection).toEqual({ x: 0, y: 0, width: 2, height: 2 });
    expect(edit?.operation).toMatchObject({
      message: 'Scale selection',
      operations: [{ type: 'fill-rectangle' }, { type: 'set-scaled-image', x: 0, y: 0, scaleX: 2, scaleY: 2 }],
    });

    apply(editor, edit?.operation);
    expect(editor.historyEntries).toEqual(['Scale selection']);
    for (const [x, y] of [[0, 0], [1, 0], [0, 1], [1, 1]]) {
      expect(editor.pickColor(x, y, 0)).toEqual(RED);
    }
    expect(editor.pickColor(2, 0, 0)).toEqual(CLEAR);

    editor.undo();
    expect(editor.pickColor(0, 0, 0)).toEqual(RED);
    expect(editor.pickColor(1, 1, 0)).toEqual(CLEAR);
  });

  it('rejects an empty target size', () => {
    expect(() => scaleSelection(surfaceOf(redBlueRow()), { x: 0, y: 0, width: 2, height: 1 }, 0, 1)).toThrow(
      'Invalid selection size 0x1',
    );
  });
});

describe('rotateSelection', () => {
  it('turns the pixels about the selection center', () => {
    const editor = redBlueRow();
    const edit = rotateSelection(surfaceOf(editor), { x: 0, y: 0, width: 2, height: 1 }, 180);

    expect(edit?.selection).toEqual({ x: 0, y: 0, width: 2, height: 1 });
    expect(edit?.operation).toMatchObject({
      message: 'Rotate selection',
      operations: [{ type: 'fill-rectangle' }, { type: 'set-rotated-image', centerX: 1, centerY: 0, rotation: 180 }],
    });

    apply(editor, edit?.operation);
    expect(editor.historyEntries).toEqual(['Rotate selection']);
    expect(row(editor)).toEqual([BLUE, RED, CLEAR, CLEAR]);

    editor.undo();
    expect(row(editor)).toEqual([RED, BLUE, CLEAR, CLEAR]);
  });
});
