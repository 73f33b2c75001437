import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import type { CodecResult, ImageFormat, RgbaImage } from '@layerpaint/types';
import { rgba } from '@layerpaint/core';
import { createSessionStore } from './session-store';
import { formatFromPath, openImage, saveImage } from './image-io';

interface FakeCodec {
  decode: Mock<[Uint8Array, ImageFormat], CodecResult<RgbaImage>>;
  encode: Mock<[RgbaImage, ImageFormat], CodecResult<Uint8Array>>;
}

/** In-memory codec: the "encoded" bytes are the raw RGBA bytes of a 2x1 image. */
function createFakeCodec(): FakeCodec {
  return {
    decode: vi.fn<[Uint8Array, ImageFormat], CodecResult<RgbaImage>>((bytes) => ({
      ok: true,
      value: { width: 2, height: 1, data: new Uint8ClampedArray(bytes) },
    })),
    encode: vi.fn<[RgbaImage, ImageFormat], CodecResult<Uint8Array>>((image) => ({
      ok: true,
      value: new Uint8Array(image.data),
    })),
  };
}

const TWO_PIXELS = new Uint8Array([255, 0, 0, 255, 0, 0, 255, 255]);

describe('formatFromPath', () => {
  it.each<[string, ImageFormat | null]>([
    ['image.png', { kind: 'png' }],
    ['photo.JPG', { kind: 'jpeg', quality: 90 }],
    ['photo.jpeg', { kind: 'jpeg', quality: 90 }],
    ['scan.tif', { kind: 'tiff' }],
    ['scan.TIFF', { kind: 'tiff' }],
    ['/tmp/icon.bmp', { kind: 'bmp' }],
    ['notes.txt', null],
    ['no-extension', null],
    ['/tmp/release.v2/readme', null],
  ])('%s', (path, expected) => {
    expect(formatFromPath(path)).toEqual(expected);
  });
});

describe('openImage', () => {
  it('installs the decoded image as a fresh canvas on the next frame', () => {
    const store = createSessionStore({ width: 4, height: 4 });
    store.getState().dispatch({ type: 'set-selection', region: { x: 0, y: 0, width: 1, height: 1 } });
    store.getState().dispatch({ type: 'add-layer' });
    store.getState().processFrame();
    const committed = vi.fn();
    store.getState().editor.events.on('layer:committed', committed);
    const codec = createFakeCodec();

    const result = openImage(store, codec, TWO_PIXELS, 'photo.jpg');

    expect(result).toEqual({ ok: true, value: { width: 2, height: 1 } });
    expect(codec.decode).toHaveBeenCalledWith(TWO_PIXELS, { kind: 'jpeg', quality: 90 });
    expect(store.getState().editor.width).toBe(4);
    expect(store.getState().pendingCommands()).toBe(1);

    store.getState().processFrame();

    const state = store.getState();
    expect(state.editor.image.layers).toHaveLength(1);
    expect(state.editor.image.sourcePath).toBe('photo.jpg');
    expect(state.editor.image.format).toEqual({ kind: 'jpeg', quality: 90 });
    expect(state.editor.pickColor(0, 0)).toEqual(rgba(255, 0, 0));
    expect(state.editor.pickColor(1, 0)).toEqual(rgba(0, 0, 255));
    expect(state.selection).toBeNull();
    expect(state.canUndo).toBe(false);
    expect(state.historyEntries).toEqual([]);
    expect(committed).toHaveBeenCalledWith({ layer: 0, bounds: { x: 0, y: 0, width: 2, height: 1 } });
  });

  it('swaps the canvas in queue order', () => {
    const store = createSessionStore({ width: 2, height: 1 });
    const { dispatch } = store.getState();
    const green = rgba(0, 255, 0);
    dispatch({
      type: 'apply',
      operation: { type: 'fill-rectangle', startX: 0, startY: 0, endX: 1, endY: 0, color: green, blend: false },
    });
    openImage(store, createFakeCodec(), TWO_PIXELS, 'photo.png');
    dispatch({
      type: 'apply',
      operation: { type: 'fill-rectangle', startX: 1, startY: 0, endX: 1, endY: 0, color: rgba(9, 9, 9), blend: false },
    });

    expect(store.getState().processFrame()).toBe(3);

    const { editor, historyEntries } = store.getState();
    expect(editor.image.sourcePath).toBe('photo.png');
    expect(editor.pickColor(0, 0)).toEqual(rgba(255, 0, 0));
    expect(editor.pickColor(1, 0)).toEqual(rgba(9, 9, 9));
    expect(historyEntries).toEqual(['Fill rectangle']);
  });

  it('rejects an unknown extension without decoding', () => {
    const store = createSessionStore({ width: 1, height: 1 });
    const codec = createFakeCodec();

    const result = openImage(store, codec, TWO_PIXELS, 'notes.txt');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Unsupported image format: notes.txt');
    }
    expect(codec.decode).not.toHaveBeenCalled();
  });

  it('passes a decode failure through and keeps the canvas', () => {
    const store = createSessionStore({ width: 3, height: 3 });
    const error = new Error('corrupt header');
    const codec = createFakeCodec();
    codec.decode.mockReturnValue({ ok: false, error });

    expect(openImage(store, codec, TWO_PIXELS, 'broken.png')).toEqual({ ok: false, error });
    expect(store.getState().pendingCommands()).toBe(0);
    expect(store.getState().editor.width).toBe(3);
  });

  it('reports a decoded buffer whose length does not match its size', () => {
    const store = createSessionStore({ width: 3, height: 3 });
    const codec = createFakeCodec();

    const result = openImage(store, codec, new Uint8Array(4), 'short.png');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Pixel data length 4 does not match 2x1 (expected 8)');
    }
    expect(store.getState().editor.width).toBe(3);
  });
});

describe('saveImage', () => {
  it('encodes the flattened visible layers in the canvas format', () => {
    const store = createSessionStore({ width: 1, height: 1 });
    const codec = createFakeCodec();
    openImage(store, codec, TWO_PIXELS, 'photo.bmp');
    store.getState().processFrame();

    const result = saveImage(store, codec);

    expect(result).toEqual({ ok: true, value: TWO_PIXELS });
    expect(codec.encode).toHaveBeenCalledWith(expect.objectContaining({ width: 2, height: 1 }), { kind: 'bmp' });
  });

  it('falls back to PNG for a canvas without a format', () => {
    const store = createSessionStore({ width: 1, height: 1 });
    const codec = createFakeCodec();

    saveImage(store, codec);

    expect(codec.encode).toHaveBeenCalledWith(expect.objectContaining({ width: 1, height: 1 }), { kind: 'png' });
  });

  it('uses an explicit format and skips hidden layers', () => {
    const store = createSessionStore({ width: 1, height: 1 });
    const { dispatch } = store.getState();
    dispatch({
      type: 'apply',
      operation: { type: 'fill-rectangle', startX: 0, startY: 0, endX: 0, endY: 0, color: rgba(9, 9, 9), blend: false },
    });
    dispatch({ type: 'add-layer' });
    dispatch({ type: 'set-layer-visible', layer: 0, visible: false });
    store.getState().processFrame();
    const codec = createFakeCodec();

    const result = saveImage(store, codec, { kind: 'tiff' });

    expect(result).toEqual({ ok: true, value: new Uint8Array([0, 0, 0, 0]) });
    expect(codec.encode).toHaveBeenCalledWith(expect.anything(), { kind: 'tiff' });
  });

  it('returns an encode failure as a value', () => {
    const store = createSessionStore({ width: 1, height: 1 });
    const codec = createFakeCodec();
    const error = new Error('disk full');
    codec.encode.mockReturnValue({ ok: false, error });

    expect(saveImage(store, codec)).toEqual({ ok: false, error });
  });
});
