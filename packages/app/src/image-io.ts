/**
 * @module image-io
 * Opening and saving through an {@link ImageCodec}.
 *
 * The codec does the file-format work; this module maps paths to formats,
 * queues decoded images into a session and flattens the canvas for saving.
 * Failures come back as `{ ok: false }` results and are never thrown.
 */

import type { CodecResult, EditorImage, ImageCodec, ImageFormat, Size } from '@layerpaint/types';
import { editorImageFromBuffer } from '@layerpaint/core';
import type { SessionStore } from './session-store';

/** JPEG quality used when the format comes from a file extension. */
export const DEFAULT_JPEG_QUALITY = 90;

/**
 * Map a file path to a format by its extension (case-insensitive).
 * @returns The format, or null for an unknown extension.
 */
export function formatFromPath(path: string): ImageFormat | null {
  const dot = path.lastIndexOf('.');
  const separator = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  if (dot < 0 || dot < separator) {
    return null;
  }
  switch (path.slice(dot + 1).toLowerCase()) {
    case 'png':
      return { kind: 'png' };
    case 'jpg':
    case 'jpeg':
      return { kind: 'jpeg', quality: DEFAULT_JPEG_QUALITY };
    case 'bmp':
      return { kind: 'bmp' };
    case 'tif':
    case 'tiff':
      return { kind: 'tiff' };
    default:
      return null;
  }
}

/**
 * Decode `bytes` and queue the result as the session's new canvas.
 * The canvas is swapped, history cleared and the selection dropped on the
 * next frame, after the commands already queued.
 *
 * @returns The decoded size, or the failure.
 */
export function openImage(
  session: SessionStore,
  codec: ImageCodec,
  bytes: Uint8Array,
  path: string,
): CodecResult<Size> {
  const format = formatFromPath(path);
  if (!format) {
    return { ok: false, error: new Error(`Unsupported image format: ${path}`) };
  }
  const decoded = codec.decode(bytes, format);
  if (!decoded.ok) {
    return decoded;
  }

  let image: EditorImage;
  try {
    image = editorImageFromBuffer(decoded.value, path, format);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }

  session.getState().dispatch({ type: 'set-image', image });
  return { ok: true, value: { width: image.width, height: image.height } };
}

/**
 * Flatten the visible layers and encode them.
 *
 * @param format - Target format. Defaults to the canvas format, then PNG.
 * @returns The encoded bytes, or the failure.
 */
export function saveImage(
  session: SessionStore,
  codec: ImageCodec,
  format?: ImageFormat,
): CodecResult<Uint8Array> {
  const { editor } = session.getState();
  const target = format ?? editor.image.format ?? { kind: 'png' };
  return codec.encode(editor.flatten(), target);
}
