/**
 * @module document
 * Canvas-level types: the layered image being edited and its file metadata.
 */

import type { EditorLayer } from './layer';

/** File format selected for saving. Metadata only; encoding happens outside the core. */
export type ImageFormat =
  | { kind: 'png' }
  | { kind: 'jpeg'; quality: number }
  | { kind: 'bmp' }
  | { kind: 'tiff' };

/** The layered canvas. */
export interface EditorImage {
  /** Canvas width in pixels. */
  width: number;
  /** Canvas height in pixels. */
  height: number;
  /** Ordered layers, bottom to top. */
  layers: EditorLayer[];
  /** Path the image was opened from, or null for a new image. */
  sourcePath: string | null;
  /** Format used when saving, or null when not yet chosen. */
  format: ImageFormat | null;
}
