/**
 * @layerpaint/app
 *
 * Host-side session: tool and color state, the per-frame command queue,
 * stroke, shape and selection builders, and the codec boundary.
 *
 * @packageDocumentation
 */

export { createSessionStore } from './session-store';
export type { SessionOptions, SessionState, SessionStore } from './session-store';
export { StrokeBuilder, isStrokeTool } from './stroke-builder';
export type { StrokeSettings, StrokeTool } from './stroke-builder';
export { ShapeBuilder, bucketFillAt, isShapeTool } from './shape-builder';
export type { ShapeSettings, ShapeTool } from './shape-builder';
export {
  copySelection,
  cutSelection,
  deleteSelection,
  moveSelection,
  pasteImage,
  rotateSelection,
  scaleSelection,
} from './selection-builder';
export type { SelectionCut, SelectionEdit } from './selection-builder';
export { DEFAULT_JPEG_QUALITY, formatFromPath, openImage, saveImage } from './image-io';
