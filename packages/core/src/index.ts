/**
 * @layerpaint/core
 *
 * Raster algorithms, the reversible operation algebra, the layered canvas
 * model and the undo/redo engine.
 *
 * @packageDocumentation
 */

// Colors, rectangles and pixel storage
export { TRANSPARENT, rgba, colorsEqual, blendColors, interpolateColors, withCoverage, colorDifference } from './color';
export { rectFromCorners, clipRect, intersectRects, rectContains, includePixel, unionRects, rectsEqual } from './rect';
export { RgbaBuffer, imagePixel } from './rgba-buffer';
export { MaskedSurface, inBounds, putColor, readRegion, canWriteTo, clipToWritable } from './surface';

// Raster algorithms
export {
  bresenhamLine,
  wuLine,
  sweptLine,
  midpointCircle,
  antiAliasedCircle,
  floodFill,
  isFillable,
  gradientFactor,
  resampleImage,
  rotateImage,
  bilinearSample,
} from './raster';
export type { PlotFn, CoveragePlotFn, SweepPlotFn } from './raster';

// Operation algebra
export { SparseImageImpl, OptionalImageImpl } from './payload';
export {
  applyOperation,
  containsMarker,
  removeMarkers,
  markerMessage,
  describeOperation,
  scaledSize,
  SparseWriter,
} from './operations';

// Canvas model
export {
  createEditorImage,
  editorImageFromBuffer,
  createLayer,
  flattenImage,
  snapshotLayers,
  resampledLayers,
  resizedCanvasLayers,
  pickColor,
  layerAt,
  firstLiveLayer,
} from './editor-image';
export type { CreateEditorImageOptions } from './editor-image';
export {
  ApplyEffects,
  applyEditorOperation,
  containsEditorMarker,
  describeEditorOperation,
  emptyInverse,
  isLayerOperation,
} from './editor-operations';
export type { EditorState } from './editor-operations';

// Undo/redo engine
export { EditorHistoryImpl, DEFAULT_MAX_DEPTH } from './history';
export { EditorImpl } from './editor';
export type { EditorOptions } from './editor';

// Event bus and command queue
export { EventBusImpl } from './event-bus';
export { CommandQueueImpl } from './command-queue';
