/**
 * @layerpaint/types
 *
 * Shared type definitions for the layerpaint packages.
 * Interfaces and type aliases only; nothing here exists at run time.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Point, Rect, Size } from './common';

// Pixel surface capability
export type { PixelBuffer, PixelSurface, RgbaImage } from './surface';

// Operation algebra
export type {
  BlockOperation,
  BucketFillOperation,
  CircleOperation,
  ColorGradientOperation,
  EmptyOperation,
  FillCircleOperation,
  FillRectangleOperation,
  GradientType,
  LineOperation,
  MarkerKind,
  MarkerOperation,
  Operation,
  OperationType,
  OptionalImage,
  OptionalImageOperation,
  PencilStrokeOperation,
  RectangleOperation,
  SequentialOperation,
  SetImageOperation,
  SetPixelOperation,
  SetRotatedImageOperation,
  SetScaledImageOperation,
  SparseImage,
  SparseImageOperation,
  SparsePixel,
} from './operation';

// Layers & canvas
export type { EditorLayer, LayerState } from './layer';
export type { EditorImage, ImageFormat } from './document';

// Canvas-level edits & history
export type {
  AddLayerEditorOperation,
  DuplicateLayerEditorOperation,
  EditorHistory,
  EditorOperation,
  HistoryEntry,
  LayerEditorOperation,
  LayerSnapshot,
  RedoEntry,
  ReplaceImageEditorOperation,
  SequentialEditorOperation,
  SetActiveLayerEditorOperation,
  SetLayerStateEditorOperation,
} from './command';

// Events
export type { EventBus, EventCallback, EventMap } from './events';

// Command intents
export type { CommandQueue, EditorCommand, ToolKind } from './intent';

// Codec boundary
export type { CodecResult, ImageCodec } from './codec';
