/**
 * @module operations
 * The operation algebra: apply any {@link Operation} and get its inverse.
 */

export { applyOperation } from './apply';
export { containsMarker, removeMarkers, markerMessage, describeOperation } from './markers';
export { scaledSize } from './region';
export { SparseWriter } from './sparse';
