/**
 * @module operations/markers
 * Stroke markers and operation labels.
 */

import type { MarkerKind, Operation, OperationType } from '@layerpaint/types';

/** Whether `op` is, or contains, a marker (of `kind`, when given). */
export function containsMarker(op: Operation, kind?: MarkerKind): boolean {
  switch (op.type) {
    case 'marker':
      return kind === undefined || op.marker === kind;
    case 'sequential':
      return op.operations.some((child) => containsMarker(child, kind));
    default:
      return false;
  }
}

/**
 * Copy of `op` without any markers. A bare marker becomes `empty`; nested
 * sequences are cleaned recursively and dropped once empty.
 */
export function removeMarkers(op: Operation): Operation {
  switch (op.type) {
    case 'marker':
      return { type: 'empty' };
    case 'sequential': {
      const operations = op.operations
        .map(removeMarkers)
        .filter((child) => child.type !== 'empty' && !(child.type === 'sequential' && child.operations.length === 0));
      return { type: 'sequential', message: op.message, operations };
    }
    default:
      return op;
  }
}

/** Label of the first marker in `op` that has one. */
export function markerMessage(op: Operation): string | null {
  if (op.type === 'marker') {
    return op.message;
  }
  if (op.type === 'sequential') {
    for (const child of op.operations) {
      const message = markerMessage(child);
      if (message !== null) {
        return message;
      }
    }
  }
  return null;
}

const LABELS = {
  empty: 'Nothing',
  marker: 'Stroke marker',
  sequential: 'Edit',
  'sparse-image': 'Restore pixels',
  'optional-image': 'Restore pixels',
  'set-image': 'Paste image',
  'set-scaled-image': 'Paste scaled image',
  'set-rotated-image': 'Paste rotated image',
  'fill-rectangle': 'Fill rectangle',
  'color-gradient': 'Gradient',
  'set-pixel': 'Set pixel',
  block: 'Block',
  line: 'Line',
  'pencil-stroke': 'Pencil',
  rectangle: 'Rectangle',
  circle: 'Circle',
  'fill-circle': 'Fill circle',
  'bucket-fill': 'Bucket fill',
} satisfies Record<OperationType, string>;

/**
 * Human-readable label for history listings.
 * Messages win; an unlabeled sequence takes the label of its first real child.
 */
export function describeOperation(op: Operation): string {
  if (op.type === 'marker' && op.message !== null) {
    return op.message;
  }
  if (op.type === 'sequential') {
    if (op.message !== null) {
      return op.message;
    }
    const labeled = markerMessage(op);
    if (labeled !== null) {
      return labeled;
    }
    const first = op.operations.find((child) => child.type !== 'marker' && child.type !== 'empty');
    return first ? describeOperation(first) : LABELS.sequential;
  }
  return LABELS[op.type];
}
