export { SparseImageImpl } from './sparse-image';
export { OptionalImageImpl } from './optional-image';
