/**
 * @module raster
 * Surface-independent rasterization algorithms.
 */

export { bresenhamLine, wuLine, sweptLine } from './line';
export type { PlotFn, CoveragePlotFn, SweepPlotFn } from './line';
export { midpointCircle, antiAliasedCircle } from './circle';
export { floodFill, isFillable } from './flood-fill';
export { gradientFactor } from './gradient';
export { resampleImage, rotateImage, bilinearSample } from './resample';
