/**
 * @module raster/line
 * Line rasterizers: integer Bresenham, Wu's anti-aliased line and the
 * offset sweep used for thick anti-aliased strokes.
 *
 * @see https://en.wikipedia.org/wiki/Bresenham%27s_line_algorithm
 * @see https://en.wikipedia.org/wiki/Xiaolin_Wu%27s_line_algorithm
 */

/** Receives one rasterized pixel. */
export type PlotFn = (x: number, y: number) => void;

/** Receives one pixel with its coverage in (0, 1]. */
export type CoveragePlotFn = (x: number, y: number, coverage: number) => void;

/** Receives one pixel of a swept stroke; `outer` marks the outermost offsets. */
export type SweepPlotFn = (x: number, y: number, coverage: number, outer: boolean) => void;

/**
 * Integer line between two inclusive endpoints.
 *
 * Always walks from the endpoint with the lower coordinate on the dominant
 * axis, so `line(a, b)` and `line(b, a)` plot the same pixel set.
 */
export function bresenhamLine(x1: number, y1: number, x2: number, y2: number, plot: PlotFn): void {
  const dx = x2 - x1;
  const dy = y2 - y1;
  const dx1 = Math.abs(dx);
  const dy1 = Math.abs(dy);
  // Same-sign deltas step the minor axis forward, mixed signs step it back.
  const minorStep = (dx < 0 && dy < 0) || (dx > 0 && dy > 0) ? 1 : -1;

  if (dy1 <= dx1) {
    let px = 2 * dy1 - dx1;
    let x = dx >= 0 ? x1 : x2;
    let y = dx >= 0 ? y1 : y2;
    const endX = dx >= 0 ? x2 : x1;
    plot(x, y);

    while (x < endX) {
      x++;
      if (px < 0) {
        px += 2 * dy1;
      } else {
        y += minorStep;
        px += 2 * (dy1 - dx1);
      }
      plot(x, y);
    }
  } else {
    let py = 2 * dx1 - dy1;
    let x = dy >= 0 ? x1 : x2;
    let y = dy >= 0 ? y1 : y2;
    const endY = dy >= 0 ? y2 : y1;
    plot(x, y);

    while (y < endY) {
      y++;
      if (py <= 0) {
        py += 2 * dx1;
      } else {
        x += minorStep;
        py += 2 * (dx1 - dy1);
      }
      plot(x, y);
    }
  }
}

function fpart(v: number): number {
  return v - Math.floor(v);
}

function rfpart(v: number): number {
  return 1 - fpart(v);
}

/**
 * Wu's anti-aliased line in floating point.
 *
 * Each endpoint column gets two partially covered pixels weighted by the
 * endpoint's horizontal gap; every interior column gets the two pixels
 * straddling the interpolated y-intercept. Zero-coverage pixels are skipped.
 */
export function wuLine(x0: number, y0: number, x1: number, y1: number, plot: CoveragePlotFn): void {
  if (x0 === x1 && y0 === y1) {
    plot(Math.round(x0), Math.round(y0), 1);
    return;
  }

  const steep = Math.abs(y1 - y0) > Math.abs(x1 - x0);
  if (steep) {
    [x0, y0] = [y0, x0];
    [x1, y1] = [y1, x1];
  }
  if (x0 > x1) {
    [x0, x1] = [x1, x0];
    [y0, y1] = [y1, y0];
  }

  const emit = (x: number, y: number, coverage: number): void => {
    if (coverage <= 0) {
      return;
    }
    if (steep) {
      plot(y, x, coverage);
    } else {
      plot(x, y, coverage);
    }
  };

  const dx = x1 - x0;
  const dy = y1 - y0;
  const gradient = dx === 0 ? 1 : dy / dx;

  // First endpoint
  let xEnd = Math.floor(x0 + 0.5);
  let yEnd = y0 + gradient * (xEnd - x0);
  let xGap = rfpart(x0 + 0.5);
  const xPixel1 = xEnd;
  const yPixel1 = Math.floor(yEnd);
  emit(xPixel1, yPixel1, rfpart(yEnd) * xGap);
  emit(xPixel1, yPixel1 + 1, fpart(yEnd) * xGap);
  let intery = yEnd + gradient;

  // Second endpoint
  xEnd = Math.floor(x1 + 0.5);
  yEnd = y1 + gradient * (xEnd - x1);
  xGap = fpart(x1 + 0.5);
  const xPixel2 = xEnd;
  const yPixel2 = Math.floor(yEnd);
  emit(xPixel2, yPixel2, rfpart(yEnd) * xGap);
  emit(xPixel2, yPixel2 + 1, fpart(yEnd) * xGap);

  for (let x = xPixel1 + 1; x < xPixel2; x++) {
    const y = Math.floor(intery);
    emit(x, y, rfpart(intery));
    emit(x, y + 1, fpart(intery));
    intery += gradient;
  }
}

/**
 * Thick anti-aliased line: Wu lines swept along the perpendicular from offset
 * 0 out to `halfWidth` on each side. Inner offsets are emitted first with
 * `outer = false`; the two outermost offsets follow with `outer = true`.
 */
export function sweptLine(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  halfWidth: number,
  plot: SweepPlotFn,
): void {
  const length = Math.hypot(x1 - x0, y1 - y0);
  const nx = length === 0 ? 0 : -(y1 - y0) / length;
  const ny = length === 0 ? 1 : (x1 - x0) / length;
  const width = Math.max(0, Math.floor(halfWidth));

  const sweep = (offset: number, outer: boolean): void => {
    wuLine(x0 + nx * offset, y0 + ny * offset, x1 + nx * offset, y1 + ny * offset, (x, y, coverage) =>
      plot(x, y, coverage, outer),
    );
  };

  for (let offset = 0; offset < width; offset++) {
    sweep(offset, false);
    if (offset > 0) {
      sweep(-offset, false);
    }
  }
  sweep(width, true);
  if (width > 0) {
    sweep(-width, true);
  }
}
