/**
 * @module color
 * Color helpers shared by the raster algorithms and the canvas model.
 * All channels, alpha included, are integers in [0, 255].
 */

import type { Color } from '@layerpaint/types';

/** Fully transparent black. */
export const TRANSPARENT: Readonly<Color> = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Build a color; alpha defaults to opaque. */
export function rgba(r: number, g: number, b: number, a = 255): Color {
  return { r, g, b, a };
}

/** Channel-wise equality. */
export function colorsEqual(c1: Color, c2: Color): boolean {
  return c1.r === c2.r && c1.g === c2.g && c1.b === c2.b && c1.a === c2.a;
}

/**
 * Source-over compositing of `fg` onto `bg`.
 * An opaque foreground replaces the background exactly.
 */
export function blendColors(bg: Color, fg: Color): Color {
  if (fg.a >= 255) {
    return { r: fg.r, g: fg.g, b: fg.b, a: 255 };
  }
  const aFg = fg.a / 255;
  const aBg = bg.a / 255;
  const aOut = aFg + aBg * (1 - aFg);

  if (aOut === 0) {
    return { r: 0, g: 0, b: 0, a: 0 };
  }

  return {
    r: Math.round((fg.r * aFg + bg.r * aBg * (1 - aFg)) / aOut),
    g: Math.round((fg.g * aFg + bg.g * aBg * (1 - aFg)) / aOut),
    b: Math.round((fg.b * aFg + bg.b * aBg * (1 - aFg)) / aOut),
    a: Math.round(aOut * 255),
  };
}

/** Linear interpolation between two colors; `t` is clamped to [0, 1]. */
export function interpolateColors(c1: Color, c2: Color, t: number): Color {
  const tClamped = clamp(t, 0, 1);
  return {
    r: Math.round(c1.r + (c2.r - c1.r) * tClamped),
    g: Math.round(c1.g + (c2.g - c1.g) * tClamped),
    b: Math.round(c1.b + (c2.b - c1.b) * tClamped),
    a: Math.round(c1.a + (c2.a - c1.a) * tClamped),
  };
}

/** Scale a color's alpha by a coverage factor in [0, 1]. */
export function withCoverage(color: Color, coverage: number): Color {
  return { r: color.r, g: color.g, b: color.b, a: Math.round(color.a * clamp(coverage, 0, 1)) };
}

/**
 * Mean absolute per-channel difference, normalized to [0, 1].
 * Used as the flood fill tolerance metric.
 */
export function colorDifference(c1: Color, c2: Color): number {
  const sum =
    Math.abs(c1.r - c2.r) + Math.abs(c1.g - c2.g) + Math.abs(c1.b - c2.b) + Math.abs(c1.a - c2.a);
  return sum / (4 * 255);
}
