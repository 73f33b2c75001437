import { describe, it, expect } from 'vitest';
import { gradientFactor } from './gradient';

describe('gradientFactor', () => {
  it('projects onto the axis for linear gradients', () => {
    expect(gradientFactor('linear', 0, 0, 4, 0, 2, 0)).toBe(0.5);
    expect(gradientFactor('linear', 0, 0, 4, 0, 2, 7)).toBe(0.5);
    expect(gradientFactor('linear', 0, 0, 0, 10, 3, 1)).toBe(0.1);
  });

  it('clamps outside the axis', () => {
    expect(gradientFactor('linear', 2, 0, 6, 0, 0, 0)).toBe(0);
    expect(gradientFactor('linear', 2, 0, 6, 0, 9, 0)).toBe(1);
    expect(gradientFactor('radial', 0, 0, 2, 0, 5, 5)).toBe(1);
  });

  it('uses distance from the start for radial gradients', () => {
    expect(gradientFactor('radial', 0, 0, 10, 0, 3, 4)).toBe(0.5);
    expect(gradientFactor('radial', 5, 5, 5, 15, 5, 5)).toBe(0);
  });

  it('returns 0 everywhere for a zero-length axis', () => {
    expect(gradientFactor('linear', 3, 3, 3, 3, 10, 10)).toBe(0);
    expect(gradientFactor('radial', 3, 3, 3, 3, 0, 0)).toBe(0);
  });
});
