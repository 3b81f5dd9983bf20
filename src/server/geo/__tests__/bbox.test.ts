import { describe, it, expect } from 'vitest';
import {
  assertValidBbox,
  bboxCenter,
  bboxToCorners,
  centerDistance,
  computeIou,
  isValidBbox,
  unionBbox,
} from '../bbox.js';
import { InvalidBboxError } from '../../types/errors.js';

describe('isValidBbox', () => {
  it('accepts finite boxes with positive dimensions', () => {
    expect(isValidBbox([1, 2, 3, 4])).toBe(true);
    expect(isValidBbox([-5, -5, 1, 1])).toBe(true);
  });

  it('rejects degenerate, non-finite and short boxes', () => {
    expect(isValidBbox([0, 0, 0, 5])).toBe(false);
    expect(isValidBbox([0, 0, 5, -1])).toBe(false);
    expect(isValidBbox([0, NaN, 5, 5])).toBe(false);
    expect(isValidBbox([0, 0, Infinity, 5])).toBe(false);
    expect(isValidBbox([0, 0, 5])).toBe(false);
  });

  it('assertValidBbox throws InvalidBboxError', () => {
    expect(() => assertValidBbox([0, 0, 0, 0], 'token')).toThrow(InvalidBboxError);
    expect(() => assertValidBbox([0, 0, 1, 1])).not.toThrow();
  });
});

describe('computeIou', () => {
  it('computes overlap ratio', () => {
    // intersection 50, union 150
    expect(computeIou([0, 0, 10, 10], [5, 0, 10, 10])).toBeCloseTo(1 / 3, 10);
  });

  it('is 1 for identical boxes', () => {
    expect(computeIou([3, 4, 10, 20], [3, 4, 10, 20])).toBe(1);
  });

  it('is 0 for disjoint or edge-touching boxes', () => {
    expect(computeIou([0, 0, 10, 10], [50, 50, 10, 10])).toBe(0);
    expect(computeIou([0, 0, 10, 10], [10, 0, 5, 5])).toBe(0);
  });
});

describe('box helpers', () => {
  it('unions boxes', () => {
    expect(unionBbox([100, 100, 50, 20], [100, 130, 30, 20])).toEqual([100, 100, 50, 50]);
    expect(unionBbox([10, 10, 5, 5])).toEqual([10, 10, 5, 5]);
    expect(unionBbox([10, 10, 5, 5], [0, 20, 2, 2], [30, 0, 1, 1])).toEqual([0, 0, 31, 22]);
  });

  it('measures center distance', () => {
    expect(bboxCenter([100, 100, 50, 20])).toEqual({ cx: 125, cy: 110 });
    expect(centerDistance([100, 100, 50, 20], [100, 130, 30, 20])).toBeCloseTo(Math.sqrt(1000), 10);
  });

  it('converts to corners', () => {
    expect(bboxToCorners([100, 80, 60, 20])).toEqual([100, 80, 160, 100]);
  });
});
