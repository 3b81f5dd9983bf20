/**
 * Bbox Utility
 *
 * Geometry helpers over [x, y, width, height] pixel boxes.
 */

import type { Bbox } from '../contracts/types.js';
import { InvalidBboxError } from '../types/errors.js';

export function isValidBbox(bbox: readonly number[]): boolean {
  if (bbox.length !== 4) return false;
  const [x, y, w, h] = bbox;
  return (
    Number.isFinite(x) && Number.isFinite(y) &&
    Number.isFinite(w) && Number.isFinite(h) &&
    w > 0 && h > 0
  );
}

/**
 * @throws {InvalidBboxError} when the box has non-finite values or non-positive dimensions
 */
export function assertValidBbox(bbox: readonly number[], label = 'bbox'): asserts bbox is Bbox {
  if (!isValidBbox(bbox)) {
    throw new InvalidBboxError(bbox, label);
  }
}

export function bboxCenter(bbox: Bbox): { cx: number; cy: number } {
  const [x, y, w, h] = bbox;
  return { cx: x + w / 2, cy: y + h / 2 };
}

/**
 * Euclidean distance between box centers
 */
export function centerDistance(a: Bbox, b: Bbox): number {
  const ca = bboxCenter(a);
  const cb = bboxCenter(b);
  return Math.hypot(ca.cx - cb.cx, ca.cy - cb.cy);
}

/**
 * Intersection over Union; 0 for disjoint or degenerate boxes
 */
export function computeIou(a: Bbox, b: Bbox): number {
  const [ax, ay, aw, ah] = a;
  const [bx, by, bw, bh] = b;

  const xi = Math.max(ax, bx);
  const yi = Math.max(ay, by);
  const xiMax = Math.min(ax + aw, bx + bw);
  const yiMax = Math.min(ay + ah, by + bh);

  if (xi >= xiMax || yi >= yiMax) {
    return 0;
  }

  const intersection = (xiMax - xi) * (yiMax - yi);
  const union = aw * ah + bw * bh - intersection;
  if (union <= 0) {
    return 0;
  }
  return intersection / union;
}

/**
 * Smallest box containing every input box
 */
export function unionBbox(first: Bbox, ...rest: Bbox[]): Bbox {
  let minX = first[0];
  let minY = first[1];
  let maxX = first[0] + first[2];
  let maxY = first[1] + first[3];

  for (const [x, y, w, h] of rest) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x + w);
    maxY = Math.max(maxY, y + h);
  }

  return [minX, minY, maxX - minX, maxY - minY];
}

/**
 * [x, y, w, h] -> [x1, y1, x2, y2]
 */
export function bboxToCorners(bbox: Bbox): [number, number, number, number] {
  const [x, y, w, h] = bbox;
  return [x, y, x + w, y + h];
}
