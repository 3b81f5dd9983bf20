/**
 * Object ID Generator
 *
 * Deterministic, content-addressed identifiers for extracted objects.
 * Re-extracting the same object yields the same ID, so results can be
 * upserted without a separate allocator.
 *
 * Format: "{type}_{sha256(pageId|type|normalizedLabel|bucketedCorners[|qualifier])[0:16]}"
 */

import { createHash } from 'crypto';
import type { Bbox, ObjectType } from '../contracts/types.js';
import { bboxToCorners } from '../geo/bbox.js';

export const DEFAULT_ID_BUCKET_SIZE_PX = 50;

/**
 * Normalize a label for hashing:
 * - Lowercase and trim
 * - Drop everything that is not a letter, digit or whitespace
 * - Collapse whitespace runs to a single space
 */
export function normalizeLabel(label: string): string {
  if (!label) {
    return '';
  }
  return label
    .toLowerCase()
    .trim()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ');
}

/**
 * Floor a coordinate to its bucket so sub-bucket jitter maps to one value
 */
export function bucketCoordinate(value: number, bucketSize: number = DEFAULT_ID_BUCKET_SIZE_PX): number {
  return Math.floor(value / bucketSize) * bucketSize;
}

/**
 * Bucket the corners [x1, y1, x2, y2] of a [x, y, w, h] box
 */
export function bucketCorners(
  bbox: Bbox,
  bucketSize: number = DEFAULT_ID_BUCKET_SIZE_PX
): [number, number, number, number] {
  const [x1, y1, x2, y2] = bboxToCorners(bbox);
  return [
    bucketCoordinate(x1, bucketSize),
    bucketCoordinate(y1, bucketSize),
    bucketCoordinate(x2, bucketSize),
    bucketCoordinate(y2, bucketSize),
  ];
}

export interface ObjectIdOptions {
  qualifier?: string;
  bucketSize?: number;
}

/**
 * Generate a deterministic ID for an extracted object
 *
 * @param pageId - Page where the object was found
 * @param objectType - Prefix and hash component
 * @param label - Printed label; normalized before hashing
 * @param bbox - Object box [x, y, w, h]; corners are bucketed before hashing
 * @returns e.g. "room_1a2b3c4d5e6f7890"
 */
export function generateObjectId(
  pageId: string,
  objectType: ObjectType,
  label: string,
  bbox: Bbox,
  options: ObjectIdOptions = {}
): string {
  const hashParts = [
    pageId,
    objectType,
    normalizeLabel(label),
    bucketCorners(bbox, options.bucketSize).join(','),
  ];
  if (options.qualifier) {
    hashParts.push(options.qualifier);
  }

  const digest = createHash('sha256').update(hashParts.join('|'), 'utf8').digest('hex');
  // First 8 bytes of the digest
  return `${objectType}_${digest.substring(0, 16)}`;
}

export function generateRoomId(
  pageId: string,
  label: string,
  bbox: Bbox,
  roomNumber?: string,
  bucketSize?: number
): string {
  return generateObjectId(pageId, 'room', label, bbox, { qualifier: roomNumber, bucketSize });
}

export function generateDoorId(
  pageId: string,
  label: string,
  bbox: Bbox,
  doorNumber?: string,
  bucketSize?: number
): string {
  return generateObjectId(pageId, 'door', label, bbox, { qualifier: doorNumber, bucketSize });
}

export function generateScheduleTableId(
  pageId: string,
  label: string,
  bbox: Bbox,
  scheduleType?: string,
  bucketSize?: number
): string {
  return generateObjectId(pageId, 'schedule_table', label, bbox, { qualifier: scheduleType, bucketSize });
}
