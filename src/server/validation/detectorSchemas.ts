/**
 * Detector Output Validation Schemas
 *
 * Model-based detectors (text regions, door symbols, schedule tables) return
 * loosely typed JSON. Each item is validated on its own; invalid items are
 * dropped and counted, valid ones are converted to the typed shapes.
 */

import { z } from 'zod';
import type { Bbox, DetectedDoor, DetectedSchedule, DetectedTextRegion } from '../contracts/types.js';
import { isValidBbox } from '../geo/bbox.js';

export const bboxSchema = z
  .array(z.number())
  .length(4)
  .refine(isValidBbox, { message: 'bbox must be [x, y, width, height] with positive dimensions' })
  .transform((b): Bbox => [b[0], b[1], b[2], b[3]]);

const confidenceSchema = z.number().min(0).max(1);

export const detectedTextRegionSchema = z.object({
  bbox: bboxSchema,
  text: z.string().transform((t) => t.trim()).pipe(z.string().min(1)),
  confidence: confidenceSchema.default(0.5),
});

export const detectedDoorSchema = z.object({
  bbox: bboxSchema,
  door_number: z.string().trim().min(1).nullish(),
  door_type: z.string().nullish(),
  confidence: confidenceSchema.default(0.5),
});

export const detectedScheduleSchema = z.object({
  schedule_type: z.string().trim().min(1).default('other'),
  title: z.string().nullish(),
  bbox: bboxSchema,
  headers: z.array(z.string()).default([]),
  rows: z.array(z.array(z.string())).default([]),
  confidence: confidenceSchema.default(0.5),
});

export interface DetectorParseResult<T> {
  items: T[];
  invalidCount: number;
}

/**
 * Accept either a bare array or an object wrapping the array under `key`
 * ({"doors": [...]}, {"schedules": [...]}) as detectors return both shapes.
 */
function unwrapItems(raw: unknown, key: string): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (typeof raw === 'object' && raw !== null && key in raw) {
    const wrapped: unknown = Reflect.get(raw, key);
    if (Array.isArray(wrapped)) return wrapped;
  }
  return [];
}

function parseItems<O, T>(
  raw: unknown,
  key: string,
  schema: z.ZodType<O, z.ZodTypeDef, unknown>,
  convert: (item: O) => T
): DetectorParseResult<T> {
  const items: T[] = [];
  let invalidCount = 0;
  for (const candidate of unwrapItems(raw, key)) {
    const parsed = schema.safeParse(candidate);
    if (parsed.success) {
      items.push(convert(parsed.data));
    } else {
      invalidCount++;
    }
  }
  return { items, invalidCount };
}

export function parseDetectedTextRegions(raw: unknown): DetectorParseResult<DetectedTextRegion> {
  return parseItems(raw, 'regions', detectedTextRegionSchema, (item) => ({
    bbox: item.bbox,
    text: item.text,
    confidence: item.confidence,
  }));
}

export function parseDetectedDoors(raw: unknown): DetectorParseResult<DetectedDoor> {
  return parseItems(raw, 'doors', detectedDoorSchema, (item) => ({
    bbox: item.bbox,
    doorNumber: item.door_number ?? undefined,
    doorType: item.door_type ?? undefined,
    confidence: item.confidence,
  }));
}

export function parseDetectedSchedules(raw: unknown): DetectorParseResult<DetectedSchedule> {
  return parseItems(raw, 'schedules', detectedScheduleSchema, (item) => ({
    scheduleType: item.schedule_type,
    title: item.title ?? undefined,
    bbox: item.bbox,
    headers: item.headers,
    rows: item.rows,
    confidence: item.confidence,
  }));
}
