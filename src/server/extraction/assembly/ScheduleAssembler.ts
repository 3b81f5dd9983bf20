/**
 * Schedule Table Assembler
 */

import type { DetectedSchedule, ExtractedScheduleTable } from '../../contracts/types.js';
import { generateScheduleTableId } from '../../utils/objectIdGenerator.js';
import { createChildLogger } from '../../utils/logger.js';
import { toConfidenceLevel } from './confidence.js';

export interface ScheduleAssemblyResult {
  tables: ExtractedScheduleTable[];
  skippedLowConfidence: number;
}

export function assembleScheduleTables(
  pageId: string,
  candidates: readonly DetectedSchedule[],
  options: { bucketSize?: number } = {}
): ScheduleAssemblyResult {
  const tables: ExtractedScheduleTable[] = [];
  let skippedLowConfidence = 0;

  for (const candidate of candidates) {
    if (toConfidenceLevel(candidate.confidence) === 'low') {
      skippedLowConfidence++;
      continue;
    }

    const label = candidate.title || candidate.scheduleType;
    tables.push({
      id: generateScheduleTableId(pageId, label, candidate.bbox, candidate.scheduleType, options.bucketSize),
      type: 'schedule_table',
      pageId,
      label,
      geometry: { type: 'bbox', bbox: candidate.bbox },
      confidence: candidate.confidence,
      sources: ['table_detected'],
      scheduleType: candidate.scheduleType,
      headers: [...candidate.headers],
      rows: candidate.rows.map((cells, rowIndex) => ({ rowIndex, cells: [...cells] })),
    });
  }

  createChildLogger({ pageId }).info({ tables: tables.length, skippedLowConfidence }, 'Schedule tables assembled');
  return { tables, skippedLowConfidence };
}
