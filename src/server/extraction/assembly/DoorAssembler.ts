/**
 * Door Assembler
 *
 * Doors come from two places: tokens classified under the door role, and
 * candidates returned by an external door symbol detector.
 */

import type { DetectedDoor, DoorType, ExtractedDoor, ExtractionPolicy, TextToken } from '../../contracts/types.js';
import { generateDoorId } from '../../utils/objectIdGenerator.js';
import { createChildLogger } from '../../utils/logger.js';
import { toConfidenceLevel } from './confidence.js';
import { withPolicySources } from './policy.js';

export const DEFAULT_DOOR_ROLE = 'door_number';

const DOOR_TYPES: readonly DoorType[] = ['single', 'double', 'sliding', 'revolving', 'unknown'];

export function parseDoorType(value: string | undefined): DoorType {
  const normalized = value?.trim().toLowerCase();
  return DOOR_TYPES.find((doorType) => doorType === normalized) ?? 'unknown';
}

export function doorLabel(doorType: DoorType, doorNumber?: string): string {
  return doorNumber || `door_${doorType}`;
}

export function assembleDoorsFromTokens(
  pageId: string,
  tokens: readonly TextToken[],
  options: { policy: ExtractionPolicy; bucketSize?: number }
): ExtractedDoor[] {
  return tokens.map((token): ExtractedDoor => {
    const doorNumber = token.text.trim();
    return {
      id: generateDoorId(pageId, doorNumber, token.bbox, doorNumber, options.bucketSize),
      type: 'door',
      pageId,
      label: doorNumber,
      geometry: { type: 'bbox', bbox: token.bbox },
      confidence: token.confidence,
      sources: withPolicySources(['text_detected', 'guide_payload'], options.policy),
      doorNumber,
      doorType: 'unknown',
    };
  });
}

export interface DetectedDoorAssemblyResult {
  doors: ExtractedDoor[];
  skippedLowConfidence: number;
}

/**
 * Low-confidence candidates are skipped
 */
export function assembleDetectedDoors(
  pageId: string,
  candidates: readonly DetectedDoor[],
  options: { bucketSize?: number } = {}
): DetectedDoorAssemblyResult {
  const log = createChildLogger({ pageId });
  const doors: ExtractedDoor[] = [];
  let skippedLowConfidence = 0;

  for (const candidate of candidates) {
    if (toConfidenceLevel(candidate.confidence) === 'low') {
      skippedLowConfidence++;
      log.debug({ confidence: candidate.confidence }, 'Skipping low confidence door');
      continue;
    }

    const doorType = parseDoorType(candidate.doorType);
    const label = doorLabel(doorType, candidate.doorNumber);
    doors.push({
      id: generateDoorId(pageId, label, candidate.bbox, candidate.doorNumber, options.bucketSize),
      type: 'door',
      pageId,
      label,
      geometry: { type: 'bbox', bbox: candidate.bbox },
      confidence: candidate.confidence,
      sources: ['symbol_detected'],
      doorNumber: candidate.doorNumber,
      doorType,
    });
  }

  log.info({ doors: doors.length, skippedLowConfidence }, 'Detected doors assembled');
  return { doors, skippedLowConfidence };
}
