/**
 * Room Assembler
 *
 * Builds room records from synthetic blocks. When the rule set pairs names
 * with numbers, a room is a name and number pair: name-only blocks are
 * dropped and counted. Without a pairing rule, name-only blocks are rooms.
 */

import type { ExtractedRoom, ExtractionPolicy, SyntheticBlock } from '../../contracts/types.js';
import { generateRoomId } from '../../utils/objectIdGenerator.js';
import { createChildLogger } from '../../utils/logger.js';
import { withPolicySources } from './policy.js';

/** Confidence added to a block corroborated by a paired number */
export const PAIRED_CONFIDENCE_BONUS = 0.1;

const ROOM_SOURCES = ['text_detected', 'token_pairing', 'guide_payload'];

export interface RoomAssemblyOptions {
  policy: ExtractionPolicy;
  hasPairingRule: boolean;
  bucketSize?: number;
}

export interface RoomAssemblyResult {
  rooms: ExtractedRoom[];
  droppedNameOnly: number;
}

export function roomLabel(roomName: string, roomNumber?: string): string {
  return roomNumber ? `${roomName} ${roomNumber}` : roomName;
}

export function assembleRooms(
  pageId: string,
  blocks: readonly SyntheticBlock[],
  options: RoomAssemblyOptions
): RoomAssemblyResult {
  const rooms: ExtractedRoom[] = [];
  let droppedNameOnly = 0;

  for (const block of blocks) {
    const roomNumber = block.numberValue;
    if (!roomNumber && options.hasPairingRule) {
      droppedNameOnly++;
      continue;
    }

    const confidence = roomNumber ? Math.min(1.0, block.confidence + PAIRED_CONFIDENCE_BONUS) : block.confidence;
    const label = roomLabel(block.nameValue, roomNumber);

    rooms.push({
      id: generateRoomId(pageId, label, block.bbox, roomNumber, options.bucketSize),
      type: 'room',
      pageId,
      label,
      geometry: { type: 'bbox', bbox: block.bbox },
      confidence,
      sources: withPolicySources(ROOM_SOURCES, options.policy),
      roomName: block.nameValue,
      roomNumber,
    });
  }

  createChildLogger({ pageId }).info(
    { rooms: rooms.length, droppedNameOnly, policy: options.policy, hasPairingRule: options.hasPairingRule },
    'Rooms assembled'
  );

  return { rooms, droppedNameOnly };
}
