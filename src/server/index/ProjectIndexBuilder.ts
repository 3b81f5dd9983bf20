/**
 * Project Index Builder
 *
 * One pass over a project's objects builds three reverse maps: room number,
 * room name and object type to object ids. The index is rebuilt wholesale on
 * every run; there is no incremental merge.
 */

import type { ExtractedObject, ProjectIndex } from '../contracts/types.js';
import { logger } from '../utils/logger.js';
import { appendTo, toRecord } from '../utils/records.js';

export function buildProjectIndex(
  projectId: string,
  objects: readonly ExtractedObject[],
  generatedAt: Date = new Date()
): ProjectIndex {
  const roomsByNumber = new Map<string, string[]>();
  const roomsByName = new Map<string, string[]>();
  const objectsByType = new Map<string, string[]>();

  for (const object of objects) {
    appendTo(objectsByType, object.type, object.id);

    if (object.type === 'room') {
      if (object.roomNumber) appendTo(roomsByNumber, object.roomNumber, object.id);
      if (object.roomName) appendTo(roomsByName, object.roomName, object.id);
    }
  }

  const index: ProjectIndex = {
    projectId,
    generatedAt,
    roomsByNumber: toRecord(roomsByNumber),
    roomsByName: toRecord(roomsByName),
    objectsByType: toRecord(objectsByType),
  };

  logger.info(
    {
      projectId,
      objects: objects.length,
      roomNumbers: roomsByNumber.size,
      roomNames: roomsByName.size,
      objectTypes: objectsByType.size,
    },
    'Project index built'
  );

  return index;
}

export function emptyProjectIndex(projectId: string, generatedAt: Date = new Date()): ProjectIndex {
  return { projectId, generatedAt, roomsByNumber: {}, roomsByName: {}, objectsByType: {} };
}
