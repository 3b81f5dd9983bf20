/**
 * Query Resolver
 *
 * Resolves lookups against a project index. Criteria are OR-ed: an object
 * matching any supplied criterion is returned, with one reason per criterion
 * it matched. When more than one object matches, every match is returned and
 * the result is flagged ambiguous. Nothing is tie-broken by recency or
 * confidence; two rooms printed "203" in different places stay two answers.
 */

import type {
  ExtractedObject,
  MatchReason,
  ProjectIndex,
  QueryCriteria,
  QueryMatch,
  QueryResult,
} from '../contracts/types.js';
import { toConfidenceLevel } from '../extraction/assembly/confidence.js';
import { EmptyQueryError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { getOwn } from '../utils/records.js';

export const AMBIGUOUS_QUERY_MESSAGE = 'Multiple candidates found';

/**
 * Drop empty criteria so that `{ roomNumber: '' }` counts as no criterion
 */
export function normalizeCriteria(criteria: QueryCriteria): QueryCriteria {
  const normalized: QueryCriteria = {};
  if (criteria.roomNumber) normalized.roomNumber = criteria.roomNumber;
  if (criteria.roomName) normalized.roomName = criteria.roomName;
  if (criteria.type) normalized.type = criteria.type;
  return normalized;
}

/**
 * @param objects - The project's objects, in the order matches should be listed
 * @throws {EmptyQueryError} when no criterion is given
 */
export function resolveQuery(
  projectId: string,
  criteria: QueryCriteria,
  index: ProjectIndex | null,
  objects: readonly ExtractedObject[]
): QueryResult {
  const query = normalizeCriteria(criteria);
  if (!query.roomNumber && !query.roomName && !query.type) {
    throw new EmptyQueryError();
  }

  const reasons = new Map<string, MatchReason[]>();
  const addMatches = (ids: readonly string[] | undefined, reason: MatchReason): void => {
    for (const id of ids ?? []) {
      const list = reasons.get(id) ?? [];
      list.push(reason);
      reasons.set(id, list);
    }
  };

  if (index) {
    if (query.roomNumber) addMatches(getOwn(index.roomsByNumber, query.roomNumber), 'room_number_match');
    if (query.roomName) addMatches(getOwn(index.roomsByName, query.roomName), 'room_name_match');
    if (query.type) addMatches(getOwn(index.objectsByType, query.type), 'type_match');
  }

  // Ids the index lists but the object list no longer holds are skipped
  const matches: QueryMatch[] = [];
  for (const object of objects) {
    const matchReasons = reasons.get(object.id);
    if (!matchReasons) continue;

    matches.push({
      objectId: object.id,
      pageId: object.pageId,
      type: object.type,
      label: object.label,
      score: object.confidence,
      geometry: object.geometry,
      confidenceLevel: toConfidenceLevel(object.confidence),
      reasons: [...matchReasons],
    });
  }

  const [onlyMatch] = matches;
  if (onlyMatch && matches.length === 1) onlyMatch.reasons.push('unique_match');

  const ambiguous = matches.length > 1;
  logger.info({ projectId, query, matchCount: matches.length, ambiguous }, 'Query executed');

  return {
    projectId,
    query,
    matches,
    ambiguous,
    ...(ambiguous && { message: AMBIGUOUS_QUERY_MESSAGE }),
  };
}
