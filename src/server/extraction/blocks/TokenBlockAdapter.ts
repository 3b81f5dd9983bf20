/**
 * Token Block Adapter
 *
 * Turns loose word tokens into labeled blocks. Room labels are usually split
 * into separate words ("CLASSE" above "203"); the adapter classifies tokens by
 * role with the supplied detectors, drops excluded name candidates, then pairs
 * each name with the nearest compatible number.
 *
 * Pairing is greedy: names are visited in reading order (top to bottom, then
 * left to right) and each takes the closest unconsumed number within range
 * that satisfies the relation. A consumed number is never re-paired. Names
 * left without a number still produce a name-only block.
 */

import type {
  AdapterMetrics,
  Bbox,
  PairingRelation,
  RulePayload,
  SyntheticBlock,
  TextToken,
} from '../../contracts/types.js';
import { centerDistance, unionBbox } from '../../geo/bbox.js';
import { createChildLogger } from '../../utils/logger.js';
import { appendTo, toRecord } from '../../utils/records.js';
import { RuleEvaluator } from '../rules/RuleEvaluator.js';

export const DEFAULT_NAME_ROLE = 'room_name';
export const DEFAULT_NUMBER_ROLE = 'room_number';
export const DEFAULT_PAIRING_RELATION: PairingRelation = 'below';
export const DEFAULT_MAX_PAIRING_DISTANCE_PX = 200;
export const DEFAULT_RELATION_TOLERANCE_PX = 50;

export interface CreateBlocksOptions {
  /** Used when the rule set has no pairing payload */
  defaultMaxDistancePx?: number;
  relationTolerancePx?: number;
  pageId?: string;
}

export interface BlockResult {
  blocks: SyntheticBlock[];
  metrics: AdapterMetrics;
  /** Classified tokens per role, excluded name candidates removed */
  tokensByRole: Record<string, TextToken[]>;
  /** Whether the rule set defines rooms as name and number pairs */
  hasPairingRule: boolean;
}

/**
 * Whether `candidate` lies in `relation` to `name`, with `tolerance` pixels of slack
 */
export function satisfiesRelation(relation: PairingRelation, name: Bbox, candidate: Bbox, tolerance: number): boolean {
  switch (relation) {
    case 'below':
      return candidate[1] >= name[1] - tolerance;
    case 'above':
      return candidate[1] <= name[1] + tolerance;
    case 'right':
      return candidate[0] >= name[0] - tolerance;
    case 'left':
      return candidate[0] <= name[0] + tolerance;
    case 'nearest':
      return true;
  }
}

function emptyMetrics(tokensInput: number): AdapterMetrics {
  return {
    tokensInput,
    nameTokens: 0,
    numberTokens: 0,
    blocksCreated: 0,
    pairedWithNumber: 0,
    nameOnly: 0,
    unpairedNumbers: 0,
    excludedByRule: 0,
    excludedReasons: {},
    roomsWithNumberRatio: 0,
  };
}

function byReadingOrder(a: TextToken, b: TextToken): number {
  return a.bbox[1] - b.bbox[1] || a.bbox[0] - b.bbox[0];
}

function nameOnlyBlock(name: TextToken): SyntheticBlock {
  return {
    bbox: name.bbox,
    text: name.text,
    nameValue: name.text,
    confidence: name.confidence,
    sourceTexts: [name.text],
  };
}

function pairedBlock(name: TextToken, number: TextToken): SyntheticBlock {
  return {
    bbox: unionBbox(name.bbox, number.bbox),
    text: `${name.text}\n${number.text}`,
    nameValue: name.text,
    numberValue: number.text,
    confidence: Math.min(name.confidence, number.confidence),
    sourceTexts: [name.text, number.text],
  };
}

/**
 * Classify, filter and pair tokens into synthetic blocks
 */
export function createBlocks(
  tokens: readonly TextToken[],
  payloads: readonly RulePayload[],
  options: CreateBlocksOptions = {}
): BlockResult {
  const log = createChildLogger({ pageId: options.pageId, component: 'token-block-adapter' });
  const evaluator = new RuleEvaluator(payloads);
  const metrics = emptyMetrics(tokens.length);
  const pairing = evaluator.pairing;

  if (!evaluator.hasDetectors) {
    log.info({ tokensCount: tokens.length }, 'No token detectors supplied, no blocks created');
    return { blocks: [], metrics, tokensByRole: {}, hasPairingRule: pairing !== undefined };
  }

  const nameRole = pairing?.nameRole ?? DEFAULT_NAME_ROLE;
  const numberRole = pairing?.numberRole ?? DEFAULT_NUMBER_ROLE;
  const relation = pairing?.relation ?? DEFAULT_PAIRING_RELATION;
  const maxDistance = pairing?.maxDistancePx ?? options.defaultMaxDistancePx ?? DEFAULT_MAX_PAIRING_DISTANCE_PX;
  const tolerance = options.relationTolerancePx ?? DEFAULT_RELATION_TOLERANCE_PX;

  // Step 1: classify
  const tokensByRole = new Map<string, TextToken[]>();
  const excludedReasons = new Map<string, number>();
  for (const token of tokens) {
    const role = evaluator.classify(token.text);
    if (role === undefined) continue;

    if (role === nameRole) {
      const reason = evaluator.exclusionReason(token.text);
      if (reason !== undefined) {
        metrics.excludedByRule++;
        excludedReasons.set(reason, (excludedReasons.get(reason) ?? 0) + 1);
        log.debug({ token: token.text, reason }, 'Token excluded by rule');
        continue;
      }
    }

    appendTo(tokensByRole, role, token);
  }

  metrics.excludedReasons = toRecord(excludedReasons);
  const names = [...(tokensByRole.get(nameRole) ?? [])].sort(byReadingOrder);
  const numbers = tokensByRole.get(numberRole) ?? [];
  metrics.nameTokens = names.length;
  metrics.numberTokens = numbers.length;

  log.info(
    { nameTokens: names.length, numberTokens: numbers.length, excludedByRule: metrics.excludedByRule },
    'Tokens classified'
  );

  // Step 2: greedy pairing
  const consumed = new Set<number>();
  const blocks: SyntheticBlock[] = [];

  for (const name of names) {
    let bestIndex = -1;
    let bestDistance = Infinity;

    numbers.forEach((candidate, index) => {
      if (consumed.has(index)) return;
      const distance = centerDistance(name.bbox, candidate.bbox);
      if (distance > maxDistance) return;
      if (!satisfiesRelation(relation, name.bbox, candidate.bbox, tolerance)) return;
      if (distance < bestDistance) {
        bestDistance = distance;
        bestIndex = index;
      }
    });

    const number = bestIndex >= 0 ? numbers[bestIndex] : undefined;
    if (number) {
      consumed.add(bestIndex);
      blocks.push(pairedBlock(name, number));
      metrics.pairedWithNumber++;
      log.debug({ roomName: name.text, roomNumber: number.text, distance: bestDistance }, 'Token pair created');
    } else {
      blocks.push(nameOnlyBlock(name));
      metrics.nameOnly++;
    }
  }

  metrics.blocksCreated = blocks.length;
  metrics.unpairedNumbers = numbers.length - consumed.size;
  metrics.roomsWithNumberRatio = blocks.length > 0 ? metrics.pairedWithNumber / blocks.length : 0;

  log.info(
    {
      blocksCreated: metrics.blocksCreated,
      pairedWithNumber: metrics.pairedWithNumber,
      nameOnly: metrics.nameOnly,
      unpairedNumbers: metrics.unpairedNumbers,
      roomsWithNumberRatio: Math.round(metrics.roomsWithNumberRatio * 1000) / 1000,
      excludedReasons: metrics.excludedReasons,
      relation,
      maxDistance,
    },
    'Token blocks created'
  );

  return { blocks, metrics, tokensByRole: toRecord(tokensByRole), hasPairingRule: pairing !== undefined };
}
