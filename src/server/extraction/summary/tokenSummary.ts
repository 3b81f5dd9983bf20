/**
 * Token Summary
 *
 * Aggregates a page's tokens into the statistics that rule negotiation works
 * from: name-like and number-like candidates, numbers sitting near a name,
 * codes that repeat too often to be room numbers, and the dominant position
 * of numbers relative to names.
 *
 * Patterns are parameters; nothing here knows a room vocabulary.
 */

import type { Bbox, TextToken } from '../../contracts/types.js';
import { logger } from '../../utils/logger.js';

/** Two or more uppercase letters, accented capitals included */
export const DEFAULT_NAME_CANDIDATE_PATTERN = /^[A-ZÀÂÄÉÈÊËÏÎÔÙÛÜÇ]{2,}$/;
export const DEFAULT_NUMBER_CANDIDATE_PATTERN = /^\d{2,4}$/;
export const DEFAULT_SUMMARY_PAIRING_DISTANCE_PX = 100;
export const HIGH_FREQUENCY_THRESHOLD = 10;

const MAX_NAME_CANDIDATES = 20;
const MAX_NUMBER_CANDIDATES = 30;
const MAX_SAMPLE_PAIRS = 10;

export type ObservedRelation =
  | 'number_below_name'
  | 'number_above_name'
  | 'number_right_of_name'
  | 'number_left_of_name';

export type PatternConfidence = 'high' | 'medium' | 'low';

export interface NameCandidate {
  text: string;
  count: number;
  exampleBbox: Bbox;
}

export interface NumberCandidate {
  text: string;
  count: number;
  nearName?: string;
  distancePx?: number;
}

export interface HighFrequencyCode {
  text: string;
  count: number;
  note: string;
}

export interface PairingPattern {
  observedRelation: ObservedRelation;
  /** [p10, p90] of pair distances; [min, max] for ten pairs or fewer */
  typicalDistancePx: [number, number];
  confidence: PatternConfidence;
  samplePairs: Array<[string, string]>;
}

export interface TokenSummary {
  totalTextBlocks: number;
  nameCandidates: NameCandidate[];
  numberCandidates: NumberCandidate[];
  highFrequencyNumbers: HighFrequencyCode[];
  pairingPattern?: PairingPattern;
}

export interface TokenSummaryOptions {
  namePattern?: RegExp;
  numberPattern?: RegExp;
  maxPairingDistancePx?: number;
}

interface ObservedPair {
  name: TextToken;
  number: TextToken;
  distance: number;
}

function integerCenter(bbox: Bbox): [number, number] {
  return [bbox[0] + Math.floor(bbox[2] / 2), bbox[1] + Math.floor(bbox[3] / 2)];
}

function integerDistance(a: Bbox, b: Bbox): number {
  const [ax, ay] = integerCenter(a);
  const [bx, by] = integerCenter(b);
  return Math.trunc(Math.hypot(ax - bx, ay - by));
}

export function relativePosition(nameBbox: Bbox, numberBbox: Bbox): ObservedRelation {
  const [nameX, nameY] = integerCenter(nameBbox);
  const [numberX, numberY] = integerCenter(numberBbox);
  const dx = numberX - nameX;
  const dy = numberY - nameY;

  if (Math.abs(dy) > Math.abs(dx)) {
    return dy > 0 ? 'number_below_name' : 'number_above_name';
  }
  return dx > 0 ? 'number_right_of_name' : 'number_left_of_name';
}

/**
 * Entries by descending count; equal counts keep first-seen order
 */
function mostCommon<K>(counts: Map<K, number>): Array<[K, number]> {
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function detectPairingPattern(pairs: readonly ObservedPair[]): PairingPattern | undefined {
  if (pairs.length === 0) return undefined;

  const positions = new Map<ObservedRelation, number>();
  for (const pair of pairs) {
    const position = relativePosition(pair.name.bbox, pair.number.bbox);
    positions.set(position, (positions.get(position) ?? 0) + 1);
  }
  const [[observedRelation, positionCount]] = mostCommon(positions);

  const share = positionCount / pairs.length;
  const confidence: PatternConfidence = share >= 0.7 ? 'high' : share >= 0.5 ? 'medium' : 'low';

  // Percentiles only once there are enough pairs to have outliers
  const distances = pairs.map((pair) => pair.distance).sort((a, b) => a - b);
  const n = distances.length;
  const low = n > 10 ? distances[Math.floor(n / 10)] : distances[0];
  const high = n > 10 ? distances[Math.floor((9 * n) / 10)] : distances[n - 1];

  return {
    observedRelation,
    typicalDistancePx: [low, high],
    confidence,
    samplePairs: pairs
      .slice(0, MAX_SAMPLE_PAIRS)
      .map((pair): [string, string] => [pair.name.text.trim(), pair.number.text.trim()]),
  };
}

export function generateTokenSummary(tokens: readonly TextToken[], options: TokenSummaryOptions = {}): TokenSummary {
  const namePattern = options.namePattern ?? DEFAULT_NAME_CANDIDATE_PATTERN;
  const numberPattern = options.numberPattern ?? DEFAULT_NUMBER_CANDIDATE_PATTERN;
  const maxDistance = options.maxPairingDistancePx ?? DEFAULT_SUMMARY_PAIRING_DISTANCE_PX;

  if (tokens.length === 0) {
    return { totalTextBlocks: 0, nameCandidates: [], numberCandidates: [], highFrequencyNumbers: [] };
  }

  const nameTokens: TextToken[] = [];
  const numberTokens: TextToken[] = [];
  const nameCounts = new Map<string, number>();
  const numberCounts = new Map<string, number>();

  for (const token of tokens) {
    const text = token.text.trim();
    if (namePattern.test(text)) {
      nameTokens.push(token);
      increment(nameCounts, text);
    } else if (numberPattern.test(text)) {
      numberTokens.push(token);
      increment(numberCounts, text);
    }
  }

  const nameCandidates: NameCandidate[] = [];
  for (const [text, count] of mostCommon(nameCounts).slice(0, MAX_NAME_CANDIDATES)) {
    const example = nameTokens.find((token) => token.text.trim() === text);
    if (example) {
      nameCandidates.push({ text, count, exampleBbox: example.bbox });
    }
  }

  const pairs: ObservedPair[] = [];
  const numberCandidates: NumberCandidate[] = [];

  for (const numberToken of numberTokens) {
    const text = numberToken.text.trim();
    const count = numberCounts.get(text) ?? 0;

    let nearest: TextToken | undefined;
    let nearestDistance = Infinity;
    for (const nameToken of nameTokens) {
      const distance = integerDistance(numberToken.bbox, nameToken.bbox);
      if (distance < nearestDistance && distance <= maxDistance) {
        nearestDistance = distance;
        nearest = nameToken;
      }
    }

    if (nearest) {
      pairs.push({ name: nearest, number: numberToken, distance: nearestDistance });
      numberCandidates.push({ text, count, nearName: nearest.text.trim(), distancePx: nearestDistance });
    } else {
      numberCandidates.push({ text, count });
    }
  }

  numberCandidates.sort((a, b) => {
    const aNear = a.nearName === undefined ? 1 : 0;
    const bNear = b.nearName === undefined ? 1 : 0;
    return aNear - bNear || b.count - a.count;
  });

  const highFrequencyNumbers: HighFrequencyCode[] = mostCommon(numberCounts)
    .filter(([, count]) => count >= HIGH_FREQUENCY_THRESHOLD)
    .map(([text, count]) => ({
      text,
      count,
      note: text.length === 2 ? 'likely wall/partition code' : 'high frequency',
    }));

  const pairingPattern = detectPairingPattern(pairs);

  const summary: TokenSummary = {
    totalTextBlocks: tokens.length,
    nameCandidates,
    numberCandidates: numberCandidates.slice(0, MAX_NUMBER_CANDIDATES),
    highFrequencyNumbers,
    pairingPattern,
  };

  logger.info(
    {
      totalTokens: tokens.length,
      nameCandidates: summary.nameCandidates.length,
      numberCandidates: summary.numberCandidates.length,
      highFrequencyCodes: highFrequencyNumbers.length,
      hasPairingPattern: pairingPattern !== undefined,
    },
    'Token summary generated'
  );

  return summary;
}

/**
 * Plain-text rendering of a summary, for inclusion in a rule negotiation prompt
 */
export function formatTokenSummary(summary: TokenSummary): string {
  const lines = [
    `Total text blocks: ${summary.totalTextBlocks}`,
    '',
    'Room name candidates (uppercase words 2+ chars):',
  ];

  for (const candidate of summary.nameCandidates.slice(0, 10)) {
    lines.push(`  - ${candidate.text}: ${candidate.count} occurrences`);
  }

  lines.push('', 'Room number candidates (2-4 digit numbers):');
  for (const candidate of summary.numberCandidates.slice(0, 15)) {
    lines.push(
      candidate.nearName !== undefined
        ? `  - ${candidate.text}: near '${candidate.nearName}' (${candidate.distancePx}px)`
        : `  - ${candidate.text}: ${candidate.count} occurrences`
    );
  }

  if (summary.highFrequencyNumbers.length > 0) {
    lines.push('', 'High-frequency codes (likely noise, consider excluding):');
    for (const code of summary.highFrequencyNumbers) {
      lines.push(`  - '${code.text}': ${code.count} occurrences (${code.note})`);
    }
  }

  const pattern = summary.pairingPattern;
  if (pattern) {
    lines.push(
      '',
      `Pairing pattern detected: ${pattern.observedRelation}`,
      `  Typical distance: ${pattern.typicalDistancePx[0]}-${pattern.typicalDistancePx[1]}px`,
      `  Confidence: ${pattern.confidence}`
    );
    if (pattern.samplePairs.length > 0) {
      lines.push('  Sample pairs:');
      for (const [name, number] of pattern.samplePairs.slice(0, 5)) {
        lines.push(`    - ${name} + ${number}`);
      }
    }
  }

  return lines.join('\n');
}
