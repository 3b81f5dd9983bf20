/**
 * Token Merger
 *
 * Unifies token lists from several sources. Tokens are ordered by source
 * priority (vector, then model, then ocr; stable within a source) and a token
 * is dropped when it overlaps an already kept one with IoU above the threshold
 * and carries the same text, or text contained in the other's.
 */

import { TOKEN_SOURCE_PRIORITY, type TextToken } from '../../contracts/types.js';
import { computeIou } from '../../geo/bbox.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_MERGE_IOU_THRESHOLD = 0.5;

/**
 * Case-insensitive, trimmed equality or containment
 */
export function isSimilarText(a: string, b: string): boolean {
  const t1 = a.trim().toUpperCase();
  const t2 = b.trim().toUpperCase();
  return t1 === t2 || t1.includes(t2) || t2.includes(t1);
}

export class TokenMerger {
  constructor(private readonly iouThreshold: number = DEFAULT_MERGE_IOU_THRESHOLD) {}

  merge(...tokenLists: ReadonlyArray<readonly TextToken[]>): TextToken[] {
    const ordered = tokenLists
      .flat()
      .sort((a, b) => TOKEN_SOURCE_PRIORITY[a.source] - TOKEN_SOURCE_PRIORITY[b.source]);

    if (ordered.length === 0) {
      return [];
    }

    const merged: TextToken[] = [];
    for (const token of ordered) {
      if (!this.isDuplicate(token, merged)) {
        merged.push(token);
      }
    }

    const bySource: Record<string, number> = {};
    for (const token of merged) {
      bySource[token.source] = (bySource[token.source] ?? 0) + 1;
    }
    logger.debug(
      { tokensCountBySource: bySource, tokensDropped: ordered.length - merged.length, tokensFinalCount: merged.length },
      'Tokens merged'
    );

    return merged;
  }

  private isDuplicate(token: TextToken, kept: readonly TextToken[]): boolean {
    return kept.some(
      (existing) => computeIou(token.bbox, existing.bbox) > this.iouThreshold && isSimilarText(token.text, existing.text)
    );
  }
}
