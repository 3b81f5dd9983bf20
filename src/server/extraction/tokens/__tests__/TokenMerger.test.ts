import { describe, it, expect } from 'vitest';
import type { Bbox, TextToken, TokenSource } from '../../../contracts/types.js';
import { isSimilarText, TokenMerger } from '../TokenMerger.js';

function token(text: string, bbox: Bbox, source: TokenSource, confidence = 1): TextToken {
  return { text, bbox, source, confidence };
}

describe('isSimilarText', () => {
  it('matches equal or contained text, ignoring case and padding', () => {
    expect(isSimilarText(' classe ', 'CLASSE')).toBe(true);
    expect(isSimilarText('CLASSE', 'CLASSE 203')).toBe(true);
    expect(isSimilarText('CLASSE', '203')).toBe(false);
  });
});

describe('TokenMerger', () => {
  const merger = new TokenMerger();

  it('keeps exactly the higher-priority token of an overlapping pair', () => {
    const vector = token('CLASSE', [100, 100, 60, 20], 'vector');
    const model = token('classe', [102, 101, 60, 20], 'model', 0.8);

    expect(merger.merge([model], [vector])).toEqual([vector]);
  });

  it('treats contained text as a duplicate', () => {
    const vector = token('203', [100, 130, 40, 20], 'vector');
    const ocr = token('203.', [100, 130, 40, 20], 'ocr', 0.6);

    expect(merger.merge([ocr, vector])).toEqual([vector]);
  });

  it('keeps overlapping tokens with unrelated text', () => {
    const name = token('CLASSE', [100, 100, 60, 20], 'vector');
    const number = token('203', [100, 100, 60, 20], 'model');

    expect(merger.merge([name, number])).toEqual([name, number]);
  });

  it('keeps distant tokens with the same text', () => {
    const a = token('WC', [0, 0, 10, 10], 'vector');
    const b = token('WC', [100, 100, 10, 10], 'model');

    expect(merger.merge([a], [b])).toEqual([a, b]);
  });

  it('orders by source priority and keeps input order within a source', () => {
    const ocr = token('A1', [0, 0, 10, 10], 'ocr');
    const model = token('B1', [20, 0, 10, 10], 'model');
    const first = token('C1', [40, 0, 10, 10], 'vector');
    const second = token('D1', [60, 0, 10, 10], 'vector');

    expect(merger.merge([ocr, first, model, second])).toEqual([first, second, model, ocr]);
  });

  it('uses the configured threshold', () => {
    // IoU of these two is 1/3
    const a = token('X', [0, 0, 10, 10], 'vector');
    const b = token('X', [5, 0, 10, 10], 'model');

    expect(new TokenMerger(0.5).merge([a, b])).toHaveLength(2);
    expect(new TokenMerger(0.3).merge([a, b])).toEqual([a]);
  });

  it('returns an empty list for no input', () => {
    expect(merger.merge()).toEqual([]);
    expect(merger.merge([], [])).toEqual([]);
  });
});
