/**
 * Conversion of PDF.js text items into word boxes
 *
 * PDF.js reports runs of text ("items") with a transform matrix in PDF user
 * space (origin bottom-left). Each item is split on whitespace; a word's
 * horizontal extent is the item's width shared out by character count.
 */

import type { PdfWord } from './PdfTextSource.js';

/**
 * The subset of a PDF.js TextItem used here
 */
export interface PdfTextItem {
  str: string;
  /** [a, b, c, d, e, f]; e/f is the baseline origin */
  transform: number[];
  width: number;
  height: number;
}

/**
 * @param items - Text items of one page
 * @param view - Page view box [x0, y0, x1, y1] in user space
 */
export function textItemsToWords(items: readonly PdfTextItem[], view: readonly number[]): PdfWord[] {
  const [viewX0 = 0, , , viewY1 = 0] = view;
  const words: PdfWord[] = [];

  for (const item of items) {
    if (item.str.length === 0 || item.transform.length < 6) continue;

    const originX = item.transform[4] - viewX0;
    const baseline = viewY1 - item.transform[5];
    // Rotated or zero-height runs fall back to the matrix scale
    const height = item.height > 0 ? item.height : Math.hypot(item.transform[2], item.transform[3]);
    const charWidth = item.width / item.str.length;

    for (const match of item.str.matchAll(/\S+/g)) {
      const start = match.index ?? 0;
      const text = match[0];
      words.push({
        text,
        x0: originX + start * charWidth,
        y0: baseline - height,
        x1: originX + (start + text.length) * charWidth,
        y1: baseline,
      });
    }
  }

  return words;
}
