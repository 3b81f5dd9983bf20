/**
 * PDF.js-backed text source
 *
 * Uses the legacy build of pdfjs-dist, which runs in Node.js without a worker.
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { SourceUnavailableError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { PdfPageText, PdfTextSource } from './PdfTextSource.js';
import { textItemsToWords, type PdfTextItem } from './pdfTextItems.js';

export class PdfjsTextSource implements PdfTextSource {
  async readPage(pdfBytes: Buffer, pageNumber: number): Promise<PdfPageText> {
    if (pdfBytes.length === 0) {
      throw new SourceUnavailableError('pdf', 'empty document');
    }

    let pdfDocument: Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
    try {
      const loadingTask = pdfjsLib.getDocument({
        // pdfjs takes ownership of the array it is given
        data: new Uint8Array(pdfBytes),
        verbosity: 0, // Suppress warnings
        isEvalSupported: false,
      });
      pdfDocument = await loadingTask.promise;
    } catch (error) {
      throw new SourceUnavailableError('pdf', getErrorMessage(error));
    }

    try {
      if (pageNumber < 0 || pageNumber >= pdfDocument.numPages) {
        throw new SourceUnavailableError('pdf', 'page out of range', {
          pageNumber,
          totalPages: pdfDocument.numPages,
        });
      }

      const page = await pdfDocument.getPage(pageNumber + 1);
      const [x0, y0, x1, y1] = page.view;
      const content = await page.getTextContent();

      const items: PdfTextItem[] = [];
      for (const item of content.items) {
        if (!('str' in item)) continue;
        items.push({
          str: item.str,
          transform: item.transform.map(Number),
          width: item.width,
          height: item.height,
        });
      }

      const words = textItemsToWords(items, page.view);
      logger.debug({ pageNumber, items: items.length, words: words.length }, 'PDF page text read');

      return {
        geometry: { widthPt: x1 - x0, heightPt: y1 - y0 },
        words,
      };
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError('pdf', getErrorMessage(error), { pageNumber });
    } finally {
      await pdfDocument.destroy();
    }
  }
}
