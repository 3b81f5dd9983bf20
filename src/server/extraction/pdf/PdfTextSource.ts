/**
 * PDF text source contract
 *
 * Word-level text with boxes in PDF points, origin top-left (y grows downward),
 * so callers only need to scale to reach page-pixel space.
 */

import type { PdfPageGeometry } from '../../contracts/types.js';

export interface PdfWord {
  text: string;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface PdfPageText {
  geometry: PdfPageGeometry;
  words: PdfWord[];
}

export interface PdfTextSource {
  /**
   * Read one page of a PDF
   *
   * @param pageNumber - 0-based page index
   * @throws {SourceUnavailableError} when the document cannot be opened or the page does not exist
   */
  readPage(pdfBytes: Buffer, pageNumber: number): Promise<PdfPageText>;
}
