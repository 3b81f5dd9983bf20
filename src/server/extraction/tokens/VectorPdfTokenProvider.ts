/**
 * Vector PDF Token Provider
 *
 * Highest-priority token source: words read from the PDF text layer, mapped
 * from PDF points onto the page raster. Vector text is exact, so every token
 * has confidence 1.0.
 */

import type { PageRasterSpec, PdfPageGeometry, TextToken } from '../../contracts/types.js';
import { SourceUnavailableError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { PdfTextSource, PdfWord } from '../pdf/PdfTextSource.js';
import type { ITokenProvider, TokenRequest } from './TokenProvider.js';

const POINTS_PER_INCH = 72;

export interface VectorPdfTokenProviderOptions {
  /** Raster resolution assumed when the request carries no raster spec */
  defaultDpi: number;
}

/**
 * Pixel size of the page raster: the requested one, or the page rendered at `defaultDpi`
 */
export function resolveTargetRaster(
  geometry: PdfPageGeometry,
  rasterSpec: PageRasterSpec | undefined,
  defaultDpi: number
): { widthPx: number; heightPx: number } {
  if (rasterSpec) {
    return { widthPx: rasterSpec.widthPx, heightPx: rasterSpec.heightPx };
  }
  return {
    widthPx: Math.trunc((geometry.widthPt * defaultDpi) / POINTS_PER_INCH),
    heightPx: Math.trunc((geometry.heightPt * defaultDpi) / POINTS_PER_INCH),
  };
}

/**
 * Scale point-space words to pixel tokens, independently per axis.
 * Coordinates are truncated; width and height are at least 1px.
 */
export function wordsToTokens(
  words: readonly PdfWord[],
  geometry: PdfPageGeometry,
  target: { widthPx: number; heightPx: number },
  pageId?: string
): TextToken[] {
  if (geometry.widthPt <= 0 || geometry.heightPt <= 0) {
    throw new SourceUnavailableError('pdf', 'page has no extent', { ...geometry });
  }

  const scaleX = target.widthPx / geometry.widthPt;
  const scaleY = target.heightPx / geometry.heightPt;
  const tokens: TextToken[] = [];

  for (const word of words) {
    const text = word.text.trim();
    if (!text) continue;

    tokens.push({
      text,
      bbox: [
        Math.trunc(word.x0 * scaleX),
        Math.trunc(word.y0 * scaleY),
        Math.max(Math.trunc((word.x1 - word.x0) * scaleX), 1),
        Math.max(Math.trunc((word.y1 - word.y0) * scaleY), 1),
      ],
      confidence: 1.0,
      source: 'vector',
      pageId,
    });
  }

  return tokens;
}

export class VectorPdfTokenProvider implements ITokenProvider {
  readonly source = 'vector' as const;

  constructor(
    private readonly pdfSource: PdfTextSource,
    private readonly options: VectorPdfTokenProviderOptions
  ) {}

  async getTokens(request: TokenRequest): Promise<TextToken[]> {
    const { page, pdfBytes, rasterSpec } = request;
    const log = createChildLogger({ pageId: page.pageId, provider: this.source });

    if (!pdfBytes) {
      log.debug('No source PDF for page, skipping vector text');
      return [];
    }

    const pageNumber = page.pageNumber ?? 0;
    try {
      const { geometry, words } = await this.pdfSource.readPage(pdfBytes, pageNumber);
      const target = resolveTargetRaster(geometry, rasterSpec, this.options.defaultDpi);
      const tokens = wordsToTokens(words, geometry, target, page.pageId);

      log.info({ tokensCount: tokens.length, pageNumber, ...target }, 'Vector tokens extracted');
      return tokens;
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        log.warn({ pageNumber, error: error.message }, 'PDF source unavailable, no vector tokens');
        return [];
      }
      throw error;
    }
  }
}
