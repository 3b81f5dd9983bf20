/**
 * Fallback Detector Token Provider
 *
 * Wraps a model-based text region detector. Only consulted when the vector
 * source produced nothing for the page.
 */

import type { ITextRegionDetector, TextToken } from '../../contracts/types.js';
import { DetectorError, getErrorMessage, isAppError } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { parseDetectedTextRegions } from '../../validation/detectorSchemas.js';
import type { ITokenProvider, TokenRequest } from './TokenProvider.js';

export interface FallbackDetectorTokenProviderOptions {
  enabled: boolean;
}

export class FallbackDetectorTokenProvider implements ITokenProvider {
  readonly source = 'model' as const;

  constructor(
    private readonly detector: ITextRegionDetector,
    private readonly options: FallbackDetectorTokenProviderOptions = { enabled: true }
  ) {}

  async getTokens(request: TokenRequest): Promise<TextToken[]> {
    const { page, imageBytes } = request;
    const log = createChildLogger({ pageId: page.pageId, provider: this.source });

    if (!this.options.enabled || !imageBytes) {
      log.debug({ enabled: this.options.enabled, hasImage: Boolean(imageBytes) }, 'Fallback detector not consulted');
      return [];
    }

    let raw: unknown;
    try {
      raw = await this.detector.detect(page.pageId, imageBytes);
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new DetectorError('text_regions', getErrorMessage(error), { pageId: page.pageId });
    }

    const { items, invalidCount } = parseDetectedTextRegions(raw);
    if (invalidCount > 0) {
      log.warn({ invalidCount }, 'Discarded invalid detector regions');
    }

    const tokens: TextToken[] = items.map((region) => ({
      text: region.text,
      bbox: region.bbox,
      confidence: region.confidence,
      source: this.source,
      pageId: page.pageId,
    }));

    log.info({ tokensCount: tokens.length }, 'Fallback tokens extracted');
    return tokens;
  }
}
