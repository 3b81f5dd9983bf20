/**
 * Page token extraction
 *
 * Strict priority, no blending: the vector provider runs first and, when it
 * yields any token, the fallback is never called. Only an empty vector result
 * reaches the fallback, and only then is a lazily loaded page image read. The
 * chosen list then passes through the merger, which removes overprinted
 * duplicates within it.
 */

import type { PageRasterSpec, PageRef, TextToken, TokenSource } from '../../contracts/types.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ITokenProvider } from './TokenProvider.js';
import { TokenMerger } from './TokenMerger.js';

export interface PageSources {
  pdfBytes?: Buffer | null;
  imageBytes?: Buffer | null;
  /** Called at most once, when imageBytes is not given and the fallback runs */
  loadImageBytes?: () => Promise<Buffer | null>;
  rasterSpec?: PageRasterSpec;
}

export interface TokenProviders {
  primary: ITokenProvider;
  fallback?: ITokenProvider;
  merger?: TokenMerger;
}

export interface PageTokens {
  tokens: TextToken[];
  /** Provider whose tokens were used; 'none' when neither produced any */
  tokenSource: TokenSource | 'none';
}

export async function extractPageTokens(
  page: PageRef,
  sources: PageSources,
  providers: TokenProviders
): Promise<PageTokens> {
  const log = createChildLogger({ pageId: page.pageId });
  const merger = providers.merger ?? new TokenMerger();
  const { loadImageBytes, ...given } = sources;
  const request = { page, ...given };

  const primaryTokens = await providers.primary.getTokens(request);
  if (primaryTokens.length > 0) {
    log.info(
      { tokenSource: providers.primary.source, tokensCount: primaryTokens.length, fallbackSkipped: true },
      'Tokens taken from primary source'
    );
    return { tokens: merger.merge(primaryTokens), tokenSource: providers.primary.source };
  }

  let imageBytes = request.imageBytes ?? null;
  if (providers.fallback) {
    if (!imageBytes && loadImageBytes) {
      imageBytes = await loadImageBytes();
    }
    const fallbackTokens = await providers.fallback.getTokens({ ...request, imageBytes });
    if (fallbackTokens.length > 0) {
      log.info(
        { tokenSource: providers.fallback.source, tokensCount: fallbackTokens.length },
        'Tokens taken from fallback source'
      );
      return { tokens: merger.merge(fallbackTokens), tokenSource: providers.fallback.source };
    }
  }

  log.warn(
    {
      primaryTried: Boolean(sources.pdfBytes),
      fallbackTried: Boolean(providers.fallback && imageBytes),
    },
    'No tokens found for page'
  );
  return { tokens: [], tokenSource: 'none' };
}

/**
 * Tokens of one page in page-pixel space
 */
export async function getTokensForPage(
  page: PageRef,
  sources: PageSources,
  providers: TokenProviders
): Promise<TextToken[]> {
  const { tokens } = await extractPageTokens(page, sources, providers);
  return tokens;
}
