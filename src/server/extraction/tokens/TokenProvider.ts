/**
 * Token provider contract
 */

import type { PageRasterSpec, PageRef, TextToken, TokenSource } from '../../contracts/types.js';

/**
 * What a provider may read for one page. Each provider uses the inputs it
 * understands and ignores the rest.
 */
export interface TokenRequest {
  page: PageRef;
  pdfBytes?: Buffer | null;
  imageBytes?: Buffer | null;
  rasterSpec?: PageRasterSpec;
}

export interface ITokenProvider {
  readonly source: TokenSource;
  getTokens(request: TokenRequest): Promise<TextToken[]>;
}
