/**
 * floorplan-label-core
 *
 * Resolves word tokens from floor-plan pages into rooms, doors and schedule
 * tables with deterministic ids, and answers ambiguity-preserving lookups.
 */

export type * from './contracts/types.js';
export { TOKEN_SOURCE_PRIORITY } from './contracts/types.js';

// Configuration
export {
  DEFAULT_EXTRACTION_CONFIG,
  getExtractionConfig,
  loadExtractionConfig,
  resetExtractionConfig,
  type ExtractionConfig,
} from './config/env.js';

// Errors
export {
  AppError,
  ConfigurationError,
  DetectorError,
  EmptyQueryError,
  ErrorCode,
  InvalidBboxError,
  MalformedRuleError,
  PageTimeoutError,
  SourceUnavailableError,
  getErrorMessage,
  isAppError,
  isOperationalError,
  toAppError,
} from './types/errors.js';

export { logger, createChildLogger, runContext } from './utils/logger.js';

// Geometry and ids
export { assertValidBbox, bboxCenter, centerDistance, computeIou, isValidBbox, unionBbox } from './geo/bbox.js';
export {
  DEFAULT_ID_BUCKET_SIZE_PX,
  generateDoorId,
  generateObjectId,
  generateRoomId,
  generateScheduleTableId,
  normalizeLabel,
} from './utils/objectIdGenerator.js';

// Tokens
export type { PdfPageText, PdfTextSource, PdfWord } from './extraction/pdf/PdfTextSource.js';
export { PdfjsTextSource } from './extraction/pdf/PdfjsTextSource.js';
export type { ITokenProvider, TokenRequest } from './extraction/tokens/TokenProvider.js';
export { VectorPdfTokenProvider } from './extraction/tokens/VectorPdfTokenProvider.js';
export { FallbackDetectorTokenProvider } from './extraction/tokens/FallbackDetectorTokenProvider.js';
export { TokenMerger } from './extraction/tokens/TokenMerger.js';
export {
  extractPageTokens,
  getTokensForPage,
  type PageSources,
  type PageTokens,
  type TokenProviders,
} from './extraction/tokens/getTokensForPage.js';

// Rules and blocks
export { parseRulePayload, parseRulePayloads, type RuleParseResult } from './validation/rulePayloadSchemas.js';
export { parseDetectedDoors, parseDetectedSchedules, parseDetectedTextRegions } from './validation/detectorSchemas.js';
export { RuleEvaluator } from './extraction/rules/RuleEvaluator.js';
export { createBlocks, type BlockResult, type CreateBlocksOptions } from './extraction/blocks/TokenBlockAdapter.js';

// Assembly
export { toConfidenceLevel } from './extraction/assembly/confidence.js';
export { assembleRooms } from './extraction/assembly/RoomAssembler.js';
export { assembleDetectedDoors, assembleDoorsFromTokens } from './extraction/assembly/DoorAssembler.js';
export { assembleScheduleTables } from './extraction/assembly/ScheduleAssembler.js';
export {
  formatTokenSummary,
  generateTokenSummary,
  type TokenSummary,
  type TokenSummaryOptions,
} from './extraction/summary/tokenSummary.js';

// Index, query and persistence
export { buildProjectIndex } from './index/ProjectIndexBuilder.js';
export { resolveQuery } from './index/QueryResolver.js';
export { ProjectQueryService } from './index/ProjectQueryService.js';
export { InMemoryExtractionStore, type IExtractionStore } from './stores/ExtractionStore.js';

// Runs
export { ExtractionPipeline, type ExtractionPipelineDeps } from './pipeline/ExtractionPipeline.js';
export type * from './pipeline/types.js';
