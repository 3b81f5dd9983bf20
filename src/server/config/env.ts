/**
 * Environment Variable Validation
 *
 * Centralized parsing of the extraction settings. Values are read once,
 * range-checked, and exposed as a frozen ExtractionConfig.
 */

// Load dotenv early so the variables are visible before the first getExtractionConfig() call
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

type EnvSource = Record<string, string | undefined>;

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

/**
 * Settings consumed by the extraction core. NODE_ENV and LOG_LEVEL belong to
 * the logger, which reads them itself.
 */
export interface ExtractionConfig {
  /** DPI used to derive the pixel raster when the caller gives no raster spec */
  rasterDefaultDpi: number;

  /** IoU above which two same-text tokens from different sources are duplicates */
  tokenMergeIouThreshold: number;

  pairingDefaultMaxDistancePx: number;
  pairingRelationTolerancePx: number;

  /** Grid size used to snap bbox corners before hashing object ids */
  idBucketSizePx: number;

  pageConcurrency: number;
  /** 0 disables the per-page time box */
  pageTimeoutMs: number;

  fallbackDetectorEnabled: boolean;
}

export const DEFAULT_EXTRACTION_CONFIG: Readonly<ExtractionConfig> = Object.freeze({
  rasterDefaultDpi: 150,
  tokenMergeIouThreshold: 0.5,
  pairingDefaultMaxDistancePx: 200,
  pairingRelationTolerancePx: 50,
  idBucketSizePx: 50,
  pageConcurrency: 4,
  pageTimeoutMs: 60_000,
  fallbackDetectorEnabled: true,
});

/**
 * Parse and validate extraction settings from an environment record.
 * Pure over `source`, so callers and tests can pass their own record.
 *
 * @throws {ConfigurationError} listing every invalid variable
 */
export function loadExtractionConfig(source: EnvSource = process.env): Readonly<ExtractionConfig> {
  const errors: ConfigurationError[] = [];
  const defaults = DEFAULT_EXTRACTION_CONFIG;

  const rasterDefaultDpi = parseNumericEnv(source.RASTER_DEFAULT_DPI, defaults.rasterDefaultDpi);
  if (rasterDefaultDpi < 36 || rasterDefaultDpi > 1200) {
    errors.push(new ConfigurationError('RASTER_DEFAULT_DPI', `${rasterDefaultDpi} must be between 36 and 1200`));
  }

  const tokenMergeIouThreshold = parseFloatEnv(source.TOKEN_MERGE_IOU_THRESHOLD, defaults.tokenMergeIouThreshold);
  if (tokenMergeIouThreshold <= 0 || tokenMergeIouThreshold >= 1) {
    errors.push(new ConfigurationError('TOKEN_MERGE_IOU_THRESHOLD', `${tokenMergeIouThreshold} must be in (0, 1)`));
  }

  const pairingDefaultMaxDistancePx = parseFloatEnv(
    source.PAIRING_DEFAULT_MAX_DISTANCE_PX,
    defaults.pairingDefaultMaxDistancePx
  );
  if (pairingDefaultMaxDistancePx <= 0) {
    errors.push(new ConfigurationError('PAIRING_DEFAULT_MAX_DISTANCE_PX', 'must be positive'));
  }

  const pairingRelationTolerancePx = parseFloatEnv(
    source.PAIRING_RELATION_TOLERANCE_PX,
    defaults.pairingRelationTolerancePx
  );
  if (pairingRelationTolerancePx < 0) {
    errors.push(new ConfigurationError('PAIRING_RELATION_TOLERANCE_PX', 'must not be negative'));
  }

  const idBucketSizePx = parseNumericEnv(source.ID_BUCKET_SIZE_PX, defaults.idBucketSizePx);
  if (idBucketSizePx < 1) {
    errors.push(new ConfigurationError('ID_BUCKET_SIZE_PX', 'must be at least 1'));
  }

  const pageConcurrency = parseNumericEnv(source.PAGE_CONCURRENCY, defaults.pageConcurrency);
  if (pageConcurrency < 1) {
    errors.push(new ConfigurationError('PAGE_CONCURRENCY', 'must be at least 1'));
  }

  const pageTimeoutMs = parseNumericEnv(source.PAGE_TIMEOUT_MS, defaults.pageTimeoutMs);
  if (pageTimeoutMs < 0) {
    errors.push(new ConfigurationError('PAGE_TIMEOUT_MS', 'must not be negative'));
  }

  if (errors.length > 0) {
    if (errors.length === 1) {
      throw errors[0];
    }
    throw new ConfigurationError(
      errors.map((e) => String(e.context?.variable)).join(', '),
      errors.map((e) => e.message).join('; ')
    );
  }

  return Object.freeze({
    rasterDefaultDpi,
    tokenMergeIouThreshold,
    pairingDefaultMaxDistancePx,
    pairingRelationTolerancePx,
    idBucketSizePx,
    pageConcurrency,
    pageTimeoutMs,
    fallbackDetectorEnabled: parseBooleanEnv(source.FALLBACK_DETECTOR_ENABLED, defaults.fallbackDetectorEnabled),
  });
}

let validatedConfig: Readonly<ExtractionConfig> | null = null;

/**
 * Get validated settings from process.env
 * Validates on first call, then returns cached result
 */
export function getExtractionConfig(): Readonly<ExtractionConfig> {
  if (!validatedConfig) {
    validatedConfig = loadExtractionConfig(process.env);
  }
  return validatedConfig;
}

/**
 * Reset validated config cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetExtractionConfig(): void {
  validatedConfig = null;
}
