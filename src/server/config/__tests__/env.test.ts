import { afterEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../types/errors.js';
import {
  DEFAULT_EXTRACTION_CONFIG,
  getExtractionConfig,
  loadExtractionConfig,
  resetExtractionConfig,
} from '../env.js';

describe('loadExtractionConfig', () => {
  afterEach(() => {
    resetExtractionConfig();
  });

  it('falls back to defaults', () => {
    expect(loadExtractionConfig({})).toEqual(DEFAULT_EXTRACTION_CONFIG);
  });

  it('reads every variable', () => {
    const config = loadExtractionConfig({
      RASTER_DEFAULT_DPI: '300',
      TOKEN_MERGE_IOU_THRESHOLD: '0.4',
      PAIRING_DEFAULT_MAX_DISTANCE_PX: '150.5',
      PAIRING_RELATION_TOLERANCE_PX: '0',
      ID_BUCKET_SIZE_PX: '25',
      PAGE_CONCURRENCY: '2',
      PAGE_TIMEOUT_MS: '0',
      FALLBACK_DETECTOR_ENABLED: 'false',
    });

    expect(config).toEqual({
      rasterDefaultDpi: 300,
      tokenMergeIouThreshold: 0.4,
      pairingDefaultMaxDistancePx: 150.5,
      pairingRelationTolerancePx: 0,
      idBucketSizePx: 25,
      pageConcurrency: 2,
      pageTimeoutMs: 0,
      fallbackDetectorEnabled: false,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects out of range values', () => {
    expect(() => loadExtractionConfig({ RASTER_DEFAULT_DPI: '10' })).toThrow(
      'Invalid configuration RASTER_DEFAULT_DPI: 10 must be between 36 and 1200'
    );
    expect(() => loadExtractionConfig({ TOKEN_MERGE_IOU_THRESHOLD: '1' })).toThrow(ConfigurationError);
  });

  it('leaves logger settings to the logger', () => {
    const config = loadExtractionConfig({ NODE_ENV: 'staging', LOG_LEVEL: 'warn' });

    expect(config).toEqual(DEFAULT_EXTRACTION_CONFIG);
    expect(Object.keys(config)).not.toContain('logLevel');
  });

  it('reports every invalid variable at once', () => {
    let thrown: unknown;
    try {
      loadExtractionConfig({ RASTER_DEFAULT_DPI: '10', PAGE_CONCURRENCY: '0' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown).toMatchObject({ context: { variable: 'RASTER_DEFAULT_DPI, PAGE_CONCURRENCY' } });
  });

  it('caches the process configuration until reset', () => {
    const first = getExtractionConfig();
    expect(getExtractionConfig()).toBe(first);

    resetExtractionConfig();
    expect(getExtractionConfig()).not.toBe(first);
  });
});
