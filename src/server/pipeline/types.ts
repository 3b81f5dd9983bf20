/**
 * Extraction run types
 */

import type {
  AdapterMetrics,
  ExtractionPolicy,
  ObjectType,
  PageRasterSpec,
  PageRef,
  PageType,
  TokenSource,
} from '../contracts/types.js';

export type StepName = 'extract_objects' | 'build_index';

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface RunStep {
  name: StepName;
  status: StepStatus;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
}

export type PageStatus = 'completed' | 'skipped' | 'failed';

/**
 * Counters explaining why candidates did not become objects
 */
export type DropReason =
  | 'no_tokens'
  | 'name_only_without_number'
  | 'low_confidence_door'
  | 'low_confidence_schedule'
  | 'invalid_detector_output';

export interface PageExtractionReport {
  pageId: string;
  pageType: PageType;
  status: PageStatus;
  tokenSource: TokenSource | 'none';
  tokenCount: number;
  objectCounts: Record<ObjectType, number>;
  dropReasons: Partial<Record<DropReason, number>>;
  adapterMetrics?: AdapterMetrics;
  durationMs: number;
  error?: string;
}

export interface ExtractionRunRequest {
  projectId: string;
  pages: readonly PageRef[];
  /** Raw rule payloads from guide negotiation; validated before use */
  rules: unknown;
  policy?: ExtractionPolicy;
  /** Target raster per page id; pages without one use the default DPI */
  rasterSpecs?: Readonly<Record<string, PageRasterSpec>>;
  /** Role whose tokens become doors */
  doorRole?: string;
}

export interface ExtractionRunReport {
  runId: string;
  projectId: string;
  policy: ExtractionPolicy;
  status: 'completed' | 'failed';
  startedAt: Date;
  completedAt: Date;
  steps: RunStep[];
  pages: PageExtractionReport[];
  rulesAccepted: number;
  rulesRejected: number;
  objectCount: number;
  error?: string;
}
