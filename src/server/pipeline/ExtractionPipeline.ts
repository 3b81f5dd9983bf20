/**
 * Extraction Pipeline
 *
 * Runs extraction for a project:
 * 1. extract_objects - every page independently, with bounded concurrency and
 *    an optional time box; objects are written per page to the store
 * 2. build_index - the project index is rebuilt from everything stored
 *
 * A page that fails or times out is logged, reported as failed and left with
 * no objects; the run carries on. Object ids are deterministic, so a run can
 * be repeated at any time. Runs for the same project must be serialized by
 * the caller.
 */

import { randomUUID } from 'crypto';
import type {
  ExtractedObject,
  ExtractionPolicy,
  IDoorDetector,
  IPageStorage,
  IScheduleDetector,
  ITextRegionDetector,
  ObjectType,
  PageRasterSpec,
  PageRef,
  PageType,
  RulePayload,
} from '../contracts/types.js';
import { getExtractionConfig, type ExtractionConfig } from '../config/env.js';
import { assembleDetectedDoors, assembleDoorsFromTokens, DEFAULT_DOOR_ROLE } from '../extraction/assembly/DoorAssembler.js';
import { assembleRooms } from '../extraction/assembly/RoomAssembler.js';
import { assembleScheduleTables } from '../extraction/assembly/ScheduleAssembler.js';
import { createBlocks } from '../extraction/blocks/TokenBlockAdapter.js';
import type { PdfTextSource } from '../extraction/pdf/PdfTextSource.js';
import { FallbackDetectorTokenProvider } from '../extraction/tokens/FallbackDetectorTokenProvider.js';
import { extractPageTokens, type TokenProviders } from '../extraction/tokens/getTokensForPage.js';
import { TokenMerger } from '../extraction/tokens/TokenMerger.js';
import { VectorPdfTokenProvider } from '../extraction/tokens/VectorPdfTokenProvider.js';
import { buildProjectIndex } from '../index/ProjectIndexBuilder.js';
import type { IExtractionStore } from '../stores/ExtractionStore.js';
import { DetectorError, getErrorMessage, isAppError, PageTimeoutError } from '../types/errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { createChildLogger, runContext } from '../utils/logger.js';
import { getOwn } from '../utils/records.js';
import { withTimeout } from '../utils/withTimeout.js';
import { parseDetectedDoors, parseDetectedSchedules } from '../validation/detectorSchemas.js';
import { parseRulePayloads } from '../validation/rulePayloadSchemas.js';
import type {
  ExtractionRunReport,
  ExtractionRunRequest,
  PageExtractionReport,
  RunStep,
  StepName,
} from './types.js';

export interface ExtractionPipelineDeps {
  storage: IPageStorage;
  store: IExtractionStore;
  pdfTextSource: PdfTextSource;
  textRegionDetector?: ITextRegionDetector;
  doorDetector?: IDoorDetector;
  scheduleDetector?: IScheduleDetector;
  config?: Readonly<ExtractionConfig>;
  /** Clock for report and index timestamps */
  now?: () => Date;
}

interface PageContext {
  projectId: string;
  payloads: readonly RulePayload[];
  policy: ExtractionPolicy;
  doorRole: string;
  rasterSpec?: PageRasterSpec;
}

interface PageOutcome {
  objects: ExtractedObject[];
  report: Omit<PageExtractionReport, 'pageId' | 'pageType' | 'status' | 'durationMs'>;
}

function emptyObjectCounts(): Record<ObjectType, number> {
  return { room: 0, door: 0, schedule_table: 0 };
}

function countObjects(objects: readonly ExtractedObject[]): Record<ObjectType, number> {
  const counts = emptyObjectCounts();
  for (const object of objects) {
    counts[object.type]++;
  }
  return counts;
}

/**
 * Pages without a type are treated as plans
 */
function resolvePageType(page: PageRef): PageType {
  return page.pageType ?? 'plan';
}

export class ExtractionPipeline {
  private readonly config: Readonly<ExtractionConfig>;
  private readonly providers: TokenProviders;
  private readonly now: () => Date;

  constructor(private readonly deps: ExtractionPipelineDeps) {
    this.config = deps.config ?? getExtractionConfig();
    this.now = deps.now ?? (() => new Date());
    this.providers = {
      primary: new VectorPdfTokenProvider(deps.pdfTextSource, { defaultDpi: this.config.rasterDefaultDpi }),
      fallback: deps.textRegionDetector
        ? new FallbackDetectorTokenProvider(deps.textRegionDetector, { enabled: this.config.fallbackDetectorEnabled })
        : undefined,
      merger: new TokenMerger(this.config.tokenMergeIouThreshold),
    };
  }

  async run(request: ExtractionRunRequest): Promise<ExtractionRunReport> {
    const runId = randomUUID();
    const policy = request.policy ?? 'conservative';
    const startedAt = this.now();

    return runContext.run({ projectId: request.projectId, runId }, async () => {
      const log = createChildLogger({ component: 'extraction-pipeline' });
      const steps: RunStep[] = [
        { name: 'extract_objects', status: 'pending' },
        { name: 'build_index', status: 'pending' },
      ];

      const { payloads, rejected } = parseRulePayloads(request.rules, {
        defaultMaxDistancePx: this.config.pairingDefaultMaxDistancePx,
      });

      log.info(
        { pages: request.pages.length, policy, rulesAccepted: payloads.length, rulesRejected: rejected.length },
        'Extraction run started'
      );

      const context = {
        projectId: request.projectId,
        payloads,
        policy,
        doorRole: request.doorRole ?? DEFAULT_DOOR_ROLE,
      };

      const rasterSpecs: Readonly<Record<string, PageRasterSpec>> = request.rasterSpecs ?? {};

      this.startStep(steps, 'extract_objects');
      const pages = await mapWithConcurrency(request.pages, this.config.pageConcurrency, (page) =>
        runContext.run({ projectId: request.projectId, runId, pageId: page.pageId }, () =>
          this.processPage(page, { ...context, rasterSpec: getOwn(rasterSpecs, page.pageId) })
        )
      );
      this.completeStep(steps, 'extract_objects');

      let objectCount = 0;
      let error: string | undefined;
      this.startStep(steps, 'build_index');
      try {
        const objects = await this.deps.store.listProjectObjects(request.projectId);
        objectCount = objects.length;
        await this.deps.store.saveIndex(buildProjectIndex(request.projectId, objects, this.now()));
        this.completeStep(steps, 'build_index');
      } catch (indexError) {
        error = getErrorMessage(indexError);
        this.completeStep(steps, 'build_index', error);
        log.error({ error: indexError }, 'Index build failed');
      }

      const report: ExtractionRunReport = {
        runId,
        projectId: request.projectId,
        policy,
        status: error === undefined ? 'completed' : 'failed',
        startedAt,
        completedAt: this.now(),
        steps,
        pages,
        rulesAccepted: payloads.length,
        rulesRejected: rejected.length,
        objectCount,
        ...(error !== undefined && { error }),
      };

      log.info(
        {
          status: report.status,
          objectCount,
          pagesCompleted: pages.filter((page) => page.status === 'completed').length,
          pagesFailed: pages.filter((page) => page.status === 'failed').length,
        },
        'Extraction run finished'
      );

      return report;
    });
  }

  /**
   * Extract one page and store its objects. Never throws: failures become a failed page report.
   */
  private async processPage(page: PageRef, context: PageContext): Promise<PageExtractionReport> {
    const log = createChildLogger({ pageId: page.pageId });
    const pageType = resolvePageType(page);
    const startTime = Date.now();
    const timeoutMs = this.config.pageTimeoutMs;

    try {
      const outcome = await withTimeout(
        this.extractPage(page, pageType, context),
        timeoutMs,
        () => new PageTimeoutError(page.pageId, timeoutMs)
      );
      await this.deps.store.replacePageObjects(context.projectId, page.pageId, outcome.objects);

      const skipped = pageType !== 'plan' && pageType !== 'schedule';
      return {
        pageId: page.pageId,
        pageType,
        status: skipped ? 'skipped' : 'completed',
        durationMs: Date.now() - startTime,
        ...outcome.report,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      log.error({ error: message, code: isAppError(error) ? error.code : undefined }, 'Page extraction failed');

      await this.clearPage(context.projectId, page.pageId);
      return {
        pageId: page.pageId,
        pageType,
        status: 'failed',
        tokenSource: 'none',
        tokenCount: 0,
        objectCounts: emptyObjectCounts(),
        dropReasons: {},
        durationMs: Date.now() - startTime,
        error: message,
      };
    }
  }

  private async clearPage(projectId: string, pageId: string): Promise<void> {
    try {
      await this.deps.store.replacePageObjects(projectId, pageId, []);
    } catch (error) {
      createChildLogger({ pageId }).error({ error: getErrorMessage(error) }, 'Failed to clear objects of failed page');
    }
  }

  private async extractPage(page: PageRef, pageType: PageType, context: PageContext): Promise<PageOutcome> {
    switch (pageType) {
      case 'plan':
        return this.extractPlanPage(page, context);
      case 'schedule':
        return this.extractSchedulePage(page);
      default:
        createChildLogger({ pageId: page.pageId }).debug({ pageType }, 'No extraction for page type');
        return {
          objects: [],
          report: { tokenSource: 'none', tokenCount: 0, objectCounts: emptyObjectCounts(), dropReasons: {} },
        };
    }
  }

  private async extractPlanPage(page: PageRef, context: PageContext): Promise<PageOutcome> {
    const log = createChildLogger({ pageId: page.pageId });
    const bucketSize = this.config.idBucketSizePx;
    const dropReasons: PageExtractionReport['dropReasons'] = {};

    const pdfBytes = await this.readPdfBytes(page);
    let pendingImage: Promise<Buffer | null> | undefined;
    const loadImageBytes = (): Promise<Buffer | null> => (pendingImage ??= this.readPageImage(page));

    const { tokens, tokenSource } = await extractPageTokens(
      page,
      {
        pdfBytes,
        loadImageBytes: this.config.fallbackDetectorEnabled ? loadImageBytes : undefined,
        rasterSpec: context.rasterSpec,
      },
      this.providers
    );
    if (tokens.length === 0) {
      dropReasons.no_tokens = 1;
    }

    const blockResult = createBlocks(tokens, context.payloads, {
      defaultMaxDistancePx: this.config.pairingDefaultMaxDistancePx,
      relationTolerancePx: this.config.pairingRelationTolerancePx,
      pageId: page.pageId,
    });

    const { rooms, droppedNameOnly } = assembleRooms(page.pageId, blockResult.blocks, {
      policy: context.policy,
      hasPairingRule: blockResult.hasPairingRule,
      bucketSize,
    });
    if (droppedNameOnly > 0) {
      dropReasons.name_only_without_number = droppedNameOnly;
    }

    const doors = assembleDoorsFromTokens(page.pageId, getOwn(blockResult.tokensByRole, context.doorRole) ?? [], {
      policy: context.policy,
      bucketSize,
    });

    const doorDetector = this.deps.doorDetector;
    const imageBytes = doorDetector ? await loadImageBytes() : null;
    if (doorDetector && imageBytes) {
      const raw = await this.detect('doors', () => doorDetector.detect(page.pageId, imageBytes));
      const { items, invalidCount } = parseDetectedDoors(raw);
      const detected = assembleDetectedDoors(page.pageId, items, { bucketSize });
      doors.push(...detected.doors);
      if (detected.skippedLowConfidence > 0) dropReasons.low_confidence_door = detected.skippedLowConfidence;
      if (invalidCount > 0) dropReasons.invalid_detector_output = invalidCount;
    }

    const objects: ExtractedObject[] = [...rooms, ...doors];
    log.info({ tokenSource, tokens: tokens.length, rooms: rooms.length, doors: doors.length }, 'Plan page extracted');

    return {
      objects,
      report: {
        tokenSource,
        tokenCount: tokens.length,
        objectCounts: countObjects(objects),
        dropReasons,
        adapterMetrics: blockResult.metrics,
      },
    };
  }

  private async extractSchedulePage(page: PageRef): Promise<PageOutcome> {
    const dropReasons: PageExtractionReport['dropReasons'] = {};
    const objects: ExtractedObject[] = [];

    const detector = this.deps.scheduleDetector;
    if (detector) {
      const imageBytes = await this.deps.storage.readPageBytes(page);
      const raw = await this.detect('schedules', () => detector.detect(page.pageId, imageBytes));
      const { items, invalidCount } = parseDetectedSchedules(raw);
      const { tables, skippedLowConfidence } = assembleScheduleTables(page.pageId, items, {
        bucketSize: this.config.idBucketSizePx,
      });
      objects.push(...tables);
      if (skippedLowConfidence > 0) dropReasons.low_confidence_schedule = skippedLowConfidence;
      if (invalidCount > 0) dropReasons.invalid_detector_output = invalidCount;
    }

    return {
      objects,
      report: { tokenSource: 'none', tokenCount: 0, objectCounts: countObjects(objects), dropReasons },
    };
  }

  /**
   * A missing or unreadable source PDF means no vector tokens, not a failed page
   */
  private async readPdfBytes(page: PageRef): Promise<Buffer | null> {
    try {
      return await this.deps.storage.readPdfBytes(page);
    } catch (error) {
      createChildLogger({ pageId: page.pageId }).warn({ error: getErrorMessage(error) }, 'Source PDF unreadable');
      return null;
    }
  }

  /**
   * An unreadable page image leaves the image-based detectors without input
   */
  private async readPageImage(page: PageRef): Promise<Buffer | null> {
    try {
      return await this.deps.storage.readPageBytes(page);
    } catch (error) {
      createChildLogger({ pageId: page.pageId }).warn({ error: getErrorMessage(error) }, 'Page image unreadable');
      return null;
    }
  }

  private async detect(detector: string, call: () => Promise<unknown>): Promise<unknown> {
    try {
      return await call();
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new DetectorError(detector, getErrorMessage(error));
    }
  }

  private startStep(steps: RunStep[], name: StepName): void {
    const step = steps.find((candidate) => candidate.name === name);
    if (step) {
      step.status = 'running';
      step.startedAt = this.now();
    }
  }

  private completeStep(steps: RunStep[], name: StepName, error?: string): void {
    const step = steps.find((candidate) => candidate.name === name);
    if (step) {
      step.status = error === undefined ? 'completed' : 'failed';
      step.completedAt = this.now();
      if (error !== undefined) step.error = error;
    }
  }
}
