import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_EXTRACTION_CONFIG, type ExtractionConfig } from '../../config/env.js';
import type {
  IDoorDetector,
  IPageStorage,
  IScheduleDetector,
  ITextRegionDetector,
  PageRef,
} from '../../contracts/types.js';
import type { PdfPageText, PdfTextSource, PdfWord } from '../../extraction/pdf/PdfTextSource.js';
import { ProjectQueryService } from '../../index/ProjectQueryService.js';
import { InMemoryExtractionStore } from '../../stores/ExtractionStore.js';
import { ExtractionPipeline } from '../ExtractionPipeline.js';

const LETTER = { widthPt: 612, heightPt: 792 };

// 144 DPI on a letter page gives a scale of exactly 2 px per point
const config: ExtractionConfig = {
  ...DEFAULT_EXTRACTION_CONFIG,
  rasterDefaultDpi: 144,
  pageConcurrency: 2,
  pageTimeoutMs: 0,
};

const rules = [
  { kind: 'token_detector', token_type: 'room_name', detector: 'regex', pattern: '[A-Z]{3,}' },
  { kind: 'token_detector', token_type: 'room_number', detector: 'regex', pattern: '\\d{3}' },
  { kind: 'token_detector', role: 'room_number', method: 'regex', pattern: '(' },
  { kind: 'pairing', name_token: 'room_name', number_token: 'room_number', relation: 'below', max_distance_px: 200 },
];

function word(text: string, x0: number, y0: number, x1: number, y1: number): PdfWord {
  return { text, x0, y0, x1, y1 };
}

/**
 * PDF text keyed by the bytes' content, so each page's "PDF" is its own document
 */
function fakePdfSource(documents: Record<string, PdfWord[] | Error | 'hang'>): PdfTextSource {
  return {
    readPage: vi.fn(async (pdfBytes: Buffer): Promise<PdfPageText> => {
      const entry = documents[pdfBytes.toString()];
      if (entry === 'hang') return new Promise<PdfPageText>(() => undefined);
      if (entry instanceof Error) throw entry;
      return { geometry: LETTER, words: entry ?? [] };
    }),
  };
}

function fakeStorage(pdfByPage: Record<string, string | null>): IPageStorage {
  return {
    readPageBytes: vi.fn(async (page: PageRef) => Buffer.from(`png:${page.pageId}`)),
    readPdfBytes: vi.fn(async (page: PageRef) => {
      const pdf = pdfByPage[page.pageId];
      return pdf ? Buffer.from(pdf) : null;
    }),
  };
}

const plans = {
  'doc-1': [word('CLASSE', 50, 40, 80, 50), word('203', 50, 55, 70, 65), word('HALL', 200, 40, 220, 50)],
  'doc-2': [word('CLASSE', 300, 300, 330, 310), word('203', 300, 315, 320, 325)],
};

function regionDetector(): ITextRegionDetector {
  return {
    detect: vi.fn(async () => ({
      regions: [
        { bbox: [100, 80, 60, 20], text: 'CLASSE', confidence: 0.9 },
        { bbox: [100, 110, 40, 20], text: '105', confidence: 0.7 },
      ],
    })),
  };
}

const pages: PageRef[] = [
  { projectId: 'project-1', pageId: 'p1', pageType: 'plan' },
  { projectId: 'project-1', pageId: 'p2' },
  { projectId: 'project-1', pageId: 'p3', pageType: 'notes' },
  { projectId: 'project-1', pageId: 'p4', pageType: 'plan' },
  { projectId: 'project-1', pageId: 'p5', pageType: 'plan' },
];

function setup() {
  const store = new InMemoryExtractionStore();
  const textRegionDetector = regionDetector();
  const pipeline = new ExtractionPipeline({
    storage: fakeStorage({ p1: 'doc-1', p2: 'doc-2', p3: 'doc-1', p4: 'doc-broken', p5: null }),
    store,
    pdfTextSource: fakePdfSource({ ...plans, 'doc-broken': new Error('boom') }),
    textRegionDetector,
    config,
    now: () => new Date('2026-02-01T00:00:00Z'),
  });
  return { store, pipeline, textRegionDetector };
}

describe('ExtractionPipeline', () => {
  it('extracts every page independently', async () => {
    const { pipeline, textRegionDetector } = setup();

    const report = await pipeline.run({ projectId: 'project-1', pages, rules });

    expect(report.status).toBe('completed');
    expect(report.rulesAccepted).toBe(3);
    expect(report.rulesRejected).toBe(1);
    expect(report.objectCount).toBe(3);
    expect(report.steps.map((step) => [step.name, step.status])).toEqual([
      ['extract_objects', 'completed'],
      ['build_index', 'completed'],
    ]);
    expect(report.pages.map((page) => [page.pageId, page.status])).toEqual([
      ['p1', 'completed'],
      ['p2', 'completed'],
      ['p3', 'skipped'],
      ['p4', 'failed'],
      ['p5', 'completed'],
    ]);

    const [p1, , , p4, p5] = report.pages;
    expect(p1).toMatchObject({
      pageType: 'plan',
      tokenSource: 'vector',
      tokenCount: 3,
      objectCounts: { room: 1, door: 0, schedule_table: 0 },
      dropReasons: { name_only_without_number: 1 },
    });
    expect(p4.error).toBe('boom');
    expect(p5).toMatchObject({ tokenSource: 'model', tokenCount: 2 });

    expect(textRegionDetector.detect).toHaveBeenCalledTimes(1);
    expect(textRegionDetector.detect).toHaveBeenCalledWith('p5', Buffer.from('png:p5'));
  });

  it('stores rooms in page-pixel space', async () => {
    const { pipeline, store } = setup();
    await pipeline.run({ projectId: 'project-1', pages, rules });

    const [classroom] = await store.getPageObjects('project-1', 'p1');
    expect(classroom).toMatchObject({
      type: 'room',
      label: 'CLASSE 203',
      geometry: { type: 'bbox', bbox: [100, 80, 60, 50] },
      confidence: 1,
      roomName: 'CLASSE',
      roomNumber: '203',
      sources: ['text_detected', 'token_pairing', 'guide_payload'],
    });

    const [fallbackRoom] = await store.getPageObjects('project-1', 'p5');
    expect(fallbackRoom.label).toBe('CLASSE 105');
    expect(fallbackRoom.confidence).toBeCloseTo(0.8);

    expect(await store.getPageObjects('project-1', 'p4')).toEqual([]);
  });

  it('keeps both candidates for a number printed on two pages', async () => {
    const { pipeline, store } = setup();
    await pipeline.run({ projectId: 'project-1', pages, rules });

    const result = await new ProjectQueryService(store).query('project-1', { roomNumber: '203' });

    expect(result.ambiguous).toBe(true);
    expect(result.matches.map((match) => match.pageId).sort()).toEqual(['p1', 'p2']);
  });

  it('produces the same objects when run again', async () => {
    const { pipeline, store } = setup();

    await pipeline.run({ projectId: 'project-1', pages, rules });
    const first = (await store.listProjectObjects('project-1')).map((object) => object.id);
    await pipeline.run({ projectId: 'project-1', pages, rules, policy: 'relaxed' });
    const second = await store.listProjectObjects('project-1');

    expect(second.map((object) => object.id)).toEqual(first);
    const [classroom] = await store.getPageObjects('project-1', 'p1');
    expect(classroom.sources).toContain('extraction_policy:relaxed');
  });

  it('extracts nothing without rules', async () => {
    const { pipeline } = setup();

    const report = await pipeline.run({ projectId: 'project-1', pages: [pages[0]], rules: [] });

    expect(report.objectCount).toBe(0);
    expect(report.pages[0]).toMatchObject({ status: 'completed', tokenCount: 3, objectCounts: { room: 0 } });
  });

  it('keeps vector tokens when the page image cannot be read', async () => {
    const storage = fakeStorage({ p1: 'doc-1', p5: null });
    storage.readPageBytes = vi.fn(async () => {
      throw new Error('image missing');
    });
    const textRegionDetector = regionDetector();
    const pipeline = new ExtractionPipeline({
      storage,
      store: new InMemoryExtractionStore(),
      pdfTextSource: fakePdfSource(plans),
      textRegionDetector,
      config,
    });

    const report = await pipeline.run({
      projectId: 'project-1',
      pages: [pages[0], pages[4]],
      rules,
    });

    expect(report.pages[0]).toMatchObject({
      status: 'completed',
      tokenSource: 'vector',
      tokenCount: 3,
      objectCounts: { room: 1 },
    });
    expect(report.pages[1]).toMatchObject({
      status: 'completed',
      tokenSource: 'none',
      tokenCount: 0,
      dropReasons: { no_tokens: 1 },
    });
    expect(storage.readPageBytes).toHaveBeenCalledTimes(1);
    expect(textRegionDetector.detect).not.toHaveBeenCalled();
  });

  it('indexes rooms whose names are built-in object keys', async () => {
    const store = new InMemoryExtractionStore();
    const pipeline = new ExtractionPipeline({
      storage: fakeStorage({ p1: 'doc-keys' }),
      store,
      pdfTextSource: fakePdfSource({
        'doc-keys': [word('constructor', 50, 40, 80, 50), word('203', 50, 55, 70, 65)],
      }),
      config,
    });

    const report = await pipeline.run({ projectId: 'project-1', pages: [pages[0]], rules });

    expect(report.steps.map((step) => [step.name, step.status])).toEqual([
      ['extract_objects', 'completed'],
      ['build_index', 'completed'],
    ]);
    const result = await new ProjectQueryService(store).query('project-1', { roomName: 'constructor' });
    expect(result.matches.map((match) => match.label)).toEqual(['constructor 203']);
    expect(result.matches[0].reasons).toEqual(['room_name_match', 'unique_match']);
  });

  it('fails a page that exceeds its time box', async () => {
    const store = new InMemoryExtractionStore();
    const pipeline = new ExtractionPipeline({
      storage: fakeStorage({ p6: 'doc-slow' }),
      store,
      pdfTextSource: fakePdfSource({ 'doc-slow': 'hang' }),
      config: { ...config, pageTimeoutMs: 20 },
    });

    const report = await pipeline.run({
      projectId: 'project-1',
      pages: [{ projectId: 'project-1', pageId: 'p6' }],
      rules,
    });

    expect(report.pages[0]).toMatchObject({ status: 'failed', error: 'Page p6 timed out after 20ms' });
    expect(report.status).toBe('completed');
  });

  it('adds detected doors and schedule tables', async () => {
    const store = new InMemoryExtractionStore();
    const doorDetector: IDoorDetector = {
      detect: vi.fn(async () => ({
        doors: [
          { bbox: [300, 300, 30, 30], door_number: 'D1', door_type: 'single', confidence: 0.9 },
          { bbox: [0, 0, 10, 10], confidence: 0.2 },
          { bbox: [1, 1, 0, 0] },
        ],
      })),
    };
    const scheduleDetector: IScheduleDetector = {
      detect: vi.fn(async () => [
        {
          schedule_type: 'finish',
          title: 'FINISHES',
          bbox: [0, 0, 100, 100],
          headers: ['Room', 'Floor'],
          rows: [['203', 'Tile']],
          confidence: 0.9,
        },
      ]),
    };
    const pipeline = new ExtractionPipeline({
      storage: fakeStorage({ p1: 'doc-1' }),
      store,
      pdfTextSource: fakePdfSource(plans),
      doorDetector,
      scheduleDetector,
      config,
    });

    const report = await pipeline.run({
      projectId: 'project-1',
      pages: [
        { projectId: 'project-1', pageId: 'p1', pageType: 'plan' },
        { projectId: 'project-1', pageId: 's1', pageType: 'schedule' },
      ],
      rules,
    });

    expect(report.pages[0]).toMatchObject({
      objectCounts: { room: 1, door: 1, schedule_table: 0 },
      dropReasons: { name_only_without_number: 1, low_confidence_door: 1, invalid_detector_output: 1 },
    });
    expect(report.pages[1]).toMatchObject({ status: 'completed', objectCounts: { schedule_table: 1 } });
    expect(scheduleDetector.detect).toHaveBeenCalledWith('s1', Buffer.from('png:s1'));

    const [table] = await store.getPageObjects('project-1', 's1');
    expect(table).toMatchObject({ label: 'FINISHES', rows: [{ rowIndex: 0, cells: ['203', 'Tile'] }] });
  });

  it('fails the page when a detector fails', async () => {
    const pipeline = new ExtractionPipeline({
      storage: fakeStorage({ p1: 'doc-1' }),
      store: new InMemoryExtractionStore(),
      pdfTextSource: fakePdfSource(plans),
      doorDetector: {
        detect: vi.fn(async () => {
          throw new Error('offline');
        }),
      },
      config,
    });

    const report = await pipeline.run({
      projectId: 'project-1',
      pages: [{ projectId: 'project-1', pageId: 'p1' }],
      rules,
    });

    expect(report.pages[0]).toMatchObject({ status: 'failed', error: 'Detector failed (doors): offline' });
  });
});
