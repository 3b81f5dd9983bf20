/**
 * Floor-plan label extraction - Contract Types
 *
 * Plain data shapes shared by the token providers, the block adapter, the
 * assemblers and the index. Everything here is serializable; bboxes are
 * always [x, y, width, height] in page-pixel space.
 */

/**
 * Bounding box [x, y, width, height] in pixels, origin top-left
 */
export type Bbox = readonly [number, number, number, number];

/**
 * Origin of a text token, highest priority first
 */
export type TokenSource = 'vector' | 'model' | 'ocr';

export const TOKEN_SOURCE_PRIORITY: Readonly<Record<TokenSource, number>> = {
  vector: 0,
  model: 1,
  ocr: 2,
};

/**
 * A recognized text fragment. Immutable once produced.
 */
export interface TextToken {
  readonly text: string;
  readonly bbox: Bbox;
  /** 1.0 for vector text */
  readonly confidence: number;
  readonly source: TokenSource;
  readonly pageId?: string;
}

/**
 * Target pixel space for token coordinates
 */
export interface PageRasterSpec {
  widthPx: number;
  heightPx: number;
  dpi?: number;
  rotation?: number;
}

/**
 * Page size in PDF points
 */
export interface PdfPageGeometry {
  widthPt: number;
  heightPt: number;
}

/**
 * Reference to a page inside a project
 */
export interface PageRef {
  projectId: string;
  pageId: string;
  /** 0-based page index inside the source PDF */
  pageNumber?: number;
  /** Plan pages yield rooms and doors, schedule pages yield schedule tables */
  pageType?: PageType;
}

export type PageType = 'plan' | 'schedule' | 'notes' | 'legend' | 'detail' | 'unknown';

// ============================================================================
// Rule payloads
// ============================================================================

export type DetectorMethod = 'regex' | 'length';

export type PairingRelation = 'below' | 'above' | 'left' | 'right' | 'nearest';

export interface TokenDetectorPayload {
  kind: 'token_detector';
  /** Semantic role, e.g. room_name, room_number, door_number */
  role: string;
  method: DetectorMethod;
  pattern?: string;
  minLength?: number;
}

export interface PairingPayload {
  kind: 'pairing';
  nameRole: string;
  numberRole: string;
  relation: PairingRelation;
  maxDistancePx: number;
}

export interface ExcludePayload {
  kind: 'exclude';
  pattern: string;
  reason?: string;
}

/**
 * Externally supplied matching rule, closed over its kind
 */
export type RulePayload = TokenDetectorPayload | PairingPayload | ExcludePayload;

// ============================================================================
// Blocks
// ============================================================================

/**
 * A labeled region built from a name token and, when paired, a number token
 */
export interface SyntheticBlock {
  bbox: Bbox;
  /** Newline-joined constituent texts */
  text: string;
  nameValue: string;
  numberValue?: string;
  confidence: number;
  sourceTexts: string[];
}

export interface AdapterMetrics {
  tokensInput: number;
  nameTokens: number;
  numberTokens: number;
  blocksCreated: number;
  pairedWithNumber: number;
  nameOnly: number;
  /** Number candidates left unconsumed after pairing */
  unpairedNumbers: number;
  excludedByRule: number;
  excludedReasons: Record<string, number>;
  roomsWithNumberRatio: number;
}

// ============================================================================
// Extracted objects
// ============================================================================

export type ObjectType = 'room' | 'door' | 'schedule_table';

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export type ExtractionPolicy = 'conservative' | 'relaxed';

export type DoorType = 'single' | 'double' | 'sliding' | 'revolving' | 'unknown';

export interface Geometry {
  type: 'bbox';
  bbox: Bbox;
}

interface ExtractedObjectBase {
  id: string;
  pageId: string;
  label: string;
  geometry: Geometry;
  confidence: number;
  /** Provenance tags */
  sources: string[];
}

export interface ExtractedRoom extends ExtractedObjectBase {
  type: 'room';
  roomName: string;
  roomNumber?: string;
}

export interface ExtractedDoor extends ExtractedObjectBase {
  type: 'door';
  doorNumber?: string;
  doorType: DoorType;
}

export interface ScheduleRow {
  rowIndex: number;
  cells: string[];
}

export interface ExtractedScheduleTable extends ExtractedObjectBase {
  type: 'schedule_table';
  scheduleType: string;
  headers: string[];
  rows: ScheduleRow[];
}

export type ExtractedObject = ExtractedRoom | ExtractedDoor | ExtractedScheduleTable;

// ============================================================================
// Index and query
// ============================================================================

export interface ProjectIndex {
  projectId: string;
  generatedAt: Date;
  roomsByNumber: Record<string, string[]>;
  roomsByName: Record<string, string[]>;
  objectsByType: Record<string, string[]>;
}

export interface QueryCriteria {
  roomNumber?: string;
  roomName?: string;
  type?: ObjectType;
}

export type MatchReason = 'room_number_match' | 'room_name_match' | 'type_match' | 'unique_match';

export interface QueryMatch {
  objectId: string;
  pageId: string;
  type: ObjectType;
  label: string;
  score: number;
  geometry: Geometry;
  confidenceLevel: ConfidenceLevel;
  reasons: MatchReason[];
}

export interface QueryResult {
  projectId: string;
  query: QueryCriteria;
  matches: QueryMatch[];
  ambiguous: boolean;
  message?: string;
}

// ============================================================================
// External collaborators
// ============================================================================

/**
 * Storage collaborator for page rasters and source PDFs
 */
export interface IPageStorage {
  readPageBytes(page: PageRef): Promise<Buffer>;
  /** Null when the page was uploaded without its source PDF */
  readPdfBytes(page: PageRef): Promise<Buffer | null>;
}

/**
 * Model-based text region detector used as fallback token source
 */
export interface DetectedTextRegion {
  bbox: Bbox;
  text: string;
  confidence: number;
}

export interface ITextRegionDetector {
  detect(pageId: string, imageBytes: Buffer): Promise<unknown>;
}

export interface DetectedDoor {
  bbox: Bbox;
  doorNumber?: string;
  doorType?: string;
  confidence: number;
}

export interface IDoorDetector {
  detect(pageId: string, imageBytes: Buffer): Promise<unknown>;
}

export interface DetectedSchedule {
  scheduleType: string;
  title?: string;
  bbox: Bbox;
  headers: string[];
  rows: string[][];
  confidence: number;
}

export interface IScheduleDetector {
  detect(pageId: string, imageBytes: Buffer): Promise<unknown>;
}
