export interface PlaceRecord {
  name: string;
  address?: string;
  website?: string;
  phoneNumber?: string;
  reviewsCount?: number;
  reviewsAverage?: number;
  latitude?: number;
  longitude?: number;
}

export type RecordBatch = PlaceRecord[];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export type DiscoveryOutcome = 'target-reached' | 'exhausted' | 'gave-up';

export interface DiscoveryResult<E> {
  outcome: DiscoveryOutcome;
  entries: E[];
  iterations: number;
  lastCount: number;
}

export interface EntryFailure {
  index: number;
  key?: string;
  kind: 'parse' | 'extraction';
  message: string;
}

export type EntryOutcome =
  | { ok: true; record: PlaceRecord }
  | { ok: false; failure: EntryFailure };

export interface CollectionResult {
  records: RecordBatch;
  failures: EntryFailure[];
  cancelled: boolean;
}

export type QueryStatus = 'completed' | 'failed' | 'skipped';

export interface QueryReport {
  query: string;
  outputName: string;
  status: QueryStatus;
  outcome?: DiscoveryOutcome;
  discovered: number;
  records: number;
  failures: EntryFailure[];
  files: string[];
  error?: string;
}

export interface BatchSummary {
  reports: QueryReport[];
  cancelled: boolean;
  /** The session became unusable and the remaining queries were skipped. */
  aborted: boolean;
}

export interface ScrapeOptions {
  /** Maximum entries per query; unbounded when omitted. */
  total?: number;
  headless?: boolean;
  outputDir?: string;
  maxScrollIterations?: number;
}

export interface ScrapeRequest {
  queries: string[];
  options?: ScrapeOptions;
}

// Streaming types
export type StreamEventType = 'progress' | 'data' | 'error' | 'complete';

export interface BaseStreamEvent {
  requestId: string;
  timestamp: number;
}

export interface StreamProgressEvent extends BaseStreamEvent {
  type: 'progress';
  message: string;
  query?: string;
  progress?: number; // 0-100
}

export interface StreamDataEvent extends BaseStreamEvent {
  type: 'data';
  query: string;
  data: RecordBatch;
  files: string[];
}

export interface StreamErrorEvent extends BaseStreamEvent {
  type: 'error';
  error: string;
  query?: string;
}

export interface StreamCompleteEvent extends BaseStreamEvent {
  type: 'complete';
  totalItems: number;
  duration?: number; // milliseconds
}

export type StreamEvent =
  | StreamProgressEvent
  | StreamDataEvent
  | StreamErrorEvent
  | StreamCompleteEvent;

// Handlers emit events without requestId/timestamp; the service adds them
export type PartialStreamEvent =
  | Omit<StreamProgressEvent, 'requestId' | 'timestamp'>
  | Omit<StreamDataEvent, 'requestId' | 'timestamp'>
  | Omit<StreamErrorEvent, 'requestId' | 'timestamp'>
  | Omit<StreamCompleteEvent, 'requestId' | 'timestamp'>;

export type StreamCallback<E = PartialStreamEvent> = (event: E) => void;

export interface ScrapeSuccessResponse {
  success: true;
  requestId: string;
  data: BatchSummary;
}

export interface ScrapeErrorResponse {
  success: false;
  error: string;
  details?: Record<string, unknown>;
}

export type ScrapeResponse = ScrapeSuccessResponse | ScrapeErrorResponse;

/** Receives one finished batch per query; returns the paths it wrote. */
export interface RecordSink {
  write(name: string, records: RecordBatch): Promise<string[]>;
}
