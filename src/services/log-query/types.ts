/**
 * Log query domain types shared by the builder, normalizer and fetcher.
 */

/** Cloud Logging filter expression (without the time range) */
export type LogFilter = string;

/** UTC time range; recomputed per stage, never mutated */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Optional constraints applied to every filter.
 * `null` / empty means "no constraint on that dimension".
 */
export interface FilterScope {
  readonly region: string | null;
  readonly services: readonly string[];
}

/** Cloud Run log streams selectable for the tail fallback */
export type LogStream = 'stderr' | 'stdout';

/** Shape-independent log entry used after ingestion */
export interface CanonicalLogRecord {
  /** ISO-8601 or empty */
  timestamp: string;
  /** Store-defined level, passed through as-is */
  severity: string | null;
  service: string | null;
  trace: string | null;
  status: number | null;
  method: string | null;
  url: string | null;
  /** Always present, at most MAX_RECORD_TEXT_CHARS long */
  text: string;
}

export interface FetchResult {
  records: CanonicalLogRecord[];
  /** Short human-readable summary when the query failed */
  error: string | null;
}

/** One attempt of an escalating fallback sequence */
export interface FallbackStage {
  readonly label: string;
  readonly filter: LogFilter;
  readonly window: TimeWindow;
  readonly pageSize: number;
}

export interface FallbackResult extends FetchResult {
  /** Label of the stage whose result was kept, null when every stage came back empty */
  stage: string | null;
  attempts: number;
}
