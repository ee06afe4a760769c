/**
 * Cloud Logging Filter Builder
 *
 * Pure string assembly of logging query language filters for Cloud Run.
 * Nothing here performs I/O; the time range is appended separately by
 * `withTimeRange` because it changes per query window.
 *
 * @see https://cloud.google.com/logging/docs/view/logging-query-language
 */

import type { FilterScope, LogFilter, LogStream, TimeWindow } from './types';
import { formatUtc } from './time-window';

// ============================================================================
// Constants
// ============================================================================

export const CLOUD_RUN_RESOURCE_TYPE = 'cloud_run_revision';

/** Successful and redirect statuses that are never reported */
export const EXPECTED_STATUSES: readonly number[] = [200, 201, 202, 204, 206, 301, 302, 303, 304, 307, 308];

/** Statuses outside the expected set that are still treated as noise */
export const IGNORED_STATUSES: readonly number[] = [404];

export const ERROR_KEYWORDS: readonly string[] = ['Traceback', 'Exception', 'CRITICAL', 'panic:'];

const STRUCTURED_ERROR_TERMS: readonly string[] = ['error', 'exception'];

const HEALTH_CHECK_USER_AGENT = 'GoogleHC';
const HEALTH_CHECK_PATH = '/health';

const REQUEST_LOG = 'run.googleapis.com%2Frequests';
const STREAM_LOGS: Record<LogStream, string> = {
  stderr: 'run.googleapis.com%2Fstderr',
  stdout: 'run.googleapis.com%2Fstdout',
};

// ============================================================================
// Clause helpers
// ============================================================================

/** Escape a value for use inside a double-quoted filter literal */
export function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function anyOf(clauses: string[]): string {
  return clauses.length === 1 ? clauses[0] : `(${clauses.join(' OR ')})`;
}

function logNameClause(logId: string): string {
  return `logName=~${quote(`projects/.*/logs/${logId}$`)}`;
}

function joinClauses(clauses: string[]): LogFilter {
  return clauses.join('\nAND ');
}

/** Clauses every filter starts with: resource type, then optional region and services */
function scopeClauses(scope: FilterScope): string[] {
  const clauses = [`resource.type=${quote(CLOUD_RUN_RESOURCE_TYPE)}`];
  if (scope.region) {
    clauses.push(`resource.labels.location=${quote(scope.region)}`);
  }
  if (scope.services.length > 0) {
    clauses.push(anyOf(scope.services.map((service) => `resource.labels.service_name=${quote(service)}`)));
  }
  return clauses;
}

function streamClause(streams: readonly LogStream[]): string {
  return anyOf(streams.map((stream) => logNameClause(STREAM_LOGS[stream])));
}

// ============================================================================
// Request anomalies
// ============================================================================

/**
 * In-process twin of the status predicate in `buildRequestAnomalyFilter`.
 */
export function isAnomalousStatus(status: number): boolean {
  return !EXPECTED_STATUSES.includes(status) && !IGNORED_STATUSES.includes(status);
}

function anomalousStatusClause(): string {
  const excluded = [...EXPECTED_STATUSES, ...IGNORED_STATUSES];
  return [
    'httpRequest.status>0',
    ...excluded.map((status) => `httpRequest.status!=${status}`),
  ].join(' AND ');
}

/**
 * Request log entries whose status is outside the success/redirect set,
 * minus health checks and 404s.
 */
export function buildRequestAnomalyFilter(scope: FilterScope): LogFilter {
  return joinClauses([
    ...scopeClauses(scope),
    logNameClause(REQUEST_LOG),
    `NOT httpRequest.userAgent:${quote(HEALTH_CHECK_USER_AGENT)}`,
    `NOT httpRequest.requestUrl:${quote(HEALTH_CHECK_PATH)}`,
    `(${anomalousStatusClause()})`,
  ]);
}

// ============================================================================
// Container errors
// ============================================================================

function errorSignalClause(): string {
  const keywords = ERROR_KEYWORDS.map(quote).join(' OR ');
  const terms = STRUCTURED_ERROR_TERMS.map(quote).join(' OR ');
  return `(severity>=ERROR OR textPayload:(${keywords}) OR jsonPayload.message:(${terms}))`;
}

/**
 * Error-level application output on stderr/stdout. The request log is
 * excluded so a failing request is not counted twice.
 *
 * @param trace - full trace resource name to scope to, when known
 */
export function buildContainerErrorFilter(scope: FilterScope, trace?: string | null): LogFilter {
  const clauses = [
    ...scopeClauses(scope),
    streamClause(['stderr', 'stdout']),
    `NOT ${logNameClause(REQUEST_LOG)}`,
    errorSignalClause(),
  ];
  if (trace) {
    clauses.push(`trace=${quote(trace)}`);
  }
  return joinClauses(clauses);
}

/**
 * Everything written to the given streams, regardless of severity.
 * Used by the tail fallback stages.
 */
export function buildStreamTailFilter(scope: FilterScope, streams: readonly LogStream[]): LogFilter {
  if (streams.length === 0) {
    throw new RangeError('buildStreamTailFilter needs at least one stream');
  }
  return joinClauses([...scopeClauses(scope), streamClause(streams)]);
}

// ============================================================================
// Time range
// ============================================================================

export function timeRangeClause(window: TimeWindow): string {
  return `timestamp>=${quote(formatUtc(window.start))} AND timestamp<=${quote(formatUtc(window.end))}`;
}

/** Final query text for one window */
export function withTimeRange(filter: LogFilter, window: TimeWindow): string {
  return `${filter}\nAND ${timeRangeClause(window)}`;
}
