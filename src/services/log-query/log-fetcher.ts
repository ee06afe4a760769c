/**
 * Log Fetcher
 *
 * Runs filters against the log store. `fetchLogs` never rejects: query
 * failures come back as a summary next to an empty record list.
 */

import { logger as defaultLogger, type Logger } from '../../lib/logger';
import { buildStreamTailFilter, withTimeRange } from './filter-builder';
import { normalizeLogEntry } from './log-normalizer';
import type { LogStore } from './log-store';
import { classifyQueryError } from './query-errors';
import { formatUtc, widenWindow } from './time-window';
import type {
  FallbackResult,
  FallbackStage,
  FetchResult,
  FilterScope,
  LogFilter,
  TimeWindow,
} from './types';

export async function fetchLogs(
  store: LogStore,
  filter: LogFilter,
  window: TimeWindow,
  pageSize: number,
  log: Logger = defaultLogger
): Promise<FetchResult> {
  const range = { start: formatUtc(window.start), end: formatUtc(window.end) };

  try {
    const entries = await store.listEntries({ filter: withTimeRange(filter, window), pageSize });
    const records = entries.slice(0, pageSize).map(normalizeLogEntry);
    log.debug({ ...range, count: records.length }, '[LogFetcher] query completed');
    return { records, error: null };
  } catch (error) {
    const classified = classifyQueryError(error);
    if (classified.kind === 'unknown') {
      log.error({ err: error, ...range, filter }, '[LogFetcher] unexpected log query failure');
    } else {
      log.warn({ kind: classified.kind, ...range, summary: classified.summary }, '[LogFetcher] log query failed');
    }
    return { records: [], error: classified.summary };
  }
}

/**
 * Execute stages in order and keep the first result that is non-empty or
 * failed. Stages are independent queries; nothing is merged.
 */
export async function runFallbackChain(
  store: LogStore,
  stages: readonly FallbackStage[],
  log: Logger = defaultLogger
): Promise<FallbackResult> {
  let attempts = 0;

  for (const stage of stages) {
    attempts += 1;
    const result = await fetchLogs(store, stage.filter, stage.window, stage.pageSize, log);
    if (result.error !== null || result.records.length > 0) {
      log.info({ stage: stage.label, attempts, count: result.records.length }, '[LogFetcher] fallback stage produced a result');
      return { ...result, stage: stage.label, attempts };
    }
  }

  return { records: [], error: null, stage: null, attempts };
}

export interface TailStageOptions {
  /** Pre-trigger tail window, ends at the trigger */
  window: TimeWindow;
  /** Minutes the last stage moves the window start back by */
  extraMinutes: number;
  pageSize: number;
}

export const TAIL_STAGE_LABELS = {
  stderr: 'stderr tail',
  stderrStdout: 'stderr+stdout tail',
  widened: 'stderr+stdout tail (widened)',
} as const;

/**
 * stderr alone, then stderr+stdout, then stderr+stdout over a wider window.
 */
export function buildTailStages(scope: FilterScope, options: TailStageOptions): FallbackStage[] {
  const { window, extraMinutes, pageSize } = options;
  const both = buildStreamTailFilter(scope, ['stderr', 'stdout']);
  return [
    { label: TAIL_STAGE_LABELS.stderr, filter: buildStreamTailFilter(scope, ['stderr']), window, pageSize },
    { label: TAIL_STAGE_LABELS.stderrStdout, filter: both, window, pageSize },
    { label: TAIL_STAGE_LABELS.widened, filter: both, window: widenWindow(window, extraMinutes), pageSize },
  ];
}
