/**
 * Report Renderer
 *
 * Bounded text blocks for log records and the Markdown body posted on the
 * pull request.
 */

import { truncateText } from '../log-query/log-normalizer';
import { formatUtc } from '../log-query/time-window';
import type { CanonicalLogRecord, TimeWindow } from '../log-query/types';

export const NO_LOGS_PLACEHOLDER = '_No logs in window._';
export const TRUNCATION_MARKER = '\n…(truncated)…';
export const RAW_PAYLOAD_MAX_CHARS = 6000;

export type RecordOrder = 'native' | 'chronological';

export interface LogBlockOptions {
  maxLines: number;
  maxChars: number;
  /** `native` keeps store order (newest first) */
  order?: RecordOrder;
}

function field(value: string | number | null): string {
  return value === null || value === '' ? '-' : String(value);
}

function recordHeader(record: CanonicalLogRecord, index: number): string {
  const position = String(index + 1).padStart(2, '0');
  return [
    position,
    field(record.timestamp),
    field(record.severity),
    `svc=${field(record.service)}`,
    `status=${field(record.status)}`,
    `method=${field(record.method)}`,
    `url=${field(record.url)}`,
  ].join(' ');
}

/**
 * At most `maxLines` records, then at most `maxChars` characters plus the
 * truncation marker. In chronological order the newest `maxLines` records
 * are kept and shown oldest first.
 */
export function formatLogBlock(records: readonly CanonicalLogRecord[], options: LogBlockOptions): string {
  const { maxLines, maxChars, order = 'native' } = options;
  const newest = records.slice(0, Math.max(0, maxLines));
  const selected = order === 'chronological' ? [...newest].reverse() : newest;

  if (selected.length === 0) {
    return NO_LOGS_PLACEHOLDER;
  }

  const blob = selected.map((record, index) => `${recordHeader(record, index)}\n${record.text}`).join('\n\n');
  return blob.length > maxChars ? truncateText(blob, maxChars) + TRUNCATION_MARKER : blob;
}

/** Backtick fence longer than any backtick run inside the block */
function fence(block: string, language = ''): string {
  if (block === NO_LOGS_PLACEHOLDER) return block;
  const longestRun = Math.max(0, ...(block.match(/`+/g) ?? []).map((run) => run.length));
  const marker = '`'.repeat(Math.max(3, longestRun + 1));
  return `${marker}${language}\n${block}\n${marker}`;
}

// ============================================================================
// Report body
// ============================================================================

export interface ReportInput {
  mentionHandle: string;
  window: TimeWindow;
  halfWidthMinutes: number;
  services: readonly string[];
  requestRecords: readonly CanonicalLogRecord[];
  errorRecords: readonly CanonicalLogRecord[];
  /** Trace the error query was scoped to */
  trace: string | null;
  /** Fallback stage that supplied the error records, if any */
  fallbackStage: string | null;
  logErrors: readonly string[];
  /** Total budget, split evenly between the two blocks */
  maxLines: number;
  maxChars: number;
  rawPayload: unknown;
}

function serializePayload(payload: unknown): string {
  try {
    return JSON.stringify(payload) ?? 'null';
  } catch (error) {
    return `<unserializable payload: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

function errorBlockTitle(input: ReportInput): string {
  if (input.fallbackStage) {
    return `**Container logs (${input.fallbackStage}, no errors matched):**`;
  }
  return input.trace
    ? `**Container errors (trace \`${input.trace}\`):**`
    : '**Container errors:**';
}

export function buildReportBody(input: ReportInput): string {
  const blockOptions: LogBlockOptions = {
    maxLines: Math.floor(input.maxLines / 2),
    maxChars: Math.floor(input.maxChars / 2),
  };
  const services = input.services.length > 0 ? input.services.join(', ') : 'unknown';

  const sections = [
    `Paging @${input.mentionHandle}: unusual HTTP statuses or errors detected`,
    `**Window:** \`${formatUtc(input.window.start)} – ${formatUtc(input.window.end)}\` (±${input.halfWidthMinutes}m)\n` +
      `**Services seen:** \`${services}\``,
    `**Request anomalies:**\n${fence(formatLogBlock(input.requestRecords, blockOptions))}`,
    `${errorBlockTitle(input)}\n${fence(formatLogBlock(input.errorRecords, blockOptions))}`,
  ];

  if (input.logErrors.length > 0) {
    sections.push(`**Log query errors:**\n${input.logErrors.map((error) => `- ${error}`).join('\n')}`);
  }

  const raw = truncateText(serializePayload(input.rawPayload), RAW_PAYLOAD_MAX_CHARS);
  sections.push(
    `<details><summary>Raw webhook payload</summary>\n\n${fence(raw, 'json')}\n</details>`
  );

  return sections.join('\n\n');
}
