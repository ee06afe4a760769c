/**
 * Log Normalizer
 *
 * Converts a raw log entry of unknown shape into a `CanonicalLogRecord`.
 * Two source shapes are understood:
 * - plain mappings (REST `LogEntry` JSON, fixtures), keys in snake_case or camelCase
 * - `Entry` objects from `@google-cloud/logging` (`metadata` + decoded `data`)
 *
 * The accessor for an entry is chosen once in `readRawFields`; everything
 * after that works on `RawLogFields` only. Normalization never throws.
 */

import { Entry } from '@google-cloud/logging';
import type { CanonicalLogRecord } from './types';

export const MAX_RECORD_TEXT_CHARS = 2000;

/** Untyped field values as found on the source entry */
export interface RawLogFields {
  timestamp: unknown;
  severity: unknown;
  serviceName: unknown;
  trace: unknown;
  httpRequest: unknown;
  textPayload: unknown;
  structuredPayload: unknown;
  protoPayload: unknown;
}

export interface LogEntryAccessor<T> {
  readonly kind: string;
  read(raw: T): RawLogFields;
}

const EMPTY_FIELDS: RawLogFields = Object.freeze({
  timestamp: undefined,
  severity: undefined,
  serviceName: undefined,
  trace: undefined,
  httpRequest: undefined,
  textPayload: undefined,
  structuredPayload: undefined,
  protoPayload: undefined,
});

// ============================================================================
// Field access helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First defined value among the given key variants */
function pick(source: unknown, ...keys: string[]): unknown {
  if (!isRecord(source)) return undefined;
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function serviceNameOf(resource: unknown): unknown {
  return pick(pick(resource, 'labels'), 'service_name', 'serviceName');
}

// ============================================================================
// Accessors
// ============================================================================

export const mappingAccessor: LogEntryAccessor<Record<string, unknown>> = {
  kind: 'mapping',
  read(raw) {
    let textPayload = pick(raw, 'text_payload', 'textPayload');
    let structuredPayload = pick(raw, 'json_payload', 'jsonPayload');
    const protoPayload = pick(raw, 'proto_payload', 'protoPayload');

    // Client-library style dumps carry a single untyped `payload`
    const payload = pick(raw, 'payload', 'data');
    if (textPayload === undefined && typeof payload === 'string') textPayload = payload;
    if (structuredPayload === undefined && isRecord(payload)) structuredPayload = payload;

    return {
      timestamp: pick(raw, 'timestamp'),
      severity: pick(raw, 'severity'),
      serviceName: serviceNameOf(pick(raw, 'resource')),
      trace: pick(raw, 'trace'),
      httpRequest: pick(raw, 'http_request', 'httpRequest'),
      textPayload,
      structuredPayload,
      protoPayload,
    };
  },
};

export const cloudEntryAccessor: LogEntryAccessor<Entry> = {
  kind: 'cloud-entry',
  read(entry) {
    const metadata: unknown = entry.metadata;
    const data: unknown = entry.data;
    const payloadKind = pick(metadata, 'payload');

    const textPayload = typeof data === 'string' ? data : pick(metadata, 'textPayload');
    const structuredPayload =
      payloadKind === 'jsonPayload' || (payloadKind === undefined && isRecord(data))
        ? data
        : pick(metadata, 'jsonPayload');
    const protoPayload = payloadKind === 'protoPayload' ? (data ?? pick(metadata, 'protoPayload')) : pick(metadata, 'protoPayload');

    return {
      timestamp: pick(metadata, 'timestamp'),
      severity: pick(metadata, 'severity'),
      serviceName: serviceNameOf(pick(metadata, 'resource')),
      trace: pick(metadata, 'trace'),
      httpRequest: pick(metadata, 'httpRequest'),
      textPayload,
      structuredPayload,
      protoPayload,
    };
  },
};

/** Pick the accessor for the entry's concrete shape and read its fields */
export function readRawFields(raw: unknown): RawLogFields {
  if (raw instanceof Entry) return cloudEntryAccessor.read(raw);
  if (isRecord(raw)) return mappingAccessor.read(raw);
  return EMPTY_FIELDS;
}

// ============================================================================
// Value coercion
// ============================================================================

function serializeReplacer(this: unknown, key: string, value: unknown): unknown {
  const holder = this;
  const original = typeof holder === 'object' && holder !== null ? Reflect.get(holder, key) : undefined;
  if (original instanceof Uint8Array) return Buffer.from(original).toString('base64');
  if (typeof value === 'bigint') return value.toString();
  return value;
}

/** JSON text of any value; falls back to String() for circular structures */
export function safeSerialize(value: unknown): string {
  try {
    return JSON.stringify(value, serializeReplacer) ?? '';
  } catch {
    try {
      return String(value);
    } catch {
      return '';
    }
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** At most `limit` UTF-16 units, never ending on half of a surrogate pair */
export function truncateText(text: string, limit = MAX_RECORD_TEXT_CHARS): string {
  if (text.length <= limit) return text;
  const cut = limit > 0 && isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
  return text.slice(0, cut);
}

function toOptionalString(value: unknown): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function toStatus(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d{1,3}$/.test(value.trim())) return Number.parseInt(value, 10);
  return null;
}

function toTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  if (typeof value === 'string') return value;

  // protobuf Timestamp: { seconds, nanos }, seconds possibly a string
  const seconds = Number(pick(value, 'seconds'));
  if (Number.isFinite(seconds)) {
    const nanos = Number(pick(value, 'nanos') ?? 0);
    const millis = seconds * 1000 + (Number.isFinite(nanos) ? Math.floor(nanos / 1e6) : 0);
    const date = new Date(millis);
    return Number.isNaN(date.getTime()) ? '' : date.toISOString();
  }
  return '';
}

/** Payload precedence: text, structured message/msg, structured whole, proto, empty */
function resolveText(fields: RawLogFields): string {
  if (typeof fields.textPayload === 'string' && fields.textPayload.length > 0) {
    return fields.textPayload;
  }

  if (isRecord(fields.structuredPayload)) {
    const message = pick(fields.structuredPayload, 'message', 'msg');
    if (typeof message === 'string' && message.length > 0) return message;
    if (message !== undefined && typeof message !== 'string') return safeSerialize(message);
    return safeSerialize(fields.structuredPayload);
  }

  if (fields.protoPayload !== undefined && fields.protoPayload !== null) {
    return safeSerialize(fields.protoPayload);
  }

  return '';
}

// ============================================================================
// Normalization
// ============================================================================

export function normalizeLogEntry(raw: unknown): CanonicalLogRecord {
  const fields = readRawFields(raw);
  const httpRequest = isRecord(fields.httpRequest) ? fields.httpRequest : null;

  return {
    timestamp: toTimestamp(fields.timestamp),
    severity: toOptionalString(fields.severity),
    service: toOptionalString(fields.serviceName),
    trace: toOptionalString(fields.trace),
    status: httpRequest ? toStatus(pick(httpRequest, 'status')) : null,
    method: httpRequest ? toOptionalString(pick(httpRequest, 'request_method', 'requestMethod')) : null,
    url: httpRequest ? toOptionalString(pick(httpRequest, 'request_url', 'requestUrl')) : null,
    text: truncateText(resolveText(fields)),
  };
}
