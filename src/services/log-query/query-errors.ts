/**
 * Log query failure taxonomy
 *
 * Failures are classified for diagnostics only; every kind ends up as a
 * short summary next to an empty result set.
 */

export type QueryErrorKind = 'api' | 'retry_exhausted' | 'auth' | 'value' | 'unknown';

export interface ClassifiedQueryError {
  kind: QueryErrorKind;
  summary: string;
}

export const MAX_ERROR_SUMMARY_CHARS = 300;

export const PERMISSION_HINT =
  'hint: grant roles/logging.viewer to the service account running the bridge';
export const CREDENTIALS_HINT =
  'hint: no Google credentials found; run on Cloud Run with a service account or set GOOGLE_APPLICATION_CREDENTIALS';

/** gRPC status codes surfaced by google-gax errors */
const GRPC_STATUS = {
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  UNAVAILABLE: 14,
  UNAUTHENTICATED: 16,
} as const;

const RETRY_CODES = new Set<number>([
  GRPC_STATUS.DEADLINE_EXCEEDED,
  GRPC_STATUS.RESOURCE_EXHAUSTED,
  GRPC_STATUS.UNAVAILABLE,
]);

const MISSING_CREDENTIALS_PATTERN = /could not load the default credentials|invalid_grant|no credentials/i;

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

function grpcCode(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const { code } = error;
  return typeof code === 'number' && Number.isInteger(code) ? code : null;
}

function clip(text: string): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > MAX_ERROR_SUMMARY_CHARS ? `${oneLine.slice(0, MAX_ERROR_SUMMARY_CHARS)}…` : oneLine;
}

export function classifyQueryError(error: unknown): ClassifiedQueryError {
  const message = errorMessage(error);
  const code = grpcCode(error);

  if (MISSING_CREDENTIALS_PATTERN.test(message)) {
    return { kind: 'auth', summary: `auth error: ${clip(message)} (${CREDENTIALS_HINT})` };
  }

  if (code === GRPC_STATUS.PERMISSION_DENIED) {
    return { kind: 'auth', summary: `permission denied: ${clip(message)} (${PERMISSION_HINT})` };
  }

  if (code === GRPC_STATUS.UNAUTHENTICATED) {
    return { kind: 'auth', summary: `unauthenticated: ${clip(message)} (${CREDENTIALS_HINT})` };
  }

  if (code !== null && RETRY_CODES.has(code)) {
    return { kind: 'retry_exhausted', summary: `retries exhausted: ${clip(message)}` };
  }

  if (code !== null) {
    return { kind: 'api', summary: `logging API error (code ${code}): ${clip(message)}` };
  }

  if (error instanceof RangeError || error instanceof SyntaxError) {
    return { kind: 'value', summary: `invalid query value: ${clip(message)}` };
  }

  const name = error instanceof Error ? error.name : typeof error;
  return { kind: 'unknown', summary: `unexpected log query failure (${name})` };
}
