import { describe, expect, it } from 'vitest';
import { CREDENTIALS_HINT, MAX_ERROR_SUMMARY_CHARS, PERMISSION_HINT, classifyQueryError } from './query-errors';

function grpcError(code: number, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifyQueryError', () => {
  it('detects missing credentials from the message', () => {
    const result = classifyQueryError(new Error('Could not load the default credentials.'));

    expect(result.kind).toBe('auth');
    expect(result.summary).toBe(`auth error: Could not load the default credentials. (${CREDENTIALS_HINT})`);
  });

  it('maps PERMISSION_DENIED to auth with the IAM hint', () => {
    const result = classifyQueryError(grpcError(7, '7 PERMISSION_DENIED: denied'));

    expect(result).toEqual({
      kind: 'auth',
      summary: `permission denied: 7 PERMISSION_DENIED: denied (${PERMISSION_HINT})`,
    });
  });

  it('maps UNAUTHENTICATED to auth with the credentials hint', () => {
    expect(classifyQueryError(grpcError(16, 'token expired'))).toEqual({
      kind: 'auth',
      summary: `unauthenticated: token expired (${CREDENTIALS_HINT})`,
    });
  });

  it.each([4, 8, 14])('treats code %i as exhausted retries', (code) => {
    expect(classifyQueryError(grpcError(code, 'try later'))).toEqual({
      kind: 'retry_exhausted',
      summary: 'retries exhausted: try later',
    });
  });

  it('reports other status codes as API errors', () => {
    expect(classifyQueryError(grpcError(3, 'invalid filter'))).toEqual({
      kind: 'api',
      summary: 'logging API error (code 3): invalid filter',
    });
  });

  it('classifies RangeError and SyntaxError as bad values', () => {
    expect(classifyQueryError(new RangeError('page size')).summary).toBe('invalid query value: page size');
    expect(classifyQueryError(new SyntaxError('unexpected token')).kind).toBe('value');
  });

  it('falls back to unknown with the error name only', () => {
    expect(classifyQueryError(new TypeError('x is undefined'))).toEqual({
      kind: 'unknown',
      summary: 'unexpected log query failure (TypeError)',
    });
    expect(classifyQueryError('boom').summary).toBe('unexpected log query failure (string)');
  });

  it('collapses whitespace and clips long messages', () => {
    expect(classifyQueryError(grpcError(3, 'line one\n   line two')).summary).toBe(
      'logging API error (code 3): line one line two'
    );

    const long = classifyQueryError(grpcError(3, 'a'.repeat(400))).summary;
    expect(long).toBe(`logging API error (code 3): ${'a'.repeat(MAX_ERROR_SUMMARY_CHARS)}…`);
  });
});
