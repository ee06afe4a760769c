/**
 * Webhook response helpers
 *
 * The monitoring system retries or escalates on non-2xx, so internal faults
 * are acknowledged with 200 and described in the body. Only authentication
 * failures surface as an HTTP error.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from './logger';

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Degraded acknowledgement for an unexpected failure.
 */
export function handleInternalError(c: Context, error: unknown, context = 'Alert') {
  logger.error({ err: error, url: c.req.url, method: c.req.method }, `[${context}] unexpected failure`);
  return c.json(
    {
      ok: true,
      note: 'internal_error',
      detail: getErrorMessage(error).slice(0, 500),
    },
    200
  );
}

/** `app.onError`: HTTP exceptions keep their response, everything else is acknowledged */
export function handleAppError(error: Error, c: Context) {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }
  return handleInternalError(c, error, 'App');
}

export function handleNotFound(c: Context) {
  return c.json({ error: 'not_found' }, 404);
}
