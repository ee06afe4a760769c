/**
 * Alert Routes
 *
 * POST /alert - Cloud Monitoring webhook
 *
 * Optional basic auth (constant-time comparison via hono/basic-auth). A
 * missing or malformed JSON body is treated as an empty payload.
 */

import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { basicAuth } from 'hono/basic-auth';
import type { AlertConfig } from '../lib/config-parser';
import { handleInternalError } from '../lib/error-handler';
import { createAlertLogger, type Logger } from '../lib/logger';
import { AlertPipeline } from '../services/alert-pipeline';
import type { LogStore } from '../services/log-query/log-store';
import type { TicketingClient } from '../services/ticketing/github-client';

export const BASIC_AUTH_REALM = 'gcm-webhook';

export interface AlertRouteDeps {
  config: AlertConfig;
  logStore: LogStore;
  ticketing: TicketingClient;
  now?: () => number;
  createLogger?: (alertId: string) => Logger;
}

async function readPayload(c: Context, log: Logger): Promise<unknown> {
  const raw = await c.req.text();
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch (error) {
    log.warn({ err: error, bytes: raw.length }, '[Alert] body is not JSON, using empty payload');
    return {};
  }
}

export function createAlertRouter(deps: AlertRouteDeps): Hono {
  const router = new Hono();
  const makeLogger = deps.createLogger ?? createAlertLogger;

  const credentials = deps.config.basicAuth;
  if (credentials) {
    router.use(
      '/alert',
      basicAuth({ username: credentials.username, password: credentials.password, realm: BASIC_AUTH_REALM })
    );
  }

  router.post('/alert', async (c: Context) => {
    const alertId = randomUUID();
    const log = makeLogger(alertId);

    try {
      const payload = await readPayload(c, log);
      const pipeline = new AlertPipeline({
        config: deps.config,
        logStore: deps.logStore,
        ticketing: deps.ticketing,
        logger: log,
        now: deps.now,
      });
      const outcome = await pipeline.handle(payload);
      return c.json({ ...outcome, alert_id: alertId }, 200);
    } catch (error) {
      return handleInternalError(c, error, 'Alert');
    }
  });

  return router;
}
