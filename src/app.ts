/**
 * Hono application factory
 *
 * Collaborators are injected so the same app serves production (Cloud
 * Logging + GitHub) and tests (in-process fakes).
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { logger as honoLogger } from 'hono/logger';
import { APP_VERSION, SERVICE_NAME } from './lib/app-info';
import { getConfigStatus } from './lib/config-parser';
import { handleAppError, handleNotFound } from './lib/error-handler';
import { logger } from './lib/logger';
import { createAlertRouter, type AlertRouteDeps } from './routes/alert';

export function createApp(deps: AlertRouteDeps): Hono {
  const app = new Hono();

  app.use('*', honoLogger((message: string) => logger.info(message)));

  app.onError(handleAppError);
  app.notFound(handleNotFound);

  /**
   * GET /health - Health Check
   */
  app.get('/health', (c: Context) =>
    c.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: APP_VERSION,
      config: getConfigStatus(deps.config),
      timestamp: new Date().toISOString(),
    })
  );

  app.route('/', createAlertRouter(deps));

  return app;
}
