/**
 * Alert Log Bridge Server
 *
 * Cloud Monitoring webhook → Cloud Logging correlation → GitHub PR comment.
 * Configuration is read once here and handed to every component.
 */

import { Logging } from '@google-cloud/logging';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { ConfigError, loadAlertConfig, type AlertConfig } from './lib/config-parser';
import { logger } from './lib/logger';
import { registerGracefulShutdownHandlers } from './server-shutdown';
import { CloudLoggingStore } from './services/log-query/log-store';
import { GitHubClient } from './services/ticketing/github-client';

function loadConfigOrExit(): AlertConfig {
  try {
    return loadAlertConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ err: error }, `Invalid configuration: ${error.message}`);
    } else {
      logger.fatal({ err: error }, 'Failed to load configuration');
    }
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const app = createApp({
  config,
  logStore: new CloudLoggingStore(new Logging({ projectId: config.projectId }), config.projectId),
  ticketing: new GitHubClient({ token: config.githubToken, apiUrl: config.githubApiUrl }),
});

const port = parseInt(process.env.PORT || '8080', 10);
logger.info(
  { port, projectId: config.projectId, region: config.region, services: config.services },
  'Alert log bridge starting'
);

const server = serve(
  {
    fetch: app.fetch,
    port,
    hostname: '0.0.0.0', // Required for Cloud Run
  },
  (info: { address: string; port: number }) => {
    logger.info({ address: info.address, port: info.port }, 'Server listening');
  }
);

registerGracefulShutdownHandlers(server);
