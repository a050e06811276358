import type { Server } from 'http';
import type { Config, Logger } from '@quill/shared';
import { createApp } from './app.js';
import type { Services } from './context.js';

export function startServer(config: Config, logger: Logger, services: Services): Server {
  const app = createApp({ config, logger, ...services });
  const server = app.listen(config.port, config.host, () => {
    logger.info(
      { host: config.host, port: config.port, apiKeyEnabled: config.apiKeyEnabled },
      'API server running',
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close((err) => {
      if (err) logger.error({ err }, 'Error while closing server');
      process.exit(err ? 1 : 0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
