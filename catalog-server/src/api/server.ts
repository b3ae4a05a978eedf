import Fastify from 'fastify';
import type { MetadataSource } from 'pg-metadata-catalog';
import type { LogLevel } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerCollectionRoutes } from './routes/collections.js';

export interface ServerOptions {
  /** false disables logging entirely. */
  logLevel?: LogLevel | false;
}

export function buildServer(source: MetadataSource, options: ServerOptions = {}) {
  const logLevel = options.logLevel ?? 'info';
  const app = Fastify({ logger: logLevel === false ? false : { level: logLevel } });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerCollectionRoutes(instance, source);
  }, { prefix });

  return app;
}
