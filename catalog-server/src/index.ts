import pg from 'pg';
import { MetadataReader, PostgresStatementExecutor } from 'pg-metadata-catalog';
import { buildServer } from './api/server.js';
import { ConfigError, loadConfig } from './config.js';
import type { ServerConfig } from './config.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const executor = new PostgresStatementExecutor({
  pool: new pg.Pool({ connectionString: config.databaseUrl }),
});
const reader = new MetadataReader({ executor, strict: config.strictRestrictions });

const app = buildServer(reader, { logLevel: config.logLevel });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await executor.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await executor.close();
});
