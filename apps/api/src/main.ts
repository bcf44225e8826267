import { loadConfig } from './lib/env.js';
import { createDatabase } from './lib/db.js';
import { buildApp } from './server.js';

const config = loadConfig();
const database = createDatabase(config.databaseUrl);
const app = await buildApp(config, database.db);

async function shutdown(signal: string) {
  app.log.info({ signal }, 'Shutting down');
  try {
    await app.close();
    await database.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, 'Shutdown failed');
    process.exit(1);
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error({ err }, 'Failed to start server');
  await database.close();
  process.exit(1);
}
