import 'dotenv/config';
import { createServer } from 'http';
import { applySchema, closePool, getPool } from '@wildlife-telemetry/adapters';
import { buildApp } from './app.js';
import { buildContainer } from './container.js';
import { loadSettings } from './config/settings.js';

async function main() {
  const settings = loadSettings();

  // Verify DB connection
  await getPool().query('SELECT 1');
  console.log('[server] database connected');
  await applySchema();

  const app = buildApp(buildContainer(settings), { corsOrigin: settings.corsOrigin });
  const httpServer = createServer(app);

  httpServer.listen(settings.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${settings.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
