/**
 * HTTP API server entry point
 */

import { config } from 'dotenv';
import { API_CONFIG } from '../config/defaults.js';
import { getStore } from '../pipeline/coefficients.js';
import { createPluginRegistry } from '../plugins/index.js';
import { createLogger } from '../utils/log.js';
import { createApp } from './app.js';

// Load .env file
config();

const logger = createLogger('api-server');
const PORT = Number(process.env.PORT) || API_CONFIG.DEFAULT_PORT;

async function main(): Promise<void> {
  // Surface preset errors at startup rather than on the first request
  const store = getStore();
  store.loadAll();

  const module_paths = (process.env.RISK_PLUGINS ?? '')
    .split(',')
    .map((path) => path.trim())
    .filter((path) => path.length > 0);
  const plugins = await createPluginRegistry(module_paths);

  const app = createApp({ plugins, store });

  app
    .listen(PORT, () => {
      console.log(`\n🚀 API Server running at http://localhost:${PORT}`);
      console.log(`   Health check: http://localhost:${PORT}/health`);
      console.log(`   Presets: ${store.list().join(', ')}`);
      console.log(`   Plugins: ${plugins.list().map((p) => p.name).join(', ') || 'none'}\n`);
    })
    .on('error', (error) => {
      logger.error({ error }, 'Server startup error');
      console.error('Failed to start server:', error);
      process.exit(1);
    });
}

main().catch((error: unknown) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Server failed to start');
  console.error('Failed to start server:', error);
  process.exit(1);
});
