import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createServices } from './services.js';
import { getServerPort, loadEnvironment } from './utils/env.js';

loadEnvironment();

async function bootstrap() {
  const config = await loadConfig();
  const services = createServices(config);
  const app = createApp(services, { staticDir: 'client/dist' });
  const server = createServer(app);

  const port = getServerPort();
  server.listen(port, () => {
    logger.info({
      event: 'server_started',
      port,
      engine: config.engine,
      devices: config.devices.count,
      cacheTtlMs: config.cache.ttlMs,
      cacheMaxEntries: config.cache.maxEntries,
    });
  });
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch((error) => {
    logger.fatal({ event: 'bootstrap_failed', message: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
}
