// ──────────────────────────────────────────
// Server entry point — config, listen, graceful shutdown
// ──────────────────────────────────────────

import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './shared/logger';

const log = createLogger('App');

function main(): void {
  const config = loadConfig();
  const app = createApp({ config });

  const server = app.listen(config.port, () => {
    log.info(`Revenue monitor listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    log.info('Shutting down...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  log.error('Fatal error:', err);
  process.exit(1);
}
