#!/usr/bin/env node
/**
 * Auto-DJ console - single entry point
 */

// Load environment variables first
import './env-loader.js';

import { logger } from '@autodj/logger';
import { DjApplication } from './main.js';
import { installShutdownHandlers } from './shutdown.js';

async function start(): Promise<void> {
  const app = new DjApplication();
  installShutdownHandlers(() => app.shutdown());
  await app.initialize();
  await app.run();
  process.exit(0);
}

start().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start Auto-DJ console');
  process.exit(1);
});
