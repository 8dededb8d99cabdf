/**
 * Query API
 *
 * Serves extracted journey records from the batch extractor's JSONL output.
 */

import { config, logger } from '@journey-extractor/shared';
import { createApp } from './app';

const app = createApp();
const port = config.queryApiPort;

const server = app.listen(port, () => {
  logger.info('Query API started', { port, output_path: config.outputPath });
});

// Graceful shutdown
function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
