#!/usr/bin/env node

import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { runEnrichCli } from './cli/enrich-slokas';
import { config } from './config';

async function main() {
  const logger = new ConsoleLogger(config.logging.level, config.logging.filePath, {
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
  });
  logger.debug(`Environment: ${config.nodeEnv}`);

  const code = await runEnrichCli(process.argv.slice(2), { config, logger });
  logger.close();
  process.exit(code);
}

main().catch((err) => {
  console.error('Unexpected error:', err);
  process.exit(1);
});
