#!/usr/bin/env node

import 'dotenv/config';
import { parseCliArgs, USAGE } from './src/cli-options.js';
import { loadConfig } from './src/config.js';
import { Database, createPgPool } from './src/database.js';
import { IngestionEngine } from './src/ingestion-engine.js';
import { Logger, handleError } from './src/utils.js';

const logger = new Logger();

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  logger.setLevel(options.logLevel ?? config.logLevel);

  const db = new Database(createPgPool(config.database), logger);
  const ingestionEngine = new IngestionEngine(db, logger, { batchSize: config.batchSize });

  try {
    const summary = await ingestionEngine.run(options.dataDir ?? config.dataDir);
    if (summary.skipped > 0) {
      logger.warn(`${summary.skipped} of ${summary.documents} documents were skipped`);
    }
  } finally {
    await db.close();
  }
}

main().catch(error => {
  handleError(error, 'repair order ingest', logger);
});
