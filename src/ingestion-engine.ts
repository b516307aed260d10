import type { Database } from './database.js';
import { DocumentStore } from './document-store.js';
import { Loader } from './loader.js';
import { MergeEngine } from './merge-engine.js';
import { parseEvent } from './parser.js';
import { SchemaManager } from './schema.js';
import type { RunSummary } from './types.js';
import { DEFAULT_BATCH_SIZE } from './config.js';
import { isAppError, ProcessingError, type Logger } from './utils.js';

export interface IngestionOptions {
  batchSize?: number;
}

export class IngestionEngine {
  private schema: SchemaManager;
  private loader: Loader;

  constructor(private db: Database, private logger: Logger, options: IngestionOptions = {}) {
    this.schema = new SchemaManager(db, logger);
    this.loader = new Loader(db, logger, options.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  /**
   * Full reload from one directory: every document is parsed and merged
   * before the store is touched, then the tables are emptied and refilled in
   * a single transaction.
   */
  async run(dataDir: string): Promise<RunSummary> {
    try {
      const store = new DocumentStore(dataDir, this.logger);
      const merge = new MergeEngine(this.logger);
      let documents = 0, parsed = 0, skipped = 0;

      for await (const document of store.documents()) {
        documents++;
        const result = parseEvent(document.content);
        if (!result.ok) {
          this.logger.error(`Skipping ${document.name}`, result.error);
          skipped++;
          continue;
        }
        parsed++;
        merge.apply(result.event);
      }

      const stats = merge.stats();
      this.logger.info(
        `Parsed ${parsed} of ${documents} documents into ${merge.size} orders ` +
        `(${stats.replaced} replaced, ${stats.discarded} discarded)`
      );

      await this.schema.ensureSchema();
      const loaded = await this.db.withTransaction(async client => {
        await this.schema.reset(client);
        return this.loader.persist(merge.snapshot(), client);
      });

      this.logger.success(`Loaded ${loaded.orders} orders and ${loaded.details} order details`);

      return {
        documents,
        parsed,
        skipped,
        replaced: stats.replaced,
        discarded: stats.discarded,
        ordersLoaded: loaded.orders,
        detailsLoaded: loaded.details,
      };
    } catch (error: unknown) {
      if (isAppError(error)) {
        throw error;
      }
      throw new ProcessingError('Failed to ingest repair orders', { originalError: error, dataDir });
    }
  }
}
