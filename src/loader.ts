import type { Database, SqlClient } from './database.js';
import { DEFAULT_BATCH_SIZE, MAX_BATCH_SIZE } from './config.js';
import { DETAIL_TABLE, ORDER_TABLE } from './schema.js';
import type { FinalState, LoadResult } from './types.js';
import { DataTransforms } from './transforms.js';
import { PersistenceError, ValidationError, Validators, type Logger } from './utils.js';

const ORDER_COLUMNS = ['order_id', 'timestamp', 'status', 'cost', 'technician'] as const;
const DETAIL_COLUMNS = ['order_id', 'part_name', 'quantity'] as const;

export interface InsertStatement {
  text: string;
  params: unknown[];
}

/**
 * One multi-row INSERT per chunk of `batchSize` rows, with numbered
 * placeholders running across the whole chunk.
 */
export function buildInsertStatements(
  table: string,
  columns: readonly string[],
  rows: unknown[][],
  batchSize: number
): InsertStatement[] {
  const statements: InsertStatement[] = [];

  for (let start = 0; start < rows.length; start += batchSize) {
    const chunk = rows.slice(start, start + batchSize);
    const params: unknown[] = [];
    const tuples = chunk.map(row => {
      const placeholders = row.map(value => {
        params.push(value);
        return `$${params.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });

    statements.push({
      text: `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${tuples.join(', ')}`,
      params,
    });
  }

  return statements;
}

export class Loader {
  constructor(
    private db: Database,
    private logger: Logger,
    private batchSize: number = DEFAULT_BATCH_SIZE
  ) {
    if (!Validators.isPositiveInteger(batchSize) || batchSize > MAX_BATCH_SIZE) {
      throw new ValidationError(`Batch size must be an integer from 1 to ${MAX_BATCH_SIZE}`, { batchSize });
    }
  }

  /**
   * Writes every header, then every detail line. A failed header insert stops
   * before any detail is attempted.
   */
  async persist(state: FinalState, client?: SqlClient): Promise<LoadResult> {
    const orderRows = state.orders.map(order => [
      order.order_id,
      DataTransforms.formatTimestamp(order.timestamp),
      order.status,
      order.cost,
      order.technician,
    ]);
    const orders = await this.insertAll(ORDER_TABLE, ORDER_COLUMNS, orderRows, client);

    const detailRows = state.details.map(detail => [
      detail.order_id,
      detail.part_name,
      detail.quantity,
    ]);
    const details = await this.insertAll(DETAIL_TABLE, DETAIL_COLUMNS, detailRows, client);

    return { orders, details };
  }

  private async insertAll(
    table: string,
    columns: readonly string[],
    rows: unknown[][],
    client?: SqlClient
  ): Promise<number> {
    const statements = buildInsertStatements(table, columns, rows, this.batchSize);
    let inserted = 0;

    try {
      for (const statement of statements) {
        const result = await this.db.query(statement.text, statement.params, client);
        inserted += result.rowCount ?? 0;
      }
    } catch (error: unknown) {
      throw new PersistenceError(table, `Failed to insert rows into ${table}`, {
        originalError: error,
        insertedBeforeFailure: inserted,
        totalRows: rows.length,
      });
    }

    this.logger.info(`Inserted ${inserted} rows into ${table}`);
    return inserted;
  }
}
