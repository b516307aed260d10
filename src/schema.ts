import type { Database, SqlClient } from './database.js';
import { REPAIR_STATUSES } from './types.js';
import { SchemaError, type Logger } from './utils.js';

export const ORDER_TABLE = 'repair_order';
export const DETAIL_TABLE = 'repair_order_detail';

const statusList = REPAIR_STATUSES.map(status => `'${status}'`).join(', ');

// Parent first: the detail table's foreign key needs repair_order to exist
export const CREATE_TABLE_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS ${ORDER_TABLE} (
    order_id BIGINT PRIMARY KEY,
    timestamp TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN (${statusList})),
    cost DOUBLE PRECISION NOT NULL CHECK (cost >= 0),
    technician TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS ${DETAIL_TABLE} (
    order_id BIGINT NOT NULL,
    part_name TEXT NOT NULL,
    quantity BIGINT NOT NULL CHECK (quantity > 0),
    PRIMARY KEY (order_id, part_name),
    FOREIGN KEY (order_id) REFERENCES ${ORDER_TABLE} (order_id)
  )`,
];

// Children before parents, so no row is ever left pointing at a deleted order
export const RESET_STATEMENTS: readonly string[] = [
  `DELETE FROM ${DETAIL_TABLE}`,
  `DELETE FROM ${ORDER_TABLE}`,
];

export class SchemaManager {
  constructor(private db: Database, private logger: Logger) {}

  /** Creates both tables when absent. Running it again changes nothing. */
  async ensureSchema(client?: SqlClient): Promise<void> {
    try {
      for (const statement of CREATE_TABLE_STATEMENTS) {
        await this.db.query(statement, [], client);
      }
      this.logger.info(`Tables ${ORDER_TABLE} and ${DETAIL_TABLE} are in place`);
    } catch (error: unknown) {
      throw new SchemaError('Failed to create target tables', { originalError: error });
    }
  }

  /** Empties both tables ahead of a full reload. */
  async reset(client?: SqlClient): Promise<void> {
    try {
      for (const statement of RESET_STATEMENTS) {
        const result = await this.db.query(statement, [], client);
        this.logger.debug(`${statement}: ${result.rowCount ?? 0} rows removed`);
      }
      this.logger.info('Cleared target tables for a full reload');
    } catch (error: unknown) {
      throw new SchemaError('Failed to reset target tables', { originalError: error });
    }
  }
}
