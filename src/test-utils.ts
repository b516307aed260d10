import type { QueryResultRow } from 'pg';
import type { SqlPool, SqlResult, SqlSession } from './database.js';
import { DETAIL_TABLE, ORDER_TABLE } from './schema.js';
import { Logger } from './utils.js';
import type { LogLevel } from './types.js';

export interface RecordedStatement {
  text: string;
  params: unknown[];
  inSession: boolean;
}

type Tables = Map<string, unknown[][]>;

function cloneTables(tables: Tables): Tables {
  return new Map([...tables].map(([name, rows]) => [name, rows.map(row => [...row])]));
}

/**
 * In-process stand-in for a pg pool. Understands the handful of statements the
 * pipeline issues, keeps rows per table, honours BEGIN/COMMIT/ROLLBACK and
 * enforces the repair_order primary key and the detail foreign key.
 */
export class FakePool implements SqlPool {
  readonly statements: RecordedStatement[] = [];
  tables: Tables = new Map();
  released = 0;
  ended = false;
  private saved: Tables | null = null;

  constructor(private failOn: (text: string) => boolean = () => false) {}

  query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<SqlResult<R>> {
    return this.execute<R>(text, params, false);
  }

  async connect(): Promise<SqlSession> {
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) =>
        this.execute<R>(text, params, true),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  rows(table: string): unknown[][] {
    return this.tables.get(table) ?? [];
  }

  texts(): string[] {
    return this.statements.map(statement => statement.text.replace(/\s+/g, ' ').trim());
  }

  private async execute<R extends QueryResultRow>(
    text: string,
    params: unknown[],
    inSession: boolean
  ): Promise<SqlResult<R>> {
    this.statements.push({ text, params, inSession });
    if (this.failOn(text)) {
      throw new Error('simulated failure');
    }
    return { rows: [], rowCount: this.apply(text.replace(/\s+/g, ' ').trim(), params) };
  }

  private table(name: string): unknown[][] {
    const rows = this.tables.get(name);
    if (!rows) {
      throw new Error(`relation "${name}" does not exist`);
    }
    return rows;
  }

  private apply(statement: string, params: unknown[]): number {
    if (statement === 'BEGIN') {
      this.saved = cloneTables(this.tables);
      return 0;
    }
    if (statement === 'COMMIT') {
      this.saved = null;
      return 0;
    }
    if (statement === 'ROLLBACK') {
      if (this.saved) this.tables = this.saved;
      this.saved = null;
      return 0;
    }

    const create = statement.match(/^CREATE TABLE IF NOT EXISTS (\w+)/);
    if (create) {
      if (!this.tables.has(create[1])) this.tables.set(create[1], []);
      return 0;
    }

    const remove = statement.match(/^DELETE FROM (\w+)$/);
    if (remove) {
      const rows = this.table(remove[1]);
      if (remove[1] === ORDER_TABLE && (this.tables.get(DETAIL_TABLE) ?? []).length > 0) {
        throw new Error(`update or delete on table "${ORDER_TABLE}" violates foreign key constraint`);
      }
      this.tables.set(remove[1], []);
      return rows.length;
    }

    const insert = statement.match(/^INSERT INTO (\w+) \(([^)]*)\) VALUES/);
    if (insert) {
      const rows = this.table(insert[1]);
      const width = insert[2].split(',').length;
      const added: unknown[][] = [];
      for (let i = 0; i < params.length; i += width) {
        added.push(params.slice(i, i + width));
      }

      for (const row of added) {
        if (insert[1] === ORDER_TABLE && rows.some(existing => existing[0] === row[0])) {
          throw new Error(`duplicate key value violates unique constraint "${ORDER_TABLE}_pkey"`);
        }
        if (insert[1] === DETAIL_TABLE &&
            !this.rows(ORDER_TABLE).some(order => order[0] === row[0])) {
          throw new Error(`insert on table "${DETAIL_TABLE}" violates foreign key constraint`);
        }
        rows.push(row);
      }
      return added.length;
    }

    throw new Error(`FakePool does not understand: ${statement}`);
  }
}

export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger(level, {
    log: line => lines.push(line),
    error: line => lines.push(line),
  });
  return { logger, lines };
}

export function eventXml(options: {
  orderId?: string;
  dateTime?: string;
  status?: string;
  cost?: string;
  technician?: string | null;
  parts?: Array<[string, string]>;
} = {}): string {
  const parts = (options.parts ?? [['Tire', '2'], ['Brake Fluid', '1']])
    .map(([name, quantity]) => `      <part name="${name}" quantity="${quantity}"/>`)
    .join('\n');
  const technician = options.technician === null
    ? ''
    : `    <technician>${options.technician ?? 'Robert White'}</technician>\n`;

  return `<event>
  <order_id>${options.orderId ?? '104'}</order_id>
  <date_time>${options.dateTime ?? '2023-08-11T12:00:00'}</date_time>
  <status>${options.status ?? 'Completed'}</status>
  <cost>${options.cost ?? '110.00'}</cost>
  <repair_details>
${technician}    <repair_parts>
${parts}
    </repair_parts>
  </repair_details>
</event>
`;
}
