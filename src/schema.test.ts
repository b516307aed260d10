import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Database } from './database.js';
import { CREATE_TABLE_STATEMENTS, DETAIL_TABLE, ORDER_TABLE, SchemaManager } from './schema.js';
import { FakePool, captureLogger } from './test-utils.js';
import { SchemaError } from './utils.js';

function setup(failOn?: (text: string) => boolean) {
  const pool = new FakePool(failOn);
  const { logger } = captureLogger('info');
  const schema = new SchemaManager(new Database(pool, logger), logger);
  return { pool, schema };
}

void describe('SchemaManager', () => {
  void it('creates the parent table before the detail table', async () => {
    const { pool, schema } = setup();

    await schema.ensureSchema();

    const texts = pool.texts();
    assert.strictEqual(texts.length, 2);
    assert.ok(texts[0].startsWith(`CREATE TABLE IF NOT EXISTS ${ORDER_TABLE} (`));
    assert.ok(texts[1].startsWith(`CREATE TABLE IF NOT EXISTS ${DETAIL_TABLE} (`));
    assert.ok(texts[1].includes(`FOREIGN KEY (order_id) REFERENCES ${ORDER_TABLE} (order_id)`));
    assert.ok(texts[1].includes('PRIMARY KEY (order_id, part_name)'));
  });

  void it('declares 64-bit keys and quantities and double-precision costs', () => {
    const [orders, details] = CREATE_TABLE_STATEMENTS.map(statement => statement.replace(/\s+/g, ' '));

    assert.ok(orders.includes('order_id BIGINT PRIMARY KEY'));
    assert.ok(orders.includes('cost DOUBLE PRECISION NOT NULL CHECK (cost >= 0)'));
    assert.ok(details.includes('order_id BIGINT NOT NULL'));
    assert.ok(details.includes('quantity BIGINT NOT NULL CHECK (quantity > 0)'));
    assert.ok(!/\b(INTEGER|REAL)\b/.test(`${orders} ${details}`));
  });

  void it('can be run repeatedly without touching existing rows', async () => {
    const { pool, schema } = setup();

    await schema.ensureSchema();
    pool.tables.set(ORDER_TABLE, [[1, '2023-01-01T00:00:00', 'Received', 5, 'Sam Lee']]);
    await schema.ensureSchema();
    await schema.ensureSchema();

    assert.deepStrictEqual([...pool.tables.keys()], [ORDER_TABLE, DETAIL_TABLE]);
    assert.strictEqual(pool.rows(ORDER_TABLE).length, 1);
  });

  void it('empties the detail table before the order table', async () => {
    const { pool, schema } = setup();
    await schema.ensureSchema();
    pool.tables.set(ORDER_TABLE, [[1, '2023-01-01T00:00:00', 'Received', 5, 'Sam Lee']]);
    pool.tables.set(DETAIL_TABLE, [[1, 'Bolt', 4]]);

    await schema.reset();

    assert.deepStrictEqual(pool.texts().slice(2), [
      `DELETE FROM ${DETAIL_TABLE}`,
      `DELETE FROM ${ORDER_TABLE}`,
    ]);
    assert.deepStrictEqual(pool.rows(ORDER_TABLE), []);
    assert.deepStrictEqual(pool.rows(DETAIL_TABLE), []);
  });

  void it('reports a failed creation as a schema error', async () => {
    const { schema } = setup(text => text.includes(DETAIL_TABLE));

    await assert.rejects(schema.ensureSchema(), (error: unknown) => {
      assert.ok(error instanceof SchemaError);
      assert.strictEqual(error.message, 'Failed to create target tables');
      return true;
    });
  });

  void it('reports a reset against missing tables as a schema error', async () => {
    const { schema } = setup();
    await assert.rejects(schema.reset(), SchemaError);
  });
});
