import { describe, it } from 'node:test';
import assert from 'node:assert';
import { captureLogger } from './test-utils.js';
import {
  ParseError,
  PersistenceError,
  SchemaError,
  ValidationError,
  Validators,
  isAppError,
} from './utils.js';

void describe('Logger', () => {
  void it('drops messages below its threshold', () => {
    const { logger, lines } = captureLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.success('hidden');
    logger.warn('shown');
    logger.error('also shown');

    assert.deepStrictEqual(lines, ['⚠️  shown', '❌ also shown']);
  });

  void it('formats context and causes', () => {
    const { logger, lines } = captureLogger('debug');

    logger.info('Loaded', { orders: 2 });
    logger.error('Skipping a.xml', new ParseError('missing_field', "Missing required field 'technician'"));
    logger.debug('trace');

    assert.deepStrictEqual(lines, [
      'ℹ️  Loaded {"orders":2}',
      "❌ Skipping a.xml: Missing required field 'technician'",
      '🔍 trace',
    ]);
  });

  void it('changes threshold at run time', () => {
    const { logger, lines } = captureLogger('error');
    logger.setLevel('info');
    logger.info('now visible');
    assert.deepStrictEqual(lines, ['ℹ️  now visible']);
  });
});

void describe('errors', () => {
  void it('carry a code and context', () => {
    const error = new PersistenceError('repair_order', 'Failed', { totalRows: 3 });

    assert.strictEqual(error.code, 'PERSISTENCE_ERROR');
    assert.strictEqual(error.table, 'repair_order');
    assert.deepStrictEqual(error.context, { totalRows: 3 });
    assert.strictEqual(new SchemaError('x').code, 'SCHEMA_ERROR');
  });

  void it('are recognised as application errors', () => {
    assert.strictEqual(isAppError(new ValidationError('x')), true);
    assert.strictEqual(isAppError(new Error('x')), false);
    assert.strictEqual(isAppError('x'), false);
  });
});

void describe('Validators', () => {
  void it('accepts only the known log levels', () => {
    assert.strictEqual(Validators.isLogLevel('warn'), true);
    assert.strictEqual(Validators.isLogLevel('toString'), false);
    assert.strictEqual(Validators.isLogLevel(3), false);
  });

  void it('checks positive integers', () => {
    assert.strictEqual(Validators.isPositiveInteger(3), true);
    assert.strictEqual(Validators.isPositiveInteger(0), false);
    assert.strictEqual(Validators.isPositiveInteger(1.5), false);
    assert.strictEqual(Validators.isPositiveInteger(Number.NaN), false);
  });
});
