import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DataTransforms } from './transforms.js';

void describe('DataTransforms', () => {
  void describe('parseInteger', () => {
    void it('reads integers, ignoring surrounding whitespace', () => {
      assert.strictEqual(DataTransforms.parseInteger('104'), 104);
      assert.strictEqual(DataTransforms.parseInteger(' 42 '), 42);
      assert.strictEqual(DataTransforms.parseInteger('-7'), -7);
    });

    void it('rejects fractions, words and blanks', () => {
      assert.strictEqual(DataTransforms.parseInteger('1.5'), null);
      assert.strictEqual(DataTransforms.parseInteger('abc'), null);
      assert.strictEqual(DataTransforms.parseInteger(''), null);
      assert.strictEqual(DataTransforms.parseInteger('99999999999999999999'), null);
    });
  });

  void describe('parseCost', () => {
    void it('reads decimal amounts', () => {
      assert.strictEqual(DataTransforms.parseCost('110.00'), 110);
      assert.strictEqual(DataTransforms.parseCost('45.50'), 45.5);
      assert.strictEqual(DataTransforms.parseCost('.5'), 0.5);
      assert.strictEqual(DataTransforms.parseCost('0'), 0);
    });

    void it('rejects negative and non-numeric amounts', () => {
      assert.strictEqual(DataTransforms.parseCost('-1'), null);
      assert.strictEqual(DataTransforms.parseCost('ten'), null);
      assert.strictEqual(DataTransforms.parseCost('1e3'), null);
      assert.strictEqual(DataTransforms.parseCost('12.5.1'), null);
    });
  });

  void describe('parseQuantity', () => {
    void it('accepts positive integers only', () => {
      assert.strictEqual(DataTransforms.parseQuantity('3'), 3);
      assert.strictEqual(DataTransforms.parseQuantity('0'), null);
      assert.strictEqual(DataTransforms.parseQuantity('-2'), null);
      assert.strictEqual(DataTransforms.parseQuantity('2.0'), null);
    });
  });

  void describe('parseTimestamp', () => {
    void it('reads the exact wall-clock instant as UTC', () => {
      const parsed = DataTransforms.parseTimestamp('2023-08-11T12:00:00');
      assert.strictEqual(parsed?.getTime(), Date.UTC(2023, 7, 11, 12, 0, 0));
    });

    void it('keeps two-digit years literal', () => {
      const parsed = DataTransforms.parseTimestamp('0099-01-01T00:00:00');
      assert.strictEqual(parsed?.getUTCFullYear(), 99);
    });

    void it('rejects other layouts and impossible dates', () => {
      assert.strictEqual(DataTransforms.parseTimestamp('2023-08-11 12:00:00'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('2023-08-11T12:00:00Z'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('2023-08-11T12:00'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('2023-02-30T00:00:00'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('2023-13-01T00:00:00'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('2023-08-11T24:00:00'), null);
      assert.strictEqual(DataTransforms.parseTimestamp('yesterday'), null);
    });
  });

  void it('formats timestamps back into the document layout', () => {
    const date = new Date(Date.UTC(2023, 7, 12, 9, 0, 0));
    assert.strictEqual(DataTransforms.formatTimestamp(date), '2023-08-12T09:00:00');
  });

  void it('accepts statuses only in their exact spelling', () => {
    assert.strictEqual(DataTransforms.repairStatus('Completed'), 'Completed');
    assert.strictEqual(DataTransforms.repairStatus(' In Progress '), 'In Progress');
    assert.strictEqual(DataTransforms.repairStatus('in progress'), null);
    assert.strictEqual(DataTransforms.repairStatus('Cancelled'), null);
  });
});
