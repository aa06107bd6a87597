import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { inspectSql, sameShape, unknownTables } from '../inspect.js';

function shapeOf(sql: string) {
  const outcome = inspectSql(sql);
  if (!outcome.ok) throw new Error(`expected ${sql} to parse: ${outcome.error}`);
  return outcome.shape;
}

describe('inspectSql', () => {
  it('reports tables and aggregates of a simple aggregate query', () => {
    const shape = shapeOf('SELECT COUNT(*) FROM order_items;');
    assert.deepEqual(shape.tables, ['order_items']);
    assert.deepEqual(shape.aggregates, ['COUNT']);
    assert.equal(shape.hasWhere, false);
    assert.equal(shape.hasGroupBy, false);
    assert.equal(shape.hasOrderBy, false);
    assert.equal(shape.hasLimit, false);
  });

  it('detects every optional clause', () => {
    const shape = shapeOf(
      "SELECT seller_id, SUM(price) AS revenue FROM order_items WHERE price > 10 AND order_id != 'x' GROUP BY seller_id ORDER BY seller_id DESC LIMIT 5;",
    );
    assert.deepEqual(shape.aggregates, ['SUM']);
    assert.equal(shape.hasWhere, true);
    assert.equal(shape.hasGroupBy, true);
    assert.equal(shape.hasOrderBy, true);
    assert.equal(shape.hasLimit, true);
  });

  it('deduplicates and sorts aggregate names', () => {
    const shape = shapeOf('SELECT MAX(price), AVG(freight_value), MAX(freight_value) FROM order_items');
    assert.deepEqual(shape.aggregates, ['AVG', 'MAX']);
  });

  it('returns an error for empty input', () => {
    assert.deepEqual(inspectSql('  ;  '), { ok: false, error: 'Empty SQL statement' });
  });

  it('returns a parse error for malformed SQL', () => {
    const outcome = inspectSql('SELECT FROM WHERE');
    assert.equal(outcome.ok, false);
    if (!outcome.ok) assert.match(outcome.error, /^SQL parse error: /);
  });

  it('refuses non-SELECT statements', () => {
    assert.deepEqual(inspectSql("DELETE FROM order_items WHERE order_id = 'x'"), {
      ok: false,
      error: 'Only SELECT statements can be inspected',
    });
  });
});

describe('shape helpers', () => {
  it('lists tables missing from the schema', () => {
    const shape = shapeOf('SELECT COUNT(*) FROM weather');
    assert.deepEqual(unknownTables(shape, ['order_items']), ['weather']);
    assert.deepEqual(unknownTables(shape, ['weather']), []);
  });

  it('compares tables and aggregates only', () => {
    const a = shapeOf('SELECT SUM(price) FROM order_items');
    const b = shapeOf('SELECT SUM(price) AS total FROM order_items WHERE price > 1');
    const c = shapeOf('SELECT AVG(price) FROM order_items');
    assert.equal(sameShape(a, b), true);
    assert.equal(sameShape(a, c), false);
  });
});
