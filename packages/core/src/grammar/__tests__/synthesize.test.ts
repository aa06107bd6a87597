/**
 * Grammar synthesis tests.
 * Covers soundness of the table/column alternations, collisions and determinism.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { synthesize, buildCapabilities } from '../synthesize.js';
import { terminalFor, larkLiteral } from '../sanitize.js';
import { SUPPORTED_OPERATIONS } from '../productions.js';
import { GrammarCollisionError, GrammarError } from '../../errors.js';
import type { Schema } from '../../schema/types.js';

const ORDER_ITEMS: Schema = {
  tables: [
    {
      name: 'order_items',
      columns: [
        { name: 'order_id', type: 'String' },
        { name: 'order_item_id', type: 'Int32' },
        { name: 'product_id', type: 'String' },
        { name: 'seller_id', type: 'String' },
        { name: 'shipping_limit_date', type: 'DateTime' },
        { name: 'price', type: 'Float64' },
        { name: 'freight_value', type: 'Float64' },
      ],
    },
    {
      name: 'sellers',
      columns: [
        { name: 'seller_id', type: 'String' },
        { name: 'seller_city', type: 'String' },
      ],
    },
  ],
};

/** Raw names reachable from a production: its terminals' literal values. */
function namesIn(grammar: string, rule: string): string[] {
  const lines = grammar.split('\n');
  const ruleLine = lines.find((l) => l.startsWith(`${rule}: `));
  if (!ruleLine) throw new Error(`missing ${rule} production`);
  const terminals = ruleLine.slice(rule.length + 2).split(' | ');
  return terminals.map((terminal) => {
    const def = lines.find((l) => l.startsWith(`${terminal}: "`));
    if (!def) throw new Error(`missing terminal ${terminal}`);
    return JSON.parse(def.slice(terminal.length + 2)) as string;
  });
}

describe('terminalFor', () => {
  it('sanitizes, uppercases and prefixes', () => {
    assert.equal(terminalFor('column', 'shipping_limit_date'), 'COL_SHIPPING_LIMIT_DATE');
    assert.equal(terminalFor('column', 'unit price ($)'), 'COL_UNIT_PRICE____');
    assert.equal(terminalFor('table', 'events.v2'), 'TBL_EVENTS_V2');
  });

  it('escapes quotes and backslashes in literals', () => {
    assert.equal(larkLiteral('say"hi'), '"say\\"hi"');
    assert.equal(larkLiteral('a\\b'), '"a\\\\b"');
  });
});

describe('synthesize', () => {
  it('admits exactly the schema tables and columns', () => {
    const { grammar, tables, columns } = synthesize(ORDER_ITEMS);

    assert.deepEqual(namesIn(grammar, 'table'), ['order_items', 'sellers']);
    assert.deepEqual(namesIn(grammar, 'column'), [
      'freight_value',
      'order_id',
      'order_item_id',
      'price',
      'product_id',
      'seller_city',
      'seller_id',
      'shipping_limit_date',
    ]);
    assert.deepEqual(
      tables.map((t) => t.terminal),
      ['TBL_ORDER_ITEMS', 'TBL_SELLERS'],
    );
    assert.equal(columns.length, 8);
  });

  it('emits one table and one column production', () => {
    const { grammar } = synthesize(ORDER_ITEMS);
    const lines = grammar.split('\n');
    assert.equal(lines.filter((l) => l.startsWith('table: ')).length, 1);
    assert.equal(lines.filter((l) => l.startsWith('column: ')).length, 1);
    assert.ok(lines.includes('table: TBL_ORDER_ITEMS | TBL_SELLERS'));
  });

  it('keeps the fixed productions', () => {
    const { grammar } = synthesize(ORDER_ITEMS);
    const lines = grammar.split('\n');
    assert.ok(lines.includes('start: select_stmt SEMI'));
    assert.ok(lines.includes('agg_func: "SUM" | "COUNT" | "AVG" | "MIN" | "MAX"'));
    assert.ok(lines.includes('compare_op: GTE | LTE | GT | LT | EQ | NEQ'));
    assert.ok(lines.includes('sort_dir: "ASC" | "DESC"'));
    assert.ok(lines.includes('limit_clause: "LIMIT" SP NUMBER'));
    assert.ok(lines.includes('NUMBER: /[0-9]+(\\.[0-9]+)?/'));
    assert.ok(lines.includes("DATETIME: /'[0-9]{4}-[0-9]{2}-[0-9]{2}( [0-9]{2}:[0-9]{2}:[0-9]{2})?'/"));
  });

  it('is byte-identical across calls and input orderings', () => {
    const first = synthesize(ORDER_ITEMS).grammar;
    const second = synthesize(ORDER_ITEMS).grammar;
    const shuffled = synthesize({
      tables: [...ORDER_ITEMS.tables]
        .reverse()
        .map((t) => ({ name: t.name, columns: [...t.columns].reverse() })),
    }).grammar;

    assert.equal(second, first);
    assert.equal(shuffled, first);
  });

  it('fails with GrammarCollisionError when two names share a terminal', () => {
    assert.throws(
      () =>
        synthesize({
          tables: [
            {
              name: 'events',
              columns: [
                { name: 'order_id', type: 'String' },
                { name: 'order-id', type: 'String' },
              ],
            },
          ],
        }),
      (err: unknown) => {
        if (!(err instanceof GrammarCollisionError)) return false;
        assert.equal(err.code, 'GRAMMAR_COLLISION');
        assert.equal(err.terminal, 'COL_ORDER_ID');
        assert.deepEqual(err.names, ['order-id', 'order_id']);
        return true;
      },
    );
  });

  it('treats case variants as a collision', () => {
    assert.throws(
      () =>
        synthesize({
          tables: [
            { name: 'a', columns: [{ name: 'Price', type: 'Float64' }] },
            { name: 'b', columns: [{ name: 'price', type: 'Float64' }] },
          ],
        }),
      GrammarCollisionError,
    );
  });

  it('fails on table name collisions too', () => {
    assert.throws(
      () =>
        synthesize({
          tables: [
            { name: 'order.items', columns: [{ name: 'id', type: 'Int32' }] },
            { name: 'order_items', columns: [{ name: 'id', type: 'Int32' }] },
          ],
        }),
      /TBL_ORDER_ITEMS/,
    );
  });

  it('rejects schemas with nothing to enumerate', () => {
    assert.throws(
      () => synthesize({ tables: [] }),
      (err: unknown) => err instanceof GrammarError && err.code === 'EMPTY_SCHEMA',
    );
    assert.throws(
      () => synthesize({ tables: [{ name: 'empty', columns: [] }] }),
      /no columns/,
    );
  });

  it('escapes names that need quoting', () => {
    const { grammar } = synthesize({
      tables: [{ name: 'logs', columns: [{ name: 'say"hi', type: 'String' }] }],
    });
    assert.ok(grammar.split('\n').includes('COL_SAY_HI: "say\\"hi"'));
    assert.deepEqual(namesIn(grammar, 'column'), ['say"hi']);
  });
});

describe('buildCapabilities', () => {
  it('lists every table with its typed columns, then the supported operations', () => {
    const text = buildCapabilities({
      tables: [
        {
          name: 'order_items',
          columns: [
            { name: 'price', type: 'Float64' },
            { name: 'order_id', type: 'String' },
          ],
        },
      ],
    });

    assert.equal(
      text,
      [
        'Generates SQL queries for the tables below.',
        '',
        'Available tables and columns:',
        '',
        '## order_items',
        '- order_id (String)',
        '- price (Float64)',
        '',
        SUPPORTED_OPERATIONS,
      ].join('\n'),
    );
  });
});
