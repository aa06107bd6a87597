import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { prepareStatement, withJsonFormat } from '../statement.js';

describe('prepareStatement', () => {
  it('trims surrounding whitespace', () => {
    assert.equal(prepareStatement('  SELECT 1 \n'), 'SELECT 1');
  });

  it('drops one trailing terminator and the whitespace before it', () => {
    assert.equal(prepareStatement('SELECT 1 ;  '), 'SELECT 1');
    assert.equal(prepareStatement('SELECT 1;;'), 'SELECT 1;');
  });

  it('leaves inner semicolons alone', () => {
    assert.equal(prepareStatement("SELECT ';' AS s"), "SELECT ';' AS s");
  });
});

describe('withJsonFormat', () => {
  it('appends the format directive after stripping the terminator', () => {
    assert.equal(withJsonFormat('SELECT count() FROM order_items;'), 'SELECT count() FROM order_items FORMAT JSON');
  });
});
