import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createRandomSource, pickOne } from './random';

describe('createRandomSource', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRandomSource(42);
    const b = createRandomSource(42);
    const seqA = [a(), a(), a(), a()];
    const seqB = [b(), b(), b(), b()];
    assert.deepStrictEqual(seqA, seqB);
  });

  it('produces values in [0, 1)', () => {
    const random = createRandomSource(7);
    for (let i = 0; i < 500; i++) {
      const value = random();
      assert.ok(value >= 0 && value < 1, `out of range: ${value}`);
    }
  });

  it('differs between seeds', () => {
    const a = createRandomSource(1);
    const b = createRandomSource(2);
    assert.notStrictEqual(a(), b());
  });

  it('uses Math.random without a seed', () => {
    assert.strictEqual(createRandomSource(), Math.random);
    assert.strictEqual(createRandomSource(null), Math.random);
  });
});

describe('pickOne', () => {
  it('returns null for an empty list', () => {
    assert.strictEqual(pickOne([], () => 0.5), null);
  });

  it('maps the random value onto an index', () => {
    const items = ['a', 'b', 'c', 'd'];
    assert.strictEqual(pickOne(items, () => 0), 'a');
    assert.strictEqual(pickOne(items, () => 0.5), 'c');
    assert.strictEqual(pickOne(items, () => 0.999), 'd');
  });
});
