import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CandidatePoolIndex,
  assertSufficientCandidatePool,
  dedupeById,
  filterByDietaryPreferences,
  filterByTags,
  normalizeTags,
} from './candidatePool';
import { AppError } from '@/src/lib/errors/app-error';
import { makeFullPool, makeRecipe } from './__fixtures__/recipes';

describe('candidatePool', () => {
  it('normalizes tags', () => {
    assert.deepStrictEqual(
      [...normalizeTags([' Main  Course ', 'LUNCH', '', 'lunch'])],
      ['main course', 'lunch'],
    );
  });

  it('dedupes recipes by id, keeping the first', () => {
    const { kept, removedCount } = dedupeById([
      makeRecipe(1, ['lunch'], 100),
      makeRecipe(2, ['lunch'], 200),
      makeRecipe(1, ['dinner'], 300),
    ]);
    assert.deepStrictEqual(
      kept.map((r) => r.calories),
      [100, 200],
    );
    assert.strictEqual(removedCount, 1);
  });

  it('filters by tags case-insensitively', () => {
    const list = [
      makeRecipe(1, ['lunch', 'soup'], 100),
      makeRecipe(2, ['lunch', 'main course'], 400),
    ];
    assert.deepStrictEqual(
      filterByTags(list, ['LUNCH', 'Soup']).map((r) => r.id),
      [1],
    );
  });

  it('keeps recipes with any preferred tag', () => {
    const list = [
      makeRecipe(1, ['vegan'], 100),
      makeRecipe(2, ['keto'], 100),
      makeRecipe(3, ['paleo'], 100),
    ];
    assert.deepStrictEqual(
      filterByDietaryPreferences(list, ['Vegan', 'keto']).map((r) => r.id),
      [1, 2],
    );
    assert.strictEqual(filterByDietaryPreferences(list, []).length, 3);
  });

  it('indexes recipes by id', () => {
    const pool = new CandidatePoolIndex(makeFullPool());
    assert.strictEqual(pool.size, 30);
    assert.strictEqual(pool.get(4)?.calories, 400);
    assert.strictEqual(pool.has(9999), false);
    assert.deepStrictEqual(
      pool.withTags(['dinner', 'soup']).map((r) => r.id),
      [7],
    );
  });

  it('rejects a pool below the minimum', () => {
    const pool = new CandidatePoolIndex(makeFullPool().slice(0, 12));
    assert.throws(
      () => assertSufficientCandidatePool(pool, 30),
      (error: unknown) =>
        error instanceof AppError &&
        error.code === 'INSUFFICIENT_CANDIDATE_RECIPES' &&
        error.details?.found === 12 &&
        error.details?.required === 30,
    );
    assert.doesNotThrow(() =>
      assertSufficientCandidatePool(new CandidatePoolIndex(makeFullPool()), 30),
    );
  });
});
