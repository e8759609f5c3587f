import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RecipeScoringService } from './recipeScoring';
import { makeRecipe } from '@/src/lib/meal-plans/__fixtures__/recipes';
import type { UserFeedback } from '@/src/lib/meal-plans/mealPlans.types';

const close = (actual: number, expected: number) =>
  assert.ok(
    Math.abs(actual - expected) < 1e-9,
    `expected ${expected}, got ${actual}`,
  );

function feedback(partial: Partial<UserFeedback> & { recipeId: number }): UserFeedback {
  return { rating: null, liked: null, cookedCount: 0, skipCount: 0, ...partial };
}

describe('RecipeScoringService', () => {
  const scorer = new RecipeScoringService(() => 0);

  it('scores calorie fit linearly and clamps at 0', () => {
    assert.strictEqual(scorer.calculateCalorieFit(300, 300), 1);
    assert.strictEqual(scorer.calculateCalorieFit(150, 300), 0.5);
    assert.strictEqual(scorer.calculateCalorieFit(450, 300), 0.5);
    assert.strictEqual(scorer.calculateCalorieFit(700, 300), 0);
    assert.strictEqual(scorer.calculateCalorieFit(300, 0), 0);
  });

  it('adds a bonus per matching slot tag', () => {
    const recipe = makeRecipe(1, ['lunch', 'main course'], 400);
    close(scorer.calculateTagBonus(recipe, 'lunch', 'main course'), 0.2);
    close(scorer.calculateTagBonus(recipe, 'lunch', 'soup'), 0.1);
    close(scorer.calculateTagBonus(recipe, 'supper', 'main'), 0.1);
    close(scorer.calculateTagBonus(recipe, 'pre-workout', null), 0.1);
  });

  it('turns feedback into a bonus or penalty', () => {
    close(
      scorer.calculatePersonalFeedback(
        feedback({ recipeId: 1, rating: 5, liked: true, cookedCount: 10, skipCount: 1 }),
      ),
      0.28,
    );
    close(
      scorer.calculatePersonalFeedback(
        feedback({ recipeId: 1, rating: 1, liked: false, skipCount: 7 }),
      ),
      -0.4,
    );
    close(scorer.calculatePersonalFeedback(feedback({ recipeId: 1, rating: 3 })), 0);
    assert.strictEqual(scorer.calculatePersonalFeedback(undefined), 0);
  });

  it('caps global popularity at 0.1', () => {
    close(
      scorer.calculatePopularity(
        makeRecipe(1, [], 100, { averageRating: 5, globalCookedCount: 250 }),
      ),
      0.1,
    );
    close(
      scorer.calculatePopularity(
        makeRecipe(1, [], 100, { averageRating: 2.5, globalCookedCount: 50 }),
      ),
      0.05,
    );
    assert.strictEqual(scorer.calculatePopularity(makeRecipe(1, [], 100)), 0);
  });

  it('weights the components', () => {
    const recipe = makeRecipe(4, ['lunch', 'main course'], 400, {
      averageRating: 5,
    });
    const breakdown = scorer.scoreBreakdown({
      recipe,
      mealType: 'lunch',
      partName: 'main course',
      targetCalories: 400,
      feedback: new Map([[4, feedback({ recipeId: 4, liked: true })]]),
    });
    // 1×0.4 + 0.2×0.2 + 0.1×0.25 + 0.05
    close(breakdown.total, 0.515);
  });

  it('adds jitter below 0.05 from the random source', () => {
    const input = {
      recipe: makeRecipe(1, ['breakfast', 'main course'], 250),
      mealType: 'breakfast' as const,
      partName: 'main course',
      targetCalories: 500,
    };
    const base = scorer.scoreBreakdown(input).total;
    close(new RecipeScoringService(() => 0).scoreRecipe(input), base);
    close(new RecipeScoringService(() => 0.5).scoreRecipe(input), base + 0.025);
  });

  it('never scores a closer calorie match lower, all else equal', () => {
    const target = 600;
    let previous = -Infinity;
    for (const calories of [1500, 1100, 900, 800, 700, 650, 610, 600]) {
      const { total } = scorer.scoreBreakdown({
        recipe: makeRecipe(1, ['dinner', 'main course'], calories),
        mealType: 'dinner',
        partName: 'main course',
        targetCalories: target,
      });
      assert.ok(total >= previous, `${calories} kcal scored ${total} < ${previous}`);
      previous = total;
    }
  });
});
