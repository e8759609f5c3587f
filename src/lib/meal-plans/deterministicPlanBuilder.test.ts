import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CandidatePoolIndex } from './candidatePool';
import { buildDeterministicPlan } from './deterministicPlanBuilder';
import { validateMealPlan } from './mealPlanValidator';
import { createRandomSource } from './random';
import { createSelectionContext } from './recipeSelector';
import { makeDensePool, makeFullPool, SLOT_RECIPES } from './__fixtures__/recipes';

function dayTotals(
  plan: ReturnType<typeof buildDeterministicPlan>['plan'],
  pool: CandidatePoolIndex,
): number[] {
  return plan.days.map((day) =>
    day.meals
      .flatMap((m) => m.parts)
      .reduce((sum, p) => {
        if (p.selectedRecipeId === null) return sum;
        return sum + (pool.get(p.selectedRecipeId)?.calories ?? 0);
      }, 0),
  );
}

describe('buildDeterministicPlan', () => {
  it('builds a complete plan for 2000 kcal inside every calorie band', () => {
    const pool = new CandidatePoolIndex(makeFullPool());
    const { plan, unfillableSlots } = buildDeterministicPlan({
      baseDailyCalories: 2000,
      selection: createSelectionContext(pool, createRandomSource(11)),
      startDate: '2026-06-01',
    });

    assert.deepStrictEqual(
      plan.days.map((d) => [d.dayType, d.date, d.targetCalories]),
      [
        ['regular', '2026-06-01', 2000],
        ['workout', '2026-06-02', 2400],
        ['rest', '2026-06-03', 1800],
      ],
    );
    assert.deepStrictEqual(unfillableSlots, []);
    assert.deepStrictEqual(dayTotals(plan, pool), [1900, 2300, 1900]);
    for (const day of plan.days) {
      for (const meal of day.meals) {
        for (const part of meal.parts) {
          assert.notStrictEqual(
            part.selectedRecipeId,
            null,
            `${day.dayType} ${meal.mealType} ${part.name}`,
          );
        }
      }
    }
    assert.deepStrictEqual(
      validateMealPlan(plan, { baseDailyCalories: 2000, pool, calorieTolerance: 0.15 }),
      { ok: true, violations: [] },
    );
  });

  it('stays inside the calorie band on a dense pool', () => {
    const pool = new CandidatePoolIndex(makeDensePool());
    const { plan, unfillableSlots } = buildDeterministicPlan({
      baseDailyCalories: 2000,
      selection: createSelectionContext(pool, () => 0),
    });

    assert.deepStrictEqual(unfillableSlots, []);
    assert.deepStrictEqual(dayTotals(plan, pool), [1990, 2410, 1820]);
    assert.deepStrictEqual(
      validateMealPlan(plan, { baseDailyCalories: 2000, pool, calorieTolerance: 0.15 }),
      { ok: true, violations: [] },
    );
    // allocations stay as allocated
    assert.strictEqual(plan.days[1]?.meals[2]?.allocatedCalories, 840);
  });

  it('lays out meals, parts and allocations per day type', () => {
    const pool = new CandidatePoolIndex(makeFullPool());
    const { plan } = buildDeterministicPlan({
      baseDailyCalories: 2000,
      selection: createSelectionContext(pool, () => 0),
    });
    const workout = plan.days[1];
    assert.deepStrictEqual(
      workout?.meals.map((m) => [m.mealType, m.allocatedCalories]),
      [
        ['breakfast', 600],
        ['mid_morning', 120],
        ['lunch', 840],
        ['mid_afternoon', 120],
        ['dinner', 720],
        ['supper', 240],
        ['pre-workout', 120],
        ['post-workout', 120],
      ],
    );
    assert.deepStrictEqual(workout?.meals[0]?.parts, [
      { name: 'main course', selectedRecipeId: SLOT_RECIPES.breakfastMain.id },
      { name: 'fruit', selectedRecipeId: SLOT_RECIPES.breakfastFruit.id },
      { name: 'dairy', selectedRecipeId: SLOT_RECIPES.breakfastDairy.id },
    ]);
    assert.deepStrictEqual(workout?.meals[5]?.parts, [
      { name: 'main', selectedRecipeId: SLOT_RECIPES.dinnerMain.id },
    ]);
  });

  it('leaves a required part null and reports it when nothing matches', () => {
    const pool = new CandidatePoolIndex(
      makeFullPool().filter((r) => r.id !== SLOT_RECIPES.postWorkout.id),
    );
    const { plan, unfillableSlots } = buildDeterministicPlan({
      baseDailyCalories: 2000,
      selection: createSelectionContext(pool, () => 0),
    });
    assert.deepStrictEqual(unfillableSlots, [
      { dayType: 'workout', mealType: 'post-workout', partName: 'main' },
    ]);
    const postWorkout = plan.days[1]?.meals.find((m) => m.mealType === 'post-workout');
    assert.deepStrictEqual(postWorkout?.parts, [{ name: 'main', selectedRecipeId: null }]);
  });
});
