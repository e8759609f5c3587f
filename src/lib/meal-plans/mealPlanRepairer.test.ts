import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CandidatePoolIndex } from './candidatePool';
import { repairMealPlan } from './mealPlanRepairer';
import { validateMealPlan } from './mealPlanValidator';
import type { MealPlan, MealPlanDraft } from './mealPlans.types';
import { createRandomSource, type RandomSource } from './random';
import { createSelectionContext } from './recipeSelector';
import { makeFullPool, makeRecipe, SLOT_RECIPES } from './__fixtures__/recipes';
import { makeValidPlan } from './__fixtures__/plans';

const pool = new CandidatePoolIndex(makeFullPool());

function repair(draft: MealPlanDraft, random: RandomSource, rate = 0.5) {
  return repairMealPlan(draft, {
    baseDailyCalories: 2000,
    selection: createSelectionContext(pool, random),
    optionalPartInclusionRate: rate,
    startDate: '2026-06-01',
  });
}

function selection(plan: MealPlan, dayType: string, mealType: string, partName: string) {
  return plan.days
    .find((d) => d.dayType === dayType)
    ?.meals.find((m) => m.mealType === mealType)
    ?.parts.find((p) => p.name === partName)?.selectedRecipeId;
}

describe('repairMealPlan', () => {
  it('keeps a valid plan unchanged', () => {
    const source = makeValidPlan();
    const { plan, unfillableSlots, reusedCount } = repair(source, () => 0.9);
    assert.deepStrictEqual(plan, source);
    assert.deepStrictEqual(unfillableSlots, []);
    // 10 regular parts + 12 workout + 10 rest
    assert.strictEqual(reusedCount, 32);
  });

  it('replaces an unknown recipe id', () => {
    const source = makeValidPlan();
    const lunch = source.days[0].meals.find((m) => m.mealType === 'lunch');
    assert.ok(lunch);
    lunch.parts[1] = { name: 'soup', selectedRecipeId: 9999 };

    const { plan } = repair(source, () => 0);
    assert.strictEqual(selection(plan, 'regular', 'lunch', 'soup'), SLOT_RECIPES.lunchSoup.id);
    assert.strictEqual(
      validateMealPlan(plan, { baseDailyCalories: 2000, pool, calorieTolerance: 0.15 }).ok,
      true,
    );
  });

  it('leaves an empty optional part empty when the inclusion roll fails', () => {
    const source = makeValidPlan();
    const lunch = source.days[0].meals.find((m) => m.mealType === 'lunch');
    assert.ok(lunch);
    lunch.parts = lunch.parts.filter((p) => p.name !== 'soup');

    const { plan } = repair(source, () => 0.9);
    assert.strictEqual(selection(plan, 'regular', 'lunch', 'soup'), null);
  });

  it('replaces a required part whose recipe lacks the tags', () => {
    const source = makeValidPlan();
    const lunch = source.days[2].meals.find((m) => m.mealType === 'lunch');
    assert.ok(lunch);
    lunch.parts[0] = { name: 'main course', selectedRecipeId: SLOT_RECIPES.dinnerMain.id };

    const { plan } = repair(source, () => 0.9);
    assert.strictEqual(selection(plan, 'rest', 'lunch', 'main course'), SLOT_RECIPES.lunchMain.id);
  });

  it('rebuilds missing days and drops unexpected meals', () => {
    const source: MealPlanDraft = {
      days: [
        {
          dayType: 'regular',
          date: '2026-07-01',
          meals: [
            { mealType: 'pre-workout', parts: [{ name: 'main', selectedRecipeId: SLOT_RECIPES.preWorkout.id }] },
            { mealType: 'brunch', parts: [] },
          ],
        },
      ],
    };
    const { plan, unfillableSlots } = repair(source, () => 0);
    assert.deepStrictEqual(
      plan.days.map((d) => [d.dayType, d.date]),
      [
        ['regular', '2026-07-01'],
        ['workout', '2026-06-02'],
        ['rest', '2026-06-03'],
      ],
    );
    assert.deepStrictEqual(
      plan.days[0]?.meals.map((m) => m.mealType),
      ['breakfast', 'mid_morning', 'lunch', 'mid_afternoon', 'dinner', 'supper'],
    );
    assert.deepStrictEqual(unfillableSlots, []);
  });

  it('takes a simple meal selection from any of its parts', () => {
    const source = makeValidPlan();
    const supper = source.days[0].meals.find((m) => m.mealType === 'supper');
    assert.ok(supper);
    supper.parts = [
      { name: 'side', selectedRecipeId: null },
      { name: 'dish', selectedRecipeId: SLOT_RECIPES.dinnerMain.id },
    ];
    const { plan } = repair(source, () => 0.9);
    assert.deepStrictEqual(
      plan.days[0]?.meals.find((m) => m.mealType === 'supper')?.parts,
      [{ name: 'main', selectedRecipeId: SLOT_RECIPES.dinnerMain.id }],
    );
  });

  it('reports required slots no recipe can fill', () => {
    const thinPool = new CandidatePoolIndex(
      makeFullPool().filter((r) => r.id !== SLOT_RECIPES.preWorkout.id),
    );
    const { unfillableSlots } = repairMealPlan(
      { days: [] },
      {
        baseDailyCalories: 2000,
        selection: createSelectionContext(thinPool, () => 0),
        optionalPartInclusionRate: 0.5,
      },
    );
    assert.deepStrictEqual(unfillableSlots, [
      { dayType: 'workout', mealType: 'pre-workout', partName: 'main' },
    ]);
  });

  it('does not change valid selections when applied twice', () => {
    const source: MealPlanDraft = {
      days: [
        {
          dayType: 'regular',
          meals: [
            {
              mealType: 'lunch',
              parts: [
                { name: 'main course', selectedRecipeId: 9999 },
                { name: 'soup', selectedRecipeId: SLOT_RECIPES.dinnerSoup.id },
              ],
            },
          ],
        },
        { dayType: 'rest', meals: [] },
      ],
    };
    const widerPool = new CandidatePoolIndex([
      ...makeFullPool(),
      makeRecipe(40, ['lunch', 'main course'], 380),
      makeRecipe(41, ['dinner', 'main course'], 320),
      makeRecipe(42, ['breakfast', 'fruit'], 60),
    ]);
    const params = (seed: number) => ({
      baseDailyCalories: 2000,
      selection: createSelectionContext(widerPool, createRandomSource(seed)),
      optionalPartInclusionRate: 0.5,
      startDate: '2026-06-01',
    });

    const first = repairMealPlan(source, params(3)).plan;
    const second = repairMealPlan(first, params(99)).plan;

    first.days.forEach((day, d) => {
      day.meals.forEach((meal, m) => {
        meal.parts.forEach((part, p) => {
          if (part.selectedRecipeId === null) return;
          assert.strictEqual(
            second.days[d]?.meals[m]?.parts[p]?.selectedRecipeId,
            part.selectedRecipeId,
            `${day.dayType} ${meal.mealType} ${part.name}`,
          );
        });
      });
    });
    assert.deepStrictEqual(
      second.days.map((d) => d.date),
      first.days.map((d) => d.date),
    );
  });
});
