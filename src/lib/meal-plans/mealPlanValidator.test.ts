import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CandidatePoolIndex } from './candidatePool';
import { toMealPlan, validateMealPlan } from './mealPlanValidator';
import type { MealPlan, MealPlanDraft, PlanMeal } from './mealPlans.types';
import { makeFullPool, SLOT_RECIPES } from './__fixtures__/recipes';
import { makeValidPlan } from './__fixtures__/plans';

const options = {
  baseDailyCalories: 2000,
  pool: new CandidatePoolIndex(makeFullPool()),
  calorieTolerance: 0.15,
};

function codes(plan: MealPlan): string[] {
  return validateMealPlan(plan, options).violations.map((v) => v.code);
}

function meal(plan: MealPlan, dayIndex: number, mealType: string): PlanMeal {
  const found = plan.days[dayIndex]?.meals.find((m) => m.mealType === mealType);
  assert.ok(found, `no ${mealType} on day ${dayIndex}`);
  return found;
}

describe('validateMealPlan', () => {
  it('accepts a complete plan inside the calorie bands', () => {
    const result = validateMealPlan(makeValidPlan(), options);
    assert.deepStrictEqual(result, { ok: true, violations: [] });
  });

  it('reports a missing regular day once and no calorie band for it', () => {
    const plan = makeValidPlan();
    plan.days = plan.days.filter((d) => d.dayType !== 'regular');
    const result = validateMealPlan(plan, options);
    assert.strictEqual(result.ok, false);
    assert.deepStrictEqual(
      result.violations.map((v) => v.code),
      ['DAY_TYPES_MISMATCH'],
    );
    assert.match(result.violations[0]?.message ?? '', /missing \[regular\]/);
  });

  it('rejects duplicate day types', () => {
    const plan = makeValidPlan();
    plan.days[2] = { ...plan.days[0], date: '2026-03-04' };
    assert.deepStrictEqual(codes(plan), ['DAY_TYPES_MISMATCH']);
  });

  it('reports a missing meal', () => {
    const plan = makeValidPlan();
    plan.days[0].meals = plan.days[0].meals.filter((m) => m.mealType !== 'supper');
    const result = validateMealPlan(plan, options);
    assert.deepStrictEqual(
      result.violations.map((v) => v.code),
      ['MISSING_MEAL', 'CALORIE_OUT_OF_RANGE'],
    );
    assert.strictEqual(result.violations[0]?.mealType, 'supper');
    assert.strictEqual(result.violations[0]?.dayIndex, 0);
  });

  it('reports a missing required part and an unfilled one', () => {
    const plan = makeValidPlan();
    const lunch = meal(plan, 1, 'lunch');
    lunch.parts = lunch.parts.filter((p) => p.name !== 'main course');
    const dinner = meal(plan, 1, 'dinner');
    dinner.parts = dinner.parts.map((p) =>
      p.name === 'main course' ? { ...p, selectedRecipeId: null } : p,
    );
    // workout day drops to 2300 - 400 - 300 = 1600
    assert.deepStrictEqual(codes(plan), [
      'MISSING_REQUIRED_PART',
      'REQUIRED_PART_UNFILLED',
      'CALORIE_OUT_OF_RANGE',
    ]);
  });

  it('treats an empty simple meal as unfilled and keeps the band inclusive', () => {
    const plan = makeValidPlan();
    meal(plan, 0, 'mid_morning').parts = [{ name: 'main', selectedRecipeId: null }];
    // 1900 - 200 = 1700, exactly the lower bound
    const result = validateMealPlan(plan, options);
    assert.deepStrictEqual(
      result.violations.map((v) => [v.code, v.partName]),
      [['REQUIRED_PART_UNFILLED', 'main']],
    );
  });

  it('references an unknown recipe id', () => {
    const plan = makeValidPlan();
    meal(plan, 0, 'lunch').parts[1] = { name: 'soup', selectedRecipeId: 9999 };
    const result = validateMealPlan(plan, options);
    assert.strictEqual(result.violations.length, 1);
    const [violation] = result.violations;
    assert.strictEqual(violation?.code, 'UNKNOWN_RECIPE');
    assert.strictEqual(violation?.recipeId, 9999);
    assert.match(violation?.message ?? '', /9999/);
  });

  it('reports a recipe without the slot tags', () => {
    const plan = makeValidPlan();
    meal(plan, 0, 'lunch').parts[1] = {
      name: 'soup',
      selectedRecipeId: SLOT_RECIPES.dinnerSoup.id,
    };
    const result = validateMealPlan(plan, options);
    assert.deepStrictEqual(
      result.violations.map((v) => [v.code, v.recipeId]),
      [['RECIPE_LACKS_TAGS', SLOT_RECIPES.dinnerSoup.id]],
    );
  });

  it('reports unknown meal types', () => {
    const draft: MealPlanDraft = makeValidPlan();
    draft.days[0].meals.push({ mealType: 'brunch', parts: [] });
    assert.deepStrictEqual(
      validateMealPlan(draft, options).violations.map((v) => v.code),
      ['UNKNOWN_MEAL_TYPE'],
    );
  });

  it('checks calories against the day-type-adjusted target', () => {
    const plan = makeValidPlan();
    // rest day: 1900 + 200 = 2100, inside 2000 ±15% but above 1800 × 1.15
    plan.days[2].meals.push({
      mealType: 'post-workout',
      allocatedCalories: 0,
      parts: [{ name: 'main', selectedRecipeId: SLOT_RECIPES.postWorkout.id }],
    });
    const result = validateMealPlan(plan, options);
    assert.deepStrictEqual(
      result.violations.map((v) => [v.code, v.dayType]),
      [['CALORIE_OUT_OF_RANGE', 'rest']],
    );
  });
});

describe('toMealPlan', () => {
  it('orders days canonically and derives missing fields', () => {
    const plan = toMealPlan(
      {
        days: [
          {
            dayType: 'rest',
            meals: [
              { mealType: 'lunch', parts: [{ name: 'main course', selectedRecipeId: 4 }] },
              { mealType: 'brunch', parts: [] },
            ],
          },
          { dayType: 'regular', date: '2026-05-01', meals: [] },
          { dayType: 'workout', meals: [] },
        ],
      },
      2000,
      '2026-04-01',
    );
    assert.deepStrictEqual(
      plan.days.map((d) => [d.dayType, d.date, d.targetCalories]),
      [
        ['regular', '2026-05-01', 2000],
        ['workout', '2026-04-02', 2400],
        ['rest', '2026-04-03', 1800],
      ],
    );
    assert.deepStrictEqual(plan.days[2]?.meals, [
      {
        mealType: 'lunch',
        allocatedCalories: 630,
        parts: [{ name: 'main course', selectedRecipeId: 4 }],
      },
    ]);
  });
});
