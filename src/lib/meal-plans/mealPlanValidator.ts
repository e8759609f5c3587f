/**
 * Structural and nutritional validator for a 3-day plan (draft or built).
 * Pure checks, all accumulated: day types, meal completeness, part
 * completeness, recipe resolvability and tags, calorie band.
 * Violations are returned, never thrown.
 */

import { allocateMealCalories } from './calorieAllocator';
import type { CandidatePoolIndex } from './candidatePool';
import type {
  DayType,
  MealPlan,
  MealPlanDraft,
  PlanDay,
  PlanMeal,
  PlanValidationResult,
  PlanViolation,
} from './mealPlans.types';
import {
  DAY_TYPE_ORDER,
  DAY_TYPE_SPECS,
  SIMPLE_MEAL_PART,
  getDayTargetCalories,
  getPartSpecs,
  getSlotTagRequirement,
  isDayType,
  isMealType,
  recipeFitsSlot,
} from './mealStructure';
import { planDates } from './planDates';

export type ValidatePlanOptions = {
  baseDailyCalories: number;
  pool: CandidatePoolIndex;
  /** Relative band around the day target, e.g. 0.15 */
  calorieTolerance: number;
};

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function validateDayTypes(plan: MealPlanDraft): PlanViolation[] {
  const found = plan.days.map((d) => d.dayType);
  const unique = new Set(found);
  const exact =
    found.length === DAY_TYPE_ORDER.length &&
    unique.size === DAY_TYPE_ORDER.length &&
    DAY_TYPE_ORDER.every((t) => unique.has(t));
  if (exact) return [];
  const missing = DAY_TYPE_ORDER.filter((t) => !unique.has(t));
  return [
    {
      code: 'DAY_TYPES_MISMATCH',
      dayIndex: null,
      dayType: null,
      message:
        `Plan must contain exactly one regular, workout and rest day; found [${found.join(', ')}]` +
        (missing.length > 0 ? `, missing [${missing.join(', ')}]` : ''),
    },
  ];
}

/**
 * Validate a plan. `ok` is true when there are no violations.
 */
export function validateMealPlan(
  plan: MealPlanDraft,
  options: ValidatePlanOptions,
): PlanValidationResult {
  const { pool, baseDailyCalories, calorieTolerance } = options;
  const violations: PlanViolation[] = [...validateDayTypes(plan)];

  plan.days.forEach((day, dayIndex) => {
    const dayType = day.dayType;
    const knownDayType = isDayType(dayType) ? dayType : null;

    // Meal completeness
    if (knownDayType) {
      const present = new Set(day.meals.map((m) => m.mealType));
      for (const expected of DAY_TYPE_SPECS[knownDayType].mealTypes) {
        if (!present.has(expected)) {
          violations.push({
            code: 'MISSING_MEAL',
            dayIndex,
            dayType,
            mealType: expected,
            message: `Day ${dayIndex + 1} (${dayType}) is missing meal "${expected}"`,
          });
        }
      }
    }

    let totalCalories = 0;

    for (const meal of day.meals) {
      const mealType = meal.mealType;
      if (!isMealType(mealType)) {
        violations.push({
          code: 'UNKNOWN_MEAL_TYPE',
          dayIndex,
          dayType,
          mealType,
          message: `Day ${dayIndex + 1} (${dayType}) has unknown meal type "${mealType}"`,
        });
      }

      // Part completeness
      const specs = isMealType(mealType) ? getPartSpecs(mealType) : null;
      if (specs) {
        for (const spec of specs.filter((s) => s.isRequired)) {
          const part = meal.parts.find((p) => sameName(p.name, spec.name));
          if (!part) {
            violations.push({
              code: 'MISSING_REQUIRED_PART',
              dayIndex,
              dayType,
              mealType,
              partName: spec.name,
              message: `Day ${dayIndex + 1} ${mealType} is missing required part "${spec.name}"`,
            });
          } else if (part.selectedRecipeId === null) {
            violations.push({
              code: 'REQUIRED_PART_UNFILLED',
              dayIndex,
              dayType,
              mealType,
              partName: spec.name,
              message: `Day ${dayIndex + 1} ${mealType} has no recipe for required part "${spec.name}"`,
            });
          }
        }
      } else if (
        isMealType(mealType) &&
        !meal.parts.some((p) => p.selectedRecipeId !== null)
      ) {
        violations.push({
          code: 'REQUIRED_PART_UNFILLED',
          dayIndex,
          dayType,
          mealType,
          partName: SIMPLE_MEAL_PART,
          message: `Day ${dayIndex + 1} ${mealType} has no recipe`,
        });
      }

      // Recipe resolvability and tags
      for (const part of meal.parts) {
        const recipeId = part.selectedRecipeId;
        if (recipeId === null) continue;
        const recipe = pool.get(recipeId);
        if (!recipe) {
          violations.push({
            code: 'UNKNOWN_RECIPE',
            dayIndex,
            dayType,
            mealType,
            partName: part.name,
            recipeId,
            message: `Day ${dayIndex + 1} ${mealType}/${part.name}: recipe ${recipeId} is not in the candidate pool`,
          });
          continue;
        }
        totalCalories += recipe.calories;
        if (isMealType(mealType) && !recipeFitsSlot(recipe, mealType, part.name)) {
          const required = getSlotTagRequirement(mealType, part.name);
          violations.push({
            code: 'RECIPE_LACKS_TAGS',
            dayIndex,
            dayType,
            mealType,
            partName: part.name,
            recipeId,
            message: `Day ${dayIndex + 1} ${mealType}/${part.name}: recipe ${recipeId} lacks tags [${required.join(', ')}]`,
          });
        }
      }
    }

    // Calorie band on the day-type-adjusted target
    if (knownDayType) {
      const target = getDayTargetCalories(baseDailyCalories, knownDayType);
      const min = target * (1 - calorieTolerance);
      const max = target * (1 + calorieTolerance);
      if (totalCalories < min || totalCalories > max) {
        violations.push({
          code: 'CALORIE_OUT_OF_RANGE',
          dayIndex,
          dayType,
          message: `Day ${dayIndex + 1} (${dayType}) totals ${Math.round(totalCalories)} kcal, outside ${Math.ceil(min)} to ${Math.floor(max)} kcal (target ${target})`,
        });
      }
    }
  });

  return { ok: violations.length === 0, violations };
}

/**
 * Narrow a draft that passed validation into the strict plan shape.
 * Days are put in canonical order; missing dates, targets and allocations
 * are derived.
 */
export function toMealPlan(
  draft: MealPlanDraft,
  baseDailyCalories: number,
  startDate?: string | null,
): MealPlan {
  const dates = planDates(DAY_TYPE_ORDER.length, startDate);
  const days: PlanDay[] = [];
  for (const [index, dayType] of DAY_TYPE_ORDER.entries()) {
    const source = draft.days.find((d) => d.dayType === dayType);
    if (!source) continue;
    days.push(toPlanDay(source, dayType, baseDailyCalories, dates[index]));
  }
  return { days };
}

function toPlanDay(
  source: MealPlanDraft['days'][number],
  dayType: DayType,
  baseDailyCalories: number,
  fallbackDate: string,
): PlanDay {
  const targetCalories = getDayTargetCalories(baseDailyCalories, dayType);
  const allocations = allocateMealCalories(
    targetCalories,
    DAY_TYPE_SPECS[dayType].mealTypes,
  );
  const meals: PlanMeal[] = [];
  for (const meal of source.meals) {
    const mealType = meal.mealType;
    if (!isMealType(mealType)) continue;
    meals.push({
      mealType,
      allocatedCalories: meal.allocatedCalories ?? allocations[mealType] ?? 0,
      parts: meal.parts.map((p) => ({
        name: p.name,
        selectedRecipeId: p.selectedRecipeId,
      })),
    });
  }
  return {
    date: source.date ?? fallbackDate,
    dayType,
    targetCalories,
    meals,
  };
}
