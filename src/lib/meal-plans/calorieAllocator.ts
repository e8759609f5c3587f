import type { MealType } from './mealPlans.types';

/** Share of the day target per meal type. Not normalized. */
export const MEAL_CALORIE_WEIGHTS: Readonly<Record<string, number>> = {
  breakfast: 0.25,
  lunch: 0.35,
  dinner: 0.3,
  'pre-workout': 0.05,
  'post-workout': 0.05,
  mid_morning: 0.05,
  mid_afternoon: 0.05,
  supper: 0.1,
};

/**
 * floor(target × weight) per meal type; unknown meal types get 0.
 * The allocations may sum to less (or more) than the target; the calorie band
 * is checked on selected recipes, not on allocations.
 */
export function allocateMealCalories(
  targetCalories: number,
  mealTypes: readonly (MealType | string)[],
): Record<string, number> {
  const allocations: Record<string, number> = {};
  for (const mealType of mealTypes) {
    const weight = MEAL_CALORIE_WEIGHTS[mealType] ?? 0;
    allocations[mealType] = Math.max(0, Math.floor(targetCalories * weight));
  }
  return allocations;
}

/** Per-part target inside a meal: allocation split evenly over its parts. */
export function getPartTargetCalories(
  mealAllocation: number,
  partCount: number,
): number {
  return partCount > 0 ? mealAllocation / partCount : mealAllocation;
}

/**
 * Factor that maps the summed meal allocations back onto the day target.
 * The weights add up to more than 1 (1.1 on regular days, 1.2 with workout
 * meals), so part targets taken straight from the allocations overshoot.
 */
export function getAllocationScale(
  targetCalories: number,
  allocations: Readonly<Record<string, number>>,
): number {
  const allocated = Object.values(allocations).reduce((sum, n) => sum + n, 0);
  return allocated > 0 ? targetCalories / allocated : 1;
}
