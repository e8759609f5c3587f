/**
 * Deterministic plan construction (fallback of last resort).
 * Allocator + selector per day, meal and part; no draft, no retry loop.
 * Required parts stay null only when the pool has no recipe with their tags.
 */

import {
  allocateMealCalories,
  getAllocationScale,
  getPartTargetCalories,
} from './calorieAllocator';
import type {
  DayType,
  MealPlan,
  MealType,
  PlanDay,
  PlanMeal,
  UnfillableSlot,
} from './mealPlans.types';
import {
  DAY_TYPE_ORDER,
  DAY_TYPE_SPECS,
  SIMPLE_MEAL_PART,
  getDayTargetCalories,
  getPartSpecs,
} from './mealStructure';
import { planDates } from './planDates';
import { selectRecipe, type SelectionContext } from './recipeSelector';

/** One part slot to decide. */
export type PartSlotRequest = {
  dayType: DayType;
  mealType: MealType;
  partName: string;
  isRequired: boolean;
  targetCalories: number;
};

/** Returns the recipe id for the slot, or null to leave it empty. */
export type PartFiller = (slot: PartSlotRequest) => number | null;

export type BuiltPlan = {
  plan: MealPlan;
  unfillableSlots: UnfillableSlot[];
};

/**
 * Build one day: every expected meal, every part spec (simple meals get one
 * `main` part). Required parts the filler leaves null are reported.
 */
export function buildPlanDay(
  dayType: DayType,
  date: string,
  baseDailyCalories: number,
  fillPart: PartFiller,
  unfillable: UnfillableSlot[],
): PlanDay {
  const targetCalories = getDayTargetCalories(baseDailyCalories, dayType);
  const mealTypes = DAY_TYPE_SPECS[dayType].mealTypes;
  const allocations = allocateMealCalories(targetCalories, mealTypes);
  // Meals keep their raw allocation; selection aims at the day target.
  const scale = getAllocationScale(targetCalories, allocations);

  const meals: PlanMeal[] = mealTypes.map((mealType) => {
    const allocatedCalories = allocations[mealType] ?? 0;
    const specs = getPartSpecs(mealType) ?? [
      { name: SIMPLE_MEAL_PART, isRequired: true },
    ];
    const partTarget =
      getPartTargetCalories(allocatedCalories, specs.length) * scale;
    const parts = specs.map((spec) => {
      const selectedRecipeId = fillPart({
        dayType,
        mealType,
        partName: spec.name,
        isRequired: spec.isRequired,
        targetCalories: partTarget,
      });
      if (selectedRecipeId === null && spec.isRequired) {
        unfillable.push({ dayType, mealType, partName: spec.name });
      }
      return { name: spec.name, selectedRecipeId };
    });
    return { mealType, allocatedCalories, parts };
  });

  return { date, dayType, targetCalories, meals };
}

/**
 * Build a full 3-day plan by direct selection. All parts, optional ones
 * included, get a selection attempt.
 */
export function buildDeterministicPlan(params: {
  baseDailyCalories: number;
  selection: SelectionContext;
  startDate?: string | null;
}): BuiltPlan {
  const { baseDailyCalories, selection } = params;
  const dates = planDates(DAY_TYPE_ORDER.length, params.startDate);
  const unfillableSlots: UnfillableSlot[] = [];

  const fillPart: PartFiller = (slot) =>
    selectRecipe(selection, {
      mealType: slot.mealType,
      partName: slot.partName,
      targetCalories: slot.targetCalories,
    })?.id ?? null;

  const days = DAY_TYPE_ORDER.map((dayType, i) =>
    buildPlanDay(dayType, dates[i], baseDailyCalories, fillPart, unfillableSlots),
  );
  return { plan: { days }, unfillableSlots };
}
