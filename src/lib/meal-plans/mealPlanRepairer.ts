/**
 * Plan repair: rebuild the three days from scratch, reusing every selection
 * of the source plan that still resolves and carries the slot's tags.
 *
 * - Required parts: reuse, else select (may end null when nothing matches).
 * - Optional parts: reuse, else filled with probability
 *   optionalPartInclusionRate.
 *
 * Meals and parts the day type does not expect are dropped.
 */

import {
  buildPlanDay,
  type BuiltPlan,
  type PartFiller,
} from './deterministicPlanBuilder';
import type {
  DraftDay,
  MealPlanDraft,
  PlanPart,
  UnfillableSlot,
} from './mealPlans.types';
import { DAY_TYPE_ORDER, SIMPLE_MEAL_PART, getPartSpecs, recipeFitsSlot } from './mealStructure';
import { isIsoDate, planDates } from './planDates';
import { selectRecipe, type SelectionContext } from './recipeSelector';

export type RepairPlanParams = {
  baseDailyCalories: number;
  selection: SelectionContext;
  /** Probability of filling an empty optional part */
  optionalPartInclusionRate: number;
  startDate?: string | null;
};

export type RepairedPlan = BuiltPlan & {
  /** Selections carried over unchanged from the source plan */
  reusedCount: number;
};

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function findSourceParts(
  day: DraftDay | undefined,
  mealType: string,
  partName: string,
): PlanPart[] {
  const meal = day?.meals.find((m) => m.mealType === mealType);
  if (!meal) return [];
  // Simple meals: any part of the meal may carry the selection
  if (partName === SIMPLE_MEAL_PART) return meal.parts;
  return meal.parts.filter((p) => sameName(p.name, partName));
}

export function repairMealPlan(
  source: MealPlanDraft,
  params: RepairPlanParams,
): RepairedPlan {
  const { baseDailyCalories, selection, optionalPartInclusionRate } = params;
  const dates = planDates(DAY_TYPE_ORDER.length, params.startDate);
  const unfillableSlots: UnfillableSlot[] = [];
  let reusedCount = 0;

  const days = DAY_TYPE_ORDER.map((dayType, i) => {
    const sourceDay = source.days.find((d) => d.dayType === dayType);

    const fillPart: PartFiller = (slot) => {
      const structured = getPartSpecs(slot.mealType) !== null;
      const partName = structured ? slot.partName : SIMPLE_MEAL_PART;
      for (const part of findSourceParts(sourceDay, slot.mealType, partName)) {
        if (part.selectedRecipeId === null) continue;
        const recipe = selection.pool.get(part.selectedRecipeId);
        if (recipe && recipeFitsSlot(recipe, slot.mealType, slot.partName)) {
          reusedCount++;
          return recipe.id;
        }
      }
      if (!slot.isRequired && selection.random() >= optionalPartInclusionRate) {
        return null;
      }
      return (
        selectRecipe(selection, {
          mealType: slot.mealType,
          partName: slot.partName,
          targetCalories: slot.targetCalories,
        })?.id ?? null
      );
    };

    const date =
      sourceDay?.date && isIsoDate(sourceDay.date) ? sourceDay.date : dates[i];
    return buildPlanDay(dayType, date, baseDailyCalories, fillPart, unfillableSlots);
  });

  return { plan: { days }, unfillableSlots, reusedCount };
}
