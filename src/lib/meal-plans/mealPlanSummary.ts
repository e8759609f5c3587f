import type { CandidatePoolIndex } from './candidatePool';
import type { DayNutritionSummary, MealPlan } from './mealPlans.types';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Per-day totals over selected recipes (unknown or null selections count 0).
 */
export function summarizeMealPlan(
  plan: MealPlan,
  pool: CandidatePoolIndex,
): DayNutritionSummary[] {
  return plan.days.map((day) => {
    let calories = 0;
    let protein = 0;
    let carbohydrate = 0;
    let fat = 0;
    for (const meal of day.meals) {
      for (const part of meal.parts) {
        if (part.selectedRecipeId === null) continue;
        const recipe = pool.get(part.selectedRecipeId);
        if (!recipe) continue;
        calories += recipe.calories;
        protein += recipe.protein;
        carbohydrate += recipe.carbohydrate;
        fat += recipe.fat;
      }
    }
    return {
      date: day.date,
      dayType: day.dayType,
      targetCalories: day.targetCalories,
      totalCalories: round2(calories),
      protein: round2(protein),
      carbohydrate: round2(carbohydrate),
      fat: round2(fat),
    };
  });
}
