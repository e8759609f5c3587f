import { allocateMealCalories } from '../calorieAllocator';
import type { DayType, MealPlan, PlanDay, PlanMeal } from '../mealPlans.types';
import { DAY_TYPE_SPECS } from '../mealStructure';
import { SLOT_RECIPES as R } from './recipes';

function regularMeals(): PlanMeal[] {
  return [
    {
      mealType: 'breakfast',
      allocatedCalories: 500,
      parts: [
        { name: 'main course', selectedRecipeId: R.breakfastMain.id },
        { name: 'fruit', selectedRecipeId: R.breakfastFruit.id },
        { name: 'dairy', selectedRecipeId: R.breakfastDairy.id },
      ],
    },
    {
      mealType: 'mid_morning',
      allocatedCalories: 100,
      parts: [{ name: 'main', selectedRecipeId: R.breakfastMain.id }],
    },
    {
      mealType: 'lunch',
      allocatedCalories: 700,
      parts: [
        { name: 'main course', selectedRecipeId: R.lunchMain.id },
        { name: 'soup', selectedRecipeId: R.lunchSoup.id },
      ],
    },
    {
      mealType: 'mid_afternoon',
      allocatedCalories: 100,
      parts: [{ name: 'main', selectedRecipeId: R.breakfastMain.id }],
    },
    {
      mealType: 'dinner',
      allocatedCalories: 600,
      parts: [
        { name: 'main course', selectedRecipeId: R.dinnerMain.id },
        { name: 'soup', selectedRecipeId: R.dinnerSoup.id },
      ],
    },
    {
      mealType: 'supper',
      allocatedCalories: 200,
      parts: [{ name: 'main', selectedRecipeId: R.dinnerMain.id }],
    },
  ];
}

function day(date: string, dayType: DayType, targetCalories: number): PlanDay {
  const meals = regularMeals();
  if (dayType === 'workout') {
    meals.push(
      {
        mealType: 'pre-workout',
        allocatedCalories: 120,
        parts: [{ name: 'main', selectedRecipeId: R.preWorkout.id }],
      },
      {
        mealType: 'post-workout',
        allocatedCalories: 120,
        parts: [{ name: 'main', selectedRecipeId: R.postWorkout.id }],
      },
    );
  }
  const allocations = allocateMealCalories(
    targetCalories,
    DAY_TYPE_SPECS[dayType].mealTypes,
  );
  for (const meal of meals) {
    meal.allocatedCalories = allocations[meal.mealType] ?? 0;
  }
  return { date, dayType, targetCalories, meals };
}

/**
 * Valid for base 2000 kcal against makeFullPool():
 * regular 1900 / 2000, workout 2300 / 2400, rest 1900 / 1800.
 */
export function makeValidPlan(): MealPlan {
  return {
    days: [
      day('2026-03-02', 'regular', 2000),
      day('2026-03-03', 'workout', 2400),
      day('2026-03-04', 'rest', 1800),
    ],
  };
}
