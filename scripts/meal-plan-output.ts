/**
 * Console output shared by the meal plan scripts.
 */

import { toPlanSnapshot } from '../src/lib/meal-plans/mealPlans.schemas';
import type { SavedMealPlan } from '../src/lib/meal-plans/mealPlans.service';

export function printPlanResult(result: SavedMealPlan, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        {
          plan_id: result.planId,
          title: result.title,
          method: result.method,
          degraded: result.degraded,
          ...toPlanSnapshot(result.plan),
        },
        null,
        2,
      ),
    );
    return;
  }

  console.log('\n' + '='.repeat(50));
  console.log(`📋 ${result.title} (${result.planId})`);
  console.log('='.repeat(50));
  console.log(`Method:   ${result.method}${result.degraded ? ' (degraded)' : ''}`);
  console.log(`Trace:    ${result.trace.join(' → ')}`);
  console.log(`Base:     ${result.baseDailyCalories} kcal/day (${result.goal})`);
  if (result.draftFailure) {
    console.log(`Draft:    rejected (${result.draftFailure.code})`);
  }
  for (const day of result.summary) {
    console.log(
      `${day.date} ${day.dayType.padEnd(8)} ${day.totalCalories} / ${day.targetCalories} kcal` +
        `  P ${day.protein}g  C ${day.carbohydrate}g  F ${day.fat}g`,
    );
  }
  for (const slot of result.unfillableSlots) {
    console.log(`⚠️  No recipe for ${slot.dayType}/${slot.mealType}/${slot.partName}`);
  }
}
