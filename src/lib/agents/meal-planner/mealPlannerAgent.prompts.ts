/**
 * Meal Planner Agent Prompts
 *
 * Builds the structured payload and prompt text for the draft generator.
 * The model may only choose recipe ids listed per slot; everything it returns
 * is validated and repaired afterwards.
 */

import { RecipeScoringService } from '@/src/lib/meal-history/recipeScoring';
import {
  allocateMealCalories,
  getAllocationScale,
  getPartTargetCalories,
} from '@/src/lib/meal-plans/calorieAllocator';
import type { CandidatePoolIndex } from '@/src/lib/meal-plans/candidatePool';
import type {
  DayType,
  FeedbackLookup,
  Goal,
  MacroTargets,
  MealPlanDraft,
  MealType,
} from '@/src/lib/meal-plans/mealPlans.types';
import {
  DAY_TYPE_ORDER,
  DAY_TYPE_SPECS,
  SIMPLE_MEAL_PART,
  getDayTargetCalories,
  getPartSpecs,
} from '@/src/lib/meal-plans/mealStructure';
import { findSlotCandidates } from '@/src/lib/meal-plans/recipeSelector';

export type PromptCandidate = {
  recipeId: number;
  title: string;
  calories: number;
  tags: string[];
};

export type PromptSlot = {
  dayType: DayType;
  mealType: MealType;
  partName: string;
  targetCalories: number;
  isRequired: boolean;
  candidates: PromptCandidate[];
};

export type DraftPromptPayload = {
  baseDailyCalories: number;
  goal: Goal;
  macroTargets: MacroTargets;
  /** Relative calorie band per day, e.g. 0.15 */
  calorieTolerance: number;
  dayTargets: Record<DayType, number>;
  slots: PromptSlot[];
  /** Present when re-optimizing a stored plan (snake_case, as the model returns it) */
  existingPlan?: Record<string, unknown>;
};

export function buildDraftPromptPayload(args: {
  baseDailyCalories: number;
  goal: Goal;
  macroTargets: MacroTargets;
  calorieTolerance: number;
  pool: CandidatePoolIndex;
  candidatesPerSlot: number;
  feedback?: FeedbackLookup;
  existingPlan?: MealPlanDraft;
}): DraftPromptPayload {
  const { baseDailyCalories, pool, candidatesPerSlot, feedback } = args;
  // No jitter: the prompt lists candidates in a stable order
  const scorer = new RecipeScoringService(() => 0);
  const dayTargets: Record<DayType, number> = {
    regular: getDayTargetCalories(baseDailyCalories, 'regular'),
    workout: getDayTargetCalories(baseDailyCalories, 'workout'),
    rest: getDayTargetCalories(baseDailyCalories, 'rest'),
  };

  const slots: PromptSlot[] = [];
  for (const dayType of DAY_TYPE_ORDER) {
    const mealTypes = DAY_TYPE_SPECS[dayType].mealTypes;
    const allocations = allocateMealCalories(dayTargets[dayType], mealTypes);
    const scale = getAllocationScale(dayTargets[dayType], allocations);
    for (const mealType of mealTypes) {
      const specs = getPartSpecs(mealType) ?? [
        { name: SIMPLE_MEAL_PART, isRequired: true },
      ];
      const targetCalories = Math.round(
        getPartTargetCalories(allocations[mealType] ?? 0, specs.length) * scale,
      );
      for (const spec of specs) {
        const candidates = findSlotCandidates(pool, mealType, spec.name)
          .map((recipe) => ({
            recipe,
            score: scorer.scoreBreakdown({
              recipe,
              mealType,
              partName: spec.name,
              targetCalories,
              feedback,
            }).total,
          }))
          .sort((a, b) => b.score - a.score || a.recipe.id - b.recipe.id)
          .slice(0, candidatesPerSlot)
          .map(({ recipe }) => ({
            recipeId: recipe.id,
            title: recipe.title,
            calories: Math.round(recipe.calories),
            tags: [...recipe.tags].sort(),
          }));
        slots.push({
          dayType,
          mealType,
          partName: spec.name,
          targetCalories,
          isRequired: spec.isRequired,
          candidates,
        });
      }
    }
  }

  return {
    baseDailyCalories,
    goal: args.goal,
    macroTargets: args.macroTargets,
    calorieTolerance: args.calorieTolerance,
    dayTargets,
    slots,
    ...(args.existingPlan && { existingPlan: toDraftWire(args.existingPlan) }),
  };
}

/** Draft → the snake_case shape the model reads and writes. */
export function toDraftWire(draft: MealPlanDraft): Record<string, unknown> {
  return {
    ...(draft.title ? { title: draft.title } : {}),
    days: draft.days.map((day) => ({
      ...(day.date ? { date: day.date } : {}),
      day_type: day.dayType,
      meals: day.meals.map((meal) => ({
        meal_type: meal.mealType,
        parts: meal.parts.map((part) => ({
          name: part.name,
          selected_recipe_id: part.selectedRecipeId,
        })),
      })),
    })),
  };
}

function outputRules(payload: DraftPromptPayload): string {
  const tolerancePct = Math.round(payload.calorieTolerance * 100);
  return `CRITICAL REQUIREMENTS:
1. Output MUST be exactly ONE valid JSON object conforming to the provided schema
2. Do NOT include markdown formatting, code blocks, or explanations
3. The plan has exactly 3 days: one "regular", one "workout" and one "rest" day
4. Every slot listed below must appear; use "selected_recipe_id": null for an optional part you leave out
5. Use ONLY recipe ids listed for that exact slot. Do NOT invent ids
6. Each day's selected recipes must total within ±${tolerancePct}% of that day's calorie target
7. Prefer variety: avoid repeating the same recipe within a day where alternatives exist`;
}

function formatSlots(payload: DraftPromptPayload): string {
  return payload.slots
    .map((slot) => {
      const header = `- ${slot.dayType} / ${slot.mealType} / ${slot.partName} (${slot.isRequired ? 'required' : 'optional'}, ~${slot.targetCalories} kcal)`;
      if (slot.candidates.length === 0) return `${header}: no candidates, use null`;
      const list = slot.candidates
        .map((c) => `    ${c.recipeId}: ${c.title} (${c.calories} kcal)`)
        .join('\n');
      return `${header}:\n${list}`;
    })
    .join('\n');
}

function formatTargets(payload: DraftPromptPayload): string {
  const m = payload.macroTargets;
  return `- Base: ${payload.baseDailyCalories} kcal/day (goal: ${payload.goal})
- Day targets: regular ${payload.dayTargets.regular} kcal, workout ${payload.dayTargets.workout} kcal, rest ${payload.dayTargets.rest} kcal
- Macro split: protein ${Math.round(m.protein * 100)}%, carbs ${Math.round(m.carbs * 100)}%, fat ${Math.round(m.fat * 100)}%`;
}

/**
 * Prompt for a first-draft 3-day plan
 */
export function buildMealPlanDraftPrompt(payload: DraftPromptPayload): string {
  return `You are a meal planning assistant. Assign recipes to meal slots for a 3-day plan.

CALORIE & MACRO TARGETS:
${formatTargets(payload)}

SLOTS AND CANDIDATE RECIPES (id: title (kcal)):
${formatSlots(payload)}

${outputRules(payload)}

Generate the meal plan now. Output ONLY the JSON object, nothing else.`;
}

/**
 * Prompt for improving an existing plan: keep what fits, replace what does not
 */
export function buildMealPlanOptimizePrompt(payload: DraftPromptPayload): string {
  return `You are a meal planning assistant. Improve the existing 3-day plan below.
Keep selections that fit their slot and the calorie targets; replace the others with candidates listed for that slot.

CALORIE & MACRO TARGETS:
${formatTargets(payload)}

EXISTING PLAN:
${JSON.stringify(payload.existingPlan ?? { days: [] })}

SLOTS AND CANDIDATE RECIPES (id: title (kcal)):
${formatSlots(payload)}

${outputRules(payload)}

Return the complete improved plan. Output ONLY the JSON object, nothing else.`;
}
