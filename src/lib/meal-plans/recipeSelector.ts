/**
 * Recipe selection for one slot: tag filter → score → best (uniform pick
 * among exact ties). Returns null when nothing passes the tag filter; the
 * caller decides whether that matters.
 */

import { RecipeScoringService } from '@/src/lib/meal-history/recipeScoring';
import type { CandidatePoolIndex } from './candidatePool';
import type {
  CandidateRecipe,
  FeedbackLookup,
  MealType,
} from './mealPlans.types';
import { getSlotTagRequirement } from './mealStructure';
import { pickOne, type RandomSource } from './random';

/** Request-scoped inputs shared by every selection in one run. */
export type SelectionContext = {
  pool: CandidatePoolIndex;
  feedback?: FeedbackLookup;
  scorer: RecipeScoringService;
  random: RandomSource;
};

export function createSelectionContext(
  pool: CandidatePoolIndex,
  random: RandomSource,
  feedback?: FeedbackLookup,
): SelectionContext {
  return { pool, feedback, random, scorer: new RecipeScoringService(random) };
}

export type SlotRequest = {
  mealType: MealType;
  partName?: string | null;
  targetCalories: number;
};

export function findSlotCandidates(
  pool: CandidatePoolIndex,
  mealType: MealType,
  partName?: string | null,
): CandidateRecipe[] {
  return pool.withTags(getSlotTagRequirement(mealType, partName));
}

export function selectRecipe(
  ctx: SelectionContext,
  slot: SlotRequest,
): CandidateRecipe | null {
  const candidates = findSlotCandidates(ctx.pool, slot.mealType, slot.partName);
  if (candidates.length === 0) return null;

  let best: CandidateRecipe[] = [];
  let bestScore = -Infinity;
  for (const recipe of candidates) {
    const score = ctx.scorer.scoreRecipe({
      recipe,
      mealType: slot.mealType,
      partName: slot.partName,
      targetCalories: slot.targetCalories,
      feedback: ctx.feedback,
    });
    if (score > bestScore) {
      bestScore = score;
      best = [recipe];
    } else if (score === bestScore) {
      best.push(recipe);
    }
  }
  return pickOne(best, ctx.random);
}
