/**
 * Recipe Scoring
 *
 * Heuristic desirability of a candidate recipe for one meal slot:
 * - Calorie fit against the slot target (dominant)
 * - Tag match for the slot
 * - Personal feedback (rating, like/dislike, cooked/skipped counts)
 * - Global popularity (flat add)
 * - Small random jitter so equal recipes do not always resolve the same way
 *
 * Higher is better; the score is not bounded.
 */

import type {
  CandidateRecipe,
  FeedbackLookup,
  MealType,
  UserFeedback,
} from '@/src/lib/meal-plans/mealPlans.types';
import { getSlotTagRequirement } from '@/src/lib/meal-plans/mealStructure';
import type { RandomSource } from '@/src/lib/meal-plans/random';

/**
 * Scoring weights (relative weights matter, not the exact constants)
 */
export const SCORING_WEIGHTS = {
  calorieFit: 0.4,
  tagBonus: 0.2,
  personalFeedback: 0.25,
  popularity: 1.0,
};

const TAG_MATCH_BONUS = 0.1;
const MAX_JITTER = 0.05;

export type RecipeScoreInput = {
  recipe: CandidateRecipe;
  mealType: MealType;
  partName?: string | null;
  targetCalories: number;
  /** Feedback of the acting user; omitted when there is no user */
  feedback?: FeedbackLookup;
};

export type RecipeScoreBreakdown = {
  calorieFit: number;
  tagBonus: number;
  personalFeedback: number;
  popularity: number;
  /** Weighted sum without jitter */
  total: number;
};

export class RecipeScoringService {
  constructor(private readonly random: RandomSource = Math.random) {}

  /** 1 at an exact match, falling linearly to 0 at 100% deviation */
  calculateCalorieFit(recipeCalories: number, targetCalories: number): number {
    if (targetCalories <= 0) return 0;
    return Math.max(
      0,
      1 - Math.abs(recipeCalories - targetCalories) / targetCalories,
    );
  }

  calculateTagBonus(
    recipe: CandidateRecipe,
    mealType: MealType,
    partName?: string | null,
  ): number {
    const [mealTag, partTag] = getSlotTagRequirement(mealType, partName);
    let bonus = 0;
    if (recipe.tags.has(mealTag)) bonus += TAG_MATCH_BONUS;
    if (recipe.tags.has(partTag)) bonus += TAG_MATCH_BONUS;
    return bonus;
  }

  calculatePersonalFeedback(feedback: UserFeedback | undefined): number {
    if (!feedback) return 0;
    let score = 0;
    if (feedback.rating !== null) {
      if (feedback.rating >= 4) score += 0.1;
      else if (feedback.rating <= 2) score -= 0.1;
    }
    if (feedback.liked === true) score += 0.1;
    else if (feedback.liked === false) score -= 0.2;
    score += Math.min(Math.max(feedback.cookedCount, 0), 5) * 0.02;
    score -= Math.min(Math.max(feedback.skipCount, 0), 5) * 0.02;
    return score;
  }

  calculatePopularity(recipe: CandidateRecipe): number {
    let score = 0;
    if (recipe.averageRating != null && recipe.averageRating > 0) {
      score += Math.min(recipe.averageRating / 5, 1) * 0.05;
    }
    if (recipe.globalCookedCount != null && recipe.globalCookedCount > 0) {
      score += Math.min(recipe.globalCookedCount / 100, 1) * 0.05;
    }
    return score;
  }

  /**
   * Weighted components without jitter
   */
  scoreBreakdown(input: RecipeScoreInput): RecipeScoreBreakdown {
    const calorieFit = this.calculateCalorieFit(
      input.recipe.calories,
      input.targetCalories,
    );
    const tagBonus = this.calculateTagBonus(
      input.recipe,
      input.mealType,
      input.partName,
    );
    const personalFeedback = this.calculatePersonalFeedback(
      input.feedback?.get(input.recipe.id),
    );
    const popularity = this.calculatePopularity(input.recipe);

    return {
      calorieFit,
      tagBonus,
      personalFeedback,
      popularity,
      total:
        calorieFit * SCORING_WEIGHTS.calorieFit +
        tagBonus * SCORING_WEIGHTS.tagBonus +
        personalFeedback * SCORING_WEIGHTS.personalFeedback +
        popularity * SCORING_WEIGHTS.popularity,
    };
  }

  scoreRecipe(input: RecipeScoreInput): number {
    return this.scoreBreakdown(input).total + this.random() * MAX_JITTER;
  }
}
