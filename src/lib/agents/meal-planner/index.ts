/**
 * Meal Planner Agent - Barrel exports
 *
 * Central export point for the meal plan generation orchestrator and its
 * draft generator.
 */

export {
  MealPlannerAgentService,
  type MealPlanGenerationRequest,
  type MealPlannerAgentServiceOptions,
} from './mealPlannerAgent.service';
export {
  GeminiMealPlanDraftGenerator,
  type MealPlanDraftGenerator,
  type DraftRequestOptions,
} from './mealPlannerAgent.draftGenerator';
export {
  MealPlanDraftError,
  parseMealPlanDraft,
  type MealPlanDraftErrorCode,
} from './mealPlannerAgent.draft';
export {
  buildDraftPromptPayload,
  type DraftPromptPayload,
} from './mealPlannerAgent.prompts';
export { createRunLogger, type MealPlannerRunLogger } from './mealPlannerRunLogger';
