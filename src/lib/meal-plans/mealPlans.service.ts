/**
 * Meal Plans Service
 *
 * Request-level use cases: create a new 3-day plan for a user, and
 * re-optimize a stored plan in place. Loads the user, candidate pool and
 * feedback once per request, hands them to the generation orchestrator and
 * persists the accepted plan.
 */

import {
  GeminiMealPlanDraftGenerator,
  MealPlannerAgentService,
} from '@/src/lib/agents/meal-planner';
import { AppError } from '@/src/lib/errors/app-error';
import {
  CandidatePoolIndex,
  assertSufficientCandidatePool,
} from './candidatePool';
import { getMealPlannerConfig, type MealPlannerConfig } from './mealPlans.config';
import { MealPlansRepository } from './mealPlans.repository';
import {
  generateMealPlanInputSchema,
  optimizeMealPlanInputSchema,
  type GenerateMealPlanInput,
  type OptimizeMealPlanInput,
} from './mealPlans.schemas';
import type {
  CandidateRecipeSource,
  FeedbackLookup,
  MealPlanGenerationResult,
  MealPlanStore,
  PlannerUser,
  PlannerUserSource,
  RecipeFeedbackSource,
} from './mealPlans.types';
import { resolveBaseDailyCalories } from './mealStructure';
import { isIsoDate } from './planDates';

export type MealPlansServiceDeps = {
  recipes: CandidateRecipeSource;
  feedback: RecipeFeedbackSource;
  users: PlannerUserSource;
  store: MealPlanStore;
  agent: MealPlannerAgentService;
  config?: MealPlannerConfig;
};

export type SavedMealPlan = MealPlanGenerationResult & {
  planId: string;
  title: string;
};

type PlanningContext = {
  user: PlannerUser;
  pool: CandidatePoolIndex;
  feedback: FeedbackLookup;
};

export function mealPlanTitle(user: Pick<PlannerUser, 'id' | 'name'>): string {
  return `Meal plan for ${user.name?.trim() || user.id}`;
}

export class MealPlansService {
  private readonly config: MealPlannerConfig;

  constructor(private readonly deps: MealPlansServiceDeps) {
    this.config = deps.config ?? getMealPlannerConfig();
  }

  /**
   * Generate and store a new plan.
   *
   * @throws AppError NOT_FOUND | INSUFFICIENT_CANDIDATE_RECIPES | MEAL_PLAN_VALIDATION_FAILED | DB_ERROR
   * @throws ZodError on invalid input
   */
  async createMealPlan(raw: GenerateMealPlanInput): Promise<SavedMealPlan> {
    const input = generateMealPlanInputSchema.parse(raw);
    const { user, pool, feedback } = await this.loadPlanningContext(input.userId);

    const baseDailyCalories = resolveBaseDailyCalories(
      input.dailyCalories,
      user,
      this.config.activeCalorieMultiplier,
    );

    const result = await this.deps.agent.generateMealPlan({
      userId: user.id,
      baseDailyCalories,
      goal: input.goal,
      pool,
      feedback,
      seed: input.seed,
      startDate: input.startDate,
      forceDeterministic: input.forceDeterministic,
    });

    const title = mealPlanTitle(user);
    const planId = await this.deps.store.savePlan(result.plan, {
      userId: user.id,
      title,
      description: `${input.goal}, ${baseDailyCalories} kcal/day`,
      baseDailyCalories,
      goal: input.goal,
    });

    console.info(
      `[MealPlans] Created plan ${planId} for user ${user.id} (method=${result.method}${result.degraded ? ', degraded' : ''})`,
    );
    return { planId, title, ...result };
  }

  /**
   * Re-run validation, repair and fallback on a stored plan and replace it.
   * The plan keeps its id, title and base calories.
   */
  async optimizeMealPlan(raw: OptimizeMealPlanInput): Promise<SavedMealPlan> {
    const input = optimizeMealPlanInputSchema.parse(raw);
    const stored = await this.deps.store.exportPlan(input.planId);
    if (!stored) {
      throw new AppError('NOT_FOUND', `Meal plan ${input.planId} not found`);
    }

    const { user, pool, feedback } = await this.loadPlanningContext(stored.userId);
    const firstDate = stored.plan.days[0]?.date;

    const result = await this.deps.agent.generateMealPlan({
      userId: user.id,
      planId: stored.id,
      baseDailyCalories: stored.baseDailyCalories,
      goal: stored.goal,
      pool,
      feedback,
      seed: input.seed,
      startDate: firstDate && isIsoDate(firstDate) ? firstDate : null,
      forceDeterministic: input.forceDeterministic,
      sourcePlan: stored.plan,
    });

    await this.deps.store.replacePlan(stored.id, result.plan, {
      userId: stored.userId,
      title: stored.title,
      description: stored.description,
      baseDailyCalories: stored.baseDailyCalories,
      goal: stored.goal,
    });

    console.info(
      `[MealPlans] Optimized plan ${stored.id} (method=${result.method})`,
    );
    return { planId: stored.id, title: stored.title, ...result };
  }

  private async loadPlanningContext(userId: string): Promise<PlanningContext> {
    const user = await this.deps.users.getUser(userId);
    if (!user) {
      throw new AppError('NOT_FOUND', `User ${userId} not found`);
    }

    const pool = new CandidatePoolIndex(
      await this.deps.recipes.loadCandidatePool(user),
    );
    assertSufficientCandidatePool(pool, this.config.minCandidateRecipes);

    const feedback = await this.deps.feedback.loadFeedback(user.id);
    return { user, pool, feedback };
  }
}

/**
 * Service wired to Supabase, with the Gemini draft generator unless disabled.
 */
export function createMealPlansService(
  options: { useDraftGenerator?: boolean } = {},
): MealPlansService {
  const repository = new MealPlansRepository();
  const config = getMealPlannerConfig();
  const agent = new MealPlannerAgentService({
    config,
    draftGenerator: options.useDraftGenerator
      ? new GeminiMealPlanDraftGenerator()
      : null,
  });
  return new MealPlansService({
    recipes: repository,
    feedback: repository,
    users: repository,
    store: repository,
    agent,
    config,
  });
}
