/**
 * Meal Planner Agent Service
 *
 * Generation orchestrator for 3-day plans:
 *
 *   AWAIT_DRAFT → VALIDATE → REPAIR → REVALIDATE → ACCEPT
 *                                   ↘ FALLBACK_DETERMINISTIC → ACCEPT
 *
 * A draft (from the draft generator, or a stored plan being re-optimized) is
 * validated; with violations it gets exactly one repair pass and one
 * re-validation. Any draft failure or remaining violation abandons the draft
 * and the plan is built by direct selection.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type { CandidatePoolIndex } from '@/src/lib/meal-plans/candidatePool';
import { buildDeterministicPlan } from '@/src/lib/meal-plans/deterministicPlanBuilder';
import { repairMealPlan } from '@/src/lib/meal-plans/mealPlanRepairer';
import {
  getMealPlannerConfig,
  type MealPlannerConfig,
} from '@/src/lib/meal-plans/mealPlans.config';
import type {
  DraftFailureInfo,
  FeedbackLookup,
  GenerationMethod,
  GenerationState,
  Goal,
  MealPlan,
  MealPlanDraft,
  MealPlanGenerationResult,
  PlanValidationResult,
  PlanViolation,
  UnfillableSlot,
} from '@/src/lib/meal-plans/mealPlans.types';
import { summarizeMealPlan } from '@/src/lib/meal-plans/mealPlanSummary';
import { getMacroTargets } from '@/src/lib/meal-plans/mealStructure';
import {
  toMealPlan,
  validateMealPlan,
} from '@/src/lib/meal-plans/mealPlanValidator';
import { createRandomSource } from '@/src/lib/meal-plans/random';
import {
  createSelectionContext,
  type SelectionContext,
} from '@/src/lib/meal-plans/recipeSelector';
import { MealPlanDraftError } from './mealPlannerAgent.draft';
import type { MealPlanDraftGenerator } from './mealPlannerAgent.draftGenerator';
import {
  buildDraftPromptPayload,
  type DraftPromptPayload,
} from './mealPlannerAgent.prompts';
import {
  createRunLogger,
  type MealPlannerRunLogger,
} from './mealPlannerRunLogger';

export type MealPlanGenerationRequest = {
  userId: string;
  /** Set when re-optimizing a stored plan; used for log correlation */
  planId?: string | null;
  baseDailyCalories: number;
  goal: Goal;
  pool: CandidatePoolIndex;
  feedback?: FeedbackLookup;
  seed?: number | null;
  startDate?: string | null;
  /** Skip the draft generator even when one is configured */
  forceDeterministic?: boolean;
  /**
   * Stored plan to re-optimize. It is sent to the draft generator for
   * improvement and used as the draft itself when that call fails.
   */
  sourcePlan?: MealPlanDraft;
};

export type MealPlannerAgentServiceOptions = {
  /** null or omitted: deterministic generation only */
  draftGenerator?: MealPlanDraftGenerator | null;
  config?: MealPlannerConfig;
};

/** Mutable state of one run; never shared between requests. */
type RunState = {
  trace: GenerationState[];
  logger: MealPlannerRunLogger;
};

type DraftOutcome = {
  draft: MealPlanDraft | null;
  failure?: DraftFailureInfo;
};

type AcceptedPlan = {
  plan: MealPlan;
  method: GenerationMethod;
  unfillableSlots: UnfillableSlot[];
};

function slotKey(slot: {
  dayType: string | null;
  mealType?: string;
  partName?: string;
}): string {
  return `${slot.dayType ?? ''}/${slot.mealType ?? ''}/${slot.partName ?? ''}`;
}

export class MealPlannerAgentService {
  private readonly draftGenerator: MealPlanDraftGenerator | null;
  private readonly config: MealPlannerConfig;

  constructor(options: MealPlannerAgentServiceOptions = {}) {
    this.draftGenerator = options.draftGenerator ?? null;
    this.config = options.config ?? getMealPlannerConfig();
  }

  async generateMealPlan(
    request: MealPlanGenerationRequest,
  ): Promise<MealPlanGenerationResult> {
    const { baseDailyCalories, goal, pool } = request;
    const run: RunState = {
      trace: [],
      logger: createRunLogger({
        planId: request.planId ?? null,
        userId: request.userId,
      }),
    };
    const selection = createSelectionContext(
      pool,
      createRandomSource(request.seed),
      request.feedback,
    );
    run.logger.event('run_start', {
      baseDailyCalories,
      goal,
      poolSize: pool.size,
      seeded: request.seed != null,
      optimize: request.sourcePlan !== undefined,
    });

    const { draft, failure } = await this.obtainDraft(request, run);
    let draftViolations: PlanViolation[] | undefined;
    let accepted: AcceptedPlan | null = null;

    if (draft) {
      this.enter(run, 'VALIDATE');
      const validation = this.validate(draft, request);
      run.logger.validation('draft', validation);
      draftViolations = validation.violations;

      if (validation.ok) {
        accepted = {
          plan: toMealPlan(draft, baseDailyCalories, request.startDate),
          method: 'draft',
          unfillableSlots: [],
        };
      } else {
        accepted = this.repairDraft(draft, request, selection, run);
      }
    }

    if (!accepted) {
      accepted = this.buildDeterministic(request, selection, run);
    }

    this.enter(run, 'ACCEPT', { method: accepted.method });
    run.logger.event('run_done', {
      method: accepted.method,
      unfillableCount: accepted.unfillableSlots.length,
    });

    return {
      plan: accepted.plan,
      method: accepted.method,
      degraded: accepted.unfillableSlots.length > 0,
      trace: run.trace,
      baseDailyCalories,
      goal,
      macroTargets: getMacroTargets(goal),
      summary: summarizeMealPlan(accepted.plan, pool),
      unfillableSlots: accepted.unfillableSlots,
      ...(failure && { draftFailure: failure }),
      ...(draftViolations && { draftViolations }),
    };
  }

  private enter(
    run: RunState,
    state: GenerationState,
    payload?: Record<string, unknown>,
  ): void {
    run.trace.push(state);
    run.logger.state(state, payload);
  }

  private validate(
    plan: MealPlanDraft,
    request: MealPlanGenerationRequest,
  ): PlanValidationResult {
    return validateMealPlan(plan, {
      baseDailyCalories: request.baseDailyCalories,
      pool: request.pool,
      calorieTolerance: this.config.calorieTolerance,
    });
  }

  /**
   * Draft for this run, or null when the deterministic path applies.
   * Generator errors are never rethrown.
   */
  private async obtainDraft(
    request: MealPlanGenerationRequest,
    run: RunState,
  ): Promise<DraftOutcome> {
    const generator = request.forceDeterministic ? null : this.draftGenerator;
    const sourcePlan = request.sourcePlan ?? null;
    if (!generator) return { draft: sourcePlan };

    this.enter(run, 'AWAIT_DRAFT');
    const payload = buildDraftPromptPayload({
      baseDailyCalories: request.baseDailyCalories,
      goal: request.goal,
      macroTargets: getMacroTargets(request.goal),
      calorieTolerance: this.config.calorieTolerance,
      pool: request.pool,
      candidatesPerSlot: this.config.promptCandidatesPerSlot,
      feedback: request.feedback,
      existingPlan: request.sourcePlan,
    });

    try {
      const draft = await this.requestDraftWithTimeout(
        generator,
        payload,
        sourcePlan !== null,
      );
      return { draft };
    } catch (error) {
      const failure: DraftFailureInfo =
        error instanceof MealPlanDraftError
          ? { code: error.code, message: error.message }
          : {
              code: 'DRAFT_UNAVAILABLE',
              message: error instanceof Error ? error.message : String(error),
            };
      console.warn(
        `[MealPlanner] Draft rejected (${failure.code}): ${failure.message}`,
      );
      run.logger.event('draft_rejected', { ...failure });
      return { draft: sourcePlan, failure };
    }
  }

  private async requestDraftWithTimeout(
    generator: MealPlanDraftGenerator,
    payload: DraftPromptPayload,
    optimize: boolean,
  ): Promise<MealPlanDraft> {
    const timeoutMs = this.config.draftTimeoutMs;
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () =>
          reject(
            new MealPlanDraftError(
              'DRAFT_TIMEOUT',
              `Draft generator did not respond within ${timeoutMs}ms`,
            ),
          ),
        { once: true },
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const options = { signal: controller.signal };
      return await Promise.race([
        optimize
          ? generator.optimizeDraft(payload, options)
          : generator.generateDraft(payload, options),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** One repair pass and one re-validation; null means fall back. */
  private repairDraft(
    draft: MealPlanDraft,
    request: MealPlanGenerationRequest,
    selection: SelectionContext,
    run: RunState,
  ): AcceptedPlan | null {
    this.enter(run, 'REPAIR');
    const repaired = repairMealPlan(draft, {
      baseDailyCalories: request.baseDailyCalories,
      selection,
      optionalPartInclusionRate: this.config.optionalPartInclusionRate,
      startDate: request.startDate,
    });
    run.logger.event('repair', {
      reusedCount: repaired.reusedCount,
      unfillableCount: repaired.unfillableSlots.length,
    });
    this.reportUnfillable(repaired.unfillableSlots, run);

    this.enter(run, 'REVALIDATE');
    const revalidation = this.validate(repaired.plan, request);
    run.logger.validation('repaired', revalidation);
    if (!revalidation.ok) return null;

    return {
      plan: repaired.plan,
      method: 'draft_repair',
      unfillableSlots: repaired.unfillableSlots,
    };
  }

  /**
   * Direct selection. Unfilled required parts are accepted only where the
   * pool has no candidate for them; any other violation fails the run.
   */
  private buildDeterministic(
    request: MealPlanGenerationRequest,
    selection: SelectionContext,
    run: RunState,
  ): AcceptedPlan {
    this.enter(run, 'FALLBACK_DETERMINISTIC');
    const built = buildDeterministicPlan({
      baseDailyCalories: request.baseDailyCalories,
      selection,
      startDate: request.startDate,
    });
    this.reportUnfillable(built.unfillableSlots, run);

    const validation = this.validate(built.plan, request);
    run.logger.validation('deterministic', validation);
    const unfillable = new Set(built.unfillableSlots.map(slotKey));
    const blocking = validation.violations.filter(
      (v) => !(v.code === 'REQUIRED_PART_UNFILLED' && unfillable.has(slotKey(v))),
    );

    if (blocking.length > 0) {
      run.logger.event('run_failed', { violationCount: blocking.length });
      throw new AppError(
        'MEAL_PLAN_VALIDATION_FAILED',
        `Generated meal plan failed validation: ${blocking.map((v) => v.message).join('; ')}`,
        { violations: blocking },
      );
    }

    return {
      plan: built.plan,
      method: 'deterministic',
      unfillableSlots: built.unfillableSlots,
    };
  }

  private reportUnfillable(slots: UnfillableSlot[], run: RunState): void {
    for (const slot of slots) {
      console.warn(
        `[MealPlanner] No candidate recipe for required slot ${slot.dayType}/${slot.mealType}/${slot.partName}`,
      );
      run.logger.slotUnfillable(slot);
    }
  }
}
