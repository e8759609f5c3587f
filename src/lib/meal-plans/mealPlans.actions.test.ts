import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { MealPlannerAgentService } from '@/src/lib/agents/meal-planner';
import { AppError } from '@/src/lib/errors/app-error';
import { makeFullPool } from './__fixtures__/recipes';
import {
  createMealPlanAction,
  optimizeMealPlanAction,
  toActionError,
} from './mealPlans.actions';
import type { MealPlannerConfig } from './mealPlans.config';
import { MealPlansService } from './mealPlans.service';

const config: MealPlannerConfig = {
  minCandidateRecipes: 30,
  calorieTolerance: 0.15,
  optionalPartInclusionRate: 0.5,
  draftTimeoutMs: 50,
  promptCandidatesPerSlot: 10,
  activeCalorieMultiplier: 1.1,
};

function makeService(): MealPlansService {
  return new MealPlansService({
    recipes: { loadCandidatePool: async () => makeFullPool() },
    feedback: { loadFeedback: async () => new Map() },
    users: {
      getUser: async (id) =>
        id === 'user-1' ? { id, name: null, dietaryPreferences: [] } : null,
    },
    store: {
      savePlan: async () => 'plan-1',
      replacePlan: async () => undefined,
      exportPlan: async () => null,
    },
    agent: new MealPlannerAgentService({ config }),
    config,
  });
}

describe('toActionError', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('keeps the code, message and details of an AppError', () => {
    assert.deepStrictEqual(
      toActionError(new AppError('INSUFFICIENT_CANDIDATE_RECIPES', 'Not enough', { found: 3, required: 30 })),
      {
        ok: false,
        error: {
          code: 'INSUFFICIENT_CANDIDATE_RECIPES',
          message: 'Not enough',
          details: { found: 3, required: 30 },
        },
      },
    );
  });

  it('maps zod failures to VALIDATION_ERROR', () => {
    const parsed = z.object({ planId: z.string() }).safeParse({});
    assert.ok(!parsed.success);
    const result = toActionError(parsed.error);
    assert.strictEqual(result.error.code, 'VALIDATION_ERROR');
    assert.deepStrictEqual(result.error.details, {
      issues: [{ path: 'planId', message: 'Required' }],
    });
  });

  it('hides unexpected errors behind AGENT_ERROR', () => {
    mock.method(console, 'error', () => undefined);
    assert.deepStrictEqual(toActionError(new Error('connection string leaked')), {
      ok: false,
      error: {
        code: 'AGENT_ERROR',
        message: 'Meal plan generation failed unexpectedly',
      },
    });
  });
});

describe('meal plan actions', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('returns the created plan', async () => {
    mock.method(console, 'info', () => undefined);
    const result = await createMealPlanAction(makeService(), {
      userId: 'user-1',
      dailyCalories: 2000,
      seed: 3,
    });
    assert.ok(result.ok);
    assert.strictEqual(result.data.planId, 'plan-1');
    assert.strictEqual(result.data.title, 'Meal plan for user-1');
  });

  it('returns NOT_FOUND for a missing plan', async () => {
    const result = await optimizeMealPlanAction(makeService(), { planId: 'plan-404' });
    assert.deepStrictEqual(result, {
      ok: false,
      error: { code: 'NOT_FOUND', message: 'Meal plan plan-404 not found' },
    });
  });

  it('returns VALIDATION_ERROR for bad input', async () => {
    const result = await createMealPlanAction(makeService(), {
      userId: '',
      dailyCalories: 2000,
    });
    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.ok ? null : result.error.code, 'VALIDATION_ERROR');
  });
});
