/**
 * Meal Plans Actions
 *
 * Result-object wrappers around MealPlansService for callers that must not
 * handle exceptions (scripts, job runners). Errors are mapped to a code and
 * a safe message; internal error messages are only logged.
 */

import { ZodError } from 'zod';
import { AppError, type AppErrorCode } from '@/src/lib/errors/app-error';
import type {
  GenerateMealPlanInput,
  OptimizeMealPlanInput,
} from './mealPlans.schemas';
import type { MealPlansService, SavedMealPlan } from './mealPlans.service';

export type ActionResult<T> =
  | { ok: true; data: T }
  | {
      ok: false;
      error: {
        code: AppErrorCode;
        message: string;
        details?: Record<string, unknown>;
      };
    };

export function toActionError(
  error: unknown,
): Extract<ActionResult<never>, { ok: false }> {
  if (error instanceof AppError) {
    return { ok: false, error: error.toJSON() };
  }
  if (error instanceof ZodError) {
    return {
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: error.issues[0]?.message ?? 'Invalid input',
        details: {
          issues: error.issues.map((i) => ({
            path: i.path.join('.'),
            message: i.message,
          })),
        },
      },
    };
  }
  console.error(
    '[MealPlans] Unexpected error:',
    error instanceof Error ? error.message : String(error),
  );
  return {
    ok: false,
    error: {
      code: 'AGENT_ERROR',
      message: 'Meal plan generation failed unexpectedly',
    },
  };
}

export async function createMealPlanAction(
  service: MealPlansService,
  input: GenerateMealPlanInput,
): Promise<ActionResult<SavedMealPlan>> {
  try {
    return { ok: true, data: await service.createMealPlan(input) };
  } catch (error) {
    return toActionError(error);
  }
}

export async function optimizeMealPlanAction(
  service: MealPlansService,
  input: OptimizeMealPlanInput,
): Promise<ActionResult<SavedMealPlan>> {
  try {
    return { ok: true, data: await service.optimizeMealPlan(input) };
  } catch (error) {
    return toActionError(error);
  }
}
