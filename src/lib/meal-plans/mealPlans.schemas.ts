/**
 * Meal Plans Schemas
 *
 * Zod schemas for generation input and for the plan snapshot exchanged with
 * storage and scripts (snake_case, language-neutral).
 */

import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import type { MealPlan } from './mealPlans.types';

const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const goalSchema = z.enum(['weight_loss', 'muscle_gain', 'maintenance']);
export const dayTypeSchema = z.enum(['regular', 'workout', 'rest']);
export const mealTypeSchema = z.enum([
  'breakfast',
  'mid_morning',
  'lunch',
  'mid_afternoon',
  'dinner',
  'supper',
  'pre-workout',
  'post-workout',
]);

/**
 * Schema for generate meal plan input
 */
export const generateMealPlanInputSchema = z.object({
  userId: z.string().min(1),
  dailyCalories: z.number().int().positive().max(20_000),
  goal: goalSchema.default('maintenance'),
  startDate: isoDateSchema.optional(),
  /** Skip the draft generator and build deterministically */
  forceDeterministic: z.boolean().optional(),
  seed: z.number().int().optional(),
});

export type GenerateMealPlanInput = z.input<typeof generateMealPlanInputSchema>;

/**
 * Schema for optimize (rebuild) stored meal plan input
 */
export const optimizeMealPlanInputSchema = z.object({
  planId: z.string().min(1),
  forceDeterministic: z.boolean().optional(),
  seed: z.number().int().optional(),
});

export type OptimizeMealPlanInput = z.input<typeof optimizeMealPlanInputSchema>;

export const planPartSnapshotSchema = z
  .object({
    name: z.string().min(1),
    selected_recipe_id: z.number().int().nullable(),
  })
  .strict();

export const planMealSnapshotSchema = z
  .object({
    meal_type: mealTypeSchema,
    allocated_calories: z.number().min(0),
    parts: z.array(planPartSnapshotSchema),
  })
  .strict();

export const planDaySnapshotSchema = z
  .object({
    date: isoDateSchema,
    day_type: dayTypeSchema,
    target_calories: z.number().min(0),
    meals: z.array(planMealSnapshotSchema),
  })
  .strict();

export const planSnapshotSchema = z
  .object({
    days: z.array(planDaySnapshotSchema).length(3),
  })
  .strict();

export type PlanSnapshot = z.infer<typeof planSnapshotSchema>;

export function toPlanSnapshot(plan: MealPlan): PlanSnapshot {
  return {
    days: plan.days.map((day) => ({
      date: day.date,
      day_type: day.dayType,
      target_calories: day.targetCalories,
      meals: day.meals.map((meal) => ({
        meal_type: meal.mealType,
        allocated_calories: meal.allocatedCalories,
        parts: meal.parts.map((part) => ({
          name: part.name,
          selected_recipe_id: part.selectedRecipeId,
        })),
      })),
    })),
  };
}

/**
 * Parse a snapshot (e.g. read from a file) into the plan shape.
 * @throws AppError VALIDATION_ERROR
 */
export function parsePlanSnapshot(input: unknown): MealPlan {
  const parsed = planSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', 'Invalid meal plan snapshot', {
      issues: parsed.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
  }
  return {
    days: parsed.data.days.map((day) => ({
      date: day.date,
      dayType: day.day_type,
      targetCalories: day.target_calories,
      meals: day.meals.map((meal) => ({
        mealType: meal.meal_type,
        allocatedCalories: meal.allocated_calories,
        parts: meal.parts.map((part) => ({
          name: part.name,
          selectedRecipeId: part.selected_recipe_id,
        })),
      })),
    })),
  };
}
