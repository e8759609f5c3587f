/**
 * Draft parsing for model output.
 *
 * The draft generator's raw text is untrusted: it is extracted, checked for
 * the top-level shape and day count, then mapped into MealPlanDraft. Anything
 * that fails here is a MealPlanDraftError and never reaches repair.
 */

import { z } from 'zod';
import type {
  DraftMeal,
  MealPlanDraft,
  PlanPart,
} from '@/src/lib/meal-plans/mealPlans.types';
import { SIMPLE_MEAL_PART } from '@/src/lib/meal-plans/mealStructure';
import { isIsoDate } from '@/src/lib/meal-plans/planDates';
import {
  dayTypeSchema,
  goalSchema,
  mealTypeSchema,
} from '@/src/lib/meal-plans/mealPlans.schemas';

export const DRAFT_DAY_COUNT = 3;

export type MealPlanDraftErrorCode =
  | 'DRAFT_UNAVAILABLE'
  | 'DRAFT_TIMEOUT'
  | 'DRAFT_UNPARSEABLE'
  | 'DRAFT_MISSING_FIELDS'
  | 'DRAFT_DAY_COUNT';

/** Draft could not be obtained or used; the caller falls back. */
export class MealPlanDraftError extends Error {
  constructor(
    readonly code: MealPlanDraftErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MealPlanDraftError';
  }
}

export const draftPartResponseSchema = z.object({
  name: z.string(),
  selected_recipe_id: z.number().int().nullable(),
});

export const draftMealResponseSchema = z.object({
  meal_type: mealTypeSchema,
  parts: z.array(draftPartResponseSchema),
});

export const draftDayResponseSchema = z.object({
  date: z.string().optional(),
  day_type: dayTypeSchema,
  meals: z.array(draftMealResponseSchema),
});

/**
 * Response shape requested from the model (sent as JSON schema).
 */
export const mealPlanDraftResponseSchema = z.object({
  title: z.string().optional(),
  days: z.array(draftDayResponseSchema).length(DRAFT_DAY_COUNT),
  goal: goalSchema.optional(),
});

const recipeIdSchema = z.union([z.number(), z.string(), z.null()]).optional();

/** What we actually accept: looser than the requested shape. */
const looseDraftSchema = z.object({
  title: z.string().nullish(),
  base_daily_calories: z.number().nullish(),
  goal: z.string().nullish(),
  days: z.array(
    z.object({
      date: z.string().nullish(),
      day_type: z.string(),
      target_calories: z.number().nullish(),
      meals: z.array(
        z.object({
          meal_type: z.string(),
          allocated_calories: z.number().nullish(),
          parts: z
            .array(
              z.object({
                name: z.string().optional(),
                selected_recipe_id: recipeIdSchema,
              }),
            )
            .optional(),
          recipe_id: recipeIdSchema,
        }),
      ),
    }),
  ),
});

type LooseDraft = z.infer<typeof looseDraftSchema>;
type LooseMeal = LooseDraft['days'][number]['meals'][number];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Find a JSON object in model text: as-is, inside a ```json fence, the
 * outermost {...} span, then that span with bare keys quoted.
 */
export function extractJsonObject(raw: string): Record<string, unknown> | null {
  const text = raw.trim();
  if (!text) return null;

  const direct = tryParseObject(text);
  if (direct) return direct;

  const fence = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fence) {
    const fenced = tryParseObject(fence[1].trim());
    if (fenced) return fenced;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  const span = text.slice(start, end + 1);
  const spanned = tryParseObject(span);
  if (spanned) return spanned;

  const quoted = span.replace(/([{,]\s*)([A-Za-z_][A-Za-z0-9_]*)\s*:/g, '$1"$2":');
  return tryParseObject(quoted);
}

/**
 * Safe integer ids and numeric strings; anything else, including values
 * beyond Number.MAX_SAFE_INTEGER, is no selection.
 */
function toRecipeId(value: number | string | null | undefined): number | null {
  if (typeof value === 'number') return Number.isSafeInteger(value) ? value : null;
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    const id = Number(value.trim());
    return Number.isSafeInteger(id) ? id : null;
  }
  return null;
}

function toDraftMeal(meal: LooseMeal): DraftMeal {
  let parts: PlanPart[];
  if (meal.parts && meal.parts.length > 0) {
    parts = meal.parts.map((p) => ({
      name: p.name?.trim() || SIMPLE_MEAL_PART,
      selectedRecipeId: toRecipeId(p.selected_recipe_id),
    }));
  } else {
    parts = [{ name: SIMPLE_MEAL_PART, selectedRecipeId: toRecipeId(meal.recipe_id) }];
  }
  return {
    mealType: meal.meal_type.trim().toLowerCase(),
    allocatedCalories: meal.allocated_calories ?? null,
    parts,
  };
}

/**
 * Parse raw model text into a draft.
 * @throws MealPlanDraftError DRAFT_UNPARSEABLE | DRAFT_MISSING_FIELDS | DRAFT_DAY_COUNT
 */
export function parseMealPlanDraft(raw: string): MealPlanDraft {
  const obj = extractJsonObject(raw);
  if (!obj) {
    throw new MealPlanDraftError(
      'DRAFT_UNPARSEABLE',
      'Draft response contains no JSON object',
    );
  }
  if (!Array.isArray(obj.days)) {
    throw new MealPlanDraftError(
      'DRAFT_MISSING_FIELDS',
      'Draft response has no "days" array',
    );
  }
  if (obj.days.length !== DRAFT_DAY_COUNT) {
    throw new MealPlanDraftError(
      'DRAFT_DAY_COUNT',
      `Draft must have exactly ${DRAFT_DAY_COUNT} days, got ${obj.days.length}`,
    );
  }

  const parsed = looseDraftSchema.safeParse(obj);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new MealPlanDraftError(
      'DRAFT_MISSING_FIELDS',
      `Draft is missing required fields${first ? ` (${first.path.join('.')}: ${first.message})` : ''}`,
    );
  }

  const draft = parsed.data;
  return {
    title: draft.title ?? null,
    baseDailyCalories: draft.base_daily_calories ?? null,
    goal: draft.goal ?? null,
    days: draft.days.map((day) => ({
      date: day.date && isIsoDate(day.date.trim()) ? day.date.trim() : null,
      dayType: day.day_type.trim().toLowerCase(),
      targetCalories: day.target_calories ?? null,
      meals: day.meals.map(toDraftMeal),
    })),
  };
}
