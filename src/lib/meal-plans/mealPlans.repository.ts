/**
 * Meal Plans Repository
 *
 * Supabase-backed collaborators of the planner: candidate pool, feedback and
 * user lookups, and the plan store. Rows are validated with zod and mapped to
 * camelCase in pure functions (exported for tests); every database failure
 * becomes AppError DB_ERROR. List reads are paged (see fetchAllPages).
 *
 * Writes go through the `save_meal_plan` function so a plan and all its
 * days, meals and parts are inserted or replaced in one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import { createAdminClient } from '@/src/lib/supabase/admin';
import { filterByDietaryPreferences, normalizeTags } from './candidatePool';
import { goalSchema, toPlanSnapshot, type PlanSnapshot } from './mealPlans.schemas';
import type {
  CandidateRecipe,
  CandidateRecipeSource,
  FeedbackLookup,
  MealPlan,
  MealPlanStore,
  PlannerUser,
  PlannerUserSource,
  RecipeFeedbackSource,
  StoredMealPlan,
  StoredMealPlanMeta,
  UserFeedback,
} from './mealPlans.types';

const PLANNER_RECIPE_COLUMNS =
  'id,title,tags,calories,protein,carbohydrate,fat,average_rating,global_cooked_count';

const FEEDBACK_COLUMNS = 'recipe_id,rating,liked,cooked_count,skip_count';

const PROFILE_COLUMNS = 'id,full_name,email,physical_activity,dietary_preferences';

/** Plan with nested days → meals → parts (PostgREST embedding) */
const STORED_PLAN_COLUMNS =
  'id,user_id,title,description,base_daily_calories,goal,' +
  'meal_plan_days(day_index,date,day_type,target_calories,' +
  'meal_plan_meals(position,meal_type,allocated_calories,' +
  'meal_plan_parts(position,name,selected_recipe_id)))';

// ---------------------------------------------------------------------------
// Row schemas
// ---------------------------------------------------------------------------

const nullableNumber = z.number().nullable().optional();

const plannerRecipeRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  tags: z.array(z.string()).nullable(),
  calories: nullableNumber,
  protein: nullableNumber,
  carbohydrate: nullableNumber,
  fat: nullableNumber,
  average_rating: nullableNumber,
  global_cooked_count: nullableNumber,
});

const feedbackRowSchema = z.object({
  recipe_id: z.number().int(),
  rating: z.number().int().min(1).max(5).nullable(),
  liked: z.boolean().nullable(),
  cooked_count: z.number().int().nullable(),
  skip_count: z.number().int().nullable(),
});

const profileRowSchema = z.object({
  id: z.string(),
  full_name: z.string().nullable(),
  email: z.string().nullable(),
  physical_activity: z
    .enum(['none', 'light', 'moderate', 'high'])
    .nullable()
    .catch(null),
  dietary_preferences: z.array(z.string()).nullable(),
});

const storedPartRowSchema = z.object({
  position: z.number().int(),
  name: z.string(),
  selected_recipe_id: z.number().int().nullable(),
});

const storedMealRowSchema = z.object({
  position: z.number().int(),
  meal_type: z.string(),
  allocated_calories: z.number().nullable(),
  meal_plan_parts: z.array(storedPartRowSchema),
});

const storedDayRowSchema = z.object({
  day_index: z.number().int(),
  date: z.string().nullable(),
  day_type: z.string(),
  target_calories: z.number().nullable(),
  meal_plan_meals: z.array(storedMealRowSchema),
});

const storedPlanRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  base_daily_calories: z.number().int().positive(),
  goal: goalSchema,
  meal_plan_days: z.array(storedDayRowSchema),
});

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string,
): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    console.error(
      `[MealPlansRepository] Unexpected ${what} row shape:`,
      first ? `${first.path.join('.')}: ${first.message}` : 'unknown issue',
    );
    throw new AppError('DB_ERROR', `Stored ${what} data is invalid`, {
      issues: parsed.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Row mappers
// ---------------------------------------------------------------------------

export function mapPlannerRecipeRows(data: unknown): CandidateRecipe[] {
  return parseOrThrow(z.array(plannerRecipeRowSchema), data ?? [], 'recipe').map(
    (row) => ({
      id: row.id,
      title: row.title,
      tags: normalizeTags(row.tags ?? []),
      calories: row.calories ?? 0,
      protein: row.protein ?? 0,
      carbohydrate: row.carbohydrate ?? 0,
      fat: row.fat ?? 0,
      averageRating: row.average_rating ?? null,
      globalCookedCount: row.global_cooked_count ?? null,
    }),
  );
}

export function mapFeedbackRows(data: unknown): FeedbackLookup {
  const rows = parseOrThrow(z.array(feedbackRowSchema), data ?? [], 'feedback');
  const lookup = new Map<number, UserFeedback>();
  for (const row of rows) {
    lookup.set(row.recipe_id, {
      recipeId: row.recipe_id,
      rating: row.rating,
      liked: row.liked,
      cookedCount: row.cooked_count ?? 0,
      skipCount: row.skip_count ?? 0,
    });
  }
  return lookup;
}

export function mapProfileRow(data: unknown): PlannerUser {
  const row = parseOrThrow(profileRowSchema, data, 'profile');
  return {
    id: row.id,
    name: row.full_name,
    email: row.email,
    physicalActivity: row.physical_activity,
    dietaryPreferences: row.dietary_preferences ?? [],
  };
}

/**
 * Stored plan → plan shape (days by day_index, meals and parts by position).
 * Day and meal types stay strings: the planner validates them.
 */
export function mapStoredPlanRow(data: unknown): StoredMealPlan {
  const row = parseOrThrow(storedPlanRowSchema, data, 'meal plan');
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    description: row.description ?? '',
    baseDailyCalories: row.base_daily_calories,
    goal: row.goal,
    plan: {
      title: row.title,
      baseDailyCalories: row.base_daily_calories,
      goal: row.goal,
      days: [...row.meal_plan_days]
        .sort((a, b) => a.day_index - b.day_index)
        .map((day) => ({
          date: day.date,
          dayType: day.day_type,
          targetCalories: day.target_calories,
          meals: [...day.meal_plan_meals]
            .sort((a, b) => a.position - b.position)
            .map((meal) => ({
              mealType: meal.meal_type,
              allocatedCalories: meal.allocated_calories,
              parts: [...meal.meal_plan_parts]
                .sort((a, b) => a.position - b.position)
                .map((part) => ({
                  name: part.name,
                  selectedRecipeId: part.selected_recipe_id,
                })),
            })),
        })),
    },
  };
}

export type SaveMealPlanArgs = {
  p_plan_id: string | null;
  p_user_id: string;
  p_title: string;
  p_description: string;
  p_base_daily_calories: number;
  p_goal: string;
  p_days: PlanSnapshot['days'];
};

/** Arguments of the `save_meal_plan` database function */
export function toSaveMealPlanArgs(
  planId: string | null,
  plan: MealPlan,
  meta: StoredMealPlanMeta,
): SaveMealPlanArgs {
  return {
    p_plan_id: planId,
    p_user_id: meta.userId,
    p_title: meta.title,
    p_description: meta.description,
    p_base_daily_calories: meta.baseDailyCalories,
    p_goal: meta.goal,
    p_days: toPlanSnapshot(plan).days,
  };
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

function dbError(action: string, error: { message: string }): AppError {
  console.error(`[MealPlansRepository] ${action} failed:`, error.message);
  return new AppError('DB_ERROR', `Failed to ${action}`, new Error(error.message));
}

/** PostgREST caps a response at max-rows (1000 by default). */
export const PAGE_SIZE = 1000;

type PageResult = {
  data: readonly unknown[] | null;
  error: { message: string } | null;
};

/**
 * Reads `fetchPage(from, to)` (inclusive range) until a page comes back
 * shorter than pageSize. The query must have a stable order.
 */
export async function fetchAllPages(
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  action: string,
  pageSize = PAGE_SIZE,
): Promise<unknown[]> {
  const rows: unknown[] = [];
  for (let offset = 0; ; offset += pageSize) {
    const { data, error } = await fetchPage(offset, offset + pageSize - 1);
    if (error) throw dbError(action, error);
    const page = data ?? [];
    rows.push(...page);
    if (page.length < pageSize) return rows;
  }
}

export class MealPlansRepository
  implements
    CandidateRecipeSource,
    RecipeFeedbackSource,
    PlannerUserSource,
    MealPlanStore
{
  constructor(private readonly supabase: SupabaseClient = createAdminClient()) {}

  async loadCandidatePool(user: PlannerUser): Promise<CandidateRecipe[]> {
    const rows = await fetchAllPages(
      (from, to) =>
        this.supabase
          .from('planner_recipes')
          .select(PLANNER_RECIPE_COLUMNS)
          .order('id', { ascending: true })
          .range(from, to),
      'load candidate recipes',
    );

    return filterByDietaryPreferences(
      mapPlannerRecipeRows(rows),
      user.dietaryPreferences,
    );
  }

  async loadFeedback(userId: string): Promise<FeedbackLookup> {
    const rows = await fetchAllPages(
      (from, to) =>
        this.supabase
          .from('user_recipe_feedback')
          .select(FEEDBACK_COLUMNS)
          .eq('user_id', userId)
          .order('recipe_id', { ascending: true })
          .range(from, to),
      'load recipe feedback',
    );

    return mapFeedbackRows(rows);
  }

  async getUser(userId: string): Promise<PlannerUser | null> {
    const { data, error } = await this.supabase
      .from('profiles')
      .select(PROFILE_COLUMNS)
      .eq('id', userId)
      .maybeSingle();

    if (error) throw dbError('load user profile', error);
    return data ? mapProfileRow(data) : null;
  }

  async savePlan(plan: MealPlan, meta: StoredMealPlanMeta): Promise<string> {
    return this.callSave(toSaveMealPlanArgs(null, plan, meta));
  }

  async replacePlan(
    planId: string,
    plan: MealPlan,
    meta: StoredMealPlanMeta,
  ): Promise<void> {
    await this.callSave(toSaveMealPlanArgs(planId, plan, meta));
  }

  async exportPlan(planId: string): Promise<StoredMealPlan | null> {
    const { data, error } = await this.supabase
      .from('meal_plans')
      .select(STORED_PLAN_COLUMNS)
      .eq('id', planId)
      .maybeSingle();

    if (error) throw dbError('load meal plan', error);
    return data ? mapStoredPlanRow(data) : null;
  }

  private async callSave(args: SaveMealPlanArgs): Promise<string> {
    const { data, error } = await this.supabase.rpc('save_meal_plan', args);
    if (error) throw dbError('save meal plan', error);

    const planId = z.string().min(1).safeParse(data);
    if (!planId.success) {
      throw new AppError('DB_ERROR', 'save_meal_plan returned no plan id');
    }
    return planId.data;
  }
}
