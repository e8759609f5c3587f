/**
 * Meal Plans Types
 *
 * Types for 3-day meal plan generation, validation, repair and persistence.
 * In-memory shapes are camelCase; the wire snapshot (snake_case) lives in
 * mealPlans.schemas.ts.
 */

/** DB: meal_plan_days.day_type */
export type DayType = 'regular' | 'workout' | 'rest';

/** DB: meal_plan_meals.meal_type */
export type MealType =
  | 'breakfast'
  | 'mid_morning'
  | 'lunch'
  | 'mid_afternoon'
  | 'dinner'
  | 'supper'
  | 'pre-workout'
  | 'post-workout';

export type Goal = 'weight_loss' | 'muscle_gain' | 'maintenance';

export type PhysicalActivity = 'none' | 'light' | 'moderate' | 'high';

/** Share of daily calories per macro (sums to 1). */
export type MacroTargets = {
  protein: number;
  carbs: number;
  fat: number;
};

/** One named part of a structured meal (e.g. "main course", "soup"). */
export type PartSpec = {
  name: string;
  isRequired: boolean;
};

export type DayTypeSpec = {
  calorieMultiplier: number;
  mealTypes: readonly MealType[];
};

/**
 * Immutable planning view of a recipe. Tags are lower-cased.
 */
export type CandidateRecipe = {
  readonly id: number;
  readonly title: string;
  readonly tags: ReadonlySet<string>;
  readonly calories: number;
  readonly protein: number;
  readonly carbohydrate: number;
  readonly fat: number;
  readonly averageRating?: number | null;
  readonly globalCookedCount?: number | null;
};

/** Per (user, recipe) feedback; read-only input to scoring. */
export type UserFeedback = {
  recipeId: number;
  /** 1–5, null when the user never rated */
  rating: number | null;
  /** true = liked, false = disliked, null = no opinion */
  liked: boolean | null;
  cookedCount: number;
  skipCount: number;
};

/** Feedback snapshot keyed by recipe id, taken once per request. */
export type FeedbackLookup = ReadonlyMap<number, UserFeedback>;

/** The acting user, as far as planning is concerned. */
export type PlannerUser = {
  id: string;
  name?: string | null;
  email?: string | null;
  physicalActivity?: PhysicalActivity | null;
  /** Tag names; recipes must carry at least one of them when non-empty. */
  dietaryPreferences: string[];
};

// ---------------------------------------------------------------------------
// Plan shapes
// ---------------------------------------------------------------------------

/** A part slot; selectedRecipeId null = intentionally unfilled. */
export type PlanPart = {
  name: string;
  selectedRecipeId: number | null;
};

export type PlanMeal = {
  mealType: MealType;
  allocatedCalories: number;
  parts: PlanPart[];
};

export type PlanDay = {
  /** YYYY-MM-DD */
  date: string;
  dayType: DayType;
  targetCalories: number;
  meals: PlanMeal[];
};

/** Exactly three days, one per day type. */
export type MealPlan = {
  days: PlanDay[];
};

/**
 * Plan proposed by an untrusted source (draft generator, stored export).
 * Same nesting as MealPlan, but day and meal types are free strings and
 * fields the source may omit are optional.
 */
export type MealPlanDraft = {
  title?: string | null;
  baseDailyCalories?: number | null;
  goal?: string | null;
  days: DraftDay[];
};

export type DraftDay = {
  date?: string | null;
  dayType: string;
  targetCalories?: number | null;
  meals: DraftMeal[];
};

export type DraftMeal = {
  mealType: string;
  allocatedCalories?: number | null;
  parts: PlanPart[];
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type PlanViolationCode =
  | 'DAY_TYPES_MISMATCH'
  | 'MISSING_MEAL'
  | 'UNKNOWN_MEAL_TYPE'
  | 'MISSING_REQUIRED_PART'
  | 'REQUIRED_PART_UNFILLED'
  | 'UNKNOWN_RECIPE'
  | 'RECIPE_LACKS_TAGS'
  | 'CALORIE_OUT_OF_RANGE';

/** Structured validation finding; never thrown. */
export type PlanViolation = {
  code: PlanViolationCode;
  /** 0-based; null for plan-level violations */
  dayIndex: number | null;
  dayType: string | null;
  mealType?: string;
  partName?: string;
  recipeId?: number;
  message: string;
};

export type PlanValidationResult = {
  ok: boolean;
  violations: PlanViolation[];
};

/** A required slot for which no candidate passed the tag filter. */
export type UnfillableSlot = {
  dayType: DayType;
  mealType: MealType;
  partName: string;
};

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export type GenerationMethod = 'draft' | 'draft_repair' | 'deterministic';

export type GenerationState =
  | 'AWAIT_DRAFT'
  | 'VALIDATE'
  | 'REPAIR'
  | 'REVALIDATE'
  | 'FALLBACK_DETERMINISTIC'
  | 'ACCEPT';

export type DayNutritionSummary = {
  date: string;
  dayType: DayType;
  targetCalories: number;
  totalCalories: number;
  protein: number;
  carbohydrate: number;
  fat: number;
};

export type DraftFailureInfo = {
  code: string;
  message: string;
};

export type MealPlanGenerationResult = {
  plan: MealPlan;
  method: GenerationMethod;
  /** true when required slots were left null for lack of candidates */
  degraded: boolean;
  trace: GenerationState[];
  baseDailyCalories: number;
  goal: Goal;
  macroTargets: MacroTargets;
  summary: DayNutritionSummary[];
  unfillableSlots: UnfillableSlot[];
  draftFailure?: DraftFailureInfo;
  /** Violations of the draft before repair (when a draft was validated) */
  draftViolations?: PlanViolation[];
};

// ---------------------------------------------------------------------------
// External collaborators
// ---------------------------------------------------------------------------

export interface CandidateRecipeSource {
  /** Recipes eligible for the user (dietary preferences applied). */
  loadCandidatePool(user: PlannerUser): Promise<CandidateRecipe[]>;
}

export interface RecipeFeedbackSource {
  loadFeedback(userId: string): Promise<FeedbackLookup>;
}

export interface PlannerUserSource {
  getUser(userId: string): Promise<PlannerUser | null>;
}

/** Metadata stored alongside a plan. */
export type StoredMealPlanMeta = {
  userId: string;
  title: string;
  description: string;
  baseDailyCalories: number;
  goal: Goal;
};

/** Stored plan exported back into the plan shape for re-optimization. */
export type StoredMealPlan = StoredMealPlanMeta & {
  id: string;
  plan: MealPlanDraft;
};

export interface MealPlanStore {
  /** Inserts a plan in one atomic unit; returns the new plan id. */
  savePlan(plan: MealPlan, meta: StoredMealPlanMeta): Promise<string>;
  /** Replaces all days of an existing plan in one atomic unit. */
  replacePlan(
    planId: string,
    plan: MealPlan,
    meta: StoredMealPlanMeta,
  ): Promise<void>;
  exportPlan(planId: string): Promise<StoredMealPlan | null>;
}
