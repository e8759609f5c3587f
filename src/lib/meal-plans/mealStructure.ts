/**
 * Meal structure definition
 *
 * Which meals a day type expects, which parts a structured meal has and which
 * tags a recipe needs to fill a slot. Simple meals (not in MEAL_PARTS_STRUCTURE)
 * have one implicit part named `main`.
 */

import type {
  CandidateRecipe,
  DayType,
  DayTypeSpec,
  Goal,
  MacroTargets,
  MealType,
  PartSpec,
  PlannerUser,
} from './mealPlans.types';

export const SIMPLE_MEAL_PART = 'main';
export const MAIN_COURSE_TAG = 'main course';

export const MEAL_PARTS_STRUCTURE: Readonly<
  Partial<Record<MealType, readonly PartSpec[]>>
> = {
  breakfast: [
    { name: 'main course', isRequired: true },
    { name: 'fruit', isRequired: false },
    { name: 'dairy', isRequired: false },
  ],
  lunch: [
    { name: 'main course', isRequired: true },
    { name: 'soup', isRequired: false },
  ],
  dinner: [
    { name: 'main course', isRequired: true },
    { name: 'soup', isRequired: false },
  ],
};

/** Tag a simple meal's recipe must carry (besides `main course`). */
export const SIMPLE_MEAL_TAG: Readonly<Record<MealType, string>> = {
  breakfast: 'breakfast',
  mid_morning: 'breakfast',
  lunch: 'lunch',
  mid_afternoon: 'breakfast',
  dinner: 'dinner',
  supper: 'dinner',
  'pre-workout': 'pre-workout',
  'post-workout': 'post-workout',
};

const REGULAR_MEALS: readonly MealType[] = [
  'breakfast',
  'mid_morning',
  'lunch',
  'mid_afternoon',
  'dinner',
  'supper',
];

export const DAY_TYPE_SPECS: Readonly<Record<DayType, DayTypeSpec>> = {
  regular: { calorieMultiplier: 1.0, mealTypes: REGULAR_MEALS },
  workout: {
    calorieMultiplier: 1.2,
    mealTypes: [...REGULAR_MEALS, 'pre-workout', 'post-workout'],
  },
  rest: { calorieMultiplier: 0.9, mealTypes: REGULAR_MEALS },
};

export const DAY_TYPE_ORDER: readonly DayType[] = ['regular', 'workout', 'rest'];

export const MEAL_TYPES: readonly MealType[] = [
  'breakfast',
  'mid_morning',
  'lunch',
  'mid_afternoon',
  'dinner',
  'supper',
  'pre-workout',
  'post-workout',
];

const MACRO_TARGETS: Readonly<Record<Goal, MacroTargets>> = {
  weight_loss: { protein: 0.35, carbs: 0.4, fat: 0.25 },
  muscle_gain: { protein: 0.3, carbs: 0.5, fat: 0.2 },
  maintenance: { protein: 0.25, carbs: 0.5, fat: 0.25 },
};

export function isDayType(value: string): value is DayType {
  return value === 'regular' || value === 'workout' || value === 'rest';
}

export function isMealType(value: string): value is MealType {
  return MEAL_TYPES.some((m) => m === value);
}

export function getPartSpecs(mealType: MealType): readonly PartSpec[] | null {
  return MEAL_PARTS_STRUCTURE[mealType] ?? null;
}

/** floor(base × day-type multiplier) */
export function getDayTargetCalories(
  baseDailyCalories: number,
  dayType: DayType,
): number {
  return Math.floor(
    baseDailyCalories * DAY_TYPE_SPECS[dayType].calorieMultiplier,
  );
}

/**
 * Tags a recipe needs for a slot. Structured part: meal type + part name.
 * Simple meal, or no part name: mapped meal tag + `main course`.
 */
export function getSlotTagRequirement(
  mealType: MealType,
  partName?: string | null,
): [string, string] {
  const structured = getPartSpecs(mealType);
  if (structured && partName && partName !== SIMPLE_MEAL_PART) {
    return [mealType, partName.toLowerCase()];
  }
  return [SIMPLE_MEAL_TAG[mealType], MAIN_COURSE_TAG];
}

export function recipeFitsSlot(
  recipe: CandidateRecipe,
  mealType: MealType,
  partName?: string | null,
): boolean {
  return getSlotTagRequirement(mealType, partName).every((tag) =>
    recipe.tags.has(tag),
  );
}

export function getMacroTargets(goal: Goal): MacroTargets {
  return { ...MACRO_TARGETS[goal] };
}

/** Applies the activity multiplier for moderate/high activity, floored. */
export function resolveBaseDailyCalories(
  dailyCalories: number,
  user: Pick<PlannerUser, 'physicalActivity'> | null,
  activeCalorieMultiplier: number,
): number {
  const activity = user?.physicalActivity;
  if (activity === 'moderate' || activity === 'high') {
    return Math.floor(dailyCalories * activeCalorieMultiplier);
  }
  return dailyCalories;
}
