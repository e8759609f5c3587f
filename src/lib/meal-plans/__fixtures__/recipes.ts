import type { CandidateRecipe } from '../mealPlans.types';

export function makeRecipe(
  id: number,
  tags: string[],
  calories: number,
  overrides: Partial<Omit<CandidateRecipe, 'id' | 'tags' | 'calories'>> = {},
): CandidateRecipe {
  return {
    id,
    title: `Recipe ${id}`,
    tags: new Set(tags.map((t) => t.toLowerCase())),
    calories,
    protein: 10,
    carbohydrate: 20,
    fat: 5,
    ...overrides,
  };
}

/**
 * One recipe per slot tag combination, plus untagged filler up to 30.
 * Filling every part: regular 1900 kcal, workout 2300, rest 1900.
 */
export const SLOT_RECIPES = {
  breakfastMain: makeRecipe(1, ['breakfast', 'main course'], 200),
  breakfastFruit: makeRecipe(2, ['breakfast', 'fruit'], 50),
  breakfastDairy: makeRecipe(3, ['breakfast', 'dairy'], 50),
  lunchMain: makeRecipe(4, ['lunch', 'main course'], 400),
  lunchSoup: makeRecipe(5, ['lunch', 'soup'], 100),
  dinnerMain: makeRecipe(6, ['dinner', 'main course'], 300),
  dinnerSoup: makeRecipe(7, ['dinner', 'soup'], 100),
  preWorkout: makeRecipe(8, ['pre-workout', 'main course'], 200),
  postWorkout: makeRecipe(9, ['post-workout', 'main course'], 200),
};

export function makeFillerRecipes(count: number, startId = 100): CandidateRecipe[] {
  return Array.from({ length: count }, (_, i) =>
    makeRecipe(startId + i, ['vegan', 'snack'], 150),
  );
}

export function makeFullPool(): CandidateRecipe[] {
  return [...Object.values(SLOT_RECIPES), ...makeFillerRecipes(21)];
}

export const SLOT_TAG_COMBINATIONS: readonly string[][] = [
  ['breakfast', 'main course'],
  ['breakfast', 'fruit'],
  ['breakfast', 'dairy'],
  ['lunch', 'main course'],
  ['lunch', 'soup'],
  ['dinner', 'main course'],
  ['dinner', 'soup'],
  ['pre-workout', 'main course'],
  ['post-workout', 'main course'],
];

/** Every slot tag combination at 50, 60, ... 940 kcal (ascending). */
export function makeDensePool(): CandidateRecipe[] {
  return SLOT_TAG_COMBINATIONS.flatMap((tags, c) =>
    Array.from({ length: 90 }, (_, i) =>
      makeRecipe((c + 1) * 1000 + i, tags, 50 + 10 * i),
    ),
  );
}
