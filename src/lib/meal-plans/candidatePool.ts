/**
 * Candidate pool: normalization, dedupe, tag filtering and the minimum-size
 * check. Pure; the pool itself is loaded by the repository.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type { CandidateRecipe } from './mealPlans.types';

/** Lowercase, trim, collapse whitespace. */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function normalizeTags(tags: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) out.add(normalized);
  }
  return out;
}

/** Keeps the first recipe per id. */
export function dedupeById(list: readonly CandidateRecipe[]): {
  kept: CandidateRecipe[];
  removedCount: number;
} {
  const seen = new Set<number>();
  const kept: CandidateRecipe[] = [];
  for (const recipe of list) {
    if (seen.has(recipe.id)) continue;
    seen.add(recipe.id);
    kept.push(recipe);
  }
  return { kept, removedCount: list.length - kept.length };
}

/** Recipes carrying every given tag (case-insensitive). */
export function filterByTags(
  list: readonly CandidateRecipe[],
  tags: readonly string[],
): CandidateRecipe[] {
  const wanted = tags.map(normalizeTag).filter(Boolean);
  return list.filter((r) => wanted.every((t) => r.tags.has(t)));
}

/**
 * Recipes carrying at least one preferred tag. Empty preferences → no-op.
 */
export function filterByDietaryPreferences(
  list: readonly CandidateRecipe[],
  preferences: readonly string[],
): CandidateRecipe[] {
  const wanted = preferences.map(normalizeTag).filter(Boolean);
  if (wanted.length === 0) return [...list];
  return list.filter((r) => wanted.some((t) => r.tags.has(t)));
}

/** Read-only snapshot of the pool for one request. */
export class CandidatePoolIndex {
  readonly recipes: readonly CandidateRecipe[];
  private readonly byId: ReadonlyMap<number, CandidateRecipe>;

  constructor(recipes: readonly CandidateRecipe[]) {
    this.recipes = dedupeById(recipes).kept;
    this.byId = new Map(this.recipes.map((r) => [r.id, r]));
  }

  get size(): number {
    return this.recipes.length;
  }

  get(id: number): CandidateRecipe | undefined {
    return this.byId.get(id);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  withTags(tags: readonly string[]): CandidateRecipe[] {
    return filterByTags(this.recipes, tags);
  }
}

/**
 * Throws INSUFFICIENT_CANDIDATE_RECIPES when the pool is smaller than the
 * configured minimum.
 */
export function assertSufficientCandidatePool(
  pool: CandidatePoolIndex,
  minCandidateRecipes: number,
): void {
  if (pool.size < minCandidateRecipes) {
    throw new AppError(
      'INSUFFICIENT_CANDIDATE_RECIPES',
      `Not enough recipes match the dietary preferences (found ${pool.size}, need at least ${minCandidateRecipes}).`,
      { found: pool.size, required: minCandidateRecipes },
    );
  }
}
