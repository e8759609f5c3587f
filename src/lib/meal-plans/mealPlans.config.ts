/**
 * Meal planner config – loaded from config file and env.
 * No hardcoded business values; edit config/meal-planner.json or set env vars.
 * Env vars override the file.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export type MealPlannerConfig = {
  /** Below this pool size generation is refused (INSUFFICIENT_CANDIDATE_RECIPES). */
  minCandidateRecipes: number;
  /** Allowed relative deviation of a day's calories from its target. */
  calorieTolerance: number;
  /** Probability that repair fills an empty optional part. */
  optionalPartInclusionRate: number;
  draftTimeoutMs: number;
  promptCandidatesPerSlot: number;
  /** Base-calorie multiplier for moderate/high physical activity. */
  activeCalorieMultiplier: number;
};

const DEFAULTS: MealPlannerConfig = {
  minCandidateRecipes: 30,
  calorieTolerance: 0.15,
  optionalPartInclusionRate: 0.5,
  draftTimeoutMs: 60_000,
  promptCandidatesPerSlot: 10,
  activeCalorieMultiplier: 1.1,
};

const CONFIG_KEYS: Array<keyof MealPlannerConfig> = [
  'minCandidateRecipes',
  'calorieTolerance',
  'optionalPartInclusionRate',
  'draftTimeoutMs',
  'promptCandidatesPerSlot',
  'activeCalorieMultiplier',
];

const ENV_KEYS: Record<keyof MealPlannerConfig, string> = {
  minCandidateRecipes: 'MEAL_PLANNER_MIN_CANDIDATE_RECIPES',
  calorieTolerance: 'MEAL_PLANNER_CALORIE_TOLERANCE',
  optionalPartInclusionRate: 'MEAL_PLANNER_OPTIONAL_PART_RATE',
  draftTimeoutMs: 'MEAL_PLANNER_DRAFT_TIMEOUT_MS',
  promptCandidatesPerSlot: 'MEAL_PLANNER_PROMPT_CANDIDATES_PER_SLOT',
  activeCalorieMultiplier: 'MEAL_PLANNER_ACTIVE_CALORIE_MULTIPLIER',
};

/** Accepted range per key; values outside fall back to the default. */
const BOUNDS: Record<keyof MealPlannerConfig, [number, number]> = {
  minCandidateRecipes: [0, 100_000],
  calorieTolerance: [0, 1],
  optionalPartInclusionRate: [0, 1],
  draftTimeoutMs: [1, 600_000],
  promptCandidatesPerSlot: [1, 100],
  activeCalorieMultiplier: [1, 3],
};

let cached: MealPlannerConfig | null = null;

function pickNumber(key: keyof MealPlannerConfig, value: unknown): number | null {
  const n =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;
  if (!Number.isFinite(n)) return null;
  const [min, max] = BOUNDS[key];
  if (n < min || n > max) return null;
  return n;
}

function readConfigFile(): Record<string, unknown> {
  const configPath =
    process.env.MEAL_PLANNER_CONFIG_PATH ??
    join(process.cwd(), 'config', 'meal-planner.json');
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    console.warn(
      `[MealPlannerConfig] ${configPath} is not a JSON object, using defaults`,
    );
  } catch (error) {
    console.warn(
      `[MealPlannerConfig] Could not read ${configPath}, using defaults:`,
      error instanceof Error ? error.message : String(error),
    );
  }
  return {};
}

function loadConfig(): MealPlannerConfig {
  if (cached) return cached;
  const fromFile = readConfigFile();
  const config: MealPlannerConfig = { ...DEFAULTS };
  for (const key of CONFIG_KEYS) {
    const envValue = pickNumber(key, process.env[ENV_KEYS[key]]);
    const fileValue = pickNumber(key, fromFile[key]);
    config[key] = envValue ?? fileValue ?? DEFAULTS[key];
  }
  config.minCandidateRecipes = Math.floor(config.minCandidateRecipes);
  config.promptCandidatesPerSlot = Math.floor(config.promptCandidatesPerSlot);
  cached = config;
  return cached;
}

/** Get meal planner config (file + env). Reset cache for tests with resetMealPlannerConfigCache(). */
export function getMealPlannerConfig(): MealPlannerConfig {
  return loadConfig();
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetMealPlannerConfigCache(): void {
  cached = null;
}
