#!/usr/bin/env tsx
/**
 * Generate Meal Plan Script
 *
 * Generates a 3-day meal plan for a user and stores it in Supabase.
 *
 * Usage:
 *   npm run mealplan:generate -- --user <id> --calories 2000 [--goal maintenance]
 *     [--start 2026-03-02] [--seed 42] [--deterministic] [--json]
 *
 * Set MEAL_PLANNER_DISABLE_DRAFT=true (or leave GEMINI_API_KEY unset) to skip
 * the draft generator.
 */

import * as path from 'node:path';
import { config } from 'dotenv';
import { isGeminiConfigured } from '../src/lib/ai/gemini/gemini.client';
import { createMealPlanAction } from '../src/lib/meal-plans/mealPlans.actions';
import {
  goalSchema,
  type GenerateMealPlanInput,
} from '../src/lib/meal-plans/mealPlans.schemas';
import { createMealPlansService } from '../src/lib/meal-plans/mealPlans.service';
import { printPlanResult } from './meal-plan-output';

// Load environment variables from .env.local
config({ path: path.join(process.cwd(), '.env.local') });

function parseArgs(): { input: GenerateMealPlanInput; json: boolean } | null {
  const args = process.argv.slice(2);
  let userId = '';
  let dailyCalories = NaN;
  let goal: string | undefined;
  let startDate: string | undefined;
  let seed: number | undefined;
  let forceDeterministic = false;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--user' && args[i + 1]) {
      userId = args[++i];
    } else if (args[i] === '--calories' && args[i + 1]) {
      dailyCalories = Number(args[++i]);
    } else if (args[i] === '--goal' && args[i + 1]) {
      goal = args[++i];
    } else if (args[i] === '--start' && args[i + 1]) {
      startDate = args[++i];
    } else if (args[i] === '--seed' && args[i + 1]) {
      seed = Number(args[++i]);
    } else if (args[i] === '--deterministic') {
      forceDeterministic = true;
    } else if (args[i] === '--json') {
      json = true;
    }
  }

  const parsedGoal = goalSchema.optional().safeParse(goal);
  if (!parsedGoal.success) {
    console.error(`❌ Unknown goal "${goal}" (weight_loss, muscle_gain, maintenance)`);
    return null;
  }

  return {
    input: {
      userId,
      dailyCalories,
      goal: parsedGoal.data,
      startDate,
      seed,
      forceDeterministic,
    },
    json,
  };
}

async function main(): Promise<boolean> {
  const parsed = parseArgs();
  if (!parsed) return false;
  const { input, json } = parsed;
  const useDraftGenerator =
    process.env.MEAL_PLANNER_DISABLE_DRAFT !== 'true' && isGeminiConfigured();

  const service = createMealPlansService({ useDraftGenerator });
  const result = await createMealPlanAction(service, input);
  if (!result.ok) {
    console.error(`❌ ${result.error.code}: ${result.error.message}`);
    if (result.error.details) {
      console.error(JSON.stringify(result.error.details, null, 2));
    }
    return false;
  }

  printPlanResult(result.data, json);
  return true;
}

main()
  .then((success) => {
    process.exit(success ? 0 : 1);
  })
  .catch((error) => {
    console.error('\n💥 Fatal error:', error);
    process.exit(1);
  });
