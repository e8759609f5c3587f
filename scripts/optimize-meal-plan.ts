#!/usr/bin/env tsx
/**
 * Optimize Meal Plan Script
 *
 * Re-validates and repairs a stored meal plan (asking the draft generator for
 * an improved version when configured) and replaces it in Supabase.
 *
 * Usage:
 *   npm run mealplan:optimize -- --plan <id> [--seed 42] [--deterministic] [--json]
 */

import * as path from 'node:path';
import { config } from 'dotenv';
import { isGeminiConfigured } from '../src/lib/ai/gemini/gemini.client';
import { optimizeMealPlanAction } from '../src/lib/meal-plans/mealPlans.actions';
import { createMealPlansService } from '../src/lib/meal-plans/mealPlans.service';
import { printPlanResult } from './meal-plan-output';

// Load environment variables from .env.local
config({ path: path.join(process.cwd(), '.env.local') });

function parseArgs(): {
  planId: string;
  seed?: number;
  forceDeterministic: boolean;
  json: boolean;
} {
  const args = process.argv.slice(2);
  let planId = '';
  let seed: number | undefined;
  let forceDeterministic = false;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--plan' && args[i + 1]) {
      planId = args[++i];
    } else if (args[i] === '--seed' && args[i + 1]) {
      seed = Number(args[++i]);
    } else if (args[i] === '--deterministic') {
      forceDeterministic = true;
    } else if (args[i] === '--json') {
      json = true;
    }
  }

  return { planId, seed, forceDeterministic, json };
}

async function main(): Promise<boolean> {
  const { planId, seed, forceDeterministic, json } = parseArgs();
  const useDraftGenerator =
    process.env.MEAL_PLANNER_DISABLE_DRAFT !== 'true' && isGeminiConfigured();

  const service = createMealPlansService({ useDraftGenerator });
  const result = await optimizeMealPlanAction(service, {
    planId,
    seed,
    forceDeterministic,
  });
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
