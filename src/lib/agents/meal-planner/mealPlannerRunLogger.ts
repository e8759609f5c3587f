/**
 * Meal Planner Run Logger
 *
 * Structured logging for one generation run. Logs one JSON object per event
 * via console and optionally appends NDJSON to a local logfile. Fully behind
 * env flags; silent by default.
 *
 * Env flags:
 *   MEAL_PLANNER_DEBUG_LOG=true        - Master switch
 *   MEAL_PLANNER_LOG_TO_FILE=true      - NDJSON file output
 *   MEAL_PLANNER_DEBUG_MAX_EVENTS=N    - Event cap per run (default 20000)
 */

import { createHash } from 'node:crypto';
import { appendFileSync, mkdirSync } from 'node:fs';
import { join, relative } from 'node:path';
import type {
  GenerationState,
  PlanValidationResult,
  UnfillableSlot,
} from '@/src/lib/meal-plans/mealPlans.types';

function flag(name: string): boolean {
  const value = process.env[name];
  return value === 'true' || value === '1';
}

function hashUserId(userId: string): string {
  return createHash('sha256').update(userId).digest('hex').slice(0, 8);
}

export type CreateRunLoggerParams = {
  planId: string | null;
  userId: string;
  runId?: string;
  /** Defaults to <cwd>/logs/meal-planner */
  logDir?: string;
};

export type RunLogEvent = {
  ts: string;
  runId: string;
  planId: string | null;
  userIdHash: string;
  event: string;
  [key: string]: unknown;
};

export type MealPlannerRunLogger = {
  readonly runId: string;
  event(name: string, payload?: Record<string, unknown>): void;
  state(state: GenerationState, payload?: Record<string, unknown>): void;
  validation(stage: string, result: PlanValidationResult): void;
  slotUnfillable(slot: UnfillableSlot): void;
  getDebugMeta(): { runId: string; logFileRelativePath?: string };
};

/** Caps violation details per validation event */
const MAX_LOGGED_VIOLATIONS = 20;

export function createRunLogger(
  params: CreateRunLoggerParams,
): MealPlannerRunLogger {
  const { planId, userId } = params;
  const runId =
    params.runId ?? `run-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  const userIdHash = hashUserId(userId);

  const debugLog = flag('MEAL_PLANNER_DEBUG_LOG');
  const logToFile = debugLog && flag('MEAL_PLANNER_LOG_TO_FILE');
  const maxEvents = Math.max(
    0,
    parseInt(process.env.MEAL_PLANNER_DEBUG_MAX_EVENTS ?? '20000', 10) || 20000,
  );

  let eventsCount = 0;
  let limitEmitted = false;
  let logFilePath: string | null = null;

  if (logToFile) {
    const logDir = params.logDir ?? join(process.cwd(), 'logs', 'meal-planner');
    try {
      mkdirSync(logDir, { recursive: true });
      const dateStr = new Date().toISOString().slice(0, 10).replace(/-/g, '');
      const safeRunId = runId.replace(/[^a-zA-Z0-9-_]/g, '_').slice(0, 32);
      logFilePath = join(logDir, `mealplan-${dateStr}-${safeRunId}.ndjson`);
    } catch (error) {
      console.warn(
        '[MealPlanner] Log directory not writable, file logging disabled:',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  function write(obj: RunLogEvent): void {
    console.log(JSON.stringify(obj));
    if (!logFilePath) return;
    try {
      appendFileSync(logFilePath, JSON.stringify(obj) + '\n');
    } catch (error) {
      logFilePath = null;
      console.warn(
        '[MealPlanner] Log file write failed, file logging disabled:',
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  function event(name: string, payload: Record<string, unknown> = {}): void {
    if (!debugLog) return;
    if (eventsCount >= maxEvents) {
      if (!limitEmitted) {
        limitEmitted = true;
        write({
          ...payload,
          ts: new Date().toISOString(),
          runId,
          planId,
          userIdHash,
          event: 'log_limit_reached',
          limit: maxEvents,
        });
      }
      return;
    }
    eventsCount++;
    write({
      ...payload,
      ts: new Date().toISOString(),
      runId,
      planId,
      userIdHash,
      event: name,
    });
  }

  return {
    runId,
    event,
    state(state, payload = {}) {
      event('state', { state, ...payload });
    },
    validation(stage, result) {
      event('validation', {
        stage,
        ok: result.ok,
        violationCount: result.violations.length,
        violations: result.violations.slice(0, MAX_LOGGED_VIOLATIONS).map((v) => ({
          code: v.code,
          dayType: v.dayType,
          mealType: v.mealType,
          partName: v.partName,
          recipeId: v.recipeId,
        })),
      });
    },
    slotUnfillable(slot) {
      event('slot_unfillable', { ...slot });
    },
    getDebugMeta() {
      return logFilePath
        ? { runId, logFileRelativePath: relative(process.cwd(), logFilePath) }
        : { runId };
    },
  };
}
