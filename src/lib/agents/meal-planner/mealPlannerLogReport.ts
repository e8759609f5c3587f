/**
 * Meal Planner Log Report
 *
 * Folds NDJSON run-log lines (see mealPlannerRunLogger) into one summary per
 * run. Lines that are not JSON, or not run-log events, are counted and
 * skipped.
 */

import { z } from 'zod';

const baseEventSchema = z
  .object({
    ts: z.string().optional(),
    runId: z.string(),
    planId: z.string().nullable().optional(),
    event: z.string(),
  })
  .passthrough();

const stateEventSchema = z.object({
  state: z.string(),
  method: z.string().optional(),
});

const validationEventSchema = z.object({
  stage: z.string(),
  ok: z.boolean(),
  violationCount: z.number(),
  violations: z
    .array(z.object({ code: z.string() }).passthrough())
    .default([]),
});

const draftRejectedEventSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
});

const slotEventSchema = z.object({
  dayType: z.string(),
  mealType: z.string(),
  partName: z.string(),
});

export type ValidationSummary = {
  stage: string;
  ok: boolean;
  violationCount: number;
  /** violation code → count over the logged (capped) violations */
  codes: Record<string, number>;
};

export type RunSummary = {
  runId: string;
  planId: string | null;
  startedAt: string | null;
  trace: string[];
  method: string | null;
  draftRejected: string | null;
  validations: ValidationSummary[];
  unfillableSlots: string[];
  eventCount: number;
  finished: boolean;
};

export type RunLogReport = {
  runs: RunSummary[];
  skippedLines: number;
};

function emptyRun(runId: string): RunSummary {
  return {
    runId,
    planId: null,
    startedAt: null,
    trace: [],
    method: null,
    draftRejected: null,
    validations: [],
    unfillableSlots: [],
    eventCount: 0,
    finished: false,
  };
}

function parseLine(line: string): z.infer<typeof baseEventSchema> | null {
  try {
    const parsed = baseEventSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function summarizeRunLog(
  lines: Iterable<string>,
  runIdFilter?: string,
): RunLogReport {
  const runs = new Map<string, RunSummary>();
  let skippedLines = 0;

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;
    const evt = parseLine(line);
    if (!evt) {
      skippedLines++;
      continue;
    }
    if (runIdFilter && evt.runId !== runIdFilter) continue;

    const run = runs.get(evt.runId) ?? emptyRun(evt.runId);
    runs.set(evt.runId, run);
    run.eventCount++;
    run.planId = run.planId ?? evt.planId ?? null;

    switch (evt.event) {
      case 'run_start':
        run.startedAt = evt.ts ?? null;
        break;
      case 'state': {
        const state = stateEventSchema.safeParse(evt);
        if (state.success) {
          run.trace.push(state.data.state);
          if (state.data.state === 'ACCEPT') run.method = state.data.method ?? null;
        }
        break;
      }
      case 'draft_rejected': {
        const rejected = draftRejectedEventSchema.safeParse(evt);
        if (rejected.success) run.draftRejected = rejected.data.code;
        break;
      }
      case 'validation': {
        const validation = validationEventSchema.safeParse(evt);
        if (!validation.success) break;
        const codes: Record<string, number> = {};
        for (const v of validation.data.violations) {
          codes[v.code] = (codes[v.code] ?? 0) + 1;
        }
        run.validations.push({
          stage: validation.data.stage,
          ok: validation.data.ok,
          violationCount: validation.data.violationCount,
          codes,
        });
        break;
      }
      case 'slot_unfillable': {
        const slot = slotEventSchema.safeParse(evt);
        if (slot.success) {
          const { dayType, mealType, partName } = slot.data;
          run.unfillableSlots.push(`${dayType}/${mealType}/${partName}`);
        }
        break;
      }
      case 'run_done':
        run.finished = true;
        break;
    }
  }

  return { runs: [...runs.values()], skippedLines };
}

export function formatRunSummary(run: RunSummary): string {
  const lines = [
    `Run ${run.runId}${run.planId ? ` (plan ${run.planId})` : ''}`,
    `  started:  ${run.startedAt ?? 'unknown'}`,
    `  trace:    ${run.trace.length > 0 ? run.trace.join(' → ') : '-'}`,
    `  method:   ${run.method ?? (run.finished ? 'unknown' : 'not finished')}`,
  ];
  if (run.draftRejected) lines.push(`  draft:    rejected (${run.draftRejected})`);
  for (const v of run.validations) {
    const codes = Object.entries(v.codes)
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .map(([code, count]) => `${code}×${count}`)
      .join(', ');
    lines.push(
      `  validate: ${v.stage} ${v.ok ? 'ok' : `${v.violationCount} violation(s)`}${codes ? ` [${codes}]` : ''}`,
    );
  }
  for (const slot of run.unfillableSlots) {
    lines.push(`  unfillable: ${slot}`);
  }
  return lines.join('\n');
}
