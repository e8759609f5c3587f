#!/usr/bin/env tsx
/**
 * Meal Planner NDJSON Log Reporter
 *
 * Reads meal-planner NDJSON run logs (MEAL_PLANNER_LOG_TO_FILE=true) and
 * prints a compact summary per run.
 * Usage:
 *   npm run mealplan:log:report -- --file ./logs/meal-planner/mealplan-YYYYMMDD-runId.ndjson
 *   npm run mealplan:log:report -- --latest
 *   npm run mealplan:log:report -- --latest --runId <id>
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import {
  formatRunSummary,
  summarizeRunLog,
} from '../src/lib/agents/meal-planner/mealPlannerLogReport';

const LOG_DIR = path.join(process.cwd(), 'logs', 'meal-planner');

function parseArgs(): { file?: string; latest: boolean; runId?: string } {
  const args = process.argv.slice(2);
  let file: string | undefined;
  let latest = false;
  let runId: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--file' && args[i + 1]) {
      file = args[++i];
    } else if (args[i] === '--latest') {
      latest = true;
    } else if (args[i] === '--runId' && args[i + 1]) {
      runId = args[++i];
    }
  }

  return { file, latest, runId };
}

function findLatestNdjson(): string | null {
  if (!fs.existsSync(LOG_DIR)) return null;
  const ndjsonFiles = fs
    .readdirSync(LOG_DIR)
    .filter((f) => f.endsWith('.ndjson'))
    .map((f) => path.join(LOG_DIR, f));
  if (ndjsonFiles.length === 0) return null;
  ndjsonFiles.sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);
  return ndjsonFiles[0];
}

async function readLines(filePath: string): Promise<string[]> {
  const stream = fs.createReadStream(filePath, { encoding: 'utf8' });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const lines: string[] = [];
  for await (const line of rl) lines.push(line);
  return lines;
}

async function main(): Promise<boolean> {
  const { file, latest, runId } = parseArgs();
  const filePath = file ?? (latest ? findLatestNdjson() : null);
  if (!filePath) {
    console.error('Usage: --file <path.ndjson> | --latest [--runId <id>]');
    if (latest) console.error('No NDJSON files found in', LOG_DIR);
    return false;
  }
  if (!fs.existsSync(filePath)) {
    console.error('File not found:', filePath);
    return false;
  }

  const report = summarizeRunLog(await readLines(filePath), runId);
  console.log(`File: ${filePath}`);
  if (report.skippedLines > 0) {
    console.log(`Skipped lines: ${report.skippedLines}`);
  }
  if (report.runs.length === 0) {
    console.log(runId ? `No events for run ${runId}` : 'No run events found');
    return true;
  }
  for (const run of report.runs) {
    console.log('\n' + formatRunSummary(run));
  }
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
