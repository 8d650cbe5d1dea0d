#!/usr/bin/env tsx
/**
 * Run the file hand-off between the scripts in one command.
 *
 * Steps:
 *   1. extract-descriptions  → <workdir>/descriptions.json
 *   2. judge-likelihood      → <workdir>/likelihood_output.json (+ raw log)
 *   3. filter-likelihood     → <workdir>/impossible.json and <workdir>/possible.json
 *   4. generate-statements   → <workdir>/true_false_output.json (+ raw log)
 *
 * Each step is a separate process; the files are the only shared state.
 * A dry run extracts into a temp directory that is removed afterwards.
 *
 * Usage:
 *   npm run pipeline -- --source events.json                     # full run (needs LLM_API_KEY)
 *   npm run pipeline -- --source events.json --dry-run           # batch counts only, no API calls, workdir untouched
 *   npm run pipeline -- --descriptions descriptions.json         # start from an existing descriptions file
 *   npm run pipeline -- --source events.json --skip-generate     # stop after filtering
 *   npm run pipeline -- --source events.json --limit 10          # judge/generate at most 10 items
 */

import { execFileSync } from 'child_process';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { FILES } from '../src/lib/constants.js';
import { UsageError } from '../src/lib/errors.js';
import { createLogger, type Logger } from '../src/lib/logger.js';
import { getOption, hasFlag, parseLimit, runIfDirect } from '../src/lib/cli.js';

const SCRIPTS_DIR = dirname(fileURLToPath(import.meta.url));

export interface PipelineOptions {
  source?: string;
  descriptions?: string;
  workdir: string;
  limit: number;
  dryRun: boolean;
  skipGenerate: boolean;
  /** Where a dry run writes extracted descriptions instead of `workdir`. */
  scratchDir?: string;
}

export interface PipelineStep {
  name: string;
  script: string;
  args: string[];
}

export function parsePipelineArgs(args: readonly string[]): PipelineOptions {
  const source = getOption(args, 'source');
  const descriptions = getOption(args, 'descriptions');
  if (!source && !descriptions) {
    throw new UsageError('--source <events.json> or --descriptions <descriptions.json> is required');
  }
  return {
    source,
    descriptions,
    workdir: getOption(args, 'workdir') ?? '.',
    limit: parseLimit(args),
    dryRun: hasFlag(args, 'dry-run'),
    skipGenerate: hasFlag(args, 'skip-generate'),
  };
}

/** Steps to run, in order. Filtering and generation need judge output, so a dry run stops after judging. */
export function buildSteps(options: PipelineOptions): PipelineStep[] {
  const file = (name: string) => join(options.workdir, name);
  const limitArgs = Number.isFinite(options.limit) ? ['--limit', String(options.limit)] : [];
  const dryRunArgs = options.dryRun ? ['--dry-run'] : [];
  const steps: PipelineStep[] = [];

  let descriptionsPath = options.descriptions;
  if (!descriptionsPath) {
    descriptionsPath = options.dryRun && options.scratchDir !== undefined
      ? join(options.scratchDir, FILES.descriptions)
      : file(FILES.descriptions);
    steps.push({
      name: 'extract-descriptions',
      script: 'extract-descriptions.ts',
      args: ['--input', options.source ?? '', '--output', descriptionsPath],
    });
  }

  steps.push({
    name: 'judge-likelihood',
    script: 'judge-likelihood.ts',
    args: [
      '--input', descriptionsPath,
      '--output', file(FILES.likelihood),
      '--raw-log', file(FILES.likelihoodRaw),
      ...limitArgs,
      ...dryRunArgs,
    ],
  });

  if (options.dryRun) return steps;

  steps.push(
    {
      name: 'filter-impossible',
      script: 'filter-likelihood.ts',
      args: ['--keep', 'impossible', '--input', file(FILES.likelihood), '--output', file(FILES.impossible)],
    },
    {
      name: 'filter-possible',
      script: 'filter-likelihood.ts',
      args: [
        '--keep', 'possible',
        '--input', file(FILES.likelihood),
        '--descriptions', descriptionsPath,
        '--output', file(FILES.possible),
      ],
    },
  );

  if (!options.skipGenerate) {
    steps.push({
      name: 'generate-statements',
      script: 'generate-statements.ts',
      args: [
        '--input', file(FILES.possible),
        '--output', file(FILES.statements),
        '--raw-log', file(FILES.statementsRaw),
        ...limitArgs,
      ],
    });
  }

  return steps;
}

async function main(): Promise<void> {
  const logger = createLogger('pipeline');
  const options = parsePipelineArgs(process.argv.slice(2));
  const scratchDir = options.dryRun ? mkdtempSync(join(tmpdir(), 'pipeline-dry-run-')) : undefined;
  try {
    runSteps(buildSteps({ ...options, scratchDir }), logger);
  } finally {
    if (scratchDir !== undefined) rmSync(scratchDir, { recursive: true, force: true });
  }
}

function runSteps(steps: PipelineStep[], logger: Logger): void {
  const timings: Array<{ name: string; ms: number }> = [];

  for (const step of steps) {
    logger.info('='.repeat(60));
    logger.info(`Step: ${step.name}`);
    logger.info('='.repeat(60));
    const start = performance.now();
    execFileSync('npx', ['tsx', join(SCRIPTS_DIR, step.script), ...step.args], { stdio: 'inherit' });
    const ms = Math.round(performance.now() - start);
    timings.push({ name: step.name, ms });
    logger.info(`${step.name} completed in ${ms}ms`);
  }

  logger.info('='.repeat(60));
  logger.info('Pipeline complete');
  for (const t of timings) {
    logger.info(`  ${t.name.padEnd(25)} ${t.ms}ms`);
  }
  const total = timings.reduce((sum, t) => sum + t.ms, 0);
  logger.info(`  ${'total'.padEnd(25)} ${total}ms`);
}

runIfDirect('run-pipeline', main);
