#!/usr/bin/env tsx
/**
 * True/false statement generator
 *
 * For each description, asks the LLM for four statements graded from
 * "Highly likely" to "Highly unlikely". Output is a flat JSON array of
 * `{ id: "<id>_<suffix>", statement, label }`.
 *
 * Usage:
 *   npx tsx scripts/generate-statements.ts --input possible.json --dry-run
 *   LLM_API_KEY=... npx tsx scripts/generate-statements.ts --limit 10
 */

import { FILES, STATEMENTS_PER_ITEM } from '../src/lib/constants.js';
import { loadEnv, loadLLMConfig, type RunSettings } from '../src/lib/config.js';
import { createProvider, type LLMProvider } from '../src/lib/llm-client.js';
import { parseResultsArray } from '../src/lib/json-extract.js';
import { callModel, type ModelCallResult } from '../src/lib/model-call.js';
import { runBatches, chunked } from '../src/lib/batching.js';
import { loadDescriptionItems, saveJson } from '../src/lib/io.js';
import { createLogger, silentLogger, plural, type Logger } from '../src/lib/logger.js';
import { getOption, hasFlag, parseLimit, runIfDirect } from '../src/lib/cli.js';
import type { Sleep } from '../src/lib/retry.js';
import {
  STATEMENT_SYSTEM_PROMPT,
  STATEMENT_INSTRUCTIONS,
  buildBatchUserContent,
} from '../src/lib/prompts.js';
import {
  GeneratedStatementSchema,
  LABEL_SUFFIX,
  countInvalid,
  type DescriptionItem,
} from '../src/lib/schemas.js';

export interface StatementRunOptions {
  items: DescriptionItem[];
  provider: LLMProvider;
  settings: RunSettings;
  outputPath: string;
  rawLogPath: string;
  logger?: Logger;
  sleep?: Sleep;
}

export interface StatementSummary {
  batches: number;
  statements: number;
  countMismatches: number;
  invalid: number;
  /** Valid statements whose id suffix does not match their label. */
  suffixMismatches: number;
}

export function expectedStatementCount(batchLength: number): number {
  return STATEMENTS_PER_ITEM * batchLength;
}

export function countSuffixMismatches(statements: unknown[]): number {
  let n = 0;
  for (const item of statements) {
    const parsed = GeneratedStatementSchema.safeParse(item);
    if (parsed.success && !parsed.data.id.endsWith(`_${LABEL_SUFFIX[parsed.data.label]}`)) n++;
  }
  return n;
}

export function callStatementModel(
  provider: LLMProvider,
  batch: DescriptionItem[],
  settings: RunSettings,
  options: { label?: string; logger?: Logger; sleep?: Sleep } = {},
): Promise<ModelCallResult<unknown[]>> {
  return callModel(
    provider,
    [
      { role: 'system', content: STATEMENT_SYSTEM_PROMPT },
      { role: 'user', content: buildBatchUserContent(STATEMENT_INSTRUCTIONS, batch) },
    ],
    parseResultsArray,
    {
      label: options.label ?? 'statements',
      attempts: settings.retries,
      waitMs: settings.retryWaitMs,
      temperature: settings.temperature,
      logger: options.logger,
      sleep: options.sleep,
    },
  );
}

export async function generateStatements(options: StatementRunOptions): Promise<StatementSummary> {
  const logger = options.logger ?? silentLogger;
  const statements: unknown[] = [];
  let countMismatches = 0;

  const { batches } = await runBatches({
    items: options.items,
    batchSize: options.settings.batchSize,
    rawLogPath: options.rawLogPath,
    logger,
    call: (batch, index) => callStatementModel(options.provider, batch, options.settings, {
      label: `batch ${index + 1}`,
      logger,
      sleep: options.sleep,
    }),
    onResult: (parsed, batch, index) => {
      const expected = expectedStatementCount(batch.length);
      if (parsed.length !== expected) {
        countMismatches++;
        logger.warn(`batch ${index + 1}: got ${parsed.length} statements, expected ${expected}`);
      }
      statements.push(...parsed);
    },
  });

  saveJson(options.outputPath, statements);

  return {
    batches,
    statements: statements.length,
    countMismatches,
    invalid: countInvalid(statements, GeneratedStatementSchema),
    suffixMismatches: countSuffixMismatches(statements),
  };
}

async function main(): Promise<void> {
  const logger = createLogger('generate-statements');
  const args = process.argv.slice(2);
  const inputPath = getOption(args, 'input') ?? FILES.possible;
  const outputPath = getOption(args, 'output') ?? FILES.statements;
  const rawLogPath = getOption(args, 'raw-log') ?? FILES.statementsRaw;
  const dryRun = hasFlag(args, 'dry-run');
  const limit = parseLimit(args);

  loadEnv();
  const config = loadLLMConfig(process.env, { requireApiKey: !dryRun });

  let items = loadDescriptionItems(inputPath);
  logger.info(`Loaded ${plural(items.length, 'description')} from ${inputPath}`);
  if (limit < items.length) {
    items = items.slice(0, limit);
    logger.info(`Limited to ${limit} items`);
  }

  if (dryRun) {
    logger.info('--- Dry Run Summary ---');
    logger.info(`Provider: ${config.provider} (${config.model})`);
    logger.info(`Items: ${items.length}`);
    logger.info(`Batches: ${chunked(items, config.batchSize).length} (batch size ${config.batchSize})`);
    logger.info(`Expected statements: ${expectedStatementCount(items.length)}`);
    return;
  }

  const provider = await createProvider(config);
  const summary = await generateStatements({ items, provider, settings: config, outputPath, rawLogPath, logger });

  logger.info(`Done: ${plural(summary.statements, 'statement')} from ${plural(summary.batches, 'batch', 'es')}`);
  if (summary.countMismatches > 0) logger.warn(`${plural(summary.countMismatches, 'batch', 'es')} returned an unexpected statement count`);
  if (summary.invalid > 0) logger.warn(`${plural(summary.invalid, 'statement')} do not match the requested schema`);
  if (summary.suffixMismatches > 0) logger.warn(`${plural(summary.suffixMismatches, 'statement')} have an id suffix that does not match the label`);
  logger.info(`Output: ${outputPath}; raw responses: ${rawLogPath}`);
}

runIfDirect('generate-statements', main);
