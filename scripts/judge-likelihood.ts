#!/usr/bin/env tsx
/**
 * Plausibility judge
 *
 * Sends event descriptions to the LLM in batches and asks, per item, whether
 * the event could realistically happen in 2026 and how likely it is.
 *
 * Writes `{ "results": [...] }` to the output file and every raw response
 * body, one per line, to the raw log.
 *
 * Usage:
 *   npx tsx scripts/judge-likelihood.ts --input descriptions.json --dry-run
 *   LLM_API_KEY=... npx tsx scripts/judge-likelihood.ts --limit 40
 *   LLM_API_KEY=... npx tsx scripts/judge-likelihood.ts --input descriptions.json --output likelihood_output.json
 */

import { FILES } from '../src/lib/constants.js';
import { loadEnv, loadLLMConfig, type RunSettings } from '../src/lib/config.js';
import { createProvider, type LLMProvider } from '../src/lib/llm-client.js';
import { parseResultsObject, type ResultsObject } from '../src/lib/json-extract.js';
import { callModel, type ModelCallResult } from '../src/lib/model-call.js';
import { runBatches, chunked } from '../src/lib/batching.js';
import { loadDescriptionItems, saveJson } from '../src/lib/io.js';
import { createLogger, silentLogger, plural, type Logger } from '../src/lib/logger.js';
import { getOption, hasFlag, parseLimit, runIfDirect } from '../src/lib/cli.js';
import type { Sleep } from '../src/lib/retry.js';
import {
  LIKELIHOOD_SYSTEM_PROMPT,
  LIKELIHOOD_INSTRUCTIONS,
  buildBatchUserContent,
} from '../src/lib/prompts.js';
import { LikelihoodResultSchema, countInvalid, type DescriptionItem } from '../src/lib/schemas.js';

export interface LikelihoodRunOptions {
  items: DescriptionItem[];
  provider: LLMProvider;
  settings: RunSettings;
  outputPath: string;
  rawLogPath: string;
  logger?: Logger;
  sleep?: Sleep;
}

export interface LikelihoodSummary {
  batches: number;
  results: number;
  /** Batches whose result count differed from the number of items sent. */
  countMismatches: number;
  /** Results that do not match the requested schema. */
  invalid: number;
}

export function callLikelihoodModel(
  provider: LLMProvider,
  batch: DescriptionItem[],
  settings: RunSettings,
  options: { label?: string; logger?: Logger; sleep?: Sleep } = {},
): Promise<ModelCallResult<ResultsObject>> {
  return callModel(
    provider,
    [
      { role: 'system', content: LIKELIHOOD_SYSTEM_PROMPT },
      { role: 'user', content: buildBatchUserContent(LIKELIHOOD_INSTRUCTIONS, batch) },
    ],
    parseResultsObject,
    {
      label: options.label ?? 'likelihood',
      attempts: settings.retries,
      waitMs: settings.retryWaitMs,
      temperature: settings.temperature,
      logger: options.logger,
      sleep: options.sleep,
    },
  );
}

export async function judgeLikelihood(options: LikelihoodRunOptions): Promise<LikelihoodSummary> {
  const logger = options.logger ?? silentLogger;
  const allResults: unknown[] = [];
  let countMismatches = 0;

  const { batches } = await runBatches({
    items: options.items,
    batchSize: options.settings.batchSize,
    rawLogPath: options.rawLogPath,
    logger,
    call: (batch, index) => callLikelihoodModel(options.provider, batch, options.settings, {
      label: `batch ${index + 1}`,
      logger,
      sleep: options.sleep,
    }),
    onResult: (parsed, batch, index) => {
      if (parsed.results.length !== batch.length) {
        countMismatches++;
        logger.warn(`batch ${index + 1}: got ${parsed.results.length} results, expected ${batch.length}`);
      }
      allResults.push(...parsed.results);
    },
  });

  saveJson(options.outputPath, { results: allResults });

  return {
    batches,
    results: allResults.length,
    countMismatches,
    invalid: countInvalid(allResults, LikelihoodResultSchema),
  };
}

async function main(): Promise<void> {
  const logger = createLogger('judge-likelihood');
  const args = process.argv.slice(2);
  const inputPath = getOption(args, 'input') ?? FILES.descriptions;
  const outputPath = getOption(args, 'output') ?? FILES.likelihood;
  const rawLogPath = getOption(args, 'raw-log') ?? FILES.likelihoodRaw;
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
    return;
  }

  const provider = await createProvider(config);
  const summary = await judgeLikelihood({ items, provider, settings: config, outputPath, rawLogPath, logger });

  logger.info(`Done: ${plural(summary.results, 'result')} from ${plural(summary.batches, 'batch', 'es')}`);
  if (summary.countMismatches > 0) logger.warn(`${plural(summary.countMismatches, 'batch', 'es')} returned an unexpected result count`);
  if (summary.invalid > 0) logger.warn(`${plural(summary.invalid, 'result')} do not match the requested schema`);
  logger.info(`Output: ${outputPath}; raw responses: ${rawLogPath}`);
}

runIfDirect('judge-likelihood', main);
