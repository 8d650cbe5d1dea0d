#!/usr/bin/env tsx
/**
 * Ask the model to judge one true/false statement against a retrieved
 * context passage, and say whether it relied on the passage, its own
 * knowledge, or noticed a conflict between them.
 *
 * Each run appends one line to the results JSONL:
 *   { context, statement, model_output }
 * where model_output is the parsed JSON reply, or the raw text when the
 * reply is not valid JSON or parses to an empty or falsy value.
 *
 * Usage:
 *   LLM_API_KEY=... npx tsx scripts/rag-conflict-test.ts \
 *     --context "As of January 1, 2026, the author no longer chairs the committee." \
 *     --statement "The author was appointed committee chair on January 1, 2026."
 *   LLM_API_KEY=... npx tsx scripts/rag-conflict-test.ts --context-file passage.txt --statement "..."
 */

import { readFileSync } from 'fs';
import { FILES } from '../src/lib/constants.js';
import { loadEnv, loadLLMConfig, type RunSettings } from '../src/lib/config.js';
import { UsageError } from '../src/lib/errors.js';
import { createProvider, type LLMProvider } from '../src/lib/llm-client.js';
import { parseStrictOrNull } from '../src/lib/json-extract.js';
import { callModel } from '../src/lib/model-call.js';
import { appendJsonl } from '../src/lib/io.js';
import { createLogger, silentLogger, type Logger } from '../src/lib/logger.js';
import { getOption, runIfDirect } from '../src/lib/cli.js';
import type { Sleep } from '../src/lib/retry.js';
import { RAG_SYSTEM_PROMPT, buildRagUserContent } from '../src/lib/prompts.js';
import { RagJudgmentSchema } from '../src/lib/schemas.js';

export interface RagRecord {
  context: string;
  statement: string;
  model_output: unknown;
}

export interface RagRunOptions {
  provider: LLMProvider;
  context: string;
  statement: string;
  settings: Pick<RunSettings, 'retries' | 'retryWaitMs' | 'temperature'>;
  outputPath: string;
  logger?: Logger;
  sleep?: Sleep;
}

/** False for `null`, `false`, `0`, `""`, `[]` and `{}`. */
function hasContent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

/** Parsed reply when it carries content, otherwise the raw text. */
export function toModelOutput(parsed: unknown, text: string): unknown {
  return hasContent(parsed) ? parsed : text;
}

export async function runRagConflictTest(options: RagRunOptions): Promise<RagRecord> {
  const logger = options.logger ?? silentLogger;

  // Only transport failures retry here: a non-JSON reply is recorded as text
  const { parsed, text } = await callModel(
    options.provider,
    [
      { role: 'system', content: RAG_SYSTEM_PROMPT },
      { role: 'user', content: buildRagUserContent(options.context, options.statement) },
    ],
    parseStrictOrNull,
    {
      label: 'rag-conflict',
      attempts: options.settings.retries,
      waitMs: options.settings.retryWaitMs,
      temperature: options.settings.temperature,
      logger,
      sleep: options.sleep,
    },
  );

  logger.info('=== Model Output (raw content) ===');
  logger.info(text);
  logger.info('==================================');

  if (parsed === null) {
    logger.warn('reply is not valid JSON; recording raw text');
  } else if (!RagJudgmentSchema.safeParse(parsed).success) {
    logger.warn('reply JSON does not match { statement, answer, reasoning }');
  }

  const record: RagRecord = {
    context: options.context,
    statement: options.statement,
    model_output: toModelOutput(parsed, text),
  };
  appendJsonl(options.outputPath, record);
  return record;
}

async function main(): Promise<void> {
  const logger = createLogger('rag-conflict-test');
  const args = process.argv.slice(2);

  const contextFile = getOption(args, 'context-file');
  const context = contextFile !== undefined ? readFileSync(contextFile, 'utf-8').trim() : getOption(args, 'context');
  const statement = getOption(args, 'statement');
  if (!context || !statement) {
    throw new UsageError('--context (or --context-file) and --statement are required');
  }
  const outputPath = getOption(args, 'output') ?? FILES.ragResults;

  loadEnv();
  const config = loadLLMConfig(process.env);
  const provider = await createProvider(config);

  await runRagConflictTest({ provider, context, statement, settings: config, outputPath, logger });
  logger.info(`Appended result to ${outputPath}`);
}

runIfDirect('rag-conflict-test', main);
