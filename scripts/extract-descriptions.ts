#!/usr/bin/env tsx
/**
 * Reduce a source event list to `[{ id, description }]`, the input format of
 * judge-likelihood. Items without a string description are dropped.
 *
 * Usage:
 *   npx tsx scripts/extract-descriptions.ts --input events.json --output descriptions.json
 */

import { FILES } from '../src/lib/constants.js';
import { InputValidationError, UsageError } from '../src/lib/errors.js';
import { readJsonFile, saveJson, assertUniqueIds } from '../src/lib/io.js';
import { createLogger, plural } from '../src/lib/logger.js';
import { getOption, runIfDirect } from '../src/lib/cli.js';
import type { DescriptionItem } from '../src/lib/schemas.js';

/**
 * Keep the description of each source item. The id is the item's own `id`
 * when it is a string or number, otherwise `idx-<position>`. Ids must come
 * out unique.
 */
export function extractDescriptions(source: unknown): DescriptionItem[] {
  if (!Array.isArray(source)) {
    throw new InputValidationError('source JSON must be an array of event objects');
  }
  const out: DescriptionItem[] = [];
  source.forEach((item: unknown, index) => {
    if (typeof item !== 'object' || item === null || !('description' in item)) return;
    if (typeof item.description !== 'string') return;
    const ownId = 'id' in item ? item.id : undefined;
    const id = typeof ownId === 'string' || typeof ownId === 'number' ? ownId : `idx-${index}`;
    out.push({ id, description: item.description });
  });
  assertUniqueIds(out, 'source JSON');
  return out;
}

async function main(): Promise<void> {
  const logger = createLogger('extract-descriptions');
  const args = process.argv.slice(2);
  const inputPath = getOption(args, 'input');
  if (!inputPath) throw new UsageError('--input <file> is required');
  const outputPath = getOption(args, 'output') ?? FILES.descriptions;

  const descriptions = extractDescriptions(readJsonFile(inputPath));
  saveJson(outputPath, descriptions);
  logger.info(`Wrote ${plural(descriptions.length, 'description')} to ${outputPath}`);
}

runIfDirect('extract-descriptions', main);
