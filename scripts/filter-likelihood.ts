#!/usr/bin/env tsx
/**
 * Split judge output by the `possible_in_2026` verdict.
 *
 *   --keep impossible (default)  → [{ id, likelihood, rationale }]
 *   --keep possible              → [{ id, description, likelihood, rationale }]
 *
 * The possible set feeds generate-statements, which needs the description
 * text back; it is joined from --descriptions on the item id.
 *
 * Usage:
 *   npx tsx scripts/filter-likelihood.ts --input likelihood_output.json --output impossible.json
 *   npx tsx scripts/filter-likelihood.ts --keep possible --descriptions descriptions.json --output possible.json
 */

import { z } from 'zod';
import { FILES } from '../src/lib/constants.js';
import { InputValidationError, UsageError } from '../src/lib/errors.js';
import { readJsonFile, loadDescriptionItems, saveJson, assertUniqueIds } from '../src/lib/io.js';
import { createLogger, plural } from '../src/lib/logger.js';
import { getOption, runIfDirect } from '../src/lib/cli.js';
import { ItemIdSchema, type DescriptionItem, type ItemId } from '../src/lib/schemas.js';

export const KeepSchema = z.enum(['impossible', 'possible']).default('impossible');
export type Keep = z.infer<typeof KeepSchema>;

/** Lenient view of one judge result: only `id` is required. */
const JudgedItemSchema = z.object({
  id: ItemIdSchema,
  possible_in_2026: z.unknown(),
  likelihood: z.unknown(),
  rationale: z.unknown(),
});

const JudgeOutputSchema = z.object({ results: z.array(z.unknown()) });

export interface ImpossibleEntry {
  id: ItemId;
  likelihood: unknown;
  rationale: unknown;
}

export interface PossibleEntry extends ImpossibleEntry {
  description: string;
}

export interface FilterSummary<E> {
  entries: E[];
  /** Results without a usable id. */
  skipped: number;
  /** Possible results with no matching description. */
  missingDescription: number;
}

export function readJudgeResults(path: string): unknown[] {
  const parsed = JudgeOutputSchema.safeParse(readJsonFile(path));
  if (!parsed.success) {
    throw new InputValidationError(`${path} must be a JSON object with a "results" array`);
  }
  return parsed.data.results;
}

export function filterImpossible(results: unknown[]): FilterSummary<ImpossibleEntry> {
  const entries: ImpossibleEntry[] = [];
  let skipped = 0;
  for (const item of results) {
    const parsed = JudgedItemSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    if (parsed.data.possible_in_2026 !== false) continue;
    entries.push({ id: parsed.data.id, likelihood: parsed.data.likelihood, rationale: parsed.data.rationale });
  }
  return { entries, skipped, missingDescription: 0 };
}

export function filterPossible(
  results: unknown[],
  descriptions: DescriptionItem[],
): FilterSummary<PossibleEntry> {
  assertUniqueIds(descriptions, 'descriptions');
  const byId = new Map(descriptions.map(d => [String(d.id), d.description]));
  const entries: PossibleEntry[] = [];
  let skipped = 0;
  let missingDescription = 0;

  for (const item of results) {
    const parsed = JudgedItemSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    if (parsed.data.possible_in_2026 !== true) continue;

    const description = byId.get(String(parsed.data.id));
    if (description === undefined) {
      missingDescription++;
      continue;
    }
    entries.push({
      id: parsed.data.id,
      description,
      likelihood: parsed.data.likelihood,
      rationale: parsed.data.rationale,
    });
  }
  return { entries, skipped, missingDescription };
}

async function main(): Promise<void> {
  const logger = createLogger('filter-likelihood');
  const args = process.argv.slice(2);

  const keepParse = KeepSchema.safeParse(getOption(args, 'keep'));
  if (!keepParse.success) throw new UsageError('--keep must be "impossible" or "possible"');
  const keep = keepParse.data;

  const inputPath = getOption(args, 'input') ?? FILES.likelihood;
  const outputPath = getOption(args, 'output') ?? (keep === 'possible' ? FILES.possible : FILES.impossible);
  const results = readJudgeResults(inputPath);

  let summary: FilterSummary<ImpossibleEntry | PossibleEntry>;
  if (keep === 'possible') {
    const descriptionsPath = getOption(args, 'descriptions');
    if (!descriptionsPath) throw new UsageError('--keep possible requires --descriptions <file>');
    summary = filterPossible(results, loadDescriptionItems(descriptionsPath));
  } else {
    summary = filterImpossible(results);
  }

  saveJson(outputPath, summary.entries);

  if (summary.skipped > 0) logger.warn(`${plural(summary.skipped, 'result')} without an id skipped`);
  if (summary.missingDescription > 0) logger.warn(`${plural(summary.missingDescription, 'result')} had no matching description`);
  logger.info(`Wrote ${plural(summary.entries.length, 'item')} to ${outputPath}`);
}

runIfDirect('filter-likelihood', main);
