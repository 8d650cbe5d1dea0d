import { readFileSync, writeFileSync, appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { ErrorMessage } from './constants.js';
import { InputValidationError } from './errors.js';
import { DescriptionItemSchema, type DescriptionItem, type ItemId } from './schemas.js';

export function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/** First id that occurs twice, compared as strings (`1` and `"1"` clash). */
export function findDuplicateId(items: readonly { id: ItemId }[]): string | undefined {
  const seen = new Set<string>();
  for (const item of items) {
    const key = String(item.id);
    if (seen.has(key)) return key;
    seen.add(key);
  }
  return undefined;
}

export function assertUniqueIds(items: readonly { id: ItemId }[], source: string): void {
  const duplicate = findDuplicateId(items);
  if (duplicate !== undefined) {
    throw new InputValidationError(`duplicate id "${duplicate}" in ${source}`);
  }
}

/** Load `[{ id, description, ... }]` with unique ids. Extra fields are kept. */
export function loadDescriptionItems(path: string): DescriptionItem[] {
  const data = readJsonFile(path);
  if (!Array.isArray(data)) {
    throw new InputValidationError(ErrorMessage.InputNotArray);
  }
  const items = data.map((item: unknown, i) => {
    const parsed = DescriptionItemSchema.safeParse(item);
    if (!parsed.success) {
      throw new InputValidationError(`item ${i} is missing id or description: ${JSON.stringify(item)}`);
    }
    return parsed.data;
  });
  assertUniqueIds(items, path);
  return items;
}

function ensureParentDir(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

/** Pretty-printed JSON (2-space indent, non-ASCII kept as-is). */
export function saveJson(path: string, value: unknown): void {
  ensureParentDir(path);
  writeFileSync(path, JSON.stringify(value, null, 2), 'utf-8');
}

export function appendJsonl(path: string, value: unknown): void {
  ensureParentDir(path);
  appendFileSync(path, JSON.stringify(value) + '\n', 'utf-8');
}

/** Create or empty a JSONL log before a run appends to it. */
export function truncateFile(path: string): void {
  ensureParentDir(path);
  writeFileSync(path, '', 'utf-8');
}

export function parseJsonl(content: string): unknown[] {
  return content
    .split('\n')
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}
