/**
 * Pull JSON out of model replies that were asked for strict JSON but may
 * wrap it in prose or code fences.
 */

import { ErrorMessage } from './constants.js';
import { ModelResponseError } from './errors.js';

export interface ResultsObject {
  results: unknown[];
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResultsObject(value: unknown): value is ResultsObject {
  return isRecord(value) && Array.isArray(value.results);
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Text between the first `open` and the last `close`, inclusive, or null. */
export function sliceBetween(content: string, open: string, close: string): string | null {
  const start = content.indexOf(open);
  const end = content.lastIndexOf(close);
  if (start === -1 || end === -1 || end <= start) return null;
  return content.slice(start, end + 1);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Strict parse, or null when the reply is not JSON. */
export function parseStrictOrNull(content: string): unknown {
  const parsed = tryParse(content);
  return parsed.ok ? parsed.value : null;
}

/**
 * Expect `{ "results": [...] }`. Falls back to the span from the first `{`
 * to the last `}` when the reply is not clean JSON.
 */
export function parseResultsObject(content: string): ResultsObject {
  let parsed = tryParse(content);
  if (!parsed.ok) {
    const span = sliceBetween(content, '{', '}');
    parsed = span !== null ? tryParse(span) : { ok: false };
    if (!parsed.ok) throw new ModelResponseError(ErrorMessage.InvalidJsonReply, content);
  }

  if (!isResultsObject(parsed.value)) {
    throw new ModelResponseError(ErrorMessage.UnexpectedReplyShape, JSON.stringify(parsed.value));
  }
  return parsed.value;
}

/**
 * Expect a JSON array, tolerating `{ "results": [...] }`. Fallbacks, in
 * order: the `[`…`]` span, then the `{`…`}` span when it carries `results`.
 */
export function parseResultsArray(content: string): unknown[] {
  let value: unknown;
  const strict = tryParse(content);

  if (strict.ok) {
    value = strict.value;
  } else {
    const arraySpan = sliceBetween(content, '[', ']');
    if (arraySpan !== null) {
      const parsed = tryParse(arraySpan);
      if (!parsed.ok) throw new ModelResponseError(ErrorMessage.InvalidJsonReply, content);
      value = parsed.value;
    } else {
      const objectSpan = sliceBetween(content, '{', '}');
      const parsed = objectSpan !== null ? tryParse(objectSpan) : { ok: false as const };
      if (!parsed.ok || !isRecord(parsed.value) || !('results' in parsed.value)) {
        throw new ModelResponseError(ErrorMessage.InvalidJsonReply, content);
      }
      value = parsed.value.results;
    }
  }

  if (isRecord(value) && 'results' in value) value = value.results;
  if (!Array.isArray(value)) {
    throw new ModelResponseError(`Expected JSON array, got: ${typeName(value)}`, content);
  }
  return value;
}
