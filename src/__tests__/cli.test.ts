import { describe, it, expect } from 'vitest';
import { hasFlag, getOption, parseLimit, isDirectRun } from '../lib/cli.js';
import { UsageError } from '../lib/errors.js';

describe('hasFlag', () => {
  it('matches exact flags only', () => {
    expect(hasFlag(['--dry-run'], 'dry-run')).toBe(true);
    expect(hasFlag(['--dry-run=1'], 'dry-run')).toBe(false);
    expect(hasFlag([], 'dry-run')).toBe(false);
  });
});

describe('getOption', () => {
  it('reads space-separated values', () => {
    expect(getOption(['--input', 'a.json'], 'input')).toBe('a.json');
  });

  it('reads inline values', () => {
    expect(getOption(['--input=a=b.json'], 'input')).toBe('a=b.json');
  });

  it('returns undefined when absent', () => {
    expect(getOption(['--output', 'x'], 'input')).toBeUndefined();
  });

  it('throws when the value is missing', () => {
    expect(() => getOption(['--input'], 'input')).toThrow(UsageError);
    expect(() => getOption(['--input', '--dry-run'], 'input')).toThrow('--input requires a value');
  });
});

describe('parseLimit', () => {
  it('defaults to Infinity', () => {
    expect(parseLimit([])).toBe(Infinity);
  });

  it('parses a positive integer', () => {
    expect(parseLimit(['--limit', '10'])).toBe(10);
  });

  it('caps very large limits', () => {
    expect(parseLimit(['--limit', '5000000'])).toBe(100_000);
  });

  it('rejects non-integers and non-positive values', () => {
    expect(() => parseLimit(['--limit', 'abc'])).toThrow('--limit must be a positive integer');
    expect(() => parseLimit(['--limit', '0'])).toThrow(UsageError);
    expect(() => parseLimit(['--limit', '2.5'])).toThrow(UsageError);
  });
});

describe('isDirectRun', () => {
  it('matches the script name with a .ts or .js extension', () => {
    expect(isDirectRun('judge-likelihood', '/repo/scripts/judge-likelihood.ts')).toBe(true);
    expect(isDirectRun('judge-likelihood', '/repo/dist/scripts/judge-likelihood.js')).toBe(true);
  });

  it('does not match other entry points', () => {
    expect(isDirectRun('judge-likelihood', '/repo/node_modules/vitest/vitest.mjs')).toBe(false);
  });
});
