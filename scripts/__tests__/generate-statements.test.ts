import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  expectedStatementCount,
  countSuffixMismatches,
  callStatementModel,
  generateStatements,
} from '../generate-statements.js';
import { STATEMENT_SYSTEM_PROMPT, STATEMENT_INSTRUCTIONS } from '../../src/lib/prompts.js';
import { parseJsonl } from '../../src/lib/io.js';
import type { ChatMessage, LLMProvider } from '../../src/lib/llm-client.js';
import type { RunSettings } from '../../src/lib/config.js';
import type { DescriptionItem } from '../../src/lib/schemas.js';

// ---------------------------------------------------------------------------
// Test Data Factories
// ---------------------------------------------------------------------------

const SETTINGS: RunSettings = { batchSize: 1, retries: 2, retryWaitMs: 0, temperature: 0.2 };
const noSleep = async () => {};

const GRADES = [
  ['highly_likely', 'Highly likely'],
  ['possible', 'Possible'],
  ['unlikely', 'Unlikely'],
  ['highly_unlikely', 'Highly unlikely'],
] as const;

function makeItems(): DescriptionItem[] {
  return [
    { id: 'e1', description: 'A harbour festival moves to a new pier.' },
    { id: 7, description: 'A bakery opens a second branch.' },
  ];
}

function makeStatement(id: string, suffix: string, label: string) {
  return { id: `${id}_${suffix}`, statement: `Statement ${id} ${suffix}.`, label };
}

function wrap(text: string): unknown {
  return { choices: [{ message: { role: 'assistant', content: text } }] };
}

/** Four graded statements per item, rendered by `render` (default: a bare array). */
function createStatementLLM(
  render: (statements: object[]) => string = s => JSON.stringify(s),
): LLMProvider & { calls: ChatMessage[][] } {
  const calls: ChatMessage[][] = [];
  return {
    calls,
    async complete(messages) {
      calls.push(messages);
      const user = messages.find(m => m.role === 'user')?.content ?? '';
      const items: Array<{ id: string | number }> = JSON.parse(user.slice(user.indexOf('\nInput:\n') + '\nInput:\n'.length));
      const statements = items.flatMap(item =>
        GRADES.map(([suffix, label]) => makeStatement(String(item.id), suffix, label)),
      );
      const text = render(statements);
      return { text, raw: wrap(text) };
    },
  };
}

// ---------------------------------------------------------------------------
// expectedStatementCount / countSuffixMismatches
// ---------------------------------------------------------------------------

describe('expectedStatementCount', () => {
  it('expects four statements per item', () => {
    expect(expectedStatementCount(1)).toBe(4);
    expect(expectedStatementCount(20)).toBe(80);
    expect(expectedStatementCount(0)).toBe(0);
  });
});

describe('countSuffixMismatches', () => {
  it('counts valid statements whose id suffix disagrees with the label', () => {
    const statements = [
      makeStatement('e1', 'highly_likely', 'Highly likely'),
      makeStatement('e1', 'possible', 'Unlikely'),
      makeStatement('e1', 'unlikely', 'Unlikely'),
    ];
    expect(countSuffixMismatches(statements)).toBe(1);
  });

  it('ignores items that are not valid statements', () => {
    expect(countSuffixMismatches([{ id: 'e1_possible' }, 'text', null])).toBe(0);
  });

  it('does not confuse "unlikely" with "highly_unlikely"', () => {
    expect(countSuffixMismatches([makeStatement('e1', 'highly_unlikely', 'Unlikely')])).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// callStatementModel
// ---------------------------------------------------------------------------

describe('callStatementModel', () => {
  it('sends the statement prompt and the batch', async () => {
    const llm = createStatementLLM();
    const batch = makeItems().slice(0, 1);
    await callStatementModel(llm, batch, SETTINGS, { sleep: noSleep });

    expect(llm.calls[0]).toEqual([
      { role: 'system', content: STATEMENT_SYSTEM_PROMPT },
      { role: 'user', content: `${STATEMENT_INSTRUCTIONS}\nInput:\n${JSON.stringify(batch, null, 2)}` },
    ]);
  });

  it('unwraps a {"results": [...]} reply', async () => {
    const llm = createStatementLLM(s => JSON.stringify({ results: s }));
    const { parsed } = await callStatementModel(llm, makeItems().slice(0, 1), SETTINGS, { sleep: noSleep });
    expect(parsed).toHaveLength(4);
    expect(parsed[0]).toEqual(makeStatement('e1', 'highly_likely', 'Highly likely'));
  });

  it('extracts an array from a fenced reply', async () => {
    const llm = createStatementLLM(s => '```json\n' + JSON.stringify(s) + '\n```');
    const { parsed } = await callStatementModel(llm, makeItems().slice(0, 1), SETTINGS, { sleep: noSleep });
    expect(parsed).toHaveLength(4);
  });

  it('retries when the reply is a non-array value', async () => {
    const replies = ['"just a string"', '[]'];
    let i = 0;
    const llm: LLMProvider = {
      complete: async () => {
        const text = replies[i++];
        return { text, raw: wrap(text) };
      },
    };
    const sleep = vi.fn(async (_ms: number) => {});

    const { parsed } = await callStatementModel(llm, makeItems(), SETTINGS, { sleep });
    expect(parsed).toEqual([]);
    expect(i).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// generateStatements
// ---------------------------------------------------------------------------

describe('generateStatements', () => {
  let tmpDir: string;
  let outputPath: string;
  let rawLogPath: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `generate-statements-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tmpDir, { recursive: true });
    outputPath = join(tmpDir, 'true_false_output.json');
    rawLogPath = join(tmpDir, 'true_false_raw_responses.jsonl');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes a flat array of statements across batches', async () => {
    const summary = await generateStatements({
      items: makeItems(), provider: createStatementLLM(), settings: SETTINGS, outputPath, rawLogPath, sleep: noSleep,
    });

    expect(summary).toEqual({ batches: 2, statements: 8, countMismatches: 0, invalid: 0, suffixMismatches: 0 });
    const output = JSON.parse(readFileSync(outputPath, 'utf-8'));
    expect(output.map((s: { id: string }) => s.id)).toEqual([
      'e1_highly_likely', 'e1_possible', 'e1_unlikely', 'e1_highly_unlikely',
      '7_highly_likely', '7_possible', '7_unlikely', '7_highly_unlikely',
    ]);
    expect(parseJsonl(readFileSync(rawLogPath, 'utf-8'))).toHaveLength(2);
  });

  it('warns on a short batch and keeps what was returned', async () => {
    const llm = createStatementLLM(s => JSON.stringify(s.slice(0, 3)));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const summary = await generateStatements({
      items: makeItems().slice(0, 1), provider: llm, settings: SETTINGS, outputPath, rawLogPath, logger, sleep: noSleep,
    });

    expect(summary.statements).toBe(3);
    expect(summary.countMismatches).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('batch 1: got 3 statements, expected 4');
  });
});
