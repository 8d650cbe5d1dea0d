import { describe, it, expect, vi } from 'vitest';
import { callModel } from '../lib/model-call.js';
import { parseResultsObject } from '../lib/json-extract.js';
import { ModelResponseError } from '../lib/errors.js';
import type { ChatMessage, LLMProvider } from '../lib/llm-client.js';

function createScriptedLLM(replies: Array<string | Error>): LLMProvider & { calls: ChatMessage[][] } {
  const calls: ChatMessage[][] = [];
  let i = 0;
  return {
    calls,
    async complete(messages) {
      calls.push(messages);
      const reply = replies[Math.min(i++, replies.length - 1)];
      if (reply instanceof Error) throw reply;
      return { text: reply, raw: { choices: [{ message: { content: reply } }] } };
    },
  };
}

const MESSAGES: ChatMessage[] = [
  { role: 'system', content: 'sys' },
  { role: 'user', content: 'user' },
];

describe('callModel', () => {
  it('returns parsed value, raw body and text', async () => {
    const llm = createScriptedLLM(['{"results":[]}']);
    const result = await callModel(llm, MESSAGES, parseResultsObject, { label: 't', attempts: 3, waitMs: 0 });

    expect(result.parsed).toEqual({ results: [] });
    expect(result.text).toBe('{"results":[]}');
    expect(result.raw).toEqual({ choices: [{ message: { content: '{"results":[]}' } }] });
    expect(llm.calls).toEqual([MESSAGES]);
  });

  it('retries a reply that fails to parse', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const llm = createScriptedLLM(['not json', '{"results":[{"id":"1"}]}']);
    const result = await callModel(llm, MESSAGES, parseResultsObject, { label: 't', attempts: 3, waitMs: 2000, sleep });

    expect(result.parsed).toEqual({ results: [{ id: '1' }] });
    expect(llm.calls).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('retries transport errors', async () => {
    const llm = createScriptedLLM([new Error('socket hang up'), '{"results":[]}']);
    const result = await callModel(llm, MESSAGES, parseResultsObject, {
      label: 't', attempts: 2, waitMs: 0, sleep: async () => {},
    });
    expect(result.parsed).toEqual({ results: [] });
  });

  it('surfaces the last parse error once attempts run out', async () => {
    const llm = createScriptedLLM(['still not json']);
    await expect(callModel(llm, MESSAGES, parseResultsObject, {
      label: 't', attempts: 3, waitMs: 0, sleep: async () => {},
    })).rejects.toBeInstanceOf(ModelResponseError);
    expect(llm.calls).toHaveLength(3);
  });

  it('passes the temperature to the provider', async () => {
    const complete = vi.fn(async (_messages: ChatMessage[], _options?: { temperature?: number }) => ({ text: '{"results":[]}', raw: {} }));
    await callModel({ complete }, MESSAGES, parseResultsObject, { label: 't', attempts: 1, waitMs: 0, temperature: 0.2 });
    expect(complete).toHaveBeenCalledWith(MESSAGES, { temperature: 0.2 });
  });
});
