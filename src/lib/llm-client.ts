/**
 * Chat-completion providers.
 *
 * The default provider speaks the OpenAI chat-completions protocol and works
 * against any compatible endpoint (`LLM_BASE_URL`). SDK-level retries are
 * disabled: callers retry through `callModel`, which also retries replies
 * that fail to parse.
 */

import OpenAI from 'openai';
import type { LLMConfig } from './config.js';
import { ANTHROPIC_MAX_TOKENS } from './constants.js';
import { LLMRequestError, errorMessage } from './errors.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface CompletionResult {
  /** Assistant message text. */
  text: string;
  /** Full response body, persisted verbatim to the raw-response log. */
  raw: unknown;
}

export interface LLMProvider {
  complete(messages: ChatMessage[], options?: { temperature?: number }): Promise<CompletionResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of `choices[0].message.content`. When the body does not have that
 * shape, the whole body is serialized so it can still be parsed or inspected.
 */
export function extractMessageText(raw: unknown): string {
  if (isRecord(raw) && Array.isArray(raw.choices)) {
    const first: unknown = raw.choices[0];
    if (isRecord(first) && isRecord(first.message) && typeof first.message.content === 'string') {
      return first.message.content;
    }
  }
  return JSON.stringify(raw);
}

function statusOf(err: unknown): number | undefined {
  return isRecord(err) && typeof err.status === 'number' ? err.status : undefined;
}

export function createChatCompletionsProvider(config: LLMConfig): LLMProvider {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });

  return {
    async complete(messages, options) {
      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await client.chat.completions.create({
          model: config.model,
          messages: messages.map(m => (m.role === 'system'
            ? { role: 'system' as const, content: m.content }
            : { role: 'user' as const, content: m.content })),
          temperature: options?.temperature ?? config.temperature,
        });
      } catch (err) {
        throw new LLMRequestError(`chat completion failed: ${errorMessage(err)}`, statusOf(err), { cause: err });
      }
      return { text: extractMessageText(response), raw: response };
    },
  };
}

export async function createAnthropicProvider(config: LLMConfig): Promise<LLMProvider> {
  // Loaded on demand: only this provider needs the SDK
  const { default: Anthropic } = await import('@anthropic-ai/sdk');
  const client = new Anthropic({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });

  return {
    async complete(messages, options) {
      const system = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n');
      const user = messages.filter(m => m.role === 'user').map(m => ({ role: 'user' as const, content: m.content }));
      try {
        const response = await client.messages.create({
          model: config.model,
          max_tokens: ANTHROPIC_MAX_TOKENS,
          temperature: options?.temperature ?? config.temperature,
          ...(system ? { system } : {}),
          messages: user,
        });
        const text = response.content
          .map(block => (block.type === 'text' ? block.text : ''))
          .join('');
        return { text, raw: response };
      } catch (err) {
        throw new LLMRequestError(`messages request failed: ${errorMessage(err)}`, statusOf(err), { cause: err });
      }
    },
  };
}

export async function createProvider(config: LLMConfig): Promise<LLMProvider> {
  return config.provider === 'anthropic'
    ? createAnthropicProvider(config)
    : createChatCompletionsProvider(config);
}
