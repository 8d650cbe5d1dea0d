import type { ChatMessage, LLMProvider } from './llm-client.js';
import type { Logger } from './logger.js';
import { withRetry, type Sleep } from './retry.js';

export interface ModelCallOptions {
  label: string;
  attempts: number;
  waitMs: number;
  temperature?: number;
  logger?: Logger;
  sleep?: Sleep;
}

export interface ModelCallResult<T> {
  parsed: T;
  raw: unknown;
  text: string;
}

/**
 * One request/parse cycle under retry: a transport failure and a reply that
 * `parse` rejects both consume an attempt.
 */
export async function callModel<T>(
  provider: LLMProvider,
  messages: ChatMessage[],
  parse: (text: string) => T,
  options: ModelCallOptions,
): Promise<ModelCallResult<T>> {
  return withRetry(options.label, async () => {
    const { text, raw } = await provider.complete(messages, { temperature: options.temperature });
    options.logger?.debug(`${options.label} reply: ${text.length} chars`);
    return { parsed: parse(text), raw, text };
  }, {
    attempts: options.attempts,
    waitMs: options.waitMs,
    logger: options.logger,
    sleep: options.sleep,
  });
}
