import { z } from 'zod';

/** Named error identifiers for custom error classes. */
export const enum ErrorName {
  Config = 'ConfigError',
  InputValidation = 'InputValidationError',
  ModelResponse = 'ModelResponseError',
  LLMRequest = 'LLMRequestError',
  Usage = 'UsageError',
}

/** Reusable error messages for input and response validation. */
export const enum ErrorMessage {
  InputNotArray = 'input JSON must be an array of {id, description} items',
  MissingApiKey = 'LLM_API_KEY (or NCHC_API_KEY) is required',
  InvalidJsonReply = 'model reply is not valid JSON',
  UnexpectedReplyShape = 'model reply JSON does not match the expected shape',
}

/** Zod schema for the LLM provider, defaulting to openai. */
export const ProviderSchema = z.enum(['openai', 'anthropic']).default('openai');
export type Provider = z.infer<typeof ProviderSchema>;

/** OpenAI-compatible endpoint base; the client posts to `<base>/chat/completions`. */
export const DEFAULT_BASE_URL = 'https://outer-medusa.genai.nchc.org.tw/v1';
export const DEFAULT_MODEL = 'gpt-oss-120b';

export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_TIMEOUT_MS = 60_000;

/** Total attempts per model call, counting the first. */
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_WAIT_MS = 2_000;

/** Items sent to the model per request. */
export const DEFAULT_BATCH_SIZE = 20;

/** Anthropic's Messages API requires an explicit output cap. */
export const ANTHROPIC_MAX_TOKENS = 4096;

/** Statements generated per input description. */
export const STATEMENTS_PER_ITEM = 4;

/** Upper bound accepted by --limit. */
export const MAX_LIMIT = 100_000;

/** Default hand-off file names between pipeline steps. */
export const FILES = {
  descriptions: 'descriptions.json',
  likelihood: 'likelihood_output.json',
  likelihoodRaw: 'likelihood_raw_responses.jsonl',
  impossible: 'impossible.json',
  possible: 'possible.json',
  statements: 'true_false_output.json',
  statementsRaw: 'true_false_raw_responses.jsonl',
  ragResults: 'rag_conflict_results.jsonl',
} as const;
