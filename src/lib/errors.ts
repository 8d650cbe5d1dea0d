import { ErrorName } from './constants.js';

/** Invalid or missing environment configuration. */
export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = ErrorName.Config;
  }
}

/** Input file is not the list of items the script expects. */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = ErrorName.InputValidation;
  }
}

/**
 * The model answered, but the reply is not the JSON we asked for.
 * `content` keeps the raw text so it can be inspected after the run.
 */
export class ModelResponseError extends Error {
  constructor(message: string, public readonly content: string) {
    super(`${message}, raw content:\n${content}`);
    this.name = ErrorName.ModelResponse;
  }
}

/** Transport or HTTP failure talking to the LLM endpoint. */
export class LLMRequestError extends Error {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(status !== undefined ? `${message} (HTTP ${status})` : message, options);
    this.name = ErrorName.LLMRequest;
  }
}

/** Bad command-line flags; reported without a stack trace. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = ErrorName.Usage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
