export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

/** Console-backed logger; every line carries a `[prefix]` tag. */
export function createLogger(
  prefix: string,
  options: { level?: LogLevel } = {},
): Logger {
  const min = LEVEL_ORDER[options.level ?? parseLevel(process.env.LOG_LEVEL)];
  const tag = `[${prefix}]`;
  return {
    debug: (msg) => { if (min <= LEVEL_ORDER.debug) console.log(`${tag} [debug] ${msg}`); },
    info: (msg) => { if (min <= LEVEL_ORDER.info) console.log(`${tag} ${msg}`); },
    warn: (msg) => { if (min <= LEVEL_ORDER.warn) console.warn(`${tag} [warn] ${msg}`); },
    error: (msg) => console.error(`${tag} [error] ${msg}`),
  };
}

/** Discards everything; used by tests and library callers that pass no logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function plural(count: number, singular: string, suffix = 's'): string {
  return `${count} ${singular}${count !== 1 ? suffix : ''}`;
}
