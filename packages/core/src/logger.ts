export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Print debug lines (default: CHUNKVAULT_DEBUG env flag) */
  debug?: boolean;
}

function debugFromEnv(): boolean {
  const flag = process.env.CHUNKVAULT_DEBUG;
  return flag === '1' || flag === 'true';
}

/**
 * Create a console logger whose lines are tagged with `[prefix]`.
 */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? debugFromEnv();
  const tag = `[${prefix}]`;
  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) console.log(tag, ...args);
    },
    info: (...args: unknown[]) => console.log(tag, ...args),
    warn: (...args: unknown[]) => console.warn(tag, ...args),
    error: (...args: unknown[]) => console.error(tag, ...args),
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
