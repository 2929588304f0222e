export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export type LoggerOptions = {
  debug?: boolean;
};

export function createLogger(prefix: string, opts: LoggerOptions = {}): Logger {
  const tag = `[${prefix}]`;
  return {
    error: (msg, ctx) => console.error(`${tag} ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`${tag} ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`${tag} ${msg}`, ctx || ''),
    debug: (msg, ctx) => {
      if (!opts.debug) return;
      console.debug(`${tag} ${msg}`, ctx || '');
    },
  };
}

export const defaultLogger: Logger = createLogger('Pubmed');
