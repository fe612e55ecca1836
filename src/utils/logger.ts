export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export const defaultLogger: Logger = {
  error: (msg, ctx) => console.error(`[ERROR] ${msg}`, ctx || ''),
  warn: (msg, ctx) => console.warn(`[WARN] ${msg}`, ctx || ''),
  info: (msg, ctx) => console.info(`[INFO] ${msg}`, ctx || ''),
};

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
};

/** Forwards warnings and errors only. */
export function withoutInfo(logger: Logger): Logger {
  return {
    error: (msg, ctx) => logger.error(msg, ctx),
    warn: (msg, ctx) => logger.warn(msg, ctx),
    info: () => undefined,
  };
}
