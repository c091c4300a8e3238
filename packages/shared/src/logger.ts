import pino from 'pino';

export type Logger = pino.Logger;

/** Root logger for a package or process. Pretty-printed outside production and vitest runs. */
export function createLogger(name: string, level = 'info'): Logger {
  const pretty = process.env.NODE_ENV !== 'production' && !process.env.VITEST;
  return pino({
    name,
    level,
    base: { service: 'postcraft' },
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
}

/** Child logger scoped to one module, e.g. `scoped(logger, 'theme-manager')` */
export function scoped(logger: Logger, module: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ module, ...bindings });
}
