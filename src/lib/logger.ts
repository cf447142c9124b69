import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  name: 'resume-renderer',
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single render pass.
 */
export function createRenderLogger(
  renderId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ renderId, ...extra });
}

export default logger;

export type { Logger };
