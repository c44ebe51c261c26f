/**
 * Shared pino logger
 */

import pino, { type Logger } from 'pino';

export type { Logger };

const level = process.env.HTTP_CACHE_POLICY_LOG_LEVEL ?? 'info';

// Pretty printing runs in a worker thread, so it is opt-in
export const logger: Logger =
  process.env.HTTP_CACHE_POLICY_LOG_PRETTY === '1'
    ? pino({
        name: 'http-cache-policy',
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        },
      })
    : pino({ name: 'http-cache-policy', level });

/**
 * Child logger tagged with the component name
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
