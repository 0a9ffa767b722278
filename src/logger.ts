import type { Logger } from './types';

const PREFIX = '[faas]';

function emit(write: (...args: unknown[]) => void) {
  return (message: string, meta?: Record<string, unknown>) => {
    if (meta) write(`${PREFIX} ${message}`, meta);
    else write(`${PREFIX} ${message}`);
  };
}

/**
 * Default sink: the process console.
 */
export const consoleLogger: Logger = {
  debug: emit(console.debug),
  info: emit(console.info),
  warn: emit(console.warn),
  error: emit(console.error)
};
