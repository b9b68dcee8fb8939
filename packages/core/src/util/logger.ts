/**
 * Minimal logging seam. The default implementation writes prefixed lines to
 * the console/stderr; callers embedding the library pass their own.
 */
export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

const PREFIX = '[resource-schema]';

export function createConsoleLogger(options: { debug?: boolean } = {}): Logger {
  const debugEnabled = options.debug === true;
  return {
    debug(message: string): void {
      if (!debugEnabled) return;
      process.stderr.write(`${PREFIX} ${message}\n`);
    },
    warn(message: string): void {
      console.warn(`${PREFIX} warning: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug(): void {},
  warn(): void {},
};
