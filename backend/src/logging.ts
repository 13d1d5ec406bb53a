export type Logger = Readonly<{
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}>;

export const DEFAULT_LOG_PREFIX = "[Troupe]";

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createConsoleLogger(prefix: string = DEFAULT_LOG_PREFIX): Logger {
  return {
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${prefix} ${message}`);
    },
    error(message: string): void {
      console.error(`${prefix} ${message}`);
    }
  };
}

// Used where a component is constructed without a logger, mostly in tests.
export const silentLogger: Logger = {
  info(): void {},
  warn(): void {},
  error(): void {}
};
