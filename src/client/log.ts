// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(prefix = "notify-client"): Logger {
  return {
    info(message) {
      console.log(`[${prefix}] ${message}`);
    },
    warn(message) {
      console.warn(`[${prefix}] ${message}`);
    },
    error(message) {
      console.error(`[${prefix}] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
