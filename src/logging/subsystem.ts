/**
 * CareDesk - Subsystem Logger
 *
 * Console logger with a `[caredesk:<subsystem>]` prefix. Plugins receive one
 * through `api.logger`.
 */

export type SubsystemLogger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
};

function formatError(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const prefix = `[caredesk:${subsystem}]`;
  const debugEnabled = process.env.CAREDESK_DEBUG === "1";

  return {
    debug(message) {
      if (debugEnabled) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      console.info(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message, err) {
      if (err === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message}:`, formatError(err));
    },
  };
}
