import { getContractConfig } from "./config.js";

export interface Logger {
  /** Printed only when the `debug` setting is on */
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

/**
 * Console logger with a `[covenant/<scope>]` prefix. The debug check reads
 * the configuration on every call so that settings changed at runtime
 * take effect.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[covenant/${scope}]`;
  return {
    debug(message, ...details) {
      if (getContractConfig().debug) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
