/**
 * Scoped console logging.
 *
 * Debug lines are only written when `debug` is enabled in the configuration;
 * warnings are always written.
 *
 * @example
 * ```typescript
 * const log = createLogger("union");
 * log.debug("traversal started");   // [setwise:union] traversal started
 * ```
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[setwise:${scope}]`;
  return {
    scope,
    debug(message) {
      if (config.get("debug") === true) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
  };
}
