/**
 * @setwise/core - configuration, logging and errors shared by every package.
 */

export { config, defineConfig } from "./config.js";
export type {
  SetwiseConfig,
  EqualityConfig,
  CollisionsConfig,
  DefaultEqualityMode,
} from "./config.js";

export { createLogger } from "./logging.js";
export type { Logger } from "./logging.js";

export { SetwiseError, InvalidArgumentError, ConfigError } from "./errors.js";
export type { InvalidArgumentReason } from "./errors.js";

export {
  requirePresent,
  requireIterable,
  requireFunction,
  requireCount,
  isIterable,
} from "./guards.js";
