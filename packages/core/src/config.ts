/**
 * Configuration
 *
 * Values are resolved on first read by layering, lowest to highest:
 *
 * 1. Built-in defaults
 * 2. The first config file cosmiconfig finds: package.json "setwise" key,
 *    .setwiserc[.json|.yaml|.yml|.js|.cjs], setwise.config.[js|cjs]
 * 3. Environment variables: SETWISE_*
 *
 * `config.set()` merges over the resolved result and so wins over all three
 * until `config.reset()` drops it and the sources are read again.
 *
 * @example
 * ```typescript
 * import { config } from "@setwise/core";
 *
 * config.get("debug")              // → boolean
 * config.get("equality.default")   // → "same-value-zero" | "strict"
 *
 * config.set({ collisions: { threshold: 16 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Which built-in equality backs operators called without an explicit one.
 */
export type DefaultEqualityMode = "same-value-zero" | "strict";

export interface EqualityConfig {
  /** "same-value-zero" treats NaN as equal to itself, "strict" uses === */
  default?: DefaultEqualityMode;
}

export interface CollisionsConfig {
  /** Bucket size past which a HashSet warns about a degenerate hash */
  threshold?: number;
}

export interface SetwiseConfig {
  /** Log sequence traversals through console.log */
  debug?: boolean;
  equality?: EqualityConfig;
  collisions?: CollisionsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigTree = Record<string, unknown>;

const MODULE_NAME = "setwise";
const ENV_PREFIX = "SETWISE_";
const EQUALITY_MODES: readonly string[] = ["same-value-zero", "strict"];

// ============================================================================
// State
// ============================================================================

let resolved: ConfigTree | undefined;
let sourceFile: string | undefined;

// ============================================================================
// Tree helpers
// ============================================================================

function isPlainObject(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function lookup(tree: unknown, path: string): unknown {
  let node = tree;
  for (const segment of path.split(".")) {
    if (!isPlainObject(node)) return undefined;
    node = node[segment];
  }
  return node;
}

function assign(tree: ConfigTree, path: string, value: unknown): void {
  const segments = path.split(".");
  const leaf = segments.pop();
  if (leaf === undefined) return;
  let node = tree;
  for (const segment of segments) {
    const child = node[segment];
    if (isPlainObject(child)) {
      node = child;
    } else {
      const created: ConfigTree = {};
      node[segment] = created;
      node = created;
    }
  }
  node[leaf] = value;
}

/** Right-biased recursive merge; neither input is modified. */
function merge(base: ConfigTree, overlay: ConfigTree): ConfigTree {
  const out: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? merge(current, value) : value;
  }
  return out;
}

// ============================================================================
// Sources
// ============================================================================

function defaults(): ConfigTree {
  return {
    debug: false,
    equality: { default: "same-value-zero" },
    collisions: { threshold: 8 },
  };
}

/**
 * SETWISE_COLLISIONS_THRESHOLD=32 → { collisions: { threshold: 32 } }.
 * "1"/"true" and "0"/"false"/"" are booleans, digit strings are integers.
 */
function parseEnvValue(raw: string): unknown {
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false" || raw === "") return false;
  if (/^\d+$/.test(raw)) return Number.parseInt(raw, 10);
  return raw;
}

function fromEnv(): ConfigTree {
  const tree: ConfigTree = {};
  for (const [name, raw] of Object.entries(process.env)) {
    if (raw === undefined || !name.startsWith(ENV_PREFIX)) continue;
    const path = name.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    assign(tree, path, parseEnvValue(raw));
  }
  return tree;
}

function fromFiles(): ConfigTree {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let found: { filepath: string; config: unknown; isEmpty?: boolean } | null;
  try {
    found = explorer.search();
  } catch (error) {
    throw new ConfigError(`failed to load ${MODULE_NAME} configuration`, error);
  }

  if (found === null || found.isEmpty) return {};
  if (!isPlainObject(found.config)) {
    throw new ConfigError(
      `${found.filepath}: configuration must be an object`,
      new TypeError(`got ${typeof found.config}`)
    );
  }
  sourceFile = found.filepath;
  return found.config;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check the keys the library reads. Custom keys pass through untouched.
 */
function validate(tree: ConfigTree, origin: string): void {
  const fail = (detail: string): never => {
    throw new ConfigError(`${origin}: ${detail}`, new TypeError(detail));
  };

  const debug = lookup(tree, "debug");
  if (typeof debug !== "boolean") {
    fail(`debug must be a boolean, got ${JSON.stringify(debug)}`);
  }

  const mode = lookup(tree, "equality.default");
  if (typeof mode !== "string" || !EQUALITY_MODES.includes(mode)) {
    fail(`equality.default must be "same-value-zero" or "strict", got ${JSON.stringify(mode)}`);
  }

  const threshold = lookup(tree, "collisions.threshold");
  if (typeof threshold !== "number" || !Number.isInteger(threshold) || threshold < 1) {
    fail(`collisions.threshold must be a positive integer, got ${JSON.stringify(threshold)}`);
  }
}

function load(): ConfigTree {
  if (resolved) return resolved;
  const tree = merge(merge(defaults(), fromFiles()), fromEnv());
  validate(tree, sourceFile ?? "configuration");
  resolved = tree;
  return tree;
}

// ============================================================================
// Public API
// ============================================================================

/** Read a value by dot-separated path, e.g. "collisions.threshold". */
function get(path: string): unknown {
  return lookup(load(), path);
}

/**
 * Merge values over the current configuration. Invalid values throw
 * `ConfigError` and leave the configuration unchanged.
 */
function set(values: SetwiseConfig): void {
  const next = merge(load(), values);
  validate(next, "config.set");
  resolved = next;
}

/** True when the value at `path` is truthy. */
function has(path: string): boolean {
  return Boolean(get(path));
}

function getAll(): Readonly<ConfigTree> {
  return load();
}

/** Path of the config file that was loaded, if any. */
function getConfigFilePath(): string | undefined {
  load();
  return sourceFile;
}

/** Drop programmatic overrides and re-read every source on next access. */
function reset(): void {
  resolved = undefined;
  sourceFile = undefined;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Typed identity for `setwise.config.js` files.
 */
export function defineConfig(cfg: SetwiseConfig): SetwiseConfig {
  return cfg;
}
