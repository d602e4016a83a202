/**
 * Configuration
 *
 * Centralized configuration for the knowable packages. Values are loaded
 * lazily on first access from (in priority order):
 *
 * 1. Environment variables: KNOWABLE_* (highest priority, for CI overrides)
 * 2. Config files: .knowablerc, .knowablerc.json, knowable.config.js, etc.
 * 3. package.json: "knowable" key
 * 4. Defaults (lowest priority)
 *
 * `config.set()` merges on top of whatever was loaded.
 *
 * @example
 * ```typescript
 * import { config } from "@knowable/core";
 *
 * config.get("debug")              // → boolean
 * config.get("laws.iterations")    // → number
 * config.set({ log: { level: "debug" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogConfig {
  /** Lowest level that is written */
  level?: LogLevel;
}

export interface LawsConfig {
  /** Number of trials per law when checking laws */
  iterations?: number;
}

/**
 * Full configuration schema.
 */
export interface KnowableConfig {
  /** Enable debug mode (lowers the log threshold to "debug") */
  debug?: boolean;
  log?: LogConfig;
  laws?: LawsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "knowable";
const ENV_PREFIX = "KNOWABLE_";

const DEFAULTS: KnowableConfig = {
  debug: false,
  log: { level: "warn" },
  laws: { iterations: 100 },
};

// ============================================================================
// Loading
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files in the working directory.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
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
        `${MODULE_NAME}.config.mjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      if (isRecord(loaded)) return loaded;
      console.warn(`[${MODULE_NAME}] Ignoring non-object config in ${result.filepath}`);
    }
  } catch (error) {
    // A broken config file falls back to defaults, but is always reported
    console.warn(`[${MODULE_NAME}] Failed to load config file:`, error);
  }

  return {};
}

/**
 * Parse an environment variable value into a config value.
 */
export function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 *   KNOWABLE_DEBUG=1               → { debug: true }
 *   KNOWABLE_LOG_LEVEL=debug       → { log: { level: "debug" } }
 *   KNOWABLE_LAWS_ITERATIONS=500   → { laws: { iterations: 500 } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Path Helpers
// ============================================================================

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence). Arrays are replaced.
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function initializeConfig(): void {
  if (configLoaded) return;

  // defaults < file < env
  configStore = deepMerge(deepMerge({ ...DEFAULTS }, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 *
 * The value is returned as `unknown`; callers narrow it.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge configuration values programmatically.
 */
function set(values: KnowableConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return Boolean(get(path));
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Forget everything loaded or set; the next access reloads (mainly for tests).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Identity helper for typed `knowable.config.js` files.
 */
export function defineConfig(value: KnowableConfig): KnowableConfig {
  return value;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;
