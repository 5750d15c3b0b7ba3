import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, ErrorCode, Ok, type Result } from "@mdlive/shared";
import type { ZodError } from "zod";
import { ConfigError } from "../errors/index.js";
import { CONFIG_FILE_NAMES } from "./defaults.js";
import {
  type PartialServerConfig,
  PartialServerConfigSchema,
  type ServerConfig,
  ServerConfigSchema,
} from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Working directory to search for config files and resolve paths (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority), typically from CLI flags */
  overrides?: PartialServerConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Environment to read MDLIVE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Find a project configuration file by searching up from startDir to the filesystem root.
 *
 * @returns Path to the first config file found, or undefined
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

// ============================================
// Environment
// ============================================

/**
 * A loosely-typed configuration layer; only the merged result is validated.
 */
export type ConfigLayer = Record<string, unknown>;

type EnvParser = (value: string) => ConfigLayer;

/**
 * Environment variable to config field mappings
 */
const ENV_MAPPINGS: Record<string, EnvParser> = {
  MDLIVE_HOST: (value) => ({ host: value }),
  MDLIVE_PORT: (value) => ({ port: Number(value) }),
  MDLIVE_THEME: (value) => ({ theme: value }),
  MDLIVE_LOG_LEVEL: (value) => ({ logLevel: value.toLowerCase() }),
  MDLIVE_DEBOUNCE_MS: (value) => ({ debounceMs: Number(value) }),
  MDLIVE_NO_RELOAD: (value) => ({ reloadEnabled: !(value === "1" || value === "true") }),
};

/**
 * Parse MDLIVE_* environment variables into a config layer.
 * Values are coerced but not validated; `loadConfig` reports invalid ones.
 *
 * @example
 * ```typescript
 * // With MDLIVE_PORT=9000 set:
 * parseEnvConfig(); // { port: 9000 }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  let result: ConfigLayer = {};

  for (const [name, parse] of Object.entries(ENV_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      result = { ...result, ...parse(value) };
    }
  }

  return result;
}

// ============================================
// Merging
// ============================================

/**
 * Shallow merge of flat config layers. Later layers win; undefined never overwrites.
 */
export function mergeConfigLayers(...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = {};

  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

function snakeToCamel(key: string): string {
  return key.replace(/_([a-z])/g, (_, char: string) => char.toUpperCase());
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read a TOML config file. Keys may be written in snake_case (`debounce_ms`) or camelCase.
 * A relative `serve_path` is resolved against the file's directory.
 */
export function readConfigFile(filePath: string): Result<PartialServerConfig, ConfigError> {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    return Err(
      new ConfigError(`Failed to parse ${filePath}`, ErrorCode.CONFIG_PARSE_ERROR, {
        cause: error,
        context: { path: filePath },
      })
    );
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    normalized[snakeToCamel(key)] = value;
  }

  const validated = PartialServerConfigSchema.strict().safeParse(normalized);
  if (!validated.success) {
    return Err(
      new ConfigError(`Invalid config in ${filePath}: ${formatZodError(validated.error)}`, ErrorCode.CONFIG_INVALID, {
        context: { path: filePath },
      })
    );
  }

  const layer: PartialServerConfig = { ...validated.data };
  if (layer.servePath !== undefined) {
    layer.servePath = path.resolve(path.dirname(filePath), layer.servePath);
  }

  return Ok(layer);
}

// ============================================
// loadConfig
// ============================================

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Project config: mdlive.toml / .mdlive.toml found by findProjectConfig()
 * 3. Environment variables (unless skipEnv)
 * 4. Overrides (options.overrides)
 *
 * The resulting `servePath` is absolute and exists.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { servePath: "docs", port: 9000 } });
 * if (result.ok) {
 *   console.log(result.value.servePath);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<ServerConfig, ConfigError> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const layers: ConfigLayer[] = [];

  if (!options.skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const fileResult = readConfigFile(projectPath);
      if (!fileResult.ok) {
        return fileResult;
      }
      layers.push(fileResult.value);
    }
  }

  if (!options.skipEnv) {
    layers.push(parseEnvConfig(options.env));
  }

  if (options.overrides) {
    layers.push(options.overrides);
  }

  const merged = mergeConfigLayers({ servePath: "." }, ...layers);
  const validated = ServerConfigSchema.safeParse(merged);

  if (!validated.success) {
    return Err(new ConfigError(`Invalid configuration: ${formatZodError(validated.error)}`, ErrorCode.CONFIG_INVALID));
  }

  const servePath = path.resolve(cwd, validated.data.servePath);
  if (!fs.existsSync(servePath)) {
    return Err(
      new ConfigError(`Path does not exist: ${validated.data.servePath}`, ErrorCode.CONFIG_NOT_FOUND, {
        context: { servePath },
      })
    );
  }

  return Ok(Object.freeze({ ...validated.data, servePath }));
}
