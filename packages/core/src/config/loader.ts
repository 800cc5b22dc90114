import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@helmsman/shared";
import { errorMessage } from "../errors/index.js";
import { type Config, ConfigSchema, type PartialConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Where the project file search starts (default: process.cwd()) */
  cwd?: string;
  /** Highest priority */
  overrides?: PartialConfig;
  skipEnv?: boolean;
  skipProjectFile?: boolean;
  /** Default: ~/.config/helmsman/config.toml */
  globalConfigPath?: string;
  /** Default: process.env */
  env?: NodeJS.ProcessEnv;
}

// ============================================
// findProjectConfig
// ============================================

const CONFIG_FILE_NAMES = ["helmsman.toml", ".helmsman.toml", ".config/helmsman.toml"];

/**
 * Find the nearest project config file, searching from `startDir` up to the
 * filesystem root.
 *
 * @example
 * ```typescript
 * const configPath = findProjectConfig("/work/project/src");
 * // "/work/project/helmsman.toml"
 * ```
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
// parseEnvConfig
// ============================================

type EnvValueKind = "string" | "number";

const ENV_MAPPINGS: Readonly<Record<string, { path: readonly string[]; kind: EnvValueKind }>> = {
  HELMSMAN_LOG_LEVEL: { path: ["logLevel"], kind: "string" },
  HELMSMAN_LOG_FORMAT: { path: ["logFormat"], kind: "string" },
  HELMSMAN_WORKING_DIR: { path: ["workingDir"], kind: "string" },
  HELMSMAN_PERMISSION_MODE: { path: ["permissions", "mode"], kind: "string" },
  HELMSMAN_MAX_TURNS: { path: ["permissions", "maxTurns"], kind: "number" },
  HELMSMAN_MAX_COST_USD: { path: ["permissions", "maxCostUsd"], kind: "number" },
};

const UNLIMITED_VALUES = new Set(["none", "null", "unlimited"]);

/**
 * Numbers parse; "none", "null" and "unlimited" clear the limit. Anything
 * else stays a string so validation reports it.
 */
function coerceValue(value: string, kind: EnvValueKind): unknown {
  if (kind === "string") {
    return value;
  }
  if (UNLIMITED_VALUES.has(value.trim().toLowerCase())) {
    return null;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function setNestedValue(target: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  target[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Read `HELMSMAN_*` variables into a partial config.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ HELMSMAN_MAX_TURNS: "10", HELMSMAN_PERMISSION_MODE: "readOnly" });
 * // { permissions: { maxTurns: 10, mode: "readOnly" } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [name, mapping] of Object.entries(ENV_MAPPINGS)) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      setNestedValue(result, mapping.path, coerceValue(value, mapping.kind));
    }
  }

  return result;
}

// ============================================
// deepMerge
// ============================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

/**
 * Merge objects left to right. Nested objects merge, arrays and other values
 * are replaced, `undefined` never overwrites.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: readonly object[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    if (!isPlainObject(source)) continue;

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
    }
  }

  return result;
}

// ============================================
// loadConfig
// ============================================

export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), ".config", "helmsman", "config.toml");
}

function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  if (!fs.existsSync(filePath)) {
    return Err({ code: "FILE_NOT_FOUND", message: `Config file not found: ${filePath}`, path: filePath });
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML in ${filePath}: ${errorMessage(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration from every source. Later sources win:
 *
 * 1. Schema defaults
 * 2. Global file (~/.config/helmsman/config.toml)
 * 3. Nearest project file ({@link findProjectConfig})
 * 4. `HELMSMAN_*` environment variables
 * 5. `overrides`
 *
 * A missing file is skipped. A file that cannot be read or parsed, or a
 * merged result that fails validation, is an error.
 *
 * @example
 * ```typescript
 * const result = loadConfig({ cwd: "/work/project" });
 * if (result.ok) {
 *   const policy = policyFromConfig(result.value);
 * } else {
 *   logger.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false } = options;
  const sources: object[] = [];

  const globalResult = readTomlFile(options.globalConfigPath ?? getGlobalConfigPath());
  if (globalResult.ok) {
    sources.push(globalResult.value);
  } else if (globalResult.error.code !== "FILE_NOT_FOUND") {
    return globalResult;
  }

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      sources.push(projectResult.value);
    }
  }

  if (!skipEnv) {
    sources.push(parseEnvConfig(options.env));
  }

  if (overrides) {
    sources.push(overrides);
  }

  const parsed = ConfigSchema.safeParse(deepMerge(...sources));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return Err({ code: "VALIDATION_ERROR", message: `Invalid configuration: ${issues}`, cause: parsed.error });
  }

  return Ok(parsed.data);
}
