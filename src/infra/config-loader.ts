/**
 * ConfigLoader — Load configuration from YAML files with env var support.
 *
 * Features:
 * - Load from config.yml (base) + config.local.yml (override)
 * - Support ${ENV_VAR} interpolation in strings
 * - Environment variables override all file configs
 * - Fallback to env-only mode if no config file found
 * - Custom config path via MANIFEST_HUB_CONFIG env var
 */
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { ZodError } from "zod";
import { ConfigError, errorToString } from "./errors.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type Env = Record<string, string | undefined>;
type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function interpolateString(input: string, env: Env): string | undefined {
  const out = input.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
    // Bash-style operators: :- := :? :+
    const operatorMatch = content.match(/^([^:]+)(:-|:=|:\?|:\+)(.*)$/);

    if (operatorMatch) {
      const [, varName = "", operator, value = ""] = operatorMatch;
      const envValue = env[varName];
      const isEmpty = !envValue;

      switch (operator) {
        case ":-":
          return isEmpty ? value : envValue;

        case ":=":
          if (isEmpty) {
            env[varName] = value;
            return value;
          }
          return envValue;

        case ":?":
          if (isEmpty) {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${value || "missing value"}`,
            );
          }
          return envValue;

        case ":+":
          return isEmpty ? "" : value;

        default:
          return envValue ?? "";
      }
    }

    return env[content] ?? "";
  });
  return out || undefined; // Empty string becomes undefined
}

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 * Supports ${VAR:-default}, ${VAR:=default}, ${VAR:?error} and ${VAR:+alternate}.
 */
export function interpolateEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === "string") {
    return interpolateString(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: ConfigRecord = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return obj;
}

/** Load and parse a config file (JSON or YAML), returning the raw structure. */
function loadConfigFile(filePath: string, env: Env): ConfigRecord {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, "utf-8");
    const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${filePath}: ${errorToString(err)}`);
  }

  if (parsed === undefined || parsed === null) return {};
  const interpolated = interpolateEnvVars(parsed, env);
  if (!isRecord(interpolated)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return interpolated;
}

/** Deep merge two records, with source overriding target. Arrays are replaced. */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function pickSingle(dir: string, names: string[], label: string): string | null {
  const found = names.map((n) => path.join(dir, n)).filter((p) => existsSync(p));
  if (found.length > 1) {
    throw new ConfigError(
      `Multiple ${label} config files found: ${found.map((p) => path.basename(p)).join(", ")}. ` +
        `Please keep only one (${names.join(" or ")}).`,
    );
  }
  return found[0] ?? null;
}

/**
 * Find and load config files with layered merging.
 * Priority: config.local.yml/yaml overrides config.yml/yaml.
 */
function findAndMergeConfigs(cwd: string, env: Env): ConfigRecord | null {
  const customPath = env["MANIFEST_HUB_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`Config file not found: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath, env);
  }

  const basePath = pickSingle(cwd, ["config.yaml", "config.yml"], "base");
  const localPath = pickSingle(cwd, ["config.local.yaml", "config.local.yml"], "local");

  let merged: ConfigRecord | null = null;
  if (basePath) {
    logger.info({ path: basePath }, "loading_base_config");
    merged = loadConfigFile(basePath, env);
  }
  if (localPath) {
    logger.info({ path: localPath }, "loading_local_config_override");
    const local = loadConfigFile(localPath, env);
    merged = merged ? deepMerge(merged, local) : local;
  }
  return merged;
}

/** Environment overrides, laid over whatever the files produced. */
function envOverrides(env: Env): ConfigRecord {
  return {
    manifestsDir: env["MANIFEST_HUB_MANIFESTS_DIR"],
    dataDir: env["MANIFEST_HUB_DATA_DIR"],
    projectTypes: env["MANIFEST_HUB_PROJECT_TYPES"],
    patterns: {
      threshold: env["MANIFEST_HUB_PATTERN_THRESHOLD"],
      metrics: env["MANIFEST_HUB_PATTERN_METRICS"],
    },
    logLevel: env["MANIFEST_HUB_LOG_LEVEL"],
    logFormat: env["MANIFEST_HUB_LOG_FORMAT"],
    logConsoleEnabled: env["MANIFEST_HUB_LOG_CONSOLE_ENABLED"],
    nodeEnv: env["NODE_ENV"],
  };
}

function parseSettings(raw: ConfigRecord): Settings {
  try {
    return SettingsSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ConfigError(`Invalid configuration — ${detail}`);
    }
    throw err;
  }
}

/**
 * Load settings from config files and env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. config.local.yml/yaml
 * 3. config.yml/yaml
 * 4. Schema defaults
 */
export function loadSettings(cwd: string = process.cwd(), env: Env = process.env): Settings {
  const fileConfig = findAndMergeConfigs(cwd, env);
  if (!fileConfig) {
    logger.info("loading_config_from_env");
  }
  return parseSettings(deepMerge(fileConfig ?? {}, envOverrides(env)));
}
