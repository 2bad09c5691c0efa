/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";
import { TRACKED_METRICS } from "../metrics/types.ts";

/**
 * Preprocess list values coming from env var interpolation.
 * YAML ${VAR:-[]} produces the string "[]", and env overrides are comma lists.
 */
function coerceStringList(val: unknown): unknown {
  if (typeof val === "string") {
    const trimmed = val.trim();
    if (trimmed === "[]" || trimmed === "") return [];
    if (trimmed.startsWith("[")) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (Array.isArray(parsed)) return parsed;
      } catch {
        // Not valid JSON, fall through to comma splitting
      }
    }
    return trimmed.split(",").map((s) => s.trim()).filter(Boolean);
  }
  return val;
}

export const PatternsConfigSchema = z.object({
  // Fractional improvement that makes a pattern candidate (0.25 = +25%)
  threshold: z.coerce.number().positive().max(10).default(0.25),
  metrics: z.preprocess(
    coerceStringList,
    z.array(z.enum(TRACKED_METRICS)).min(1).default([...TRACKED_METRICS]),
  ),
});

export const SettingsSchema = z.object({
  manifestsDir: z.string().min(1).default("data/projects"),
  dataDir: z.string().min(1).default("data"),
  // Allow-list of project types. Absent means any non-empty type is accepted.
  projectTypes: z.preprocess(coerceStringList, z.array(z.string().min(1)).optional()),
  patterns: PatternsConfigSchema.default({}),
  logLevel: z.string().default("info"),
  logFormat: z.enum(["json", "line"]).default("json"),
  logConsoleEnabled: z.preprocess(
    (val) => {
      if (typeof val === "string") {
        if (val === "true") return true;
        if (val === "false" || val === "") return false;
      }
      return val;
    },
    z.boolean().default(false),
  ),
  nodeEnv: z.string().default("development"), // development | production | test
});

export type PatternsConfig = z.infer<typeof PatternsConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
