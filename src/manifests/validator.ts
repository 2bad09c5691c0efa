/**
 * ManifestValidator — the boundary between untyped manifest JSON and Project.
 *
 * Rejections (missing/invalid name, type, status) throw SchemaViolation.
 * Everything below the header degrades instead: a bad task is dropped, a bad
 * revenue or user count becomes 0, and each is reported as a warning.
 */
import path from "node:path";
import { SchemaViolation } from "../infra/errors.ts";
import { parseRevenue } from "./revenue.ts";
import { ManifestHeaderSchema, TaskRecordSchema, firstIssue } from "./schema.ts";
import type { Project, Task, TaskStatus, ValidationWarning } from "./types.ts";

export interface ValidatorOptions {
  /** Path of the manifest file; also the fallback id source. */
  sourcePath: string;
  /** Allowed project types. Absent means any non-empty type is accepted. */
  typeAllowList?: readonly string[];
  /** ISO timestamp of the file's last modification. */
  lastModified?: string;
}

export interface ValidationResult {
  project: Project;
  warnings: ValidationWarning[];
}

type ManifestRecord = Record<string, unknown>;

interface TaskEntry {
  label: string;
  record: unknown;
  defaultStatus: TaskStatus;
}

function isRecord(value: unknown): value is ManifestRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First defined value among keys; nested keys use "parent.child". */
function pick(record: ManifestRecord, ...keys: string[]): unknown {
  for (const key of keys) {
    const [head = "", child] = key.split(".");
    let value = record[head];
    if (child !== undefined) {
      value = isRecord(value) ? value[child] : undefined;
    }
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function optionalText(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/** Manifest file name without its extension. */
export function idFromPath(sourcePath: string): string {
  return path.basename(sourcePath, path.extname(sourcePath));
}

function resolveId(record: ManifestRecord, sourcePath: string): string {
  const explicit = record["id"];
  if (typeof explicit === "number" && Number.isFinite(explicit)) return String(explicit);
  return optionalText(explicit) ?? idFromPath(sourcePath);
}

function resolveType(type: string, allowList: readonly string[] | undefined): string {
  if (!allowList) return type;
  const match = allowList.find((allowed) => allowed.toLowerCase() === type.toLowerCase());
  if (!match) {
    throw new SchemaViolation(`invalid type: ${type}`, "type");
  }
  return match;
}

/**
 * Coerce a user count to a nonnegative integer.
 * Strings may carry thousands separators ("1,200").
 */
export function coerceUserCount(raw: unknown): { value: number; warning?: string } {
  if (raw === undefined || raw === null || raw === "") return { value: 0 };

  let n: number;
  if (typeof raw === "number") {
    n = raw;
  } else if (typeof raw === "string") {
    const cleaned = raw.replace(/[,_\s]/g, "");
    n = cleaned === "" ? Number.NaN : Number(cleaned);
  } else {
    return { value: 0, warning: `unsupported users value of type ${typeof raw}` };
  }

  if (!Number.isFinite(n)) {
    return { value: 0, warning: `users is not a number: ${String(raw)}` };
  }
  if (n < 0) {
    return { value: 0, warning: `negative users clamped to 0: ${String(raw)}` };
  }
  if (!Number.isInteger(n)) {
    return { value: Math.trunc(n), warning: `fractional users truncated: ${String(raw)}` };
  }
  return { value: n };
}

/**
 * Collect task records. Accepts a plain list, or an object with
 * `active` and `completed` lists (completed tasks default to "done").
 */
function collectTasks(raw: unknown, warnings: ValidationWarning[]): TaskEntry[] {
  if (raw === undefined || raw === null) return [];

  if (Array.isArray(raw)) {
    return raw.map((record, i) => ({ label: `tasks[${i}]`, record, defaultStatus: "pending" }));
  }

  if (isRecord(raw)) {
    const entries: TaskEntry[] = [];
    const groups: Array<[string, TaskStatus]> = [
      ["active", "pending"],
      ["completed", "done"],
    ];
    for (const [group, defaultStatus] of groups) {
      const list = raw[group];
      if (list === undefined || list === null) continue;
      if (!Array.isArray(list)) {
        warnings.push({ kind: "SchemaViolation", message: `tasks.${group} must be a list; ignored` });
        continue;
      }
      list.forEach((record, i) => {
        entries.push({ label: `tasks.${group}[${i}]`, record, defaultStatus });
      });
    }
    return entries;
  }

  warnings.push({ kind: "SchemaViolation", message: "tasks must be a list; ignored" });
  return [];
}

function validateTask(entry: TaskEntry): Task | string {
  if (!isRecord(entry.record)) {
    return `${entry.label}: task must be an object`;
  }
  const record = entry.record;
  const result = TaskRecordSchema.safeParse({
    description: record["description"],
    assignedAgent: pick(record, "assignedAgent", "assignedTo"),
    priority: record["priority"],
    status: record["status"] ?? entry.defaultStatus,
  });
  if (!result.success) {
    return `${entry.label}: ${firstIssue(result.error).message}`;
  }

  const { description, assignedAgent, priority, status } = result.data;
  const task: Task = { description, priority, status };
  if (assignedAgent) task.assignedAgent = assignedAgent;
  return task;
}

/**
 * Validate one parsed manifest and normalize it into a Project.
 * Throws SchemaViolation when the manifest must be rejected.
 */
export function validateManifest(record: unknown, options: ValidatorOptions): ValidationResult {
  if (!isRecord(record)) {
    throw new SchemaViolation("manifest must be a JSON object");
  }

  const header = ManifestHeaderSchema.safeParse({
    name: pick(record, "name", "projectName"),
    type: pick(record, "type", "projectType"),
    status: record["status"],
  });
  if (!header.success) {
    const { field, message } = firstIssue(header.error);
    throw new SchemaViolation(message, field);
  }

  const warnings: ValidationWarning[] = [];
  const type = resolveType(header.data.type, options.typeAllowList);

  const revenue = parseRevenue(pick(record, "revenue", "metrics.revenue"));
  if (revenue.malformed) {
    warnings.push({ kind: "MalformedRevenue", message: revenue.reason ?? "malformed revenue" });
  }

  const users = coerceUserCount(pick(record, "users", "metrics.users"));
  if (users.warning) {
    warnings.push({ kind: "MalformedUsers", message: users.warning });
  }

  const tasks: Task[] = [];
  for (const entry of collectTasks(record["tasks"], warnings)) {
    const outcome = validateTask(entry);
    if (typeof outcome === "string") {
      warnings.push({ kind: "SchemaViolation", message: `${outcome}; task dropped` });
    } else {
      tasks.push(outcome);
    }
  }

  const rawTeam = record["team"];
  const team = Array.isArray(rawTeam)
    ? rawTeam.map(optionalText).filter((m): m is string => m !== undefined)
    : [];

  const project: Project = {
    id: resolveId(record, options.sourcePath),
    name: header.data.name,
    type,
    status: header.data.status,
    revenue: revenue.amount,
    users: users.value,
    tasks,
    rawSourcePath: options.sourcePath,
    team,
  };

  const description = optionalText(record["description"]);
  if (description) project.description = description;
  const lead = optionalText(pick(record, "lead", "leadStrategist"));
  if (lead) project.lead = lead;
  const liveUrl = optionalText(record["liveUrl"]);
  if (liveUrl) project.liveUrl = liveUrl;
  const startDate = optionalText(pick(record, "startDate", "metrics.startDate"));
  if (startDate) project.startDate = startDate;
  if (options.lastModified) project.lastModified = options.lastModified;

  return { project, warnings };
}
