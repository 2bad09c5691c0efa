/** Types for the manifest system — one JSON file per project. */

export const PROJECT_STATUSES = [
  "planning",
  "development",
  "production",
  "paused",
  "archived",
] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

/** Statuses counted as "active" in aggregate reporting. */
export const ACTIVE_STATUSES: ReadonlySet<ProjectStatus> = new Set(["development", "production"]);

export const TASK_PRIORITIES = ["low", "medium", "high", "critical"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const TASK_STATUSES = ["pending", "in-progress", "done", "blocked"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

/** Workload bucket for tasks with no agent; reserved, so no task may name it. */
export const UNASSIGNED_AGENT = "unassigned";

/** Task statuses that count toward an agent's workload. */
export const OPEN_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set(["pending", "in-progress"]);

export interface Task {
  description: string;
  assignedAgent?: string;
  priority: TaskPriority;
  status: TaskStatus;
}

/** Validated, normalized representation of one manifest file. */
export interface Project {
  id: string;
  name: string;
  type: string;
  status: ProjectStatus;
  revenue: number;
  users: number;
  tasks: readonly Task[];
  rawSourcePath: string;
  description?: string;
  lead?: string;
  liveUrl?: string;
  team: readonly string[];
  startDate?: string;
  lastModified?: string;
}

// ── Diagnostics ─────────────────────────────────

export type DiagnosticKind =
  | "ParseError"
  | "SchemaViolation"
  | "MalformedRevenue"
  | "MalformedUsers"
  | "DuplicateId";

/** "error" means the file was rejected; "warning" means a field was degraded. */
export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  kind: DiagnosticKind;
  severity: DiagnosticSeverity;
  file: string;
  message: string;
  projectId?: string;
}

/** A value-level problem found while validating; the store attaches the file. */
export type ValidationWarning = Pick<Diagnostic, "kind" | "message">;
