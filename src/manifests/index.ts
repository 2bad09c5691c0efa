/**
 * Manifest system — discovery, validation and normalization of project manifests.
 */
export { parseRevenue, toCents } from "./revenue.ts";
export type { RevenueParseResult } from "./revenue.ts";
export { validateManifest, coerceUserCount, idFromPath } from "./validator.ts";
export type { ValidatorOptions, ValidationResult } from "./validator.ts";
export { ManifestStore, loadManifestFile, foldOutcomes } from "./store.ts";
export type { ManifestStoreOptions, StoreSnapshot, FileOutcome } from "./store.ts";
export {
  PROJECT_STATUSES,
  TASK_PRIORITIES,
  TASK_STATUSES,
  ACTIVE_STATUSES,
  OPEN_TASK_STATUSES,
} from "./types.ts";
export type {
  Project,
  ProjectStatus,
  Task,
  TaskPriority,
  TaskStatus,
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
} from "./types.ts";
