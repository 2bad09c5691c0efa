/** Types for aggregate metrics snapshots. */
import type { ProjectStatus, TaskPriority, TaskStatus } from "../manifests/types.ts";

export { UNASSIGNED_AGENT } from "../manifests/types.ts";

/** Metrics a pattern can be detected on. */
export const TRACKED_METRICS = ["completionRate", "revenuePerUser", "totalRevenue"] as const;
export type TrackedMetric = (typeof TRACKED_METRICS)[number];

/** Immutable result of one aggregation run. */
export interface MetricsSnapshot {
  /** Project type the snapshot covers; null for the whole portfolio. */
  readonly projectType: string | null;
  readonly takenAt: string;
  readonly totalProjects: number;
  readonly activeProjects: number;
  readonly totalRevenue: number;
  readonly revenueProjects: number;
  readonly totalUsers: number;
  readonly totalTasks: number;
  readonly statusDistribution: Readonly<Record<ProjectStatus, number>>;
  readonly agentWorkload: Readonly<Record<string, number>>;
  readonly taskPriorityDistribution: Readonly<Record<TaskPriority, number>>;
  readonly taskStatusDistribution: Readonly<Record<TaskStatus, number>>;
  readonly completionRate: number;
  readonly revenuePerUser: number;
}
