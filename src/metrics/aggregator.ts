/**
 * MetricsAggregator — fold a Project set into one immutable MetricsSnapshot.
 *
 * Results never depend on the order projects arrive in: revenue is summed in
 * integer cents over projects sorted by id, and every distribution is a count.
 */
import {
  ACTIVE_STATUSES,
  OPEN_TASK_STATUSES,
  UNASSIGNED_AGENT,
  type Project,
  type ProjectStatus,
  type TaskPriority,
  type TaskStatus,
} from "../manifests/types.ts";
import { toCents } from "../manifests/revenue.ts";
import type { MetricsSnapshot } from "./types.ts";

export interface AggregateOptions {
  /** Label the snapshot with a project type; null (default) for the whole portfolio. */
  projectType?: string | null;
  now?: Date;
}

// fromEntries defines own properties, so an agent id such as "__proto__" stays a key.
function sortedRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Sum revenue in cents, ascending by project id. */
export function sumRevenue(projects: readonly Project[]): number {
  const ordered = [...projects].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  let cents = 0;
  for (const p of ordered) {
    cents += toCents(p.revenue);
  }
  return cents / 100;
}

/** Compute a snapshot over the given projects. */
export function computeMetrics(
  projects: readonly Project[],
  options: AggregateOptions = {},
): MetricsSnapshot {
  const statusDistribution: Record<ProjectStatus, number> = {
    planning: 0,
    development: 0,
    production: 0,
    paused: 0,
    archived: 0,
  };
  const taskPriorityDistribution: Record<TaskPriority, number> = {
    low: 0,
    medium: 0,
    high: 0,
    critical: 0,
  };
  const taskStatusDistribution: Record<TaskStatus, number> = {
    pending: 0,
    "in-progress": 0,
    done: 0,
    blocked: 0,
  };
  const workload = new Map<string, number>([[UNASSIGNED_AGENT, 0]]);

  let activeProjects = 0;
  let revenueProjects = 0;
  let totalUsers = 0;
  let totalTasks = 0;

  for (const project of projects) {
    statusDistribution[project.status] += 1;
    if (ACTIVE_STATUSES.has(project.status)) activeProjects += 1;
    if (project.revenue > 0) revenueProjects += 1;
    totalUsers += project.users;

    for (const task of project.tasks) {
      totalTasks += 1;
      taskPriorityDistribution[task.priority] += 1;
      taskStatusDistribution[task.status] += 1;
      if (OPEN_TASK_STATUSES.has(task.status)) {
        const agent = task.assignedAgent ?? UNASSIGNED_AGENT;
        workload.set(agent, (workload.get(agent) ?? 0) + 1);
      }
    }
  }

  const totalRevenue = sumRevenue(projects);

  return Object.freeze({
    projectType: options.projectType ?? null,
    takenAt: (options.now ?? new Date()).toISOString(),
    totalProjects: projects.length,
    activeProjects,
    totalRevenue,
    revenueProjects,
    totalUsers,
    totalTasks,
    statusDistribution: Object.freeze(statusDistribution),
    agentWorkload: Object.freeze(sortedRecord(workload)),
    taskPriorityDistribution: Object.freeze(taskPriorityDistribution),
    taskStatusDistribution: Object.freeze(taskStatusDistribution),
    completionRate: totalTasks === 0 ? 0 : taskStatusDistribution.done / totalTasks,
    revenuePerUser: totalUsers === 0 ? 0 : toCents(totalRevenue / totalUsers) / 100,
  });
}

/** One snapshot per project type, keyed and ordered by type. */
export function computeMetricsByType(
  projects: readonly Project[],
  options: Pick<AggregateOptions, "now"> = {},
): Map<string, MetricsSnapshot> {
  const groups = new Map<string, Project[]>();
  for (const project of projects) {
    const group = groups.get(project.type);
    if (group) {
      group.push(project);
    } else {
      groups.set(project.type, [project]);
    }
  }

  const now = options.now ?? new Date();
  const out = new Map<string, MetricsSnapshot>();
  for (const type of [...groups.keys()].sort()) {
    out.set(type, computeMetrics(groups.get(type) ?? [], { projectType: type, now }));
  }
  return out;
}
