/**
 * Plain-text rendering of store and metrics output for the CLI.
 */
import path from "node:path";
import type { Diagnostic, Project } from "../manifests/types.ts";
import { OPEN_TASK_STATUSES } from "../manifests/types.ts";
import type { MetricsSnapshot } from "../metrics/types.ts";
import type { PatternProposal } from "../patterns/proposal-fsm.ts";
import type { Pattern } from "../patterns/types.ts";

const money = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" });
const integer = new Intl.NumberFormat("en-US");

export function formatMoney(amount: number): string {
  return money.format(amount);
}

function plural(n: number, word: string): string {
  return `${integer.format(n)} ${word}${n === 1 ? "" : "s"}`;
}

function countLines(counts: Readonly<Record<string, number>>, skipZero: boolean): string[] {
  return Object.entries(counts)
    .filter(([, n]) => !skipZero || n > 0)
    .map(([key, n]) => `  ${key}: ${n}`);
}

/** One summary line per project. */
export function formatProject(project: Project): string {
  const open = project.tasks.filter((t) => OPEN_TASK_STATUSES.has(t.status)).length;
  return (
    `- ${project.name} [${project.id}] ${project.type} | ${project.status} | ` +
    `${formatMoney(project.revenue)} | ${plural(project.users, "user")} | ${plural(open, "open task")}`
  );
}

export interface StatusReportOptions {
  /** Omit the per-project section. */
  summary?: boolean;
}

export function formatStatusReport(
  snapshot: MetricsSnapshot,
  projects: readonly Project[],
  options: StatusReportOptions = {},
): string[] {
  const lines = [
    "Portfolio status",
    `  Projects: ${snapshot.totalProjects} (${snapshot.activeProjects} active)`,
    `  Revenue: ${formatMoney(snapshot.totalRevenue)} across ${plural(snapshot.revenueProjects, "project")}`,
    `  Users: ${integer.format(snapshot.totalUsers)}`,
    "Status distribution",
    ...countLines(snapshot.statusDistribution, true),
    "Agent workload (open tasks)",
    ...countLines(snapshot.agentWorkload, false),
    "Task priorities",
    ...countLines(snapshot.taskPriorityDistribution, false),
  ];

  if (!options.summary) {
    lines.push("Projects");
    if (projects.length === 0) {
      lines.push("  (none)");
    }
    lines.push(...projects.map(formatProject));
  }
  return lines;
}

export function formatDiagnostic(d: Diagnostic): string {
  const level = d.severity === "error" ? "ERROR" : "WARN";
  return `${level} ${d.kind} ${path.basename(d.file)}: ${d.message}`;
}

/** Rejections first, then warnings; each group by file name. */
export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  const rank = (d: Diagnostic): number => (d.severity === "error" ? 0 : 1);
  return [...diagnostics]
    .sort((a, b) => rank(a) - rank(b) || path.basename(a.file).localeCompare(path.basename(b.file)))
    .map(formatDiagnostic);
}

export function formatProposal(proposal: PatternProposal): string {
  const { projectType, description, previousValue, currentValue } = proposal.candidate;
  return `[${projectType}] ${description} (${previousValue} -> ${currentValue})`;
}

export function formatPattern(pattern: Pattern): string {
  return `${pattern.confirmedAt.slice(0, 10)} [${pattern.projectType}] ${pattern.description}`;
}
