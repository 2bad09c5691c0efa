/**
 * SnapshotStore — append-only JSONL history of metrics snapshots per project type.
 *
 * `{dataDir}/snapshots/{type}.jsonl`; the last line is the current snapshot,
 * earlier lines are superseded ones.
 */
import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { HubError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import type { MetricsSnapshot } from "../metrics/types.ts";

const logger = getLogger("snapshot_store");

const count = z.number().int().nonnegative();

export const MetricsSnapshotSchema = z.object({
  projectType: z.string().nullable(),
  takenAt: z.string(),
  totalProjects: count,
  activeProjects: count,
  totalRevenue: z.number().nonnegative(),
  revenueProjects: count,
  totalUsers: count,
  totalTasks: count,
  statusDistribution: z.object({
    planning: count,
    development: count,
    production: count,
    paused: count,
    archived: count,
  }),
  agentWorkload: z.record(z.string(), count),
  taskPriorityDistribution: z.object({
    low: count,
    medium: count,
    high: count,
    critical: count,
  }),
  taskStatusDistribution: z.object({
    pending: count,
    "in-progress": count,
    done: count,
    blocked: count,
  }),
  completionRate: z.number(),
  revenuePerUser: z.number(),
});

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileSnapshotStore {
  readonly dir: string;

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, "snapshots");
  }

  private fileFor(projectType: string): string {
    return path.join(this.dir, `${encodeURIComponent(projectType)}.jsonl`);
  }

  /** Append a per-type snapshot; it becomes the latest for its type. */
  async append(snapshot: MetricsSnapshot): Promise<void> {
    if (snapshot.projectType === null) {
      throw new HubError("Only per-type snapshots are retained for pattern detection");
    }
    await mkdir(this.dir, { recursive: true });
    await appendFile(this.fileFor(snapshot.projectType), JSON.stringify(snapshot) + "\n", "utf-8");
    logger.debug({ projectType: snapshot.projectType, takenAt: snapshot.takenAt }, "snapshot_appended");
  }

  /** Most recent snapshot for a type, or null if none was stored. */
  async latest(projectType: string): Promise<MetricsSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.fileFor(projectType), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    const lines = content.trim().split("\n").filter(Boolean);
    const last = lines[lines.length - 1];
    if (last === undefined) return null;
    return Object.freeze(MetricsSnapshotSchema.parse(JSON.parse(last)));
  }
}
