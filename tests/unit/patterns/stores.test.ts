/**
 * Unit tests for FilePatternStore and FileSnapshotStore.
 */
import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { HubError, PatternError } from "@hub/infra/errors.ts";
import { computeMetrics } from "@hub/metrics/aggregator.ts";
import type { MetricsSnapshot } from "@hub/metrics/types.ts";
import { FilePatternStore } from "@hub/patterns/pattern-store.ts";
import { FileSnapshotStore } from "@hub/patterns/snapshot-store.ts";
import type { Pattern } from "@hub/patterns/types.ts";

let tmpDirs: string[] = [];

function makeTmpDir(): string {
  const dir = mkdtempSync(path.join(tmpdir(), "manifest-hub-patterns-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
});

function makePattern(overrides: Partial<Pattern> = {}): Pattern {
  return {
    id: "pat-1",
    projectType: "SaaS",
    metric: "completionRate",
    previousValue: 0.4,
    currentValue: 0.6,
    improvement: 0.5,
    description: "task completion rate +50%",
    detectedAt: "2025-06-01T00:00:00.000Z",
    confirmedAt: "2025-06-01T00:05:00.000Z",
    ...overrides,
  };
}

function snap(projectType: string | null, overrides: Partial<MetricsSnapshot> = {}): MetricsSnapshot {
  return {
    ...computeMetrics([], { projectType, now: new Date("2025-06-01T00:00:00.000Z") }),
    ...overrides,
  };
}

// ── FilePatternStore ──────────────────────────────────────────

describe("FilePatternStore", () => {
  it("should return nothing before any pattern is saved", async () => {
    const store = new FilePatternStore(makeTmpDir());
    expect(await store.list()).toEqual([]);
  });

  it("should write one file per pattern and read it back", async () => {
    const dataDir = makeTmpDir();
    const store = new FilePatternStore(dataDir);
    const pattern = makePattern();

    await store.save(pattern);

    const file = path.join(dataDir, "patterns", "pat-1.json");
    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual(pattern);
    expect(await store.list()).toEqual([pattern]);
  });

  it("should never overwrite a persisted pattern", async () => {
    const store = new FilePatternStore(makeTmpDir());
    await store.save(makePattern());

    await expect(store.save(makePattern({ description: "changed" }))).rejects.toBeInstanceOf(PatternError);
    expect((await store.list())[0]?.description).toBe("task completion rate +50%");
  });

  it("should filter by type and order by confirmation time", async () => {
    const store = new FilePatternStore(makeTmpDir());
    await store.save(makePattern({ id: "late", confirmedAt: "2025-06-03T00:00:00.000Z" }));
    await store.save(makePattern({ id: "early", confirmedAt: "2025-06-02T00:00:00.000Z" }));
    await store.save(makePattern({ id: "other", projectType: "marketplace" }));

    expect((await store.list("SaaS")).map((p) => p.id)).toEqual(["early", "late"]);
    expect((await store.list("marketplace")).map((p) => p.id)).toEqual(["other"]);
    expect(await store.list()).toHaveLength(3);
  });

  it("should skip files that are not valid patterns", async () => {
    const dataDir = makeTmpDir();
    const store = new FilePatternStore(dataDir);
    await store.save(makePattern());
    writeFileSync(path.join(dataDir, "patterns", "junk.json"), "{ not json", "utf-8");
    writeFileSync(path.join(dataDir, "patterns", "partial.json"), JSON.stringify({ id: "x" }), "utf-8");

    expect((await store.list()).map((p) => p.id)).toEqual(["pat-1"]);
  });
});

// ── FileSnapshotStore ─────────────────────────────────────────

describe("FileSnapshotStore", () => {
  it("should have no latest snapshot for an unseen type", async () => {
    const store = new FileSnapshotStore(makeTmpDir());
    expect(await store.latest("SaaS")).toBeNull();
  });

  it("should return the most recently appended snapshot", async () => {
    const store = new FileSnapshotStore(makeTmpDir());
    await store.append(snap("SaaS", { completionRate: 0.4 }));
    await store.append(snap("SaaS", { completionRate: 0.6 }));
    await store.append(snap("marketplace", { completionRate: 0.1 }));

    const latest = await store.latest("SaaS");
    expect(latest?.completionRate).toBe(0.6);
    expect(latest?.projectType).toBe("SaaS");
    expect(latest && Object.isFrozen(latest)).toBe(true);
    expect((await store.latest("marketplace"))?.completionRate).toBe(0.1);
  });

  it("should keep earlier snapshots as history lines", async () => {
    const dataDir = makeTmpDir();
    const store = new FileSnapshotStore(dataDir);
    await store.append(snap("SaaS"));
    await store.append(snap("SaaS"));

    const content = readFileSync(path.join(dataDir, "snapshots", "SaaS.jsonl"), "utf-8");
    expect(content.trim().split("\n")).toHaveLength(2);
  });

  it("should encode type names into safe file names", async () => {
    const dataDir = makeTmpDir();
    const store = new FileSnapshotStore(dataDir);
    await store.append(snap("food/bots"));

    expect(existsSync(path.join(dataDir, "snapshots", "food%2Fbots.jsonl"))).toBe(true);
    expect((await store.latest("food/bots"))?.projectType).toBe("food/bots");
  });

  it("should treat an empty history file as no snapshot", async () => {
    const dataDir = makeTmpDir();
    mkdirSync(path.join(dataDir, "snapshots"), { recursive: true });
    writeFileSync(path.join(dataDir, "snapshots", "SaaS.jsonl"), "\n", "utf-8");

    expect(await new FileSnapshotStore(dataDir).latest("SaaS")).toBeNull();
  });

  it("should refuse a portfolio-wide snapshot", async () => {
    const store = new FileSnapshotStore(makeTmpDir());
    await expect(store.append(snap(null))).rejects.toBeInstanceOf(HubError);
  });
});
