/**
 * Unit tests for ManifestValidator — header rejection and field-level degradation.
 */
import { describe, it, expect } from "vitest";
import { SchemaViolation } from "@hub/infra/errors.ts";
import { coerceUserCount, validateManifest } from "@hub/manifests/validator.ts";

const SOURCE = "/srv/manifests/hugemouth.json";

function validate(record: unknown, typeAllowList?: string[]) {
  return validateManifest(record, { sourcePath: SOURCE, typeAllowList });
}

function violationOf(fn: () => unknown): SchemaViolation {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaViolation) return err;
    throw err;
  }
  throw new Error("expected a SchemaViolation");
}

// ── accepted manifests ──────────────────────────────────────

describe("validateManifest", () => {
  it("should normalize a minimal valid manifest", () => {
    const { project, warnings } = validate({
      name: "HugemouthSEO",
      type: "SaaS",
      status: "Production",
      revenue: "$12,500",
      users: 450,
    });

    expect(warnings).toEqual([]);
    expect(project).toEqual({
      id: "hugemouth",
      name: "HugemouthSEO",
      type: "SaaS",
      status: "production",
      revenue: 12500,
      users: 450,
      tasks: [],
      rawSourcePath: SOURCE,
      team: [],
    });
  });

  it("should prefer an explicit id over the file name", () => {
    expect(validate({ id: "seo-main", name: "A", type: "SaaS", status: "planning" }).project.id).toBe(
      "seo-main",
    );
    expect(validate({ id: 42, name: "A", type: "SaaS", status: "planning" }).project.id).toBe("42");
    expect(validate({ id: "  ", name: "A", type: "SaaS", status: "planning" }).project.id).toBe(
      "hugemouth",
    );
  });

  it("should read the legacy manifest layout", () => {
    const { project, warnings } = validate({
      projectName: "SEOEasy Directory",
      projectType: "marketplace",
      status: "development",
      leadStrategist: "Ops Lead",
      liveUrl: "https://directory.example.com",
      team: ["architect_specialist", 3, " devops_specialist "],
      metrics: { revenue: "$8,500", users: "1,200", startDate: "2024-03-01" },
      tasks: {
        active: [{ description: "Add listings import", assignedTo: "api_integration_master", priority: "high" }],
        completed: [{ description: "Launch landing page" }],
      },
    });

    expect(warnings).toEqual([]);
    expect(project.name).toBe("SEOEasy Directory");
    expect(project.type).toBe("marketplace");
    expect(project.revenue).toBe(8500);
    expect(project.users).toBe(1200);
    expect(project.lead).toBe("Ops Lead");
    expect(project.liveUrl).toBe("https://directory.example.com");
    expect(project.startDate).toBe("2024-03-01");
    expect(project.team).toEqual(["architect_specialist", "devops_specialist"]);
    expect(project.tasks).toEqual([
      {
        description: "Add listings import",
        assignedAgent: "api_integration_master",
        priority: "high",
        status: "pending",
      },
      { description: "Launch landing page", priority: "medium", status: "done" },
    ]);
  });

  it("should prefer current keys over legacy ones", () => {
    const { project } = validate({
      name: "Current",
      projectName: "Legacy",
      type: "SaaS",
      status: "planning",
      revenue: 100,
      metrics: { revenue: 999 },
    });
    expect(project.name).toBe("Current");
    expect(project.revenue).toBe(100);
  });

  it("should normalize task enum spellings", () => {
    const { project } = validate({
      name: "A",
      type: "SaaS",
      status: "planning",
      tasks: [
        { description: "one", status: "In Progress", priority: "CRITICAL" },
        { description: "two", status: "in_progress", assignedAgent: "" },
      ],
    });
    expect(project.tasks).toEqual([
      { description: "one", priority: "critical", status: "in-progress" },
      { description: "two", priority: "medium", status: "in-progress" },
    ]);
  });

  // ── rejections ────────────────────────────────────────────

  it("should reject a manifest without status", () => {
    const err = violationOf(() => validate({ name: "A", type: "SaaS" }));
    expect(err.message).toBe("missing field: status");
    expect(err.field).toBe("status");
  });

  it("should report the first missing field in name, type, status order", () => {
    expect(violationOf(() => validate({ type: "SaaS" })).message).toBe("missing field: name");
    expect(violationOf(() => validate({ name: "A", status: "planning" })).message).toBe(
      "missing field: type",
    );
  });

  it("should treat blank and null header fields as missing", () => {
    expect(violationOf(() => validate({ name: "  ", type: "SaaS", status: "planning" })).message).toBe(
      "missing field: name",
    );
    expect(violationOf(() => validate({ name: "A", type: "SaaS", status: null })).message).toBe(
      "missing field: status",
    );
  });

  it("should reject a status outside the lifecycle", () => {
    expect(violationOf(() => validate({ name: "A", type: "SaaS", status: "running" })).message).toBe(
      "invalid status: running",
    );
  });

  it("should quote the raw value of a header field that is not text", () => {
    const err = violationOf(() => validate({ name: "A", type: "SaaS", status: 5 }));
    expect(err.message).toBe("invalid status: 5");
    expect(err.field).toBe("status");
    expect(violationOf(() => validate({ name: true, type: "SaaS", status: "planning" })).message).toBe(
      "invalid name: true",
    );
    expect(violationOf(() => validate({ name: "A", type: ["SaaS"], status: "planning" })).message).toBe(
      'invalid type: ["SaaS"]',
    );
  });

  it("should reject anything that is not a JSON object", () => {
    expect(violationOf(() => validate([])).message).toBe("manifest must be a JSON object");
    expect(violationOf(() => validate(null)).message).toBe("manifest must be a JSON object");
  });

  it("should check the type against a configured allow-list", () => {
    const allow = ["SaaS", "marketplace"];
    expect(validate({ name: "A", type: "saas", status: "planning" }, allow).project.type).toBe("SaaS");

    const err = violationOf(() => validate({ name: "A", type: "crypto", status: "planning" }, allow));
    expect(err.message).toBe("invalid type: crypto");
    expect(err.field).toBe("type");
  });

  it("should accept any non-empty type without an allow-list", () => {
    expect(validate({ name: "A", type: "restaurant_bot", status: "paused" }).project.type).toBe(
      "restaurant_bot",
    );
  });

  // ── degradation ───────────────────────────────────────────

  it("should drop malformed tasks and keep the rest", () => {
    const { project, warnings } = validate({
      name: "A",
      type: "SaaS",
      status: "production",
      tasks: [
        { description: "keep me" },
        { priority: "high" },
        { description: "bad priority", priority: "urgent" },
        "not a task",
      ],
    });

    expect(project.tasks).toEqual([{ description: "keep me", priority: "medium", status: "pending" }]);
    expect(warnings).toEqual([
      { kind: "SchemaViolation", message: "tasks[1]: missing field: description; task dropped" },
      { kind: "SchemaViolation", message: "tasks[2]: invalid priority: urgent; task dropped" },
      { kind: "SchemaViolation", message: "tasks[3]: task must be an object; task dropped" },
    ]);
  });

  it("should drop a task that names the reserved unassigned agent", () => {
    const { project, warnings } = validate({
      name: "A",
      type: "SaaS",
      status: "production",
      tasks: [
        { description: "claims the bucket", assignedAgent: "unassigned" },
        { description: "legacy key", assignedTo: " unassigned " },
        { description: "real agent", assignedAgent: "Unassigned" },
        { description: "no agent" },
        { description: "numeric agent", assignedAgent: 7 },
      ],
    });

    expect(project.tasks).toEqual([
      { description: "real agent", assignedAgent: "Unassigned", priority: "medium", status: "pending" },
      { description: "no agent", priority: "medium", status: "pending" },
    ]);
    expect(warnings).toEqual([
      {
        kind: "SchemaViolation",
        message: 'tasks[0]: invalid assignedAgent: "unassigned" is reserved for tasks with no agent; task dropped',
      },
      {
        kind: "SchemaViolation",
        message: 'tasks[1]: invalid assignedAgent: "unassigned" is reserved for tasks with no agent; task dropped',
      },
      { kind: "SchemaViolation", message: "tasks[4]: invalid assignedAgent: 7; task dropped" },
    ]);
  });

  it("should ignore a tasks field that is not a list", () => {
    const { project, warnings } = validate({ name: "A", type: "SaaS", status: "planning", tasks: "lots" });
    expect(project.tasks).toEqual([]);
    expect(warnings).toEqual([{ kind: "SchemaViolation", message: "tasks must be a list; ignored" }]);
  });

  it("should degrade malformed revenue to zero with a warning", () => {
    const { project, warnings } = validate({ name: "A", type: "SaaS", status: "planning", revenue: "N/A" });
    expect(project.revenue).toBe(0);
    expect(warnings).toEqual([
      { kind: "MalformedRevenue", message: 'no numeric content in revenue: "N/A"' },
    ]);
  });

  it("should degrade malformed user counts with a warning", () => {
    const { project, warnings } = validate({ name: "A", type: "SaaS", status: "planning", users: "lots" });
    expect(project.users).toBe(0);
    expect(warnings).toEqual([{ kind: "MalformedUsers", message: "users is not a number: lots" }]);
  });
});

describe("coerceUserCount", () => {
  it("should accept integers and separated strings", () => {
    expect(coerceUserCount(450)).toEqual({ value: 450 });
    expect(coerceUserCount("1,200")).toEqual({ value: 1200 });
    expect(coerceUserCount(undefined)).toEqual({ value: 0 });
  });

  it("should clamp negatives and truncate fractions", () => {
    expect(coerceUserCount(-5)).toEqual({ value: 0, warning: "negative users clamped to 0: -5" });
    expect(coerceUserCount(12.7)).toEqual({ value: 12, warning: "fractional users truncated: 12.7" });
  });
});
