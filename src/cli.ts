/**
 * CLI — status reporting and pattern confirmation over a manifests directory.
 *
 *   manifest-hub status [--summary]   portfolio metrics and project list
 *   manifest-hub projects             one line per valid project
 *   manifest-hub diagnostics          rejected files and degraded fields
 *   manifest-hub detect               compare per-type metrics with the last run
 *   manifest-hub patterns [type]      confirmed patterns
 */
import { createInterface } from "node:readline/promises";
import { pathToFileURL } from "node:url";
import { getSettings } from "./infra/config.ts";
import type { Settings } from "./infra/config-schema.ts";
import { ManifestDirectoryError, errorToString } from "./infra/errors.ts";
import { getLogger, reinitLogger } from "./infra/logger.ts";
import { ManifestStore } from "./manifests/store.ts";
import { computeMetrics, computeMetricsByType } from "./metrics/aggregator.ts";
import { PatternDetector } from "./patterns/detector.ts";
import { FilePatternStore } from "./patterns/pattern-store.ts";
import { FileSnapshotStore } from "./patterns/snapshot-store.ts";
import {
  formatDiagnostics,
  formatPattern,
  formatProject,
  formatProposal,
  formatStatusReport,
} from "./report/format.ts";

const logger = getLogger("cli");

export interface CLIContext {
  settings: Settings;
  out: (line: string) => void;
  /** Ask the operator a yes/no question. */
  confirm: (question: string) => Promise<boolean>;
}

const HELP = [
  "Usage: manifest-hub <command>",
  "",
  "Commands:",
  "  status [--summary]   Portfolio metrics and project list",
  "  projects             List valid projects",
  "  diagnostics          Rejected manifests and degraded fields",
  "  detect               Detect per-type improvements and confirm patterns",
  "  patterns [type]      List confirmed patterns",
  "  help                 Show this help message",
];

async function loadStore(settings: Settings): Promise<ManifestStore> {
  const store = new ManifestStore(settings.manifestsDir, { typeAllowList: settings.projectTypes });
  await store.reload();
  return store;
}

async function detect(ctx: CLIContext): Promise<void> {
  const { settings, out } = ctx;
  const store = await loadStore(settings);
  const snapshots = new FileSnapshotStore(settings.dataDir);
  const detector = new PatternDetector({
    store: new FilePatternStore(settings.dataDir),
    threshold: settings.patterns.threshold,
    metrics: settings.patterns.metrics,
  });

  for (const [type, current] of computeMetricsByType(store.projects())) {
    const previous = await snapshots.latest(type);
    if (previous) {
      detector.detect(previous, current);
    } else {
      out(`[${type}] first snapshot recorded`);
    }
    await snapshots.append(current);
  }

  const pending = detector.pendingAll();
  if (pending.length === 0) {
    out("No improvements crossed the threshold.");
    return;
  }

  for (const proposal of pending) {
    const accepted = await ctx.confirm(`Save pattern ${formatProposal(proposal)}? [y/N] `);
    const pattern = await detector.confirm(proposal.projectType, accepted);
    out(pattern ? `Saved pattern ${pattern.id}` : `Discarded pattern for ${proposal.projectType}`);
  }
}

/** Run one command. Returns the process exit code. */
export async function runCLI(args: readonly string[], ctx: CLIContext): Promise<number> {
  const [command = "status", ...rest] = args;
  const { settings, out } = ctx;

  try {
    switch (command) {
      case "status": {
        const store = await loadStore(settings);
        const snapshot = computeMetrics(store.projects());
        const summary = rest.includes("--summary");
        formatStatusReport(snapshot, store.projects(), { summary }).forEach(out);
        const rejected = store.rejected().length;
        if (rejected > 0) {
          out(`${rejected} manifest(s) rejected; run "diagnostics" for details`);
        }
        return 0;
      }

      case "projects": {
        const store = await loadStore(settings);
        if (store.projects().length === 0) {
          out(`No projects found in ${store.dir}`);
        }
        store.projects().map(formatProject).forEach(out);
        return 0;
      }

      case "diagnostics": {
        const store = await loadStore(settings);
        if (store.diagnostics().length === 0) {
          out("No diagnostics.");
        }
        formatDiagnostics(store.diagnostics()).forEach(out);
        return 0;
      }

      case "detect":
        await detect(ctx);
        return 0;

      case "patterns": {
        const patterns = await new FilePatternStore(settings.dataDir).list(rest[0]);
        if (patterns.length === 0) {
          out("No confirmed patterns.");
        }
        patterns.map(formatPattern).forEach(out);
        return 0;
      }

      case "help":
      case "--help":
        HELP.forEach(out);
        return 0;

      default:
        out(`Unknown command: ${command}`);
        HELP.forEach(out);
        return 2;
    }
  } catch (err) {
    if (err instanceof ManifestDirectoryError) {
      out(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const settings = getSettings();
  reinitLogger(settings);
  const code = await runCLI(process.argv.slice(2), {
    settings,
    out: (line) => console.log(line),
    confirm: askYesNo,
  });
  process.exitCode = code;
}

// Entry point: run when this file is executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logger.error({ error: errorToString(err) }, "cli_fatal");
    console.error("Fatal error:", errorToString(err));
    process.exit(1);
  });
}
