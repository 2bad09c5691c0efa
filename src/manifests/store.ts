/**
 * ManifestStore — scan a directory of JSON manifests into Projects.
 *
 * Each `reload()` builds a complete new result off to the side and swaps it
 * in with one assignment, so readers see either the previous load or the new
 * one. The manifests directory is only ever read.
 */
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { ManifestDirectoryError, SchemaViolation, errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import type { Diagnostic, Project, ProjectStatus, ValidationWarning } from "./types.ts";
import { validateManifest } from "./validator.ts";

const logger = getLogger("manifest_store");

const MANIFEST_EXTENSION = ".json";

export interface ManifestStoreOptions {
  typeAllowList?: readonly string[];
}

/** One complete load of the directory. */
export interface StoreSnapshot {
  readonly projects: readonly Project[];
  readonly diagnostics: readonly Diagnostic[];
  readonly loadedAt: string | null;
}

/** What a single manifest file turned into. */
export type FileOutcome =
  | { ok: true; file: string; project: Project; warnings: ValidationWarning[] }
  | { ok: false; file: string; diagnostic: Diagnostic };

const EMPTY: StoreSnapshot = Object.freeze({ projects: [], diagnostics: [], loadedAt: null });

function rejection(file: string, kind: Diagnostic["kind"], message: string): FileOutcome {
  return { ok: false, file, diagnostic: { kind, severity: "error", file, message } };
}

/** Read, parse and validate one manifest file. Bad content becomes a diagnostic. */
export async function loadManifestFile(
  file: string,
  options: ManifestStoreOptions = {},
): Promise<FileOutcome> {
  let content: string;
  let lastModified: string;
  try {
    const [text, info] = await Promise.all([readFile(file, "utf-8"), stat(file)]);
    content = text;
    lastModified = info.mtime.toISOString();
  } catch (err) {
    return rejection(file, "ParseError", `unreadable manifest: ${errorToString(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return rejection(file, "ParseError", errorToString(err));
  }

  try {
    const { project, warnings } = validateManifest(parsed, {
      sourcePath: file,
      typeAllowList: options.typeAllowList,
      lastModified,
    });
    return { ok: true, file, project, warnings };
  } catch (err) {
    if (err instanceof SchemaViolation) {
      return rejection(file, "SchemaViolation", err.message);
    }
    throw err;
  }
}

function compareProjects(a: Project, b: Project): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * Fold per-file outcomes, given in discovery order, into one snapshot.
 * The first file to claim an id keeps it; later claimants are rejected.
 */
export function foldOutcomes(outcomes: readonly FileOutcome[], loadedAt: string): StoreSnapshot {
  const byId = new Map<string, Project>();
  const diagnostics: Diagnostic[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) {
      diagnostics.push(outcome.diagnostic);
      continue;
    }

    const { project, file } = outcome;
    const owner = byId.get(project.id);
    if (owner) {
      diagnostics.push({
        kind: "DuplicateId",
        severity: "error",
        file,
        projectId: project.id,
        message: `duplicate id "${project.id}" already claimed by ${owner.rawSourcePath}`,
      });
      continue;
    }

    byId.set(project.id, Object.freeze(project));
    for (const warning of outcome.warnings) {
      diagnostics.push({ ...warning, severity: "warning", file, projectId: project.id });
    }
  }

  return Object.freeze({
    projects: Object.freeze([...byId.values()].sort(compareProjects)),
    diagnostics: Object.freeze(diagnostics),
    loadedAt,
  });
}

export class ManifestStore {
  readonly dir: string;
  private readonly options: ManifestStoreOptions;
  private state: StoreSnapshot = EMPTY;
  /** Reloads started so far; each reload is numbered by its start. */
  private started = 0;
  /** Number of the reload whose result is installed. */
  private installed = 0;

  constructor(dir: string, options: ManifestStoreOptions = {}) {
    this.dir = path.resolve(dir);
    this.options = options;
  }

  /**
   * Scan the directory again and replace the current result.
   * Throws ManifestDirectoryError if the directory cannot be listed;
   * the previous result stays in place. When reloads overlap, a scan that
   * started earlier never replaces the result of one that started later;
   * it still returns its own result.
   */
  async reload(): Promise<StoreSnapshot> {
    const generation = ++this.started;
    let files: string[];
    try {
      const entries = await readdir(this.dir, { withFileTypes: true });
      files = entries
        .filter(
          (e) =>
            e.isFile() &&
            !e.name.startsWith(".") &&
            e.name.toLowerCase().endsWith(MANIFEST_EXTENSION),
        )
        .map((e) => e.name)
        .sort()
        .map((name) => path.join(this.dir, name));
    } catch (err) {
      logger.error({ dir: this.dir, error: errorToString(err) }, "manifest_dir_unreadable");
      throw new ManifestDirectoryError(this.dir, errorToString(err));
    }

    // Discovery order is file-name order; Promise.all keeps it for the duplicate tie-break.
    const outcomes = await Promise.all(files.map((f) => loadManifestFile(f, this.options)));
    const next = foldOutcomes(outcomes, new Date().toISOString());

    for (const d of next.diagnostics) {
      const fields = { kind: d.kind, file: d.file, message: d.message };
      if (d.severity === "error") {
        logger.warn(fields, "manifest_rejected");
      } else {
        logger.warn(fields, "manifest_field_degraded");
      }
    }

    if (generation < this.installed) {
      logger.info({ dir: this.dir, generation, installed: this.installed }, "stale_reload_discarded");
      return next;
    }
    this.installed = generation;
    this.state = next;
    logger.info(
      {
        dir: this.dir,
        files: files.length,
        projects: next.projects.length,
        diagnostics: next.diagnostics.length,
      },
      "manifests_loaded",
    );
    return next;
  }

  /** Current complete result. */
  snapshot(): StoreSnapshot {
    return this.state;
  }

  /** Valid projects, sorted by name then id. */
  projects(): readonly Project[] {
    return this.state.projects;
  }

  /** Every rejection and warning from the last load. Order is not meaningful. */
  diagnostics(): readonly Diagnostic[] {
    return this.state.diagnostics;
  }

  /** Diagnostics for files that were left out of the project set. */
  rejected(): Diagnostic[] {
    return this.state.diagnostics.filter((d) => d.severity === "error");
  }

  loadedAt(): string | null {
    return this.state.loadedAt;
  }

  /** Get a project by id, or null if not found. */
  get(id: string): Project | null {
    return this.state.projects.find((p) => p.id === id) ?? null;
  }

  /** Find a project by id or display name, case-insensitively. */
  find(nameOrId: string): Project | null {
    const needle = nameOrId.trim().toLowerCase();
    return (
      this.state.projects.find(
        (p) => p.id.toLowerCase() === needle || p.name.toLowerCase() === needle,
      ) ?? null
    );
  }

  /** List projects, optionally filtered by status. */
  list(status?: ProjectStatus): Project[] {
    const all = [...this.state.projects];
    if (!status) return all;
    return all.filter((p) => p.status === status);
  }
}
