/**
 * PatternStore — persistence for confirmed patterns.
 *
 * The file store writes one `{dataDir}/patterns/{id}.json` per pattern with an
 * exclusive create, so an existing pattern file is never rewritten.
 */
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { PatternError, errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { TRACKED_METRICS } from "../metrics/types.ts";
import type { Pattern } from "./types.ts";

const logger = getLogger("pattern_store");

export interface PatternStore {
  save(pattern: Pattern): Promise<void>;
  /** All persisted patterns, oldest confirmation first. */
  list(projectType?: string): Promise<Pattern[]>;
}

export const PatternSchema = z.object({
  id: z.string().min(1),
  projectType: z.string().min(1),
  metric: z.enum(TRACKED_METRICS),
  previousValue: z.number(),
  currentValue: z.number(),
  improvement: z.number(),
  description: z.string(),
  detectedAt: z.string(),
  confirmedAt: z.string(),
});

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FilePatternStore implements PatternStore {
  readonly dir: string;

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, "patterns");
  }

  async save(pattern: Pattern): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const filePath = path.join(this.dir, `${pattern.id}.json`);
    try {
      await writeFile(filePath, JSON.stringify(pattern, null, 2) + "\n", {
        encoding: "utf-8",
        flag: "wx",
      });
    } catch (err) {
      if (isAlreadyExists(err)) {
        throw new PatternError(`Pattern ${pattern.id} is already persisted`);
      }
      throw err;
    }
    logger.info(
      { id: pattern.id, projectType: pattern.projectType, metric: pattern.metric },
      "pattern_persisted",
    );
  }

  async list(projectType?: string): Promise<Pattern[]> {
    let names: string[];
    try {
      names = (await readdir(this.dir)).filter((n) => n.endsWith(".json"));
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const patterns: Pattern[] = [];
    for (const name of names) {
      const filePath = path.join(this.dir, name);
      try {
        const parsed = PatternSchema.parse(JSON.parse(await readFile(filePath, "utf-8")));
        patterns.push(parsed);
      } catch (err) {
        logger.warn({ filePath, error: errorToString(err) }, "pattern_file_unreadable");
      }
    }

    return patterns
      .filter((p) => projectType === undefined || p.projectType === projectType)
      .sort((a, b) => (a.confirmedAt < b.confirmedAt ? -1 : a.confirmedAt > b.confirmedAt ? 1 : 0));
  }
}
