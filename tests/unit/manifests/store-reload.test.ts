/**
 * ManifestStore — overlapping reloads.
 *
 * Directory listings are held open so the test decides which scan finishes first.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { ManifestStore } from "@hub/manifests/store.ts";

const listings = vi.hoisted(() => ({ held: [] as Array<() => void> }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    // List now, hand the entries back only once the test releases them.
    readdir: async (dir: string, options: { withFileTypes: true }) => {
      const entries = await actual.readdir(dir, options);
      await new Promise<void>((resolve) => listings.held.push(resolve));
      return entries;
    },
  };
});

let tmpDirs: string[] = [];

function makeTmpDir(): string {
  const dir = mkdtempSync(path.join(tmpdir(), "manifest-hub-reload-"));
  tmpDirs.push(dir);
  return dir;
}

function writeManifest(dir: string, fileName: string, name: string): void {
  writeFileSync(
    path.join(dir, fileName),
    JSON.stringify({ name, type: "SaaS", status: "planning" }),
    "utf-8",
  );
}

function release(index: number): void {
  const resume = listings.held[index];
  if (!resume) throw new Error(`no listing held at ${index}`);
  resume();
}

afterEach(() => {
  listings.held = [];
  for (const dir of tmpDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
});

describe("ManifestStore overlapping reloads", () => {
  it("should keep the newer scan when an older one finishes last", async () => {
    const dir = makeTmpDir();
    writeManifest(dir, "a.json", "A");
    const store = new ManifestStore(dir);

    const older = store.reload();
    await vi.waitFor(() => expect(listings.held).toHaveLength(1));
    writeManifest(dir, "b.json", "B");
    const newer = store.reload();
    await vi.waitFor(() => expect(listings.held).toHaveLength(2));

    release(1);
    const newerResult = await newer;
    release(0);
    const olderResult = await older;

    expect(newerResult.projects.map((p) => p.id)).toEqual(["a", "b"]);
    expect(olderResult.projects.map((p) => p.id)).toEqual(["a"]);
    expect(store.snapshot()).toBe(newerResult);
    expect(store.projects().map((p) => p.id)).toEqual(["a", "b"]);
  });

  it("should install an older scan while no newer one has finished", async () => {
    const dir = makeTmpDir();
    writeManifest(dir, "a.json", "A");
    const store = new ManifestStore(dir);

    const older = store.reload();
    await vi.waitFor(() => expect(listings.held).toHaveLength(1));
    writeManifest(dir, "b.json", "B");
    const newer = store.reload();
    await vi.waitFor(() => expect(listings.held).toHaveLength(2));

    release(0);
    const olderResult = await older;
    expect(store.snapshot()).toBe(olderResult);

    release(1);
    const newerResult = await newer;
    expect(store.snapshot()).toBe(newerResult);
    expect(store.projects().map((p) => p.id)).toEqual(["a", "b"]);
  });
});
