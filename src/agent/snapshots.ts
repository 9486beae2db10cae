import { readdir, readFile } from "fs/promises";
import { isAbsolute, join, resolve } from "path";
import { SnapshotDocumentSchema, type SnapshotDocument } from "./schemas";

// Relative to script-output/, matching what the mod writes with write_file.
const SNAPSHOT_DIR = "agent/snapshots";

const SNAPSHOT_FILE = /^(\d+)\.json$/;

export interface SnapshotFile {
  tick: number;
  path: string;
}

export interface SnapshotSummary {
  tick: number;
  total: number;
  byName: { name: string; count: number }[];
}

export function snapshotDir(scriptOutput: string): string {
  return join(scriptOutput, SNAPSHOT_DIR);
}

export async function listSnapshots(dir: string): Promise<SnapshotFile[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const files: SnapshotFile[] = [];
  for (const name of names) {
    const match = SNAPSHOT_FILE.exec(name);
    if (match?.[1]) {
      files.push({ tick: Number(match[1]), path: join(dir, name) });
    }
  }
  return files.sort((a, b) => a.tick - b.tick);
}

export async function readSnapshot(path: string): Promise<SnapshotDocument> {
  const text = await readFile(path, "utf-8");
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new Error(`Snapshot ${path} is not valid JSON`);
  }

  const result = SnapshotDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Snapshot ${path} is malformed at ${issue?.path.join(".") || "root"}: ${issue?.message}`);
  }
  return result.data;
}

export async function latestSnapshot(dir: string): Promise<SnapshotDocument | undefined> {
  const newest = (await listSnapshots(dir)).pop();
  return newest ? readSnapshot(newest.path) : undefined;
}

export function summarizeSnapshot(doc: SnapshotDocument): SnapshotSummary {
  const counts = new Map<string, number>();
  for (const entity of doc.entities) {
    counts.set(entity.name, (counts.get(entity.name) ?? 0) + 1);
  }

  const byName = [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));

  return { tick: doc.tick, total: doc.entities.length, byName };
}

// The mod reports screenshot paths relative to script-output/.
export function screenshotPath(scriptOutput: string, reported: string): string {
  return isAbsolute(reported) ? reported : resolve(scriptOutput, reported);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
