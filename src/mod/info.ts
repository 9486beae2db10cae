import type { Dirent } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { join } from "path";
import { z } from "zod";

export class PackagingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PackagingError";
  }
}

// Only name and version matter for packaging; the rest is passed through untouched.
const ModInfoSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().regex(/^\d+\.\d+\.\d+$/, "expected major.minor.patch"),
    title: z.string().optional(),
    factorio_version: z.string().optional(),
  })
  .passthrough();
export type ModInfo = z.infer<typeof ModInfoSchema>;

export function releaseName(info: Pick<ModInfo, "name" | "version">): string {
  return `${info.name}_${info.version}`;
}

export async function readModInfo(dir: string): Promise<ModInfo> {
  const path = join(dir, "info.json");
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch {
    throw new PackagingError(`info.json not found in ${dir}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new PackagingError(`${path} is not valid JSON`);
  }

  const result = ModInfoSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new PackagingError(
      `Failed to read name/version from ${path}: ${issue?.path.join(".") || "root"} ${issue?.message ?? "invalid"}`
    );
  }
  return result.data;
}

/** The most recently modified directory under `modsDir` that has an info.json. */
export async function findModSource(modsDir: string): Promise<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(modsDir, { withFileTypes: true });
  } catch {
    throw new PackagingError(`No mod source found under ${modsDir} (directory does not exist)`);
  }

  const candidates: { dir: string; mtimeMs: number }[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const dir = join(modsDir, entry.name);
    try {
      await stat(join(dir, "info.json"));
    } catch {
      continue;
    }
    candidates.push({ dir, mtimeMs: (await stat(dir)).mtimeMs });
  }

  candidates.sort((a, b) => b.mtimeMs - a.mtimeMs);
  const newest = candidates[0];
  if (!newest) {
    throw new PackagingError(`No mod source found under ${modsDir} (expecting a folder with info.json)`);
  }
  return newest.dir;
}
