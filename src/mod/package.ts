import { copyFile, mkdir, readdir, readFile, writeFile } from "fs/promises";
import { join, posix, relative, sep } from "path";
import JSZip from "jszip";
import { findModSource, readModInfo, releaseName } from "./info";
import { log } from "../utils/log";

const EXCLUDED_DIRS = new Set([".git", "dist"]);

export interface PackageOptions {
  // Defaults to the newest mod under modsDir.
  source?: string;
  modsDir: string;
  outputDir: string;
  stagingDir: string;
  dryRun?: boolean;
}

export interface PackageResult {
  name: string;
  version: string;
  source: string;
  zipName: string;
  stagedZip: string;
  outputZip: string;
  files: string[];
}

/** Files to ship, as posix paths relative to `sourceDir`, sorted. */
export async function collectModFiles(sourceDir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name)) await walk(path);
      } else if (entry.isFile() && !entry.name.endsWith(".zip")) {
        files.push(relative(sourceDir, path).split(sep).join(posix.sep));
      }
    }
  }

  await walk(sourceDir);
  return files.sort();
}

/** Zips `files` under a single top-level `<folder>/`, as Factorio expects. */
export async function buildModZip(sourceDir: string, folder: string, files: string[]): Promise<Buffer> {
  const zip = new JSZip();
  const root = zip.folder(folder);
  if (!root) {
    throw new Error(`Cannot create folder ${folder} in archive`);
  }

  for (const file of files) {
    root.file(file, await readFile(join(sourceDir, ...file.split(posix.sep))));
  }

  return zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE", compressionOptions: { level: 9 } });
}

export async function packageMod(options: PackageOptions): Promise<PackageResult> {
  const source = options.source ?? (await findModSource(options.modsDir));
  const info = await readModInfo(source);
  const folder = releaseName(info);
  const zipName = `${folder}.zip`;
  const files = await collectModFiles(source);

  const result: PackageResult = {
    name: info.name,
    version: info.version,
    source,
    zipName,
    stagedZip: join(options.stagingDir, zipName),
    outputZip: join(options.outputDir, zipName),
    files,
  };

  if (options.dryRun) {
    log.step(`[dry-run] would zip ${files.length} file(s) from ${source} into ${result.stagedZip}`);
    log.step(`[dry-run] would copy ${result.stagedZip} to ${result.outputZip}`);
    return result;
  }

  await mkdir(options.stagingDir, { recursive: true });
  await writeFile(result.stagedZip, await buildModZip(source, folder, files));

  await mkdir(options.outputDir, { recursive: true });
  await copyFile(result.stagedZip, result.outputZip);

  log.info(`Packaged: ${result.outputZip}`);
  return result;
}
