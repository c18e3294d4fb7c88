import { promises as fs } from "node:fs";
import { dirname, extname } from "node:path";
import { FilesystemError } from "../errors";
import { walkFiles, type WalkedFile, type WalkOptions } from "./walk";

export interface ManifestOptions extends WalkOptions {
  /** Accepted extensions, with leading dot (".py") */
  extensions: readonly string[];
  /** Prefix for each entry; entries are bare relative paths without it */
  baseUrl?: string;
}

/** Joins a relative POSIX path onto the base URL */
export function toEntry(relativePath: string, baseUrl?: string): string {
  return baseUrl ? `${baseUrl}/${relativePath}` : relativePath;
}

/** Files under `root` whose extension is accepted, sorted by relative path */
export async function collectFiles(
  root: string,
  options: ManifestOptions,
): Promise<WalkedFile[]> {
  const accepted = new Set(options.extensions);
  const files = await walkFiles(root, options);
  return files.filter((file) => accepted.has(extname(file.path)));
}

/**
 * Builds the manifest entries for `root`.
 * The result is recomputed wholesale and sorted, so identical trees give
 * identical manifests.
 */
export async function buildManifest(
  root: string,
  options: ManifestOptions,
): Promise<string[]> {
  const files = await collectFiles(root, options);
  return toEntries(files, options.baseUrl);
}

/** Unique, sorted manifest entries for already collected files */
export function toEntries(
  files: readonly WalkedFile[],
  baseUrl?: string,
): string[] {
  const entries = files.map((file) => toEntry(file.path, baseUrl));
  return [...new Set(entries)].sort();
}

export function renderManifest(entries: readonly string[]): string {
  return entries.join("\n");
}

/** Overwrites `outputPath` with the rendered manifest */
export async function writeManifest(
  outputPath: string,
  entries: readonly string[],
): Promise<void> {
  try {
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, renderManifest(entries), "utf-8");
  } catch (err) {
    throw new FilesystemError(
      `Cannot write manifest ${outputPath}`,
      outputPath,
      { cause: err },
    );
  }
}
