/**
 * Structured JSON index of the tracked files.
 *
 * Complements the flat manifest with file sizes and a category breakdown.
 * Each file lands in the first category whose `match` substrings hit its
 * relative path; files matching no rule are left uncategorised.
 */

import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { FilesystemError } from "../errors";
import type { CategoryRule } from "../core/types";
import { toEntry } from "./manifest-builder";
import type { WalkedFile } from "./walk";

export interface IndexedFile {
  path: string;
  url: string;
  sizeBytes: number;
}

export interface FileIndex {
  generatedAt: string;
  totalFiles: number;
  files: IndexedFile[];
  categories: Record<string, string[]>;
}

export function categorize(
  path: string,
  rules: readonly CategoryRule[],
): string | null {
  for (const rule of rules) {
    if (rule.match.some((needle) => path.includes(needle))) {
      return rule.name;
    }
  }
  return null;
}

export function buildIndex(
  files: readonly WalkedFile[],
  options: {
    baseUrl?: string;
    categories: readonly CategoryRule[];
    now?: Date;
  },
): FileIndex {
  const categories: Record<string, string[]> = {};
  const indexed: IndexedFile[] = [];

  for (const file of files) {
    indexed.push({
      path: file.path,
      url: toEntry(file.path, options.baseUrl),
      sizeBytes: file.size,
    });

    const category = categorize(file.path, options.categories);
    if (category) {
      (categories[category] ??= []).push(file.path);
    }
  }

  for (const paths of Object.values(categories)) {
    paths.sort();
  }

  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    totalFiles: indexed.length,
    files: indexed,
    categories,
  };
}

function sameContent(a: FileIndex, b: FileIndex): boolean {
  const strip = ({ generatedAt: _generatedAt, ...rest }: FileIndex) => rest;
  return JSON.stringify(strip(a)) === JSON.stringify(strip(b));
}

async function readIndex(path: string): Promise<FileIndex | null> {
  const content = await fs.readFile(path, "utf-8").catch(() => null);
  if (content === null) return null;
  try {
    const parsed: unknown = JSON.parse(content);
    return isFileIndex(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isFileIndex(value: unknown): value is FileIndex {
  return (
    typeof value === "object" &&
    value !== null &&
    "generatedAt" in value &&
    "files" in value &&
    Array.isArray(value.files) &&
    "categories" in value
  );
}

/**
 * Writes the index unless only `generatedAt` would change.
 * Returns true if the file was written.
 */
export async function writeIndex(
  outputPath: string,
  index: FileIndex,
): Promise<boolean> {
  const existing = await readIndex(outputPath);
  if (existing && sameContent(existing, index)) return false;

  try {
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, `${JSON.stringify(index, null, 2)}\n`, "utf-8");
  } catch (err) {
    throw new FilesystemError(`Cannot write index ${outputPath}`, outputPath, {
      cause: err,
    });
  }
  return true;
}
