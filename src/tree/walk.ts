import { promises as fs, type Dirent, type Stats } from "node:fs";
import { join, relative, sep } from "node:path";
import ignore, { type Ignore } from "ignore";
import { FilesystemError } from "../errors";
import { debug } from "../logging";

export interface WalkOptions {
  /** File or directory names skipped anywhere in the tree */
  exclude?: readonly string[];
  /** Gitignore-syntax file at the root; null disables it */
  ignoreFile?: string | null;
  /** Absolute paths never reported (generated outputs) */
  skip?: readonly string[];
}

export interface WalkedFile {
  /** Relative path with POSIX separators */
  path: string;
  absolutePath: string;
  mtimeMs: number;
  size: number;
}

/**
 * Loads ignore patterns from a file (gitignore syntax).
 * Returns null if file doesn't exist.
 */
async function loadIgnoreFile(filePath: string): Promise<Ignore | null> {
  const content = await fs.readFile(filePath, "utf-8").catch(() => null);
  if (content === null) return null;
  return ignore().add(content);
}

/**
 * Safely stat a path, returning null if it doesn't exist.
 */
async function safeStat(path: string): Promise<Stats | null> {
  return fs.stat(path).catch(() => null);
}

/**
 * Safely get realpath, returning original path on failure.
 */
async function safeRealpath(path: string): Promise<string> {
  return fs.realpath(path).catch(() => path);
}

export function toPosix(relativePath: string): string {
  return sep === "/" ? relativePath : relativePath.split(sep).join("/");
}

/** Ensures `root` is a readable directory */
export async function assertReadableRoot(root: string): Promise<void> {
  const stat = await safeStat(root);
  if (!stat?.isDirectory()) {
    throw new FilesystemError(`Root is not a readable directory: ${root}`, root);
  }
}

/**
 * Walks `root` and returns every regular file, sorted by relative path.
 * Symlinks are followed; broken links and directory cycles are skipped.
 */
export async function walkFiles(
  root: string,
  options: WalkOptions = {},
): Promise<WalkedFile[]> {
  const { exclude = [], ignoreFile = null, skip = [] } = options;

  await assertReadableRoot(root);

  const excluded = new Set(exclude);
  const skipped = new Set(skip);
  const ig = ignoreFile ? await loadIgnoreFile(join(root, ignoreFile)) : null;
  const visited = new Set<string>();
  const files: WalkedFile[] = [];

  const visit = async (dir: string): Promise<void> => {
    const realDir = await safeRealpath(dir);
    if (visited.has(realDir)) return;
    visited.add(realDir);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === root) {
        throw new FilesystemError(`Cannot read root ${root}`, root, {
          cause: err,
        });
      }
      debug(`Skipping unreadable directory ${dir}`);
      return;
    }

    for (const entry of entries) {
      if (excluded.has(entry.name)) continue;

      const fullPath = join(dir, entry.name);
      if (skipped.has(fullPath)) continue;

      const stat = await safeStat(fullPath);
      if (!stat) continue; // broken symlink or vanished file

      const relativePath = toPosix(relative(root, fullPath));
      // names such as "..." cannot be matched by gitignore rules
      if (!ignore.isPathValid(relativePath)) {
        debug(`Skipping unmatchable path ${relativePath}`);
        continue;
      }
      const isDir = stat.isDirectory();

      if (ig) {
        const pathToCheck = isDir ? `${relativePath}/` : relativePath;
        if (ig.ignores(pathToCheck)) continue;
      }

      if (isDir) {
        await visit(fullPath);
      } else if (stat.isFile()) {
        files.push({
          path: relativePath,
          absolutePath: fullPath,
          mtimeMs: stat.mtimeMs,
          size: stat.size,
        });
      }
    }
  };

  await visit(root);

  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return files;
}
