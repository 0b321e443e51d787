import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve, sep } from "node:path";
import {
  NotADirectoryError,
  NotFoundError,
  isErrnoException,
  toIoError,
} from "../errors/catalog.js";
import type { SymlinkPolicy } from "./types.js";

export interface WalkOptions {
  symlinks?: SymlinkPolicy;
}

export interface WalkedFile {
  /** Absolute path (of the link itself for an indexed symlink). */
  path: string;
  /** "/"-separated path relative to the root. */
  relativePath: string;
}

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Resolves `root` to an absolute path and checks that it is a directory.
 */
export async function checkRoot(root: string): Promise<string> {
  const absRoot = resolve(root);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(absRoot)).isDirectory();
  } catch (err: unknown) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
      throw new NotFoundError(absRoot);
    }
    throw toIoError(err, absRoot);
  }
  if (!isDirectory) {
    throw new NotADirectoryError(absRoot);
  }
  return absRoot;
}

function isInside(realRoot: string, target: string): boolean {
  const rel = relative(realRoot, target);
  return rel !== "" && rel !== ".." && !rel.startsWith(".." + sep) && !isAbsolute(rel);
}

/**
 * Real path of a symlink's target when it is a regular file inside the
 * root, null for anything else (dangling, looping, outside, directory).
 */
async function linkedFile(link: string, realRoot: string): Promise<string | null> {
  let target: string;
  try {
    target = await realpath(link);
  } catch (err: unknown) {
    if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ELOOP")) {
      return null;
    }
    throw toIoError(err, link);
  }
  if (!isInside(realRoot, target)) {
    return null;
  }
  try {
    return (await stat(target)).isFile() ? target : null;
  } catch (err: unknown) {
    throw toIoError(err, link);
  }
}

/**
 * Lists every regular file below `root`, sorted by relative path.
 *
 * Symlinks: with "within-root" (default) a link to a regular file inside
 * the root is listed under the link's own path; links to directories are
 * never descended into. With "never" all links are skipped. Sockets,
 * FIFOs and devices are skipped.
 */
export async function walkTree(
  root: string,
  options: WalkOptions = {},
): Promise<WalkedFile[]> {
  const policy = options.symlinks ?? "within-root";
  const absRoot = await checkRoot(root);
  let realRoot: string;
  try {
    realRoot = await realpath(absRoot);
  } catch (err: unknown) {
    throw toIoError(err, absRoot);
  }

  const files: WalkedFile[] = [];

  async function visit(dir: string, rel: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      throw toIoError(err, dir);
    }
    entries.sort((a, b) => comparePaths(a.name, b.name));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      const relativePath = rel === "" ? entry.name : `${rel}/${entry.name}`;

      if (entry.isDirectory()) {
        await visit(path, relativePath);
      } else if (entry.isFile()) {
        files.push({ path, relativePath });
      } else if (entry.isSymbolicLink() && policy === "within-root") {
        if ((await linkedFile(path, realRoot)) !== null) {
          files.push({ path, relativePath });
        }
      }
    }
  }

  await visit(absRoot, "");
  return files.sort((a, b) => comparePaths(a.relativePath, b.relativePath));
}
