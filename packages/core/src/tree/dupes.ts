import { copyFile, realpath, stat, unlink } from "node:fs/promises";
import { dirname, extname, join, resolve } from "node:path";
import { isErrnoException, toIoError } from "../errors/catalog.js";
import { maxSize } from "./digest-index.js";
import { buildTreeList, type TreeListOptions } from "./list.js";
import type { DigestIndex, DupeGroup } from "./types.js";
import { comparePaths } from "./walk.js";

function cloneGroup(group: DupeGroup): DupeGroup {
  return { item: { ...group.item }, dupes: [...group.dupes] };
}

function samePath(a: string, b: string): boolean {
  return resolve(a) === resolve(b);
}

/**
 * Scans `root` for copies of the indexed items. Files larger than the
 * biggest indexed item are not digested since they cannot match.
 */
export async function matchTree(
  index: DigestIndex,
  root: string,
  options: Omit<TreeListOptions, "maxSize"> = {},
): Promise<DigestIndex> {
  const list = await buildTreeList(root, { ...options, maxSize: maxSize(index) });
  const matched: DigestIndex = new Map(
    [...index].map(([digest, group]) => [digest, cloneGroup(group)]),
  );

  for (const item of list) {
    const group = matched.get(item.digest);
    if (
      group !== undefined &&
      !samePath(group.item.path, item.path) &&
      !group.dupes.some((d) => samePath(d, item.path))
    ) {
      group.dupes.push(item.path);
    }
  }
  return matched;
}

/**
 * Needle items that also appear in the haystack under another path. Each
 * result group lists the haystack item and its duplicates as dupes.
 */
export function findDupes(needle: DigestIndex, haystack: DigestIndex): DigestIndex {
  const found: DigestIndex = new Map();
  for (const [digest, needleGroup] of needle) {
    const hay = haystack.get(digest);
    if (hay === undefined || samePath(hay.item.path, needleGroup.item.path)) {
      continue;
    }
    const group = cloneGroup(needleGroup);
    group.dupes.push(hay.item.path);
    for (const dupe of hay.dupes) {
      if (!samePath(dupe, group.item.path)) {
        group.dupes.push(dupe);
      }
    }
    found.set(digest, group);
  }
  return found;
}

/** Sorted, unique parent directories of every duplicate. */
export function dupeDirs(index: DigestIndex): string[] {
  const dirs = new Set<string>();
  for (const { dupes } of index.values()) {
    for (const dupe of dupes) {
      dirs.add(dirname(dupe));
    }
  }
  return [...dirs].sort(comparePaths);
}

/** Bytes freed by deleting every duplicate. */
export function dupeSavings(index: DigestIndex): number {
  let total = 0;
  for (const { item, dupes } of index.values()) {
    total += item.size * dupes.length;
  }
  return total;
}

const GiB = 1024 ** 3;
const MiB = 1024 ** 2;
const KiB = 1024;

export function formatSavings(bytes: number): string {
  if (bytes > GiB) {
    return `Total saved ${Math.floor(bytes / GiB)} GB`;
  }
  if (bytes > MiB) {
    return `Total saved ${Math.floor(bytes / MiB)} MB`;
  }
  if (bytes > KiB) {
    return `Total saved ${Math.floor(bytes / KiB)} KB`;
  }
  return `Total saved ${bytes} Bytes`;
}

export interface DupeActionOptions {
  /** Report the actions without touching any file. */
  dryRun?: boolean;
  /** Called with "cp <src> <dest>" / "rm <path>" before each action. */
  onAction?: (action: string) => void | Promise<void>;
}

/**
 * Real path of the regular file behind `path`, following links. Null when
 * the path is gone, dangling or not a regular file.
 */
async function realFile(path: string): Promise<string | null> {
  try {
    const real = await realpath(path);
    return (await stat(real)).isFile() ? real : null;
  } catch (err: unknown) {
    if (
      isErrnoException(err) &&
      (err.code === "ENOENT" || err.code === "ENOTDIR" || err.code === "ELOOP")
    ) {
      return null;
    }
    throw toIoError(err, path);
  }
}

/**
 * Copies every duplicate still present on disk to `<dest>/<digest><ext>`.
 * A dupe that resolves to the item's own file (a symlink to it, or the
 * target of an item that is a link) is skipped. Returns the number of
 * copy actions.
 */
export async function copyDupes(
  index: DigestIndex,
  dest: string,
  options: DupeActionOptions = {},
): Promise<number> {
  let actions = 0;
  for (const [digest, { item, dupes }] of index) {
    const itemFile = await realFile(item.path);
    for (const dupe of dupes) {
      const dupeFile = await realFile(dupe);
      if (dupeFile === null || dupeFile === itemFile) {
        continue;
      }
      const target = join(dest, digest + extname(dupe));
      await options.onAction?.(`cp ${dupe} ${target}`);
      actions++;
      if (!options.dryRun) {
        try {
          await copyFile(dupe, target);
        } catch (err: unknown) {
          throw toIoError(err, target);
        }
      }
    }
  }
  return actions;
}

/**
 * Deletes every duplicate still present on disk; items are kept. Nothing
 * in a group is deleted unless its item is still a regular file,
 * and a dupe that resolves to the item's own file is never deleted.
 * Returns the number of delete actions.
 */
export async function deleteDupes(
  index: DigestIndex,
  options: DupeActionOptions = {},
): Promise<number> {
  let actions = 0;
  for (const { item, dupes } of index.values()) {
    const itemFile = await realFile(item.path);
    if (itemFile === null) {
      continue;
    }
    for (const dupe of dupes) {
      const dupeFile = await realFile(dupe);
      if (dupeFile === null || dupeFile === itemFile) {
        continue;
      }
      await options.onAction?.(`rm ${dupe}`);
      actions++;
      if (!options.dryRun) {
        try {
          await unlink(dupe);
        } catch (err: unknown) {
          throw toIoError(err, dupe);
        }
      }
    }
  }
  return actions;
}
