import { stat } from "node:fs/promises";
import { InvalidFormatError } from "../errors/catalog.js";
import { digestFile, type DigestOptions } from "./digest.js";
import type { DigestIndex, DupeGroup, TreeItem } from "./types.js";

/** Marks a line listing a duplicate of the preceding item. */
export const DUPE_MARKER = "-";

export interface IndexBuildOptions {
  /** Record later items with an already seen digest as duplicates. */
  withDupes?: boolean;
}

function addItem(index: DigestIndex, item: TreeItem, withDupes: boolean): void {
  const group = index.get(item.digest);
  if (group === undefined) {
    index.set(item.digest, { item, dupes: [] });
  } else if (withDupes) {
    group.dupes.push(item.path);
  }
}

/** Groups a tree list by digest; the first item with a digest leads its group. */
export function indexFromList(
  list: Iterable<TreeItem>,
  options: IndexBuildOptions = {},
): DigestIndex {
  const index: DigestIndex = new Map();
  for (const item of list) {
    addItem(index, item, options.withDupes ?? false);
  }
  return index;
}

/** Splits off the text before the first whitespace character. */
function splitToken(line: string): [string, string] | null {
  const at = line.search(/\s/);
  if (at === -1) {
    return null;
  }
  return [line.slice(0, at), line.slice(at + 1)];
}

/**
 * Parses the digest index text format:
 *
 *   <digest> <size> <path>
 *   - <duplicate path>
 *
 * Duplicate lines belong to the closest item line above them. Blank lines
 * are ignored. Paths run to the end of the line and may contain spaces.
 */
export async function readDigestIndex(
  lines: AsyncIterable<string> | Iterable<string>,
  options: IndexBuildOptions = {},
): Promise<DigestIndex> {
  const withDupes = options.withDupes ?? false;
  const index: DigestIndex = new Map();
  let lastDigest: string | null = null;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === "") {
      continue;
    }

    const head = splitToken(line);
    if (head === null) {
      throw new InvalidFormatError(lineNumber, "missing digest");
    }
    const [digest, rest] = head;

    if (digest === DUPE_MARKER) {
      if (lastDigest === null) {
        throw new InvalidFormatError(lineNumber, "duplicate before any item");
      }
      const group = index.get(lastDigest);
      if (withDupes && group !== undefined) {
        group.dupes.push(rest);
      }
      continue;
    }

    const sized = splitToken(rest);
    if (sized === null) {
      throw new InvalidFormatError(lineNumber, "missing size");
    }
    const [sizeText, path] = sized;
    if (!/^\d+$/.test(sizeText)) {
      throw new InvalidFormatError(lineNumber, `invalid size "${sizeText}"`);
    }

    lastDigest = digest;
    addItem(index, { digest, path, size: Number(sizeText) }, withDupes);
  }

  return index;
}

export function formatItem(item: TreeItem): string {
  return `${item.digest} ${item.size} ${item.path}\n`;
}

export function formatGroup(group: DupeGroup): string {
  return formatItem(group.item) + group.dupes.map((d) => `${DUPE_MARKER} ${d}\n`).join("");
}

/** Largest item size in the index, 0 when empty. */
export function maxSize(index: DigestIndex): number {
  let max = 0;
  for (const { item } of index.values()) {
    if (item.size > max) {
      max = item.size;
    }
  }
  return max;
}

export function countDupes(index: DigestIndex): number {
  let count = 0;
  for (const group of index.values()) {
    count += group.dupes.length;
  }
  return count;
}

/** Keeps only groups whose item has content. */
export function dropZeroLength(index: DigestIndex): DigestIndex {
  return new Map([...index].filter(([, group]) => group.item.size > 0));
}

export interface ConfirmEvents {
  onConfirmed?(item: TreeItem, dupe: string): void;
  onRejected?(item: TreeItem, dupe: string): void;
}

/**
 * Re-digests every item and duplicate with full hashing and keeps only the
 * duplicates whose size and full digest equal their item's. The result is
 * keyed by full digests, so fast-digest indexes come back re-keyed.
 */
export async function confirmDigestIndex(
  index: DigestIndex,
  options: Omit<DigestOptions, "fast"> & ConfirmEvents = {},
): Promise<DigestIndex> {
  const confirmed: DigestIndex = new Map();

  for (const group of index.values()) {
    const full = await digestFile(group.item.path, { algorithm: options.algorithm });
    const item: TreeItem = { digest: full.digest, path: group.item.path, size: full.size };
    let target = confirmed.get(item.digest);
    if (target === undefined) {
      target = { item, dupes: [] };
      confirmed.set(item.digest, target);
    } else {
      // two fast-digest groups turned out to hold the same content
      target.dupes.push(item.path);
    }

    for (const dupe of group.dupes) {
      if ((await sizeOf(dupe)) !== item.size) {
        options.onRejected?.(item, dupe);
        continue;
      }
      const candidate = await digestFile(dupe, { algorithm: options.algorithm }).catch(
        () => null,
      );
      if (candidate !== null && candidate.digest === item.digest) {
        options.onConfirmed?.(item, dupe);
        target.dupes.push(dupe);
      } else {
        options.onRejected?.(item, dupe);
      }
    }
  }

  return confirmed;
}

/** Size of a file, or null when it cannot be stat'ed. */
async function sizeOf(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch {
    return null;
  }
}
