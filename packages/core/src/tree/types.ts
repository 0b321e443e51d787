import type { DigestAlgorithm, SymlinkPolicy } from "../schemas/tool-config.js";

export type { DigestAlgorithm, SymlinkPolicy };

/** One regular file of a scanned tree. */
export interface TreeEntry {
  readonly relativePath: string // "/"-separated, relative to the scan root
  readonly digest: string // lowercase hex, 32 bytes
  readonly size: number
  readonly modifiedTime: Date
}

/** Snapshot of a tree: relative path → entry, in ascending path order. */
export type TreeIndex = ReadonlyMap<string, TreeEntry>;

export interface BuildIndexOptions {
  algorithm?: DigestAlgorithm
  symlinks?: SymlinkPolicy
  /** Files digested at once (default 1). */
  concurrency?: number
}

/** A digested file as written in tree lists and digest indexes. */
export interface TreeItem {
  digest: string
  path: string
  size: number
}

/** An item plus the paths of other files with the same digest. */
export interface DupeGroup {
  item: TreeItem
  dupes: string[]
}

/** digest → group, in insertion order. */
export type DigestIndex = Map<string, DupeGroup>;
