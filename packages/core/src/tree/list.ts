import { stat } from "node:fs/promises";
import { join } from "node:path";
import { toIoError } from "../errors/catalog.js";
import { digestFile, type DigestOptions } from "./digest.js";
import { mapWithConcurrency } from "./pool.js";
import type { SymlinkPolicy, TreeItem } from "./types.js";
import { walkTree, type WalkedFile } from "./walk.js";

export interface TreeListOptions extends DigestOptions {
  /** Files larger than this many bytes are neither digested nor listed. */
  maxSize?: number;
  concurrency?: number;
  symlinks?: SymlinkPolicy;
}

/**
 * Digests every regular file below `root`. Item paths are `root` joined
 * with the file's relative path, so a relative root gives relative paths.
 * Items can repeat a digest; see indexFromList for grouping them.
 */
export async function buildTreeList(
  root: string,
  options: TreeListOptions = {},
): Promise<TreeItem[]> {
  const maxSize = options.maxSize ?? Number.MAX_SAFE_INTEGER;
  const files = await walkTree(root, { symlinks: options.symlinks });

  const candidates: WalkedFile[] = [];
  for (const file of files) {
    let size: number;
    try {
      size = (await stat(file.path)).size;
    } catch (err: unknown) {
      throw toIoError(err, file.path);
    }
    if (size <= maxSize) {
      candidates.push(file);
    }
  }

  return mapWithConcurrency(
    candidates,
    options.concurrency ?? 1,
    async (file): Promise<TreeItem> => {
      const { digest, size } = await digestFile(file.path, {
        algorithm: options.algorithm,
        fast: options.fast,
      });
      return { digest, path: join(root, file.relativePath), size };
    },
  );
}
