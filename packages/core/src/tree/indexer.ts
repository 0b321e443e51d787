import { IoError } from "../errors/catalog.js";
import { digestFile } from "./digest.js";
import { mapWithConcurrency } from "./pool.js";
import type { BuildIndexOptions, TreeEntry, TreeIndex } from "./types.js";
import { walkTree } from "./walk.js";

/**
 * Scans `root` and digests every regular file below it.
 *
 * Rejects with NotFoundError / NotADirectoryError for a bad root and with
 * an IoError for the first file or directory that cannot be read; no
 * partial index is ever returned. Read-only.
 */
export async function buildIndex(
  root: string,
  options: BuildIndexOptions = {},
): Promise<TreeIndex> {
  const files = await walkTree(root, { symlinks: options.symlinks });

  const entries = await mapWithConcurrency(
    files,
    options.concurrency ?? 1,
    async (file): Promise<TreeEntry> => {
      try {
        const { digest, size, modifiedTime } = await digestFile(file.path, {
          algorithm: options.algorithm,
        });
        return Object.freeze({
          relativePath: file.relativePath,
          digest,
          size,
          modifiedTime,
        });
      } catch (err: unknown) {
        // a file that stopped being a regular file mid-walk is an i/o failure here
        throw err instanceof IoError ? err : new IoError(file.path, err);
      }
    },
  );

  return new Map(entries.map((entry) => [entry.relativePath, entry]));
}
