/**
 * Temporary directory trees for filesystem tests.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createHash } from "node:crypto";

/** Relative path ("/"-separated) → file contents. */
export type TreeSpec = Record<string, string | Uint8Array>;

export interface TempTree {
  root: string;
  path(relativePath: string): string;
  remove(): Promise<void>;
}

export async function writeTree(root: string, spec: TreeSpec): Promise<void> {
  for (const [relativePath, content] of Object.entries(spec)) {
    const path = join(root, ...relativePath.split("/"));
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

/** Creates a fresh directory under the OS temp dir and fills it. */
export async function createTempTree(
  spec: TreeSpec = {},
  prefix = "tree-test-",
): Promise<TempTree> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  await writeTree(root, spec);
  return {
    root,
    path: (relativePath) => join(root, ...relativePath.split("/")),
    remove: () => rm(root, { recursive: true, force: true }),
  };
}

/** Reference SHA-256 of in-memory content, hex encoded. */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
