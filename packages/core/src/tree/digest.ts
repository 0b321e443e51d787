import { createHash } from "node:crypto";
import { open, type FileHandle } from "node:fs/promises";
import { blake2b } from "@noble/hashes/blake2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { NotAFileError, isErrnoException, toIoError } from "../errors/catalog.js";
import type { DigestAlgorithm } from "./types.js";

/** Files are read 1 MiB at a time. */
export const CHUNK_SIZE = 1_048_576;

export const DIGEST_LENGTH = 32;

interface Hasher {
  update(chunk: Uint8Array): void;
  hex(): string;
}

export function createHasher(algorithm: DigestAlgorithm): Hasher {
  switch (algorithm) {
    case "sha256": {
      const hash = createHash("sha256");
      return {
        update: (chunk) => {
          hash.update(chunk);
        },
        hex: () => hash.digest("hex"),
      };
    }
    case "blake2b": {
      const hash = blake2b.create({ dkLen: DIGEST_LENGTH });
      return {
        update: (chunk) => {
          hash.update(chunk);
        },
        hex: () => bytesToHex(hash.digest()),
      };
    }
  }
}

export interface DigestOptions {
  algorithm?: DigestAlgorithm;
  /**
   * Hash only the first and the last 1 MiB. Much faster on large files and
   * close enough for candidate matching; confirm with a full digest.
   */
  fast?: boolean;
}

export interface FileDigest {
  digest: string;
  size: number;
  modifiedTime: Date;
}

/** Byte ranges [start, end) hashed for a file of the given size. */
export function digestRanges(size: number, fast: boolean): Array<[number, number]> {
  if (!fast || size <= CHUNK_SIZE) {
    return [[0, size]];
  }
  return [
    [0, CHUNK_SIZE],
    [Math.max(CHUNK_SIZE, size - CHUNK_SIZE), size],
  ];
}

/**
 * Digests a regular file. Size and mtime come from the same open handle
 * that is read, so they describe the hashed contents.
 */
export async function digestFile(
  path: string,
  options: DigestOptions = {},
): Promise<FileDigest> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "EISDIR") {
      throw new NotAFileError(path);
    }
    throw toIoError(err, path);
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new NotAFileError(path);
    }

    const hasher = createHasher(options.algorithm ?? "sha256");
    const buffer = Buffer.allocUnsafe(CHUNK_SIZE);

    for (const [start, end] of digestRanges(stats.size, options.fast ?? false)) {
      let position = start;
      while (position < end) {
        const length = Math.min(CHUNK_SIZE, end - position);
        const { bytesRead } = await handle.read(buffer, 0, length, position);
        if (bytesRead === 0) {
          break; // truncated while reading
        }
        hasher.update(buffer.subarray(0, bytesRead));
        position += bytesRead;
      }
    }

    return { digest: hasher.hex(), size: stats.size, modifiedTime: stats.mtime };
  } catch (err: unknown) {
    throw toIoError(err, path);
  } finally {
    await handle.close();
  }
}
