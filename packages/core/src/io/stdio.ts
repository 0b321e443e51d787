/**
 * "Named file or standard stream" adapters for command line arguments.
 *
 * An optional path argument selects the variant: no path (or "-" for
 * input) means the process's standard stream, anything else names a file.
 */

import { open } from "node:fs/promises";
import { once } from "node:events";
import { createInterface } from "node:readline";
import { pipeline } from "node:stream/promises";
import type { Readable, Writable } from "node:stream";
import { toIoError } from "../errors/catalog.js";

export const STDIN_NAME = "stdin";
export const STDOUT_NAME = "stdout";
export const PWD_NAME = "pwd";

/** Process streams, replaceable in tests. */
export interface StdioStreams {
  stdin: Readable;
  stdout: Writable;
}

export function processStdio(): StdioStreams {
  return { stdin: process.stdin, stdout: process.stdout };
}

export type InputSource =
  | { kind: "stdin"; name: string; stream: Readable }
  | { kind: "file"; name: string; path: string; stream: Readable };

export interface OutputTarget {
  readonly kind: "stdout" | "file";
  readonly name: string;
  readonly stream: Writable;
  /** Writes text, waiting for the stream to drain when it is full. */
  write(text: string): Promise<void>;
  /** Ends a file stream; standard output is only flushed, never ended. */
  close(): Promise<void>;
}

function isStdin(path?: string): path is undefined | "-" {
  return path === undefined || path === "-";
}

export function inputName(path?: string): string {
  return isStdin(path) ? STDIN_NAME : path;
}

export function outputName(path?: string): string {
  return path ?? STDOUT_NAME;
}

/** The given directory, or the current working directory. */
export function resolveDir(path?: string): string {
  return path ?? process.cwd();
}

export function dirName(path?: string): string {
  return path ?? PWD_NAME;
}

export async function openInput(
  path?: string,
  stdio: StdioStreams = processStdio(),
): Promise<InputSource> {
  if (isStdin(path)) {
    return { kind: "stdin", name: STDIN_NAME, stream: stdio.stdin };
  }
  try {
    const handle = await open(path, "r");
    return { kind: "file", name: path, path, stream: handle.createReadStream() };
  } catch (err: unknown) {
    throw toIoError(err, path);
  }
}

export async function openOutput(
  path?: string,
  stdio: StdioStreams = processStdio(),
): Promise<OutputTarget> {
  if (path === undefined) {
    return new StreamOutput("stdout", STDOUT_NAME, stdio.stdout);
  }
  try {
    const handle = await open(path, "w");
    return new StreamOutput("file", path, handle.createWriteStream());
  } catch (err: unknown) {
    throw toIoError(err, path);
  }
}

class StreamOutput implements OutputTarget {
  private failure: unknown = null;

  constructor(
    readonly kind: "stdout" | "file",
    readonly name: string,
    readonly stream: Writable,
  ) {
    stream.on("error", (err) => {
      this.failure = err;
    });
  }

  async write(text: string): Promise<void> {
    this.check();
    if (!this.stream.write(text)) {
      try {
        await once(this.stream, "drain");
      } catch (err: unknown) {
        throw toIoError(err, this.name);
      }
    }
  }

  async close(): Promise<void> {
    this.check();
    if (this.kind === "stdout") {
      if (this.stream.writableNeedDrain) {
        await once(this.stream, "drain");
      }
      return;
    }
    this.stream.end();
    try {
      await once(this.stream, "close");
    } catch (err: unknown) {
      throw toIoError(err, this.name);
    }
    this.check();
  }

  private check(): void {
    if (this.failure !== null) {
      throw toIoError(this.failure, this.name);
    }
  }
}

/**
 * Lines of the input without their terminators. A file input is destroyed
 * (closing its handle) once iteration ends, even when the consumer stops
 * early or throws; standard input is left open.
 */
export async function* readLines(input: InputSource): AsyncGenerator<string> {
  const rl = createInterface({ input: input.stream, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (err: unknown) {
    throw toIoError(err, input.name);
  } finally {
    rl.close();
    if (input.kind === "file") {
      input.stream.destroy();
    }
  }
}

/** Copies every byte of the input to the output; the caller closes the output. */
export async function copyInput(
  input: InputSource,
  output: OutputTarget,
): Promise<void> {
  try {
    await pipeline(input.stream, output.stream, { end: false });
  } catch (err: unknown) {
    throw toIoError(err, input.name);
  }
}
