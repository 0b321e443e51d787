import {
  openInput,
  openOutput,
  readLines,
  type OutputTarget,
} from "@treetool/core/io";
import {
  countDupes,
  formatGroup,
  readDigestIndex,
  type DigestIndex,
} from "@treetool/core/tree";
import type { CommandContext } from "../context.js";

/**
 * Opens the output, hands it to `fn` and closes it. A file left half
 * written by a failure is destroyed rather than flushed.
 */
export async function withOutput(
  ctx: CommandContext,
  path: string | undefined,
  fn: (output: OutputTarget) => Promise<void>,
): Promise<void> {
  const output = await openOutput(path, ctx.stdio);
  try {
    await fn(output);
  } catch (err: unknown) {
    if (output.kind === "file") {
      output.stream.destroy();
    }
    throw err;
  }
  await output.close();
}

export async function readIndexFrom(
  ctx: CommandContext,
  path: string | undefined,
  withDupes: boolean,
): Promise<DigestIndex> {
  const input = await openInput(path, ctx.stdio);
  ctx.logger.debug({ input: input.name }, "reading digest index");
  const index = await readDigestIndex(readLines(input), { withDupes });
  ctx.logger.trace(
    { input: input.name, items: index.size, dupes: countDupes(index) },
    "read digest index",
  );
  return index;
}

export async function writeIndex(output: OutputTarget, index: DigestIndex): Promise<void> {
  for (const group of index.values()) {
    await output.write(formatGroup(group));
  }
}
