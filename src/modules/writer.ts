/**
 * Writer Module
 * Writes the LaTeX source where the next step expects it
 */

import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { ConversionContext } from "../types";

/**
 * Writes to context:
 * - texPath: the written .tex file
 * - buildDirectory: temporary directory for the engine (unless texOnly)
 *
 * With texOnly the source goes straight to the output directory.
 */
export async function write(ctx: ConversionContext): Promise<void> {
  if (ctx.latex === undefined) {
    throw new Error("Processor must run before writer");
  }

  const { options, logger } = ctx;
  const filename = `${options.output}.tex`;

  let directory: string;
  if (options.texOnly) {
    directory = path.resolve(options.outputDirectory);
    await mkdir(directory, { recursive: true });
  } else {
    directory = await mkdtemp(path.join(tmpdir(), "txt2tex-"));
    ctx.buildDirectory = directory;
  }

  const texPath = path.join(directory, filename);
  await writeFile(texPath, ctx.latex, "utf-8");
  logger.debug(`Wrote ${texPath}`);

  ctx.texPath = texPath;
}
