/**
 * Typesetter Module
 * Runs the LaTeX engine in the build directory and collects the PDF
 */

import { copyFile, mkdir, rm } from "fs/promises";
import path from "node:path";
import { fileExists, findBinary, runCommand, TypesetError } from "../utils";
import type { ConversionContext } from "../types";

const ERROR_TAIL_LINES = 20;

function tail(output: string, lines: number): string {
  return output.trimEnd().split(/\r?\n/).slice(-lines).join("\n");
}

/**
 * Copy the .tex and .log files next to the output so a failed run can be inspected
 */
async function keepForDebugging(
  buildDirectory: string,
  outputDirectory: string,
  basename: string,
): Promise<string[]> {
  await mkdir(outputDirectory, { recursive: true });

  const kept: string[] = [];
  for (const extension of [".tex", ".log"]) {
    const source = path.join(buildDirectory, basename + extension);
    if (await fileExists(source)) {
      const target = path.join(outputDirectory, basename + extension);
      await copyFile(source, target);
      kept.push(target);
    }
  }
  return kept;
}

async function compile(ctx: ConversionContext, binary: string): Promise<void> {
  const { config, options, logger, document } = ctx;
  const { buildDirectory, texPath } = ctx;
  if (!buildDirectory || !texPath) {
    throw new Error("Writer must run before typesetter");
  }

  const outputDirectory = path.resolve(options.outputDirectory);
  // The table of contents only settles on the second pass
  const passes =
    document && document.chapters.length > 1 ? config.typesetter.passes : 1;

  for (let pass = 1; pass <= passes; pass++) {
    logger.debug(`Running ${binary} (pass ${pass}/${passes})`);
    const result = await runCommand(
      binary,
      [
        ...config.typesetter.args,
        `-output-directory=${buildDirectory}`,
        texPath,
      ],
      { cwd: buildDirectory, timeout: config.typesetter.timeout },
    );

    if (!result.success) {
      const kept = await keepForDebugging(
        buildDirectory,
        outputDirectory,
        options.output,
      );
      throw new TypesetError(
        `LaTeX failed with exit code ${result.exitCode}`,
        tail(`${result.stdout}\n${result.stderr}`, ERROR_TAIL_LINES),
        kept,
      );
    }
  }

  const pdfName = `${options.output}.pdf`;
  const pdfPath = path.join(outputDirectory, pdfName);
  await mkdir(outputDirectory, { recursive: true });
  await copyFile(path.join(buildDirectory, pdfName), pdfPath);
  ctx.pdfPath = pdfPath;
}

/**
 * Writes to context:
 * - pdfPath: the PDF copied to the output directory
 *
 * Skipped entirely with texOnly. The build directory is removed afterwards
 * unless the config asks to keep it.
 */
export async function typeset(ctx: ConversionContext): Promise<void> {
  const { config, options, logger } = ctx;
  if (options.texOnly) {
    return;
  }

  try {
    const binary = await findBinary(
      config.typesetter.binary,
      config.typesetter.searchDirectories,
    );
    if (!binary) {
      throw new TypesetError(
        `Couldn't find '${config.typesetter.binary}' on your system`,
      );
    }
    await compile(ctx, binary);
  } finally {
    if (ctx.buildDirectory && !config.typesetter.keepBuildDirectory) {
      await rm(ctx.buildDirectory, { recursive: true, force: true });
      logger.debug(`Removed ${ctx.buildDirectory}`);
    } else if (ctx.buildDirectory) {
      logger.info(`Build files kept in ${ctx.buildDirectory}`);
    }
  }
}
