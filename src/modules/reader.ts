/**
 * Reader Module
 * Reads every input file into a SourceDocument, in the order given
 */

import { readFile } from "fs/promises";
import path from "node:path";
import { EncodingError, InputError } from "../utils";
import type { ConversionContext, SourceDocument } from "../types";

const LINE_BREAK = /\r\n|\r|\n/;
const REPLACEMENT_CHARACTER = "\uFFFD";

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

/**
 * Decode UTF-8, rejecting malformed byte sequences
 * The BOM, if any, is dropped.
 */
export function decodeText(buffer: Buffer, filePath: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    // Decode leniently to find the first line holding a replacement character
    const lenient = new TextDecoder("utf-8").decode(buffer);
    const index = splitLines(lenient).findIndex((line) =>
      line.includes(REPLACEMENT_CHARACTER),
    );
    throw new EncodingError(filePath, index === -1 ? undefined : index + 1);
  }
}

export async function readSource(filePath: string): Promise<SourceDocument> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new InputError(filePath);
    }
    throw new InputError(
      filePath,
      error instanceof Error ? error.message : String(error),
    );
  }

  return { path: filePath, lines: splitLines(decodeText(buffer, filePath)) };
}

/**
 * Writes to context:
 * - sources: one SourceDocument per input path
 */
export async function read(ctx: ConversionContext): Promise<void> {
  const { options, logger } = ctx;
  const basepath = path.resolve(options.basepath ?? ".");

  const sources: SourceDocument[] = [];
  for (const source of options.sources) {
    const filePath = path.resolve(basepath, source);
    logger.debug(`Reading ${filePath}`);
    sources.push(await readSource(filePath));
  }

  ctx.sources = sources;
}
