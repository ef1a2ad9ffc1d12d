/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { MarkupDocument, SourceDocument } from "./document";
import type { DocumentTemplate } from "../translator";
import type { Logger } from "../utils/logger";

/**
 * Per-run options, usually taken from the command line
 */
export interface ConvertOptions {
  sources: string[]; // Input files, in chapter order
  title: string;
  author: string;
  basepath?: string; // Directory the input paths are relative to
  output: string; // Output base name, without extension
  outputDirectory: string; // Where the .pdf (or .tex) ends up
  language?: string; // Locale tag; detected when absent
  wideLineSpacing: boolean;
  texOnly: boolean; // Stop after writing the .tex file
}

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  options: ConvertOptions;
  logger: Logger;
  startTime: number;

  template?: DocumentTemplate; // Template loader fills this
  sources?: SourceDocument[]; // Reader fills this
  document?: MarkupDocument; // Translator fills these
  latex?: string;
  texPath?: string; // Writer fills these
  buildDirectory?: string;
  pdfPath?: string; // Typesetter fills this
}
