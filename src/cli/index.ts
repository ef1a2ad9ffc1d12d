#!/usr/bin/env node

/**
 * CLI entry point for txt2tex
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("txt2tex")
  .description("Typeset plain text manuscripts into a single PDF through LaTeX")
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("<paths...>", "text file(s), one chapter each, in reading order")
  .option("-t, --title <words...>", "document title")
  .option("-a, --author <words...>", "document author")
  .option("-b, --basepath <path>", "base directory of the text file(s)")
  .option("-o, --output <name>", "output file name, without extension", "nameless")
  .option("-d, --output-dir <path>", "directory to write the output to", ".")
  .option("-l, --language <tag>", "language tag (e.g. en, sv); detected when omitted")
  .option("-w, --wide-line-spacing", "extra wide line spacing")
  .option("--tex-only", "write the LaTeX source and skip the PDF")
  .option("-c, --config <path>", "path to custom config file")
  .option("-v, --verbose", "verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
