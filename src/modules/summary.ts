/**
 * Summary Module
 * Displays what was produced, chapter by chapter
 */

import chalk from "chalk";
import path from "node:path";
import type { BlockKind, Chapter, ConversionContext } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Counting
// ============================================================================

export type BlockCounts = Record<Exclude<BlockKind, "title">, number>;

export function countBlocks(chapters: Chapter[]): BlockCounts {
  const counts: BlockCounts = { paragraph: 0, quote: 0, verse: 0, sceneBreak: 0 };
  for (const chapter of chapters) {
    for (const block of chapter.blocks) {
      counts[block.kind]++;
    }
  }
  return counts;
}

// ============================================================================
// Main Summary Display
// ============================================================================

export function summary(ctx: ConversionContext): void {
  const { document, options } = ctx;
  if (!document) {
    return;
  }

  const duration = Date.now() - ctx.startTime;
  console.log("");
  console.log(
    `  ${chalk.green("✔")} ${chalk.bold("Document Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(duration))}`,
  );

  console.log(sectionHeader("Chapters"));
  for (const chapter of document.chapters) {
    const name = path.basename(chapter.source);
    const heading = chapter.heading.text || chalk.italic("untitled");
    console.log(`   ${chalk.cyan("◉")} ${chalk.dim(name.padEnd(18))} ${heading}`);
  }

  const counts = countBlocks(document.chapters);
  console.log(sectionHeader("Blocks"));
  console.log(statRow(chalk.green("◉"), "Paragraphs", counts.paragraph));
  if (counts.quote > 0) {
    console.log(statRow(chalk.green("◉"), "Quotes", counts.quote));
  }
  if (counts.verse > 0) {
    console.log(statRow(chalk.green("◉"), "Verses", counts.verse));
  }
  if (counts.sceneBreak > 0) {
    console.log(statRow(chalk.green("◉"), "Scene breaks", counts.sceneBreak));
  }

  console.log(sectionHeader("Output"));
  console.log(
    statRow(
      chalk.cyan("◉"),
      "Language",
      document.locale ?? "unknown",
      document.locale ? chalk.white : chalk.yellow,
    ),
  );
  if (ctx.pdfPath) {
    console.log(statRow(chalk.cyan("◉"), "PDF", ctx.pdfPath, chalk.green));
  } else if (options.texOnly && ctx.texPath) {
    console.log(statRow(chalk.cyan("◉"), "LaTeX", ctx.texPath, chalk.green));
  }

  console.log("");
}
