import type { ClassifiedLine, MarkupConfig } from "../types";

export type ClassifyOptions = Pick<MarkupConfig, "quoteMarker" | "verseIndent">;

const NOTE_PATTERN = /\[\[.*?\]\]/g;
const WHITESPACE = /\s/;

/**
 * Remove editorial notes written as [[...]] on a single line
 */
export function stripNotes(line: string): string {
  return line.replace(NOTE_PATTERN, "");
}

/**
 * Tag a raw line with its kind and strip the block marker prefix
 *
 * The first line of a file is always the title, even when empty.
 * Verse lines keep whatever whitespace follows the verse indent.
 */
export function classifyLine(
  line: string,
  position: number,
  options: ClassifyOptions,
): ClassifiedLine {
  if (position === 0) {
    return { kind: "title", text: line.trim() };
  }

  if (line.trim() === "") {
    return { kind: "blank", text: "" };
  }

  const { quoteMarker, verseIndent } = options;
  if (
    line.startsWith(quoteMarker) &&
    WHITESPACE.test(line.charAt(quoteMarker.length))
  ) {
    return {
      kind: "quote",
      text: line.slice(quoteMarker.length + 1).trimEnd(),
    };
  }

  if (line.startsWith(" ".repeat(verseIndent))) {
    return { kind: "verse", text: line.slice(verseIndent).trimEnd() };
  }

  return { kind: "paragraph", text: line.trim() };
}
