/**
 * Document Composer
 * Maps blocks to LaTeX and fills the document template
 */

import type { Block, Chapter, MarkupConfig, MarkupDocument } from "../types";
import { babelLanguage } from "../language";

export type RenderOptions = Pick<
  MarkupConfig,
  "headingCommand" | "sceneBreakGap"
>;

export interface ComposeOptions extends RenderOptions {
  wideLineSpacing?: boolean;
}

/**
 * Values handed to the document template
 */
export interface DocumentTemplateContext {
  title: string;
  author: string;
  body: string;
  language: string;
  multipleChapters: boolean;
  wideLineSpacing: boolean;
}

export type DocumentTemplate = (context: DocumentTemplateContext) => string;

// \relax stops \\ from reading a leading [ or * of the next line as its argument
const FORCED_BREAK = "\\\\\\relax\n";
const EMPTY_LINE = "\\mbox{}";
const LEADING_SPACE = /^\s+/;

function renderHeading(text: string, command: string): string {
  const heading = `\\${command}{${text}}`;
  if (!command.endsWith("*")) {
    return heading;
  }
  // Starred headings stay out of the table of contents unless added by hand
  const level = command.slice(0, -1);
  return `${heading}\n\\addcontentsline{toc}{${level}}{${text}}`;
}

/**
 * Leading empty lines are dropped, since \\ cannot end a line that has not
 * started. Later empty lines keep their place as an empty box.
 */
function renderQuoteLines(lines: string[]): string {
  const start = lines.findIndex((line) => line !== "");
  if (start === -1) {
    return "";
  }
  return lines
    .slice(start)
    .map((line) => (line === "" ? EMPTY_LINE : line))
    .join(FORCED_BREAK);
}

function renderVerseLine(line: string): string {
  const indent = LEADING_SPACE.exec(line);
  if (!indent) {
    return line;
  }
  const width = indent[0].length * 0.5;
  return `\\hspace*{${width}em}${line.slice(indent[0].length)}`;
}

export function renderBlock(block: Block, options: RenderOptions): string {
  switch (block.kind) {
    case "title":
      return renderHeading(block.text, options.headingCommand);
    case "paragraph":
      return block.lines.join(" ");
    case "quote":
      return [
        "\\begin{quote}",
        renderQuoteLines(block.lines),
        "\\end{quote}",
      ].join("\n");
    case "verse":
      return [
        "\\begin{verse}",
        block.stanzas
          .map((stanza) => stanza.map(renderVerseLine).join(FORCED_BREAK))
          .join("\n\n"),
        "\\end{verse}",
      ].join("\n");
    case "sceneBreak":
      return `\\vspace{${options.sceneBreakGap}}`;
  }
}

/**
 * Concatenate every chapter's heading and body blocks in the order given
 */
export function renderBody(chapters: Chapter[], options: RenderOptions): string {
  return chapters
    .flatMap((chapter) => [chapter.heading, ...chapter.blocks])
    .map((block) => renderBlock(block, options))
    .join("\n\n");
}

export function composeDocument(
  document: MarkupDocument,
  template: DocumentTemplate,
  options: ComposeOptions,
): string {
  return template({
    title: document.title,
    author: document.author,
    body: renderBody(document.chapters, options),
    language: babelLanguage(document.locale) ?? "",
    multipleChapters: document.chapters.length > 1,
    wideLineSpacing: options.wideLineSpacing ?? false,
  });
}
