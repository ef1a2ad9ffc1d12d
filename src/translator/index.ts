/**
 * Text-to-LaTeX translator
 * Pure, synchronous transform chain: SourceDocument → Line[] → Block[] → LaTeX
 */

import type {
  Chapter,
  Line,
  MarkupConfig,
  MarkupDocument,
  QuoteStyle,
  SourceDocument,
} from "../types";
import { resolveQuoteStyle } from "../language";
import { classifyLine, stripNotes } from "./classify";
import { transformInline } from "./inline";
import { assembleBlocks, isBodyBlock, isTitleBlock } from "./assemble";
import { composeDocument, type DocumentTemplate } from "./compose";

export { classifyLine, stripNotes } from "./classify";
export {
  transformInline,
  escapeReserved,
  convertEmphasis,
  normalizeDashes,
  substituteQuotes,
} from "./inline";
export { assembleBlocks, isBodyBlock, isTitleBlock } from "./assemble";
export { composeDocument, renderBlock, renderBody } from "./compose";
export type {
  ComposeOptions,
  DocumentTemplate,
  DocumentTemplateContext,
} from "./compose";

export interface DocumentMetadata {
  title: string;
  author: string;
  locale?: string;
}

/**
 * Classify, transform and assemble the lines of one file
 */
export function translateSource(
  source: SourceDocument,
  style: QuoteStyle,
  markup: MarkupConfig,
): Chapter {
  const lines: Line[] = source.lines.map((raw, position) => {
    const stripped = stripNotes(raw);
    const { kind, text } = classifyLine(stripped, position, markup);
    return { kind, text: transformInline(text, style), source: stripped };
  });

  const blocks = assembleBlocks(lines, markup);

  return {
    source: source.path,
    heading: blocks.find(isTitleBlock) ?? { kind: "title", text: "" },
    blocks: blocks.filter(isBodyBlock),
  };
}

export function buildDocument(
  sources: SourceDocument[],
  metadata: DocumentMetadata,
  markup: MarkupConfig,
): MarkupDocument {
  const style = resolveQuoteStyle(metadata.locale);

  return {
    title: transformInline(metadata.title, style),
    author: transformInline(metadata.author, style),
    locale: metadata.locale,
    chapters: sources.map((source) => translateSource(source, style, markup)),
  };
}

/**
 * Translate source documents straight to LaTeX source text
 */
export function translate(
  sources: SourceDocument[],
  metadata: DocumentMetadata,
  template: DocumentTemplate,
  markup: MarkupConfig,
  wideLineSpacing = false,
): string {
  const document = buildDocument(sources, metadata, markup);
  return composeDocument(document, template, { ...markup, wideLineSpacing });
}
