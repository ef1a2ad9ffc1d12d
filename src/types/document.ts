/**
 * Document model shared by the translator stages
 *
 * SourceDocument → Line[] → Block[] → Chapter → MarkupDocument
 */

/**
 * One input text file, read once and never modified
 */
export interface SourceDocument {
  path: string;
  lines: string[];
}

export type LineKind = "title" | "blank" | "verse" | "quote" | "paragraph";

export interface ClassifiedLine {
  kind: LineKind;
  // Content with the block marker prefix removed
  text: string;
}

export interface Line extends ClassifiedLine {
  // Raw line after editorial notes were stripped (used for scene breaks)
  source: string;
}

// ============================================================================
// Blocks
// ============================================================================

export interface TitleBlock {
  kind: "title";
  text: string;
}

export interface ParagraphBlock {
  kind: "paragraph";
  lines: string[];
}

export interface QuoteBlock {
  kind: "quote";
  lines: string[];
}

export interface VerseBlock {
  kind: "verse";
  stanzas: string[][];
}

export interface SceneBreakBlock {
  kind: "sceneBreak";
}

export type BodyBlock = ParagraphBlock | QuoteBlock | VerseBlock | SceneBreakBlock;
export type Block = TitleBlock | BodyBlock;
export type BlockKind = Block["kind"];

export interface Chapter {
  source: string;
  heading: TitleBlock;
  blocks: BodyBlock[];
}

export interface MarkupDocument {
  // Already inline-transformed, ready for the template
  title: string;
  author: string;
  // Normalised locale tag, undefined when unknown
  locale?: string;
  chapters: Chapter[];
}

// ============================================================================
// Locale glyphs
// ============================================================================

export interface QuotePair {
  open: string;
  close: string;
}

export interface QuoteStyle {
  double: QuotePair;
  single: QuotePair;
  apostrophe: string;
}
