/**
 * Inline Transformer
 * Rewrites the text of one line into LaTeX-safe markup
 *
 * Steps run in a fixed order and none of them produces characters that a
 * later step looks for:
 *   1. escape reserved characters
 *   2. underscore pairs → \emph{...}
 *   3. dash normalisation
 *   4. locale quotes
 */

import type { QuoteStyle } from "../types";

export const EMPHASIS_START = "\\emph{";
export const EMPHASIS_END = "}";
export const EM_DASH = "\\textemdash{}";
export const EN_DASH = "\\textendash{}";

const ESCAPED_UNDERSCORE = "\\_";

// The ten characters LaTeX treats specially in running text
const RESERVED: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "#": "\\#",
  "%": "\\%",
  _: ESCAPED_UNDERSCORE,
  "~": "\\textasciitilde{}",
  "^": "\\textasciicircum{}",
};

const RESERVED_PATTERN = /[\\{}$&#%_~^]/g;
const DASH_PATTERN = /(?<!-)-{1,2}(?!-)/g;
const QUOTE_PATTERN = /["']/g;
const SPACE = /\s/;
const LETTER = /\p{L}/u;

export function escapeReserved(text: string): string {
  return text.replace(RESERVED_PATTERN, (char) => RESERVED[char]);
}

/**
 * Pair escaped underscores left to right; an odd one out stays literal
 */
export function convertEmphasis(text: string): string {
  const parts = text.split(ESCAPED_UNDERSCORE);
  const delimiters = parts.length - 1;
  const paired = delimiters - (delimiters % 2);

  let result = parts[0];
  for (let i = 1; i < parts.length; i++) {
    if (i > paired) {
      result += ESCAPED_UNDERSCORE + parts[i];
    } else {
      result += (i % 2 === 1 ? EMPHASIS_START : EMPHASIS_END) + parts[i];
    }
  }
  return result;
}

function isSpaceOrEdge(char: string): boolean {
  return char === "" || SPACE.test(char);
}

/**
 * Normalise runs of one or two hyphens
 *
 * - flanked by whitespace (or the line edge) on both sides → em-dash
 * - two hyphens between non-space characters → en-dash
 * - a single hyphen inside a word stays a hyphen
 */
export function normalizeDashes(text: string): string {
  return text.replace(DASH_PATTERN, (run: string, offset: number) => {
    const spacedBefore = isSpaceOrEdge(text.charAt(offset - 1));
    const spacedAfter = isSpaceOrEdge(text.charAt(offset + run.length));

    if (spacedBefore && spacedAfter) return EM_DASH;
    if (run.length === 2 && !spacedBefore && !spacedAfter) return EN_DASH;
    return run;
  });
}

/**
 * Replace straight quotes with the locale glyphs
 *
 * Double quotes alternate open/close by occurrence within the line.
 * A single quote between two letters is an apostrophe; the remaining
 * single quotes alternate with their own counter.
 */
export function substituteQuotes(text: string, style: QuoteStyle): string {
  let doubles = 0;
  let singles = 0;

  return text.replace(QUOTE_PATTERN, (mark: string, offset: number) => {
    if (mark === '"') {
      doubles++;
      return doubles % 2 === 1 ? style.double.open : style.double.close;
    }

    const before = text.charAt(offset - 1);
    const after = text.charAt(offset + 1);
    if (LETTER.test(before) && LETTER.test(after)) {
      return style.apostrophe;
    }

    singles++;
    return singles % 2 === 1 ? style.single.open : style.single.close;
  });
}

export function transformInline(text: string, style: QuoteStyle): string {
  const escaped = escapeReserved(text);
  const emphasized = convertEmphasis(escaped);
  const dashed = normalizeDashes(emphasized);
  return substituteQuotes(dashed, style);
}
