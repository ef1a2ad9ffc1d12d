/**
 * Locale tables
 * Quote glyphs and babel option names per two-letter language tag
 */

import type { QuoteStyle } from "../types";

const ENGLISH: QuoteStyle = {
  double: { open: "“", close: "”" },
  single: { open: "‘", close: "’" },
  apostrophe: "’",
};

// Swedish and Finnish use the closing glyph on both sides
const NORDIC: QuoteStyle = {
  double: { open: "”", close: "”" },
  single: { open: "’", close: "’" },
  apostrophe: "’",
};

const GERMAN: QuoteStyle = {
  double: { open: "„", close: "“" },
  single: { open: "‚", close: "‘" },
  apostrophe: "’",
};

const GUILLEMETS: QuoteStyle = {
  double: { open: "«", close: "»" },
  single: { open: "‹", close: "›" },
  apostrophe: "’",
};

const QUOTE_STYLES: Record<string, QuoteStyle> = {
  en: ENGLISH,
  nl: ENGLISH,
  sv: NORDIC,
  fi: NORDIC,
  de: GERMAN,
  da: {
    double: { open: "»", close: "«" },
    single: { open: "›", close: "‹" },
    apostrophe: "’",
  },
  fr: GUILLEMETS,
  it: GUILLEMETS,
  no: { ...GUILLEMETS, single: { open: "‘", close: "’" } },
  es: { ...GUILLEMETS, single: { open: "“", close: "”" } },
};

export const FALLBACK_QUOTE_STYLE: QuoteStyle = ENGLISH;

const BABEL_LANGUAGES: Record<string, string> = {
  en: "english",
  nl: "dutch",
  sv: "swedish",
  fi: "finnish",
  de: "ngerman",
  da: "danish",
  fr: "french",
  it: "italian",
  no: "norsk",
  es: "spanish",
};

// ISO 639-3 codes (as returned by franc) of the languages above
const ISO_639_3: Record<string, string> = {
  eng: "en",
  nld: "nl",
  swe: "sv",
  fin: "fi",
  deu: "de",
  dan: "da",
  fra: "fr",
  ita: "it",
  nob: "no",
  nno: "no",
  spa: "es",
};

export const DETECTABLE_LANGUAGES = Object.keys(ISO_639_3);

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Reduce a tag to its lower-case primary subtag
 *
 * @example
 * normalizeLocale("en-GB") // "en"
 * normalizeLocale("swe") // "sv"
 * normalizeLocale("nb_NO") // "no"
 */
export function normalizeLocale(tag: string): string {
  const primary = tag.trim().toLowerCase().split(/[-_]/)[0];
  if (primary === "nb" || primary === "nn") return "no";
  return lookup(ISO_639_3, primary) ?? primary;
}

export function resolveQuoteStyle(tag?: string): QuoteStyle {
  if (!tag) return FALLBACK_QUOTE_STYLE;
  return lookup(QUOTE_STYLES, normalizeLocale(tag)) ?? FALLBACK_QUOTE_STYLE;
}

export function babelLanguage(tag?: string): string | undefined {
  if (!tag) return undefined;
  return lookup(BABEL_LANGUAGES, normalizeLocale(tag));
}
