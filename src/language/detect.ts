import { franc } from "franc";
import { DETECTABLE_LANGUAGES, normalizeLocale } from "./locales";

/**
 * Guess the locale of a text
 *
 * Only languages with a quote style are considered, since any other
 * result would fall back to the default glyphs anyway. Returns undefined
 * when the text is too short to tell.
 */
export function detectLocale(text: string): string | undefined {
  const code = franc(text, { only: DETECTABLE_LANGUAGES });
  if (code === "und") {
    return undefined;
  }
  return normalizeLocale(code);
}
