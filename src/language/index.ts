/**
 * Language exports
 */

export { detectLocale } from "./detect";
export {
  babelLanguage,
  normalizeLocale,
  resolveQuoteStyle,
  FALLBACK_QUOTE_STYLE,
} from "./locales";
