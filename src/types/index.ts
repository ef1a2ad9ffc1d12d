/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  MarkupConfig,
  LanguageConfig,
  TemplateConfig,
  TypesetterConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Document model
export type {
  SourceDocument,
  LineKind,
  ClassifiedLine,
  Line,
  TitleBlock,
  ParagraphBlock,
  QuoteBlock,
  VerseBlock,
  SceneBreakBlock,
  BodyBlock,
  Block,
  BlockKind,
  Chapter,
  MarkupDocument,
  QuotePair,
  QuoteStyle,
} from "./document";

// Context
export type { ConversionContext, ConvertOptions } from "./context";
