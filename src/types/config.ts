/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const MarkupConfigSchema = z.object({
  // Single character that opens a quote line when followed by whitespace
  quoteMarker: z.string().length(1),
  // Number of leading spaces that turn a line into verse
  verseIndent: z.number().int().positive(),
  // A line holding only this marker becomes a scene break
  sceneBreakMarker: z.string().min(1),
  // LaTeX sectioning command used for chapter headings, e.g. "chapter*"
  headingCommand: z.string().regex(/^[A-Za-z]+\*?$/),
  // Vertical gap emitted for a scene break (any LaTeX length)
  sceneBreakGap: z.string().min(1),
});

export const LanguageConfigSchema = z.object({
  // Locale tag used when none is given on the command line
  default: z.string().nullable(),
  // Detect the locale from the input text when no tag is known
  detect: z.boolean(),
});

export const TemplateConfigSchema = z.object({
  // Custom Handlebars template; null uses the built-in document.tex.hbs
  path: z.string().nullable(),
});

export const TypesetterConfigSchema = z.object({
  binary: z.string().min(1),
  args: z.array(z.string()),
  // Compilation passes; the table of contents needs two
  passes: z.number().int().positive(),
  timeout: z.number().int().positive(), // In milliseconds
  // Searched with fast-glob when the binary is not on PATH ("~" expands to home)
  searchDirectories: z.array(z.string()),
  keepBuildDirectory: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  markup: MarkupConfigSchema,
  language: LanguageConfigSchema,
  template: TemplateConfigSchema,
  typesetter: TypesetterConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  markup: MarkupConfigSchema.partial().optional(),
  language: LanguageConfigSchema.partial().optional(),
  template: TemplateConfigSchema.partial().optional(),
  typesetter: TypesetterConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type MarkupConfig = z.infer<typeof MarkupConfigSchema>;
export type LanguageConfig = z.infer<typeof LanguageConfigSchema>;
export type TemplateConfig = z.infer<typeof TemplateConfigSchema>;
export type TypesetterConfig = z.infer<typeof TypesetterConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
