/**
 * Processor Module
 * Picks the locale and runs the translator over all source documents
 */

import { detectLocale, normalizeLocale } from "../language";
import { buildDocument, composeDocument } from "../translator";
import type { ConversionContext, SourceDocument } from "../types";

function joinSources(sources: SourceDocument[]): string {
  return sources.map((source) => source.lines.join("\n")).join("\n\n");
}

/**
 * Locale priority: command line > config default > detection
 */
export function resolveLocale(ctx: ConversionContext): string | undefined {
  const { config, options, sources, logger } = ctx;

  const explicit = options.language ?? config.language.default;
  if (explicit) {
    return normalizeLocale(explicit);
  }

  if (!config.language.detect || !sources) {
    return undefined;
  }

  const detected = detectLocale(joinSources(sources));
  if (detected) {
    logger.debug(`Detected language: ${detected}`);
  } else {
    logger.warn("Couldn't detect the text language, using default quotes");
  }
  return detected;
}

/**
 * Writes to context:
 * - document: the assembled chapters with transformed title and author
 * - latex: the complete LaTeX source
 */
export function process(ctx: ConversionContext): void {
  if (!ctx.sources || !ctx.template) {
    throw new Error("Template loader and reader must run before processor");
  }

  const { config, options } = ctx;
  const document = buildDocument(
    ctx.sources,
    {
      title: options.title,
      author: options.author,
      locale: resolveLocale(ctx),
    },
    config.markup,
  );

  ctx.document = document;
  ctx.latex = composeDocument(document, ctx.template, {
    ...config.markup,
    wideLineSpacing: options.wideLineSpacing,
  });
}
