/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { DocumentTemplate, DocumentTemplateContext } from "../translator";
import { TemplateError } from "../utils/errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_TEMPLATE_PATH = join(__dirname, "document.tex.hbs");
export const REQUIRED_PLACEHOLDERS = ["title", "author", "body"] as const;

/**
 * Collects every path expression in a template ({{title}}, {{#if language}}, ...)
 */
class PlaceholderCollector extends Handlebars.Visitor {
  readonly names = new Set<string>();

  PathExpression(path: hbs.AST.PathExpression): void {
    this.names.add(path.original);
  }
}

export function findPlaceholders(source: string): Set<string> {
  const collector = new PlaceholderCollector();
  collector.accept(Handlebars.parse(source));
  return collector.names;
}

/**
 * Compile a LaTeX template after checking it names every required placeholder
 * LaTeX is not HTML, so values are inserted without escaping.
 */
export function compileDocumentTemplate(
  source: string,
  templatePath?: string,
): DocumentTemplate {
  const where = templatePath ? ` '${templatePath}'` : "";

  let placeholders: Set<string>;
  try {
    placeholders = findPlaceholders(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateError(
      `Couldn't parse template${where}: ${reason}`,
      templatePath,
    );
  }

  const missing = REQUIRED_PLACEHOLDERS.filter(
    (name) => !placeholders.has(name),
  );
  if (missing.length > 0) {
    throw new TemplateError(
      `Template${where} is missing placeholder(s): ${missing.join(", ")}`,
      templatePath,
    );
  }

  return Handlebars.compile<DocumentTemplateContext>(source, {
    noEscape: true,
  });
}

/**
 * Load and compile a template from file path or use the built-in one
 */
export async function loadDocumentTemplate(
  templatePath: string | null,
): Promise<DocumentTemplate> {
  const path = templatePath ?? DEFAULT_TEMPLATE_PATH;

  let source: string;
  try {
    source = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateError(`Couldn't read template '${path}': ${reason}`, path);
  }

  return compileDocumentTemplate(source, path);
}
