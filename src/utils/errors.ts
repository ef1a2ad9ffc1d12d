/**
 * Error hierarchy
 *
 * Every error raised by the pipeline is fatal: the run aborts and nothing is
 * handed to the LaTeX engine.
 *
 * - InputError: input file missing or unreadable
 * - EncodingError: input file is not valid UTF-8
 * - TemplateError: template unreadable, unparsable or missing a placeholder
 * - ConfigError: config file is not valid JSON or fails validation
 * - TypesetError: LaTeX binary not found or compilation failed
 */

export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  [key: string]: unknown;
}

export abstract class Txt2TexError extends Error {
  abstract readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;

    // Keep instanceof working for subclasses
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InputError extends Txt2TexError {
  readonly code = "ERR_INPUT";

  constructor(filePath: string, reason?: string) {
    super(
      reason
        ? `Couldn't read input file '${filePath}': ${reason}`
        : `Couldn't find input file '${filePath}'`,
      { filePath },
    );
  }
}

export class EncodingError extends Txt2TexError {
  readonly code = "ERR_ENCODING";

  constructor(filePath: string, lineNumber?: number) {
    super(
      lineNumber === undefined
        ? `Input file '${filePath}' is not valid UTF-8 text`
        : `Input file '${filePath}' is not valid UTF-8 text (line ${lineNumber})`,
      { filePath, lineNumber },
    );
  }
}

export class TemplateError extends Txt2TexError {
  readonly code = "ERR_TEMPLATE";

  constructor(message: string, filePath?: string) {
    super(message, { filePath });
  }
}

export class ConfigError extends Txt2TexError {
  readonly code = "ERR_CONFIG";

  constructor(filePath: string, details: string) {
    super(`Invalid configuration in '${filePath}': ${details}`, { filePath });
  }
}

export class TypesetError extends Txt2TexError {
  readonly code = "ERR_TYPESET";
  // Tail of the engine output
  readonly output: string;
  // .tex/.log files copied next to the output for inspection
  readonly keptFiles: string[];

  constructor(message: string, output = "", keptFiles: string[] = []) {
    super(message);
    this.output = output;
    this.keptFiles = keptFiles;
  }
}
