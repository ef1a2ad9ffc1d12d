/**
 * Converter - Pipeline orchestrator
 * Coordinates the conversion pipeline with zero business logic
 */

import type { ConversionConfig, ConversionContext, ConvertOptions } from "./types";
import type { Logger } from "./utils";
import { loadDocumentTemplate } from "./templates";
import * as modules from "./modules";

export type ConversionStep = "template" | "read" | "process" | "write" | "typeset";

export class Converter {
  constructor(
    private config: ConversionConfig,
    private logger: Logger,
  ) {}

  /**
   * Run the conversion pipeline
   * The template is loaded first so a broken one fails before any file is read
   */
  async run(
    options: ConvertOptions,
    onStep?: (step: ConversionStep) => void,
  ): Promise<ConversionContext> {
    const ctx: ConversionContext = {
      config: this.config,
      options,
      logger: this.logger,
      startTime: Date.now(),
    };

    onStep?.("template");
    ctx.template = await loadDocumentTemplate(this.config.template.path);

    onStep?.("read");
    await modules.read(ctx);

    onStep?.("process");
    modules.process(ctx);

    onStep?.("write");
    await modules.write(ctx);

    onStep?.("typeset");
    await modules.typeset(ctx);

    return ctx;
  }
}
