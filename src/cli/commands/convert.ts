/**
 * Convert command - Loads config and runs conversion pipeline
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { Converter, type ConversionStep } from "../../converter";
import { summary } from "../../modules";
import { loadConfig, Logger, Txt2TexError, TypesetError } from "../../utils";

const ConvertOptionsSchema = z.object({
  title: z.array(z.string()).optional(),
  author: z.array(z.string()).optional(),
  basepath: z.string().optional(),
  output: z.string().regex(/^[^\\/]+$/, "must be a file name, not a path"),
  outputDir: z.string(),
  language: z.string().optional(),
  wideLineSpacing: z.boolean().optional(),
  texOnly: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

const STEP_TEXT: Record<ConversionStep, string> = {
  template: "Loading template...",
  read: "Reading input...",
  process: "Generating LaTeX source...",
  write: "Writing intermediate files...",
  typeset: "Typesetting PDF...",
};

function reportError(error: unknown): void {
  if (error instanceof TypesetError) {
    if (error.output) {
      console.error(chalk.dim(error.output));
    }
    if (error.keptFiles.length > 0) {
      console.error(`\n  Kept for debugging: ${error.keptFiles.join(", ")}`);
    }
    return;
  }
  if (!(error instanceof Txt2TexError) && !(error instanceof z.ZodError)) {
    console.error(error);
  }
}

export async function convertCommand(
  paths: string[],
  opts: Options,
): Promise<void> {
  // Debug output and the spinner would garble each other
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !opts.verbose,
  }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    for (const error of errors) {
      logger.warn(`${error.message} (ignored)`);
    }

    const converter = new Converter(config, logger);
    const ctx = await converter.run(
      {
        sources: paths,
        title: options.title?.join(" ") ?? "",
        author: options.author?.join(" ") ?? "",
        basepath: options.basepath,
        output: options.output,
        outputDirectory: options.outputDir,
        language: options.language,
        wideLineSpacing: options.wideLineSpacing ?? false,
        texOnly: options.texOnly ?? false,
      },
      (step) => {
        spinner.text = STEP_TEXT[step];
      },
    );

    spinner.stop();
    summary(ctx);
  } catch (error) {
    if (error instanceof z.ZodError) {
      spinner.fail(`Invalid options\n${z.prettifyError(error)}`);
    } else {
      spinner.fail(
        error instanceof Txt2TexError ? error.message : "Conversion failed",
      );
    }
    reportError(error);
    process.exit(1);
  }
}
