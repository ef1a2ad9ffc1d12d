import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Converter } from "./converter";
import { Logger, loadDefaultConfig, TemplateError, TypesetError } from "./utils";
import type { ConversionConfig, ConvertOptions } from "./types";

// Engines are Node scripts; the .tex path always comes last
const FAKE_ENGINE = `
const { writeFileSync } = require("fs");
const tex = process.argv[process.argv.length - 1];
writeFileSync(tex.replace(/\\.tex$/, ".pdf"), "fake pdf");
`;

const FAILING_ENGINE = `
console.log("! Undefined control sequence.");
process.exit(1);
`;

describe("Converter", () => {
  let tempDir: string;
  let outDir: string;
  let config: ConversionConfig;
  const logger = new Logger("error");

  function options(overrides: Partial<ConvertOptions> = {}): ConvertOptions {
    return {
      sources: ["one.txt", "two.txt"],
      title: "The Book",
      author: "A. Writer",
      basepath: tempDir,
      output: "book",
      outputDirectory: outDir,
      wideLineSpacing: false,
      texOnly: true,
      ...overrides,
    };
  }

  function useEngine(name: string, script: string): void {
    const path = join(tempDir, name);
    writeFileSync(path, script);
    config.typesetter.binary = process.execPath;
    config.typesetter.args = [path];
  }

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), "txt2tex-converter-test-"));
    outDir = join(tempDir, "out");
    writeFileSync(join(tempDir, "one.txt"), "Chapter One\n\nHello world.\n");
    writeFileSync(join(tempDir, "two.txt"), "Chapter Two\n\nGoodbye.\n");
    config = await loadDefaultConfig();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("tex only", () => {
    it("writes the LaTeX source to the output directory", async () => {
      const ctx = await new Converter(config, logger).run(
        options({ language: "en" }),
      );

      const texPath = join(outDir, "book.tex");
      expect(ctx.texPath).toBe(texPath);
      expect(ctx.pdfPath).toBeUndefined();

      const latex = readFileSync(texPath, "utf-8");
      expect(latex).toBe(ctx.latex);
      expect(latex).toContain("\\title{%\nThe Book%\n}");
      expect(latex.indexOf("Hello world.")).toBeLessThan(
        latex.indexOf("Goodbye."),
      );
    });

    it("prefers the command line language over the config default", async () => {
      config.language.default = "de";
      const ctx = await new Converter(config, logger).run(
        options({ language: "sv-SE" }),
      );
      expect(ctx.document?.locale).toBe("sv");
    });

    it("falls back to the configured default language", async () => {
      config.language.default = "de";
      const ctx = await new Converter(config, logger).run(options());
      expect(ctx.document?.locale).toBe("de");
      expect(ctx.latex).toContain("\\usepackage[ngerman]{babel}");
    });

    it("leaves the language unknown when detection is off", async () => {
      config.language.detect = false;
      const ctx = await new Converter(config, logger).run(options());
      expect(ctx.document?.locale).toBeUndefined();
    });

    it("fails on the template before reading any input", async () => {
      const templatePath = join(tempDir, "broken.tex.hbs");
      writeFileSync(templatePath, "{{title}} {{author}}");
      config.template.path = templatePath;

      await expect(
        new Converter(config, logger).run(options({ sources: ["missing.txt"] })),
      ).rejects.toThrow(TemplateError);
      expect(existsSync(outDir)).toBe(false);
    });
  });

  describe("typesetting", () => {
    it("copies the PDF and removes the build directory", async () => {
      useEngine("fake-latex.cjs", FAKE_ENGINE);

      const ctx = await new Converter(config, logger).run(
        options({ texOnly: false, language: "en" }),
      );

      expect(ctx.pdfPath).toBe(join(outDir, "book.pdf"));
      expect(readFileSync(join(outDir, "book.pdf"), "utf-8")).toBe("fake pdf");
      expect(ctx.buildDirectory).toBeDefined();
      expect(existsSync(ctx.buildDirectory ?? "")).toBe(false);
    });

    it("keeps the LaTeX source when the engine fails", async () => {
      useEngine("failing-latex.cjs", FAILING_ENGINE);

      const error = await new Converter(config, logger)
        .run(options({ texOnly: false, language: "en" }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TypesetError);
      if (!(error instanceof TypesetError)) return;
      expect(error.message).toBe("LaTeX failed with exit code 1");
      expect(error.output).toBe("! Undefined control sequence.");
      expect(error.keptFiles).toEqual([join(outDir, "book.tex")]);
      expect(existsSync(join(outDir, "book.pdf"))).toBe(false);
    });

    it("reports a missing engine", async () => {
      config.typesetter.binary = "txt2tex-no-such-engine";
      config.typesetter.searchDirectories = [];

      await expect(
        new Converter(config, logger).run(
          options({ texOnly: false, language: "en" }),
        ),
      ).rejects.toThrow("Couldn't find 'txt2tex-no-such-engine' on your system");
    });
  });
});
