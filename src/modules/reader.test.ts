import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { read, readSource } from "./reader";
import { EncodingError, InputError, Logger, loadDefaultConfig } from "../utils";
import type { ConversionContext } from "../types";

describe("reader", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "txt2tex-reader-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("readSource", () => {
    it("splits on any line ending", async () => {
      const file = join(tempDir, "mixed.txt");
      writeFileSync(file, "Title\r\nFirst\nSecond\rThird\n");

      expect(await readSource(file)).toEqual({
        path: file,
        lines: ["Title", "First", "Second", "Third", ""],
      });
    });

    it("drops a byte order mark", async () => {
      const file = join(tempDir, "bom.txt");
      writeFileSync(
        file,
        Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("Rubrik\nText")]),
      );

      const source = await readSource(file);
      expect(source.lines).toEqual(["Rubrik", "Text"]);
    });

    it("reports a missing file with its path", async () => {
      const file = join(tempDir, "missing.txt");
      const error = await readSource(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InputError);
      expect(error).toHaveProperty("message", `Couldn't find input file '${file}'`);
    });

    it("reports invalid UTF-8 with the line number", async () => {
      const file = join(tempDir, "latin1.txt");
      writeFileSync(file, Buffer.from([0x4f, 0x6b, 0x0a, 0xe5, 0x6c, 0x0a]));
      const error = await readSource(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EncodingError);
      expect(error).toHaveProperty("context", { filePath: file, lineNumber: 2 });
    });
  });

  describe("read", () => {
    it("keeps the given order and resolves against the basepath", async () => {
      writeFileSync(join(tempDir, "a.txt"), "Alpha");
      writeFileSync(join(tempDir, "b.txt"), "Beta");

      const ctx: ConversionContext = {
        config: await loadDefaultConfig(),
        options: {
          sources: ["b.txt", "a.txt"],
          title: "",
          author: "",
          basepath: tempDir,
          output: "out",
          outputDirectory: tempDir,
          wideLineSpacing: false,
          texOnly: true,
        },
        logger: new Logger("error"),
        startTime: Date.now(),
      };

      await read(ctx);

      expect(ctx.sources).toEqual([
        { path: join(tempDir, "b.txt"), lines: ["Beta"] },
        { path: join(tempDir, "a.txt"), lines: ["Alpha"] },
      ]);
    });
  });
});
