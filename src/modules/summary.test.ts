import { describe, it, expect } from "vitest";
import { countBlocks, formatDuration } from "./summary";

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});

describe("countBlocks", () => {
  it("counts body blocks by kind across chapters", () => {
    expect(
      countBlocks([
        {
          source: "a.txt",
          heading: { kind: "title", text: "A" },
          blocks: [
            { kind: "paragraph", lines: ["x"] },
            { kind: "sceneBreak" },
            { kind: "paragraph", lines: ["y"] },
          ],
        },
        {
          source: "b.txt",
          heading: { kind: "title", text: "B" },
          blocks: [{ kind: "verse", stanzas: [["z"]] }],
        },
      ]),
    ).toEqual({ paragraph: 2, quote: 0, verse: 1, sceneBreak: 1 });
  });
});
