import { describe, it, expect } from "vitest";
import { assembleBlocks } from "./assemble";
import { classifyLine } from "./classify";
import type { Line } from "../types";

const options = { quoteMarker: ">", verseIndent: 4, sceneBreakMarker: "*" };

function lines(...raw: string[]): Line[] {
  return raw.map((line, position) => ({
    ...classifyLine(line, position, options),
    source: line,
  }));
}

describe("assembleBlocks", () => {
  it("emits the title as a heading block", () => {
    expect(assembleBlocks(lines("Chapter One"), options)).toEqual([
      { kind: "title", text: "Chapter One" },
    ]);
  });

  it("produces an empty heading for an empty first line", () => {
    expect(assembleBlocks(lines(""), options)).toEqual([
      { kind: "title", text: "" },
    ]);
  });

  describe("paragraphs", () => {
    it("joins consecutive lines into one paragraph", () => {
      expect(assembleBlocks(lines("T", "one", "two", "three"), options)).toEqual(
        [
          { kind: "title", text: "T" },
          { kind: "paragraph", lines: ["one", "two", "three"] },
        ],
      );
    });

    it("never merges across a blank line", () => {
      expect(assembleBlocks(lines("T", "a", "", "b"), options)).toEqual([
        { kind: "title", text: "T" },
        { kind: "paragraph", lines: ["a"] },
        { kind: "paragraph", lines: ["b"] },
      ]);
    });

    it("ignores blank lines while no block is open", () => {
      expect(assembleBlocks(lines("T", "", "", "a", "", ""), options)).toEqual([
        { kind: "title", text: "T" },
        { kind: "paragraph", lines: ["a"] },
      ]);
    });
  });

  describe("quotes", () => {
    it("keeps every quote line", () => {
      expect(
        assembleBlocks(lines("T", "> q1", "> q2", "> q3"), options),
      ).toEqual([
        { kind: "title", text: "T" },
        { kind: "quote", lines: ["q1", "q2", "q3"] },
      ]);
    });

    it("starts a new block when the kind changes", () => {
      expect(assembleBlocks(lines("T", "para", "> q", "after"), options)).toEqual(
        [
          { kind: "title", text: "T" },
          { kind: "paragraph", lines: ["para"] },
          { kind: "quote", lines: ["q"] },
          { kind: "paragraph", lines: ["after"] },
        ],
      );
    });
  });

  describe("verse", () => {
    it("keeps a blank line inside verse as a stanza break", () => {
      expect(
        assembleBlocks(lines("T", "    line1", "", "    line2"), options),
      ).toEqual([
        { kind: "title", text: "T" },
        { kind: "verse", stanzas: [["line1"], ["line2"]] },
      ]);
    });

    it("collapses several blank lines into one stanza break", () => {
      expect(
        assembleBlocks(lines("T", "    a", "", "", "    b"), options),
      ).toEqual([
        { kind: "title", text: "T" },
        { kind: "verse", stanzas: [["a"], ["b"]] },
      ]);
    });

    it("drops a trailing stanza break when a paragraph follows", () => {
      expect(assembleBlocks(lines("T", "    a", "", "After"), options)).toEqual([
        { kind: "title", text: "T" },
        { kind: "verse", stanzas: [["a"]] },
        { kind: "paragraph", lines: ["After"] },
      ]);
    });

    it("closes the verse at end of file", () => {
      expect(
        assembleBlocks(lines("T", "    a", "      b", ""), options),
      ).toEqual([
        { kind: "title", text: "T" },
        { kind: "verse", stanzas: [["a", "  b"]] },
      ]);
    });
  });

  it("turns a lone scene break marker into a scene break", () => {
    expect(assembleBlocks(lines("T", "a", "*", "b"), options)).toEqual([
      { kind: "title", text: "T" },
      { kind: "paragraph", lines: ["a"] },
      { kind: "sceneBreak" },
      { kind: "paragraph", lines: ["b"] },
    ]);
  });

  it("keeps state per call", () => {
    assembleBlocks(lines("T", "> open quote"), options);
    expect(assembleBlocks(lines("U", "text"), options)).toEqual([
      { kind: "title", text: "U" },
      { kind: "paragraph", lines: ["text"] },
    ]);
  });
});
