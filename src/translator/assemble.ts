/**
 * Block Assembler
 * Groups the classified lines of one source document into blocks
 */

import type {
  Block,
  BodyBlock,
  Line,
  MarkupConfig,
  ParagraphBlock,
  QuoteBlock,
  TitleBlock,
  VerseBlock,
} from "../types";

export type AssembleOptions = Pick<MarkupConfig, "sceneBreakMarker">;

type OpenBlock = ParagraphBlock | QuoteBlock | VerseBlock;

export function isTitleBlock(block: Block): block is TitleBlock {
  return block.kind === "title";
}

export function isBodyBlock(block: Block): block is BodyBlock {
  return block.kind !== "title";
}

/**
 * Run the block state machine over one file's lines
 *
 * State is local to the call: the open block (none when null) and the
 * blocks emitted so far.
 */
export function assembleBlocks(
  lines: Line[],
  options: AssembleOptions,
): Block[] {
  const blocks: Block[] = [];
  let open: OpenBlock | null = null;

  function close(): void {
    if (open === null) return;
    if (open.kind === "verse") {
      // A stanza break only separates stanzas; drop the ones left dangling
      while (
        open.stanzas.length > 1 &&
        open.stanzas[open.stanzas.length - 1].length === 0
      ) {
        open.stanzas.pop();
      }
    }
    blocks.push(open);
    open = null;
  }

  for (const line of lines) {
    switch (line.kind) {
      case "title":
        close();
        blocks.push({ kind: "title", text: line.text });
        break;

      case "blank":
        if (open?.kind === "verse") {
          const stanza = open.stanzas[open.stanzas.length - 1];
          if (stanza.length > 0) open.stanzas.push([]);
        } else {
          close();
        }
        break;

      case "paragraph":
        if (line.source.trim() === options.sceneBreakMarker) {
          close();
          blocks.push({ kind: "sceneBreak" });
          break;
        }
        if (open?.kind !== "paragraph") {
          close();
          open = { kind: "paragraph", lines: [] };
        }
        open.lines.push(line.text);
        break;

      case "quote":
        if (open?.kind !== "quote") {
          close();
          open = { kind: "quote", lines: [] };
        }
        open.lines.push(line.text);
        break;

      case "verse":
        if (open?.kind !== "verse") {
          close();
          open = { kind: "verse", stanzas: [[]] };
        }
        open.stanzas[open.stanzas.length - 1].push(line.text);
        break;
    }
  }

  close();
  return blocks;
}
