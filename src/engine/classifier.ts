/**
 * Line Classifier
 * Single-pass state machine that partitions the document into typed blocks
 *
 * - A start marker opens a delimited block; every line up to its end marker
 *   belongs to it.
 * - After an end marker the type stays open for trailing comments and blank
 *   lines, until something else is recognized.
 * - Outside delimited blocks, summary metadata lines form metadata runs and
 *   instruction lines form executable runs; comments and blank lines extend
 *   whatever run is current.
 * - Comments and blank lines before anything is recognized form the
 *   unclassified preamble.
 *
 * Concatenating the lines of the returned blocks gives back the input.
 */

import { ConversionError } from "./errors";
import { isSummaryLine } from "./fields";
import { buildMarkerMatchers, isInstruction } from "./markers";
import type { MarkerMatcher } from "./markers";
import type {
  Block,
  BlockType,
  BlockReport,
  MarkersConfig,
} from "../types";

function findMatcher(
  matchers: MarkerMatcher[],
  line: string,
  edge: "start" | "end",
): MarkerMatcher | undefined {
  return matchers.find((m) => m[edge].test(line));
}

function startBlock(
  blocks: Block[],
  type: BlockType,
  start: number,
  delimited: boolean,
): Block {
  const block: Block = { type, lines: [], start, delimited };
  blocks.push(block);
  return block;
}

export function classifyLines(
  lines: string[],
  markers: MarkersConfig,
): Block[] {
  const matchers = buildMarkerMatchers(markers);
  const blocks: Block[] = [];

  let current: Block | null = null;
  let open: { matcher: MarkerMatcher; line: number } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    // Inside a delimited block: only its end marker is meaningful
    if (open !== null && current !== null) {
      current.lines.push(line);

      if (open.matcher.end.test(line)) {
        open = null;
        continue;
      }

      const stray =
        findMatcher(matchers, line, "start") ??
        findMatcher(matchers, line, "end");
      if (stray) {
        throw new ConversionError(
          "unexpected-marker",
          `Marker "${line.trim()}" inside unterminated ${open.matcher.type} block`,
          i + 1,
        );
      }
      continue;
    }

    const starting = findMatcher(matchers, line, "start");
    if (starting) {
      current = startBlock(blocks, starting.type, i, true);
      current.lines.push(line);
      open = { matcher: starting, line: i };
      continue;
    }

    const ending = findMatcher(matchers, line, "end");
    if (ending) {
      throw new ConversionError(
        "unexpected-marker",
        `Marker "${line.trim()}" without a matching start marker`,
        i + 1,
      );
    }

    let type: BlockType | null = null;
    if (isSummaryLine(line)) type = "metadata";
    else if (isInstruction(line)) type = "executable";

    if (current === null) {
      current = startBlock(blocks, type ?? "unclassified", i, false);
    } else if (type !== null && current.type !== type) {
      current = startBlock(blocks, type, i, false);
    }
    current.lines.push(line);
  }

  if (open !== null) {
    throw new ConversionError(
      "unterminated-block",
      `${open.matcher.type} block is never closed`,
      open.line + 1,
    );
  }

  return blocks;
}

// ============================================================================
// Block helpers
// ============================================================================

export const CANONICAL_ORDER: Exclude<BlockType, "unclassified">[] = [
  "header",
  "metadata",
  "config",
  "thumbnail",
  "executable",
];

/** Position of a block type in the target layout; the preamble counts as header */
function canonicalRank(type: BlockType): number {
  return CANONICAL_ORDER.indexOf(type === "unclassified" ? "header" : type);
}

/**
 * True when the blocks already appear in the target order
 */
export function isCanonicalOrder(blocks: Block[]): boolean {
  let rank = 0;
  for (const block of blocks) {
    const next = canonicalRank(block.type);
    if (next < rank) return false;
    rank = next;
  }
  return true;
}

/**
 * Summarize the block types found, canonical order first
 */
export function reportBlocks(blocks: Block[]): BlockReport[] {
  const order: BlockType[] = ["unclassified", ...CANONICAL_ORDER];
  const reports: BlockReport[] = [];

  for (const type of order) {
    const runs = blocks.filter((b) => b.type === type);
    if (runs.length === 0) continue;
    reports.push({
      type,
      runs: runs.length,
      lines: runs.reduce((sum, b) => sum + b.lines.length, 0),
    });
  }

  return reports;
}
