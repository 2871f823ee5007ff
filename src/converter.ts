/**
 * Converter - Conversion driver
 * Runs one G-code text through classify → extract → inject → reassemble
 * and checks that no line was lost on the way. Pure and synchronous:
 * the caller owns reading, backing up and writing files.
 */

import {
  ConversionError,
  classifyLines,
  collectSections,
  extractMetadata,
  injectSubroutines,
  isCanonicalOrder,
  parseDocument,
  reassemble,
  reportBlocks,
  serializeDocument,
  validateThumbnailBlock,
} from "./engine";
import type { ConversionResult, ConvertOptions, GcodeDocument } from "./types";

function countLines(lines: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const line of lines) counts.set(line, (counts.get(line) ?? 0) + 1);
  return counts;
}

/**
 * Check the no-data-loss guarantee: every output line is a source line,
 * a synthesized metadata line, or an injected call, with multiplicity
 */
function verifyLines(
  source: string[],
  output: string[],
  added: string[],
): void {
  if (output.length !== source.length + added.length) {
    throw new ConversionError(
      "line-loss",
      `Expected ${source.length + added.length} output lines, got ${output.length}`,
    );
  }

  const expected = countLines([...source, ...added]);
  for (const [line, count] of countLines(output)) {
    if (expected.get(line) !== count) {
      throw new ConversionError(
        "line-loss",
        `Line "${line.trim()}" appears ${count} times in the output, expected ${expected.get(line) ?? 0}`,
      );
    }
  }
}

export class Converter {
  constructor(private options: ConvertOptions) {}

  /**
   * Convert one document
   * Throws ConversionError when the input cannot be converted safely;
   * nothing is returned in that case
   */
  convert(text: string): ConversionResult {
    const { markers, triggers, subroutines } = this.options;

    const source = parseDocument(text);
    const blocks = classifyLines(source.lines, markers);

    for (const block of blocks) {
      if (block.type === "thumbnail" && block.delimited) {
        validateThumbnailBlock(block);
      }
    }

    const { fields, warnings } = extractMetadata(blocks);
    const sections = collectSections(blocks);

    const injection = injectSubroutines(
      sections.executable,
      triggers,
      subroutines,
    );
    if (
      injection.lines.length !==
      sections.executable.length + injection.injected
    ) {
      throw new ConversionError(
        "line-loss",
        "Executable section changed size during injection",
      );
    }
    sections.executable = injection.lines;

    const reassembled = reassemble(sections, fields);
    verifyLines(source.lines, reassembled.lines, [
      ...reassembled.synthesized,
      ...injection.inserted,
    ]);

    const document: GcodeDocument = { ...source, lines: reassembled.lines };
    const output = serializeDocument(document);

    return {
      text: output,
      document,
      blocks: reportBlocks(blocks),
      fields,
      metadataSynthesized: reassembled.synthesized.length > 0,
      injected: injection.injected,
      alreadyCanonical: isCanonicalOrder(blocks),
      changed: output !== text,
      warnings,
    };
  }
}

/**
 * Convert one G-code text with the given options
 */
export function convertGcode(
  text: string,
  options: ConvertOptions,
): ConversionResult {
  return new Converter(options).convert(text);
}
