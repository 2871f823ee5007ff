/**
 * Block Reassembler
 * Emits the sections in the firmware's order:
 * Header → Metadata → Config → Thumbnail → Executable
 */

import { CANONICAL_ORDER } from "./classifier";
import { SUMMARY_LINES } from "./fields";
import type { Block, MetadataMap } from "../types";

export type SectionType = (typeof CANONICAL_ORDER)[number];

export type Sections = Record<SectionType, string[]>;

/**
 * Group block lines into target sections, keeping source order within each
 * The unclassified preamble leads the header section
 */
export function collectSections(blocks: Block[]): Sections {
  const sections: Sections = {
    header: [],
    metadata: [],
    config: [],
    thumbnail: [],
    executable: [],
  };

  const preamble = blocks.filter((b) => b.type === "unclassified");
  for (const block of preamble) sections.header.push(...block.lines);

  for (const block of blocks) {
    if (block.type === "unclassified") continue;
    sections[block.type].push(...block.lines);
  }

  return sections;
}

/**
 * Build the metadata section from extracted summary fields, in firmware
 * syntax and fixed order; absent fields are left out
 */
export function synthesizeMetadata(fields: MetadataMap): string[] {
  const lines: string[] = [];
  for (const { key, render } of SUMMARY_LINES) {
    const value = fields[key];
    if (value === undefined) continue;
    const line = render(value);
    if (line !== null) lines.push(line);
  }
  return lines;
}

export interface ReassemblyResult {
  lines: string[];
  sections: Sections;
  synthesized: string[];
}

export function reassemble(
  sections: Sections,
  fields: MetadataMap,
): ReassemblyResult {
  const synthesized =
    sections.metadata.length === 0 ? synthesizeMetadata(fields) : [];

  const output: Sections = { ...sections };
  if (synthesized.length > 0) output.metadata = synthesized;

  const lines: string[] = [];
  for (const type of CANONICAL_ORDER) lines.push(...output[type]);

  return { lines, sections: output, synthesized };
}
