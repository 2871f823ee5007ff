/**
 * Metadata Extractor
 * Reads labeled comments from the header, preamble, metadata and config
 * blocks into a typed field map. Summary comments left inside the executable
 * section are read too, never moved. Source lines are never modified.
 */

import { matchField } from "./fields";
import type { FieldDefinition, FieldMatch } from "./fields";
import { parseCount, parseDuration, parseNumberList, roundQuantity } from "./values";
import type {
  Block,
  BlockType,
  ConversionWarning,
  MetadataMap,
  MetadataValue,
} from "../types";

const SCANNED_TYPES: BlockType[] = ["unclassified", "header", "metadata", "config"];

export interface ExtractionResult {
  fields: MetadataMap;
  warnings: ConversionWarning[];
}

/**
 * Parse a matched value according to the field's kind
 * Returns null when the text does not parse
 */
function parseFieldValue(match: FieldMatch): MetadataValue | null {
  const { definition, value } = match;

  switch (definition.kind) {
    case "duration": {
      const seconds = parseDuration(value);
      return seconds === null ? null : { kind: "duration", seconds };
    }
    case "count": {
      const count = parseCount(value);
      return count === null ? null : { kind: "count", value: count };
    }
    case "string": {
      const text = value.trim();
      return text === "" ? null : { kind: "string", value: text };
    }
    case "quantity":
      return parseQuantity(definition, value, match.unit);
  }
}

function parseQuantity(
  definition: FieldDefinition,
  text: string,
  sourceUnit: string | undefined,
): MetadataValue | null {
  const values = parseNumberList(text);
  if (values === null || definition.unit === undefined) return null;

  const raw =
    definition.aggregate === "first"
      ? values[0]
      : values.reduce((sum, v) => sum + v, 0);

  const factor =
    sourceUnit !== undefined && definition.conversions
      ? (definition.conversions[sourceUnit.toLowerCase()] ?? 1)
      : 1;

  return {
    kind: "quantity",
    value: roundQuantity(raw * factor),
    unit: definition.unit,
  };
}

function sameValue(a: MetadataValue, b: MetadataValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Extract metadata fields from the classified blocks, in document order
 * Later lines overwrite earlier ones for the same field
 */
export function extractMetadata(blocks: Block[]): ExtractionResult {
  const fields: MetadataMap = {};
  const warnings: ConversionWarning[] = [];

  for (const block of blocks) {
    const summaryOnly = block.type === "executable";
    if (!summaryOnly && !SCANNED_TYPES.includes(block.type)) continue;

    for (const [offset, line] of block.lines.entries()) {
      const match = matchField(line);
      if (!match) continue;
      if (summaryOnly && !match.definition.summary) continue;

      const key = match.definition.key;
      const lineNumber = block.start + offset + 1;
      const parsed = parseFieldValue(match);

      if (parsed === null) {
        warnings.push({
          reason: "unparseable-value",
          field: key,
          line: lineNumber,
          text: line.trim(),
        });
        continue;
      }

      const previous = fields[key];
      if (previous !== undefined && !sameValue(previous, parsed)) {
        warnings.push({
          reason: "conflicting-value",
          field: key,
          line: lineNumber,
          text: line.trim(),
        });
      }
      fields[key] = parsed;
    }
  }

  return { fields, warnings };
}
