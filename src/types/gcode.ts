/**
 * G-code document model
 */

import type {
  MarkersConfig,
  SubroutinesConfig,
  TriggersConfig,
} from "./config";

export type LineEnding = "\n" | "\r\n";

export interface GcodeDocument {
  lines: string[];
  eol: LineEnding;
  finalNewline: boolean; // Source text ended with a line break
}

// ============================================================================
// Blocks
// ============================================================================

export type BlockType =
  | "header"
  | "metadata"
  | "config"
  | "thumbnail"
  | "executable"
  | "unclassified";

/** Types that are opened and closed by a marker pair */
export type DelimitedBlockType = keyof MarkersConfig;

export interface Block {
  type: BlockType;
  lines: string[];
  start: number; // 0-based index of the first line in the source document
  delimited: boolean; // Opened by a start marker
}

export interface BlockReport {
  type: BlockType;
  runs: number;
  lines: number;
}

// ============================================================================
// Metadata
// ============================================================================

export type MetadataKey =
  | "estimated_time"
  | "first_layer_time"
  | "filament_length_mm"
  | "filament_volume_cm3"
  | "filament_mass_g"
  | "filament_cost"
  | "layer_count"
  | "infill_percent"
  | "layer_height"
  | "nozzle_temp"
  | "bed_temp"
  | "print_speed"
  | "travel_speed"
  | "filament_type"
  | "printer_model"
  | "generator";

export type CanonicalUnit = "mm" | "cm3" | "g" | "currency" | "percent" | "celsius" | "mm/s";

export type MetadataValue =
  | { kind: "duration"; seconds: number }
  | { kind: "quantity"; value: number; unit: CanonicalUnit }
  | { kind: "count"; value: number }
  | { kind: "string"; value: string };

export type MetadataKind = MetadataValue["kind"];

export type MetadataMap = Partial<Record<MetadataKey, MetadataValue>>;

export type ConversionWarningReason = "unparseable-value" | "conflicting-value";

export interface ConversionWarning {
  reason: ConversionWarningReason;
  field: MetadataKey;
  line: number; // 1-based line number in the source document
  text: string;
}

// ============================================================================
// Conversion
// ============================================================================

export interface ConvertOptions {
  markers: MarkersConfig;
  triggers: TriggersConfig;
  subroutines: SubroutinesConfig;
}

export interface ConversionResult {
  text: string;
  document: GcodeDocument;
  blocks: BlockReport[]; // Block types found in the source, canonical order
  fields: MetadataMap;
  metadataSynthesized: boolean;
  injected: number;
  alreadyCanonical: boolean;
  changed: boolean; // Output differs from the source text
  warnings: ConversionWarning[];
}
