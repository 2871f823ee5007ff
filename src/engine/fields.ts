/**
 * Metadata field definitions
 * Recognition patterns for each field, in priority order, plus the
 * firmware's comment syntax for the summary fields
 */

import { formatDuration, formatQuantity } from "./values";
import type {
  CanonicalUnit,
  MetadataKey,
  MetadataKind,
  MetadataValue,
} from "../types";

export interface FieldPattern {
  // Must capture a `value` group; may capture a `unit` group
  regex: RegExp;
}

export interface FieldDefinition {
  key: MetadataKey;
  kind: MetadataKind;
  unit?: CanonicalUnit;
  // Factors from source units (captured `unit` group) to the canonical unit
  conversions?: Record<string, number>;
  // Per-extruder lists are summed, or the first entry is taken
  aggregate?: "sum" | "first";
  // Summary fields form the firmware's metadata section
  summary: boolean;
  patterns: FieldPattern[];
}

/**
 * Build a pattern for `; <label> = <value>` (or `:` as separator)
 * The label is matched literally, case-insensitive, tolerant of extra
 * whitespace and repeated semicolons
 */
function labeled(label: string, separator: "=" | ":" = "="): FieldPattern {
  const escaped = label
    .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\s+/g, "\\s+");
  return {
    regex: new RegExp(
      `^\\s*;+\\s*${escaped}\\s*${separator}\\s*(?<value>.*?)\\s*$`,
      "i",
    ),
  };
}

const FIELD_DEFINITIONS: FieldDefinition[] = [
  {
    key: "estimated_time",
    kind: "duration",
    summary: true,
    patterns: [
      labeled("estimated printing time (normal mode)"),
      // Header form: "; model printing time: 1h 2m; total estimated time: 1h 5m"
      {
        regex:
          /^\s*;+(?:[^;]*;)?\s*total estimated time:\s*(?<value>[^;]*?)\s*(?:;|$)/i,
      },
    ],
  },
  {
    key: "first_layer_time",
    kind: "duration",
    summary: true,
    patterns: [labeled("estimated first layer printing time (normal mode)")],
  },
  {
    key: "filament_length_mm",
    kind: "quantity",
    unit: "mm",
    conversions: { mm: 1, m: 1000 },
    aggregate: "sum",
    summary: true,
    patterns: [
      {
        regex:
          /^\s*;+\s*filament\s+used\s+\[(?<unit>mm|m)\]\s*=\s*(?<value>.*?)\s*$/i,
      },
    ],
  },
  {
    key: "filament_volume_cm3",
    kind: "quantity",
    unit: "cm3",
    conversions: { cm3: 1, mm3: 0.001 },
    aggregate: "sum",
    summary: true,
    patterns: [
      {
        regex:
          /^\s*;+\s*filament\s+used\s+\[(?<unit>cm3|mm3)\]\s*=\s*(?<value>.*?)\s*$/i,
      },
    ],
  },
  {
    key: "filament_mass_g",
    kind: "quantity",
    unit: "g",
    conversions: { g: 1, kg: 1000 },
    aggregate: "sum",
    summary: true,
    patterns: [
      {
        regex:
          /^\s*;+\s*total\s+filament\s+used\s+\[(?<unit>g|kg)\]\s*=\s*(?<value>.*?)\s*$/i,
      },
      {
        regex:
          /^\s*;+\s*filament\s+used\s+\[(?<unit>g|kg)\]\s*=\s*(?<value>.*?)\s*$/i,
      },
    ],
  },
  {
    key: "filament_cost",
    kind: "quantity",
    unit: "currency",
    aggregate: "sum",
    summary: true,
    patterns: [labeled("total filament cost"), labeled("filament cost")],
  },
  {
    key: "layer_count",
    kind: "count",
    summary: true,
    patterns: [labeled("total layers count"), labeled("total layer number", ":")],
  },
  {
    key: "infill_percent",
    kind: "quantity",
    unit: "percent",
    aggregate: "first",
    summary: false,
    patterns: [labeled("sparse_infill_density"), labeled("fill_density")],
  },
  {
    key: "layer_height",
    kind: "quantity",
    unit: "mm",
    aggregate: "first",
    summary: false,
    patterns: [labeled("layer_height")],
  },
  {
    key: "nozzle_temp",
    kind: "quantity",
    unit: "celsius",
    aggregate: "first",
    summary: false,
    patterns: [labeled("nozzle_temperature"), labeled("temperature")],
  },
  {
    key: "bed_temp",
    kind: "quantity",
    unit: "celsius",
    aggregate: "first",
    summary: false,
    patterns: [labeled("hot_plate_temp"), labeled("bed_temperature")],
  },
  {
    key: "print_speed",
    kind: "quantity",
    unit: "mm/s",
    aggregate: "first",
    summary: false,
    patterns: [labeled("outer_wall_speed"), labeled("print_speed")],
  },
  {
    key: "travel_speed",
    kind: "quantity",
    unit: "mm/s",
    aggregate: "first",
    summary: false,
    patterns: [labeled("travel_speed")],
  },
  {
    key: "filament_type",
    kind: "string",
    summary: false,
    patterns: [labeled("filament_type")],
  },
  {
    key: "printer_model",
    kind: "string",
    summary: false,
    patterns: [labeled("printer_model")],
  },
  {
    key: "generator",
    kind: "string",
    summary: false,
    patterns: [
      {
        regex:
          /^\s*;+\s*generated\s+by\s+(?<value>.+?)(?:\s+on\s+\d{4}-\d{2}-\d{2}.*)?\s*$/i,
      },
    ],
  },
];

export interface FieldMatch {
  definition: FieldDefinition;
  value: string;
  unit?: string;
}

/**
 * Match a line against every field, trying each field's patterns in order
 * Returns the first field whose pattern matches, or null
 */
export function matchField(line: string): FieldMatch | null {
  for (const definition of FIELD_DEFINITIONS) {
    for (const pattern of definition.patterns) {
      const groups = pattern.regex.exec(line)?.groups;
      if (groups?.value !== undefined) {
        return { definition, value: groups.value, unit: groups.unit };
      }
    }
  }
  return null;
}

/**
 * True when the line carries one of the summary fields
 */
export function isSummaryLine(line: string): boolean {
  return matchField(line)?.definition.summary ?? false;
}

// ============================================================================
// Firmware syntax for the synthesized metadata section
// ============================================================================

interface SummaryLine {
  key: MetadataKey;
  render: (value: MetadataValue) => string | null;
}

function quantityLine(label: string): (value: MetadataValue) => string | null {
  return (value) =>
    value.kind === "quantity"
      ? `; ${label} = ${formatQuantity(value.value)}`
      : null;
}

function durationLine(label: string): (value: MetadataValue) => string | null {
  return (value) =>
    value.kind === "duration"
      ? `; ${label} = ${formatDuration(value.seconds)}`
      : null;
}

export const SUMMARY_LINES: SummaryLine[] = [
  { key: "filament_length_mm", render: quantityLine("filament used [mm]") },
  { key: "filament_volume_cm3", render: quantityLine("filament used [cm3]") },
  { key: "filament_mass_g", render: quantityLine("filament used [g]") },
  { key: "filament_cost", render: quantityLine("filament cost") },
  { key: "filament_mass_g", render: quantityLine("total filament used [g]") },
  { key: "filament_cost", render: quantityLine("total filament cost") },
  {
    key: "layer_count",
    render: (value) =>
      value.kind === "count" ? `; total layers count = ${value.value}` : null,
  },
  {
    key: "estimated_time",
    render: durationLine("estimated printing time (normal mode)"),
  },
  {
    key: "first_layer_time",
    render: durationLine("estimated first layer printing time (normal mode)"),
  },
];
