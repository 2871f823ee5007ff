/**
 * Marker comment matching
 * Case-insensitive, whitespace tolerant; allows multiple semicolons
 */

import type { DelimitedBlockType, MarkersConfig } from "../types";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function commentBody(text: string): string {
  return escapeRegExp(text.trim().replace(/^;+\s*/, "")).replace(
    /\s+/g,
    "\\s+",
  );
}

/**
 * Regex matching a line that consists of exactly this marker comment
 *
 * @example
 * markerPattern("; HEADER_BLOCK_START").test(";;  header_block_start ") // true
 */
function markerPattern(marker: string): RegExp {
  return new RegExp(`^\\s*;+\\s*${commentBody(marker)}\\s*$`, "i");
}

/**
 * Regex matching a comment line that starts with this text
 *
 * @example
 * triggerPattern("; filament start gcode").test("; Filament start gcode T1") // true
 */
export function triggerPattern(trigger: string): RegExp {
  return new RegExp(`^\\s*;+\\s*${commentBody(trigger)}(?![\\w])`, "i");
}

export interface MarkerMatcher {
  type: DelimitedBlockType;
  start: RegExp;
  end: RegExp;
}

export function buildMarkerMatchers(markers: MarkersConfig): MarkerMatcher[] {
  const types: DelimitedBlockType[] = [
    "header",
    "config",
    "thumbnail",
    "executable",
  ];
  return types.map((type) => ({
    type,
    start: markerPattern(markers[type].start),
    end: markerPattern(markers[type].end),
  }));
}

/**
 * True for a G-code instruction line (anything that is not blank or a comment)
 */
export function isInstruction(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== "" && !trimmed.startsWith(";");
}
