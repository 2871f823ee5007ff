/**
 * Document read/write
 * Splits text into lines while remembering the line ending, so that
 * serializing an unchanged document gives back the same bytes
 */

import { ConversionError } from "./errors";
import type { GcodeDocument } from "../types";

// Binary G-code (.bgcode) files start with this magic
const BINARY_GCODE_MAGIC = "GCDE";

export function parseDocument(text: string): GcodeDocument {
  if (text.startsWith(BINARY_GCODE_MAGIC)) {
    throw new ConversionError(
      "binary-content",
      "Binary G-code is not supported, export plain text G-code instead",
    );
  }

  const nul = text.indexOf("\u0000");
  if (nul >= 0) {
    const line = text.slice(0, nul).split("\n").length;
    throw new ConversionError(
      "binary-content",
      "Input contains binary data",
      line,
    );
  }

  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  if (text === "") {
    return { lines: [], eol, finalNewline: false };
  }

  const lines = text.split(/\r?\n/);
  const finalNewline = lines[lines.length - 1] === "";
  if (finalNewline) lines.pop();

  return { lines, eol, finalNewline };
}

export function serializeDocument(doc: GcodeDocument): string {
  const body = doc.lines.join(doc.eol);
  return doc.finalNewline ? body + doc.eol : body;
}
