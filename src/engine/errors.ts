/**
 * Conversion errors
 * Raised when the input cannot be converted without risking lost lines
 */

export type ConversionErrorReason =
  | "binary-content"
  | "unexpected-marker"
  | "unterminated-block"
  | "truncated-thumbnail"
  | "line-loss";

export class ConversionError extends Error {
  readonly reason: ConversionErrorReason;
  readonly line?: number; // 1-based

  constructor(reason: ConversionErrorReason, message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "ConversionError";
    this.reason = reason;
    this.line = line;
  }
}
