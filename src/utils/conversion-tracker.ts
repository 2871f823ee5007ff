/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { ConversionError } from "../engine";
import type { ConversionErrorReason } from "../engine";
import type {
  ConversionWarning,
  ConversionWarningReason,
  MetadataKey,
} from "../types/gcode";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "not-found"
  | "read-error"
  | "write-error"
  | "backup-error"
  | "restore-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ConversionIssue {
  type: "conversion";
  path: string;
  reason: ConversionErrorReason;
  details?: string;
  line?: number;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export interface WarningIssue {
  type: "warning";
  path: string;
  reason: ConversionWarningReason;
  field: MetadataKey;
  line: number;
  text: string;
}

export type Issue = FileIssue | ConversionIssue | ResourceIssue | WarningIssue;
export type IssueType = Issue["type"];

type IssueOfType<T extends IssueType> = Extract<Issue, { type: T }>;

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  convertedFiles: number;
  unchangedFiles: number;
  failedFiles: number;

  // Conversion counts
  injectedCalls: number;
  synthesizedMetadata: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.map(String).join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "write" | "backup" | "restore",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (
    context === "read" &&
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  ) {
    return { reason: "not-found", details };
  }

  const reasons = {
    read: "read-error",
    write: "write-error",
    backup: "backup-error",
    restore: "restore-error",
  } as const;
  return { reason: reasons[context], details };
}

// ============================================================================
// Tracker - Main tracker class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private convertedFiles = 0;
  private unchangedFiles = 0;
  private failedFiles = 0;
  private injectedCalls = 0;
  private synthesizedMetadata = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementConverted(): void {
    this.convertedFiles++;
  }

  incrementUnchanged(): void {
    this.unchangedFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  addInjectedCalls(count: number): void {
    this.injectedCalls += count;
  }

  incrementSynthesizedMetadata(): void {
    this.synthesizedMetadata++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   * Conversion errors are always tracked as conversion issues
   */
  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context: "read" | "write" | "backup" | "restore" = "read",
  ): void {
    if (error instanceof ConversionError) {
      this.issues.push({
        type: "conversion",
        path,
        reason: error.reason,
        details: error.message,
        line: error.line,
      });
      return;
    }

    if (type === "file") {
      const { reason, details } = mapFileError(error, context);
      this.issues.push({ type: "file", path, reason, details });
      return;
    }

    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackWarnings(path: string, warnings: ConversionWarning[]): void {
    for (const warning of warnings) {
      this.issues.push({ type: "warning", path, ...warning });
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): IssueOfType<T>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  hasFailures(): boolean {
    return this.failedFiles > 0;
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      convertedFiles: this.convertedFiles,
      unchangedFiles: this.unchangedFiles,
      failedFiles: this.failedFiles,
      injectedCalls: this.injectedCalls,
      synthesizedMetadata: this.synthesizedMetadata,
      issues: this.issues,
      duration,
    };
  }
}
