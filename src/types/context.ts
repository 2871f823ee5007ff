/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { FileDescriptor } from "./files";
import type { Tracker } from "../utils/conversion-tracker";
import type { Logger } from "../utils/logger";

// Re-export types from conversion-tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ConversionIssue,
  ResourceIssue,
  WarningIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/conversion-tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  inputs: string[]; // Paths or glob patterns from the command line

  // Unified tracking for stats, errors, and warnings
  tracker: Tracker;
  logger: Logger;

  dryRun?: boolean;
  verbose?: boolean;

  files?: FileDescriptor[]; // Filled by the scanner
}
