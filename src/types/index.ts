/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  MarkerPair,
  MarkersConfig,
  TriggersConfig,
  SubroutinesConfig,
  BackupConfig,
  LoggingConfig,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// G-code model
export type {
  GcodeDocument,
  LineEnding,
  Block,
  BlockType,
  DelimitedBlockType,
  BlockReport,
  MetadataKey,
  MetadataKind,
  MetadataValue,
  MetadataMap,
  CanonicalUnit,
  ConversionWarning,
  ConversionWarningReason,
  ConvertOptions,
  ConversionResult,
} from "./gcode";

// Files
export type { FileDescriptor } from "./files";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  FileIssue,
  ConversionIssue,
  ResourceIssue,
  WarningIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/conversion-tracker";
