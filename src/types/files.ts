/**
 * File-related type definitions
 */

export interface FileDescriptor {
  // Scanner fills these fields:
  inputPath: string; // Absolute path to the G-code file
  relativePath: string; // Path relative to the working directory (for display)
  backupPath: string; // Sibling backup written before the file is replaced

  // Processor fills these fields (after processing):
  converted?: boolean; // True after the file was rewritten (or would be, on dry run)
  unchanged?: boolean; // Output was identical to the input
  injected?: number;
  metadataSynthesized?: boolean;
}
