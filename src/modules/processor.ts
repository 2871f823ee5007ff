/**
 * Processor Module
 * Converts each file in memory, then backs it up and rewrites it in place
 */

import { readFile, writeFile, copyFile } from "fs/promises";
import { Converter } from "../converter";
import type {
  ConversionContext,
  ConversionResult,
  FileDescriptor,
} from "../types";

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const { config, files, tracker, logger, dryRun } = ctx;

  // Invalid UTF-8 is a read error; a byte order mark is stripped here and
  // written back in front of the converted text
  const decoder = new TextDecoder("utf-8", { fatal: true });

  const converter = new Converter({
    markers: config.markers,
    triggers: config.triggers,
    subroutines: config.subroutines,
  });

  // ============================================================================
  // Processing Functions
  // ============================================================================

  async function restoreFromBackup(file: FileDescriptor): Promise<void> {
    try {
      await copyFile(file.backupPath, file.inputPath);
      logger.info(`Restored original file from ${file.backupPath}`);
    } catch (error) {
      tracker.trackError(file.backupPath, error, "file", "restore");
      logger.error(
        `Failed to restore ${file.relativePath} from backup - manual intervention required`,
        error,
      );
    }
  }

  function recordConverted(
    file: FileDescriptor,
    result: ConversionResult,
  ): void {
    file.converted = true;
    file.injected = result.injected;
    file.metadataSynthesized = result.metadataSynthesized;
    tracker.incrementConverted();
    tracker.addInjectedCalls(result.injected);
    if (result.metadataSynthesized) tracker.incrementSynthesizedMetadata();
  }

  async function processFile(file: FileDescriptor): Promise<void> {
    let raw: Buffer;
    let text: string;
    let bom: string;
    try {
      raw = await readFile(file.inputPath);
      text = decoder.decode(raw);
      bom = raw.subarray(0, 3).equals(UTF8_BOM) ? "\uFEFF" : "";
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", "read");
      tracker.incrementFailed();
      logger.error(`Cannot read ${file.relativePath}`, error);
      return;
    }

    // Everything is computed before the file is touched
    let result: ConversionResult;
    try {
      result = converter.convert(text);
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file");
      tracker.incrementFailed();
      logger.error(`Cannot convert ${file.relativePath}`, error);
      return;
    }

    tracker.trackWarnings(file.relativePath, result.warnings);
    for (const warning of result.warnings) {
      logger.warn(
        `${file.relativePath}:${warning.line} ${warning.reason} (${warning.field})`,
      );
    }

    const found = result.blocks.map((b) => b.type).join(", ") || "none";
    logger.debug(`${file.relativePath}: blocks ${found}`);
    logger.debug(
      `${file.relativePath}: fields ${Object.keys(result.fields).join(", ") || "none"}`,
    );

    if (!result.changed) {
      file.unchanged = true;
      tracker.incrementUnchanged();
      logger.info(`${file.relativePath} is already in FlashForge layout`);
      return;
    }

    if (dryRun) {
      recordConverted(file, result);
      logger.info(`Would convert ${file.relativePath}`);
      return;
    }

    if (config.backup.enabled) {
      try {
        await writeFile(file.backupPath, raw);
        logger.debug(`Backup created: ${file.backupPath}`);
      } catch (error) {
        // Without a backup the original is left alone
        tracker.trackError(file.backupPath, error, "file", "backup");
        tracker.incrementFailed();
        logger.error(`Could not create backup ${file.backupPath}`, error);
        return;
      }
    }

    try {
      await writeFile(file.inputPath, bom + result.text, "utf-8");
    } catch (error) {
      tracker.trackError(file.relativePath, error, "file", "write");
      tracker.incrementFailed();
      logger.error(`Error writing ${file.relativePath}`, error);
      if (config.backup.enabled) await restoreFromBackup(file);
      return;
    }

    recordConverted(file, result);
    logger.info(`Converted ${file.relativePath} to FlashForge layout`);
  }

  // Files are independent; one failure does not stop the rest
  for (const file of files) {
    await processFile(file);
  }
}
