#!/usr/bin/env tsx

/**
 * CLI entry point for the OrcaSlicer to FlashForge G-code post-processor
 * Handles command-line argument parsing; the slicer's post-processing hook
 * calls it with the G-code path as its only argument
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("ff-gcode-post")
  .description(
    "Reorder OrcaSlicer G-code into the block layout FlashForge firmware reads",
  )
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("<files...>", "G-code files or glob patterns to convert in place")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--no-inject", "Do not insert spaghetti detector calls")
  .option("--no-backup", "Do not write a .backup copy before converting")
  .option("--dry-run", "Convert in memory and report, without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
