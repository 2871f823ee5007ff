/**
 * Convert command - Loads config and runs the conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";
import type { ConversionContext } from "../../types";

const ConvertOptionsSchema = z.object({
  config: z.string().optional(),
  inject: z.boolean().optional(),
  backup: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(
  files: string[],
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options (commander sets --no-* flags to false)
    if (options.inject === false) {
      config.subroutines.enabled = false;
    }
    if (options.backup === false) {
      config.backup.enabled = false;
    }

    const tracker = new Tracker();
    const logger = Logger.fromConfig(config.logging, options.verbose);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: ConversionContext = {
      config,
      inputs: files,
      tracker,
      logger,
      dryRun: options.dryRun,
      verbose: options.verbose,
    };

    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    // Per-file log lines would interleave with the spinner
    spinner.stop();
    await modules.process(ctx);

    await modules.stats(ctx);

    if (tracker.hasFailures() || ctx.files?.length === 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
