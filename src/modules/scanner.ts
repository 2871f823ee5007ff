/**
 * Scanner Module
 * Resolves command-line paths and glob patterns into G-code files
 */

import glob from "fast-glob";
import path from "node:path";
import type { ConversionContext, FileDescriptor } from "../types";

/**
 * Expands inputs into file descriptors and populates context
 *
 * Plain paths are kept as given (a missing file is reported by the
 * processor); patterns are expanded with fast-glob. Duplicates are dropped,
 * first occurrence wins.
 *
 * Writes to context:
 * - files
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, inputs, tracker, logger } = ctx;
  const seen = new Set<string>();
  const files: FileDescriptor[] = [];

  const add = (inputPath: string): void => {
    const absolute = path.resolve(inputPath);
    if (seen.has(absolute)) return;
    seen.add(absolute);

    files.push({
      inputPath: absolute,
      relativePath: path.relative(process.cwd(), absolute) || absolute,
      backupPath: `${absolute}${config.backup.suffix}`,
    });
  };

  for (const input of inputs) {
    if (!glob.isDynamicPattern(input)) {
      add(input);
      continue;
    }

    const matches = await glob(input, {
      absolute: true,
      onlyFiles: true,
      // Never pick up our own backups
      ignore: [`**/*${config.backup.suffix}`],
    });

    if (matches.length === 0) {
      logger.warn(`No files match ${input}`);
    }

    for (const match of matches.sort()) add(match);
  }

  tracker.setTotalFiles(files.length);
  ctx.files = files;
}
