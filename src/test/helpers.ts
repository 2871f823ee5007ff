/**
 * Shared test helpers
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { loadDefaultConfig } from "../utils/load-config";
import type { ConvertOptions } from "../types";

const __dirname = dirname(fileURLToPath(import.meta.url));

export async function loadFixture(name: string): Promise<string> {
  return readFile(join(__dirname, "fixtures", name), "utf-8");
}

/**
 * Engine options from the shipped default config
 */
export async function defaultOptions(
  overrides: { inject?: boolean } = {},
): Promise<ConvertOptions> {
  const config = await loadDefaultConfig();
  return {
    markers: config.markers,
    triggers: config.triggers,
    subroutines: {
      ...config.subroutines,
      enabled: overrides.inject ?? config.subroutines.enabled,
    },
  };
}

export const START_CALL = "M981 S1 P20000 ; Enable spaghetti detector";
export const END_CALL = "M981 S0 P20000 ; Disable spaghetti detector";

export function gcode(...lines: string[]): string {
  return lines.join("\n") + "\n";
}
