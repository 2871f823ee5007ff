import { stat } from "fs/promises";

/**
 * Check that a path exists and is a regular file (directories don't count)
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
