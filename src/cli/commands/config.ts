/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize markers, triggers and detector calls.");
  console.log("See src/config/default.json for available options.");
}
