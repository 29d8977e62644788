/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils/load-config";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize speed limits, extension and search window.");
  console.log("See src/config/default.json for available options.");
}
