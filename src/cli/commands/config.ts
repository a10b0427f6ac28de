/**
 * Config command - Show configuration file location and status
 */

import chalk from "chalk";
import { fileExists, getUserConfigPath } from "../../utils";

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  const exists = await fileExists(configPath);

  console.log("User configuration file location:");
  console.log(
    `${configPath} ${exists ? chalk.green("(found)") : chalk.dim("(not created)")}`,
  );
  if (!exists) {
    console.log("\nCreate this file to change build defaults, for example:");
    console.log(
      chalk.dim('{ "templates": { "assetDirectory": "assets" }, "watch": { "debounce": 250 } }'),
    );
  }
  console.log("See src/config/default.json for available options.");
}
