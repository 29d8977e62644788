#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for the spindle speed updater
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { updateCommand } from "./commands/update";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("spindle-speed")
  .description("Set the spindle speed (S command) in every G-code file under a directory")
  .version("0.1.0");

// Main update command (default action)
program
  .argument("[root]", "Directory to search (default: current directory)")
  .option("-s, --speed <rpm>", "Spindle speed to set, in RPM")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-e, --extension <ext>", "File extension to update (default: .tap)")
  .option("-j, --concurrency <n>", "Number of files processed in parallel")
  .option("-y, --yes", "Skip the confirmation prompt")
  .option("--report <path>", "Write a JSON report of the run")
  .option("-v, --verbose", "Verbose output")
  .action(updateCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
