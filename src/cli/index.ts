#!/usr/bin/env node

/**
 * CLI entry point for the markdown site builder
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mdsite")
  .description("Build a static HTML site from markdown files and templates")
  .version("0.1.0");

// Main build command (default action)
program
  .option("-i, --input <path>", "Input directory containing markdown files")
  .option("-o, --output <path>", "Output directory for HTML files")
  .option("-w, --watch", "Rebuild whenever the input directory changes")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--dry-run", "Preview the build without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
