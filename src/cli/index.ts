#!/usr/bin/env node

/**
 * CLI entry point for decorport
 * Back-ports relaxed decorator expressions to the pre-3.9 decorator grammar
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("decorport")
  .description("Back-port relaxed decorator expressions to the pre-3.9 decorator grammar")
  .version("0.1.0");

// Main conversion command (default action)
program
  .argument("[paths...]", "Source files or directories to convert in place")
  .option("-q, --quiet", "Only print warnings and errors")
  .option("-C, --concurrency <n>", "Number of files converted at once")
  .option("--dry-run", "Report the intended changes without writing anything")
  .option("-s, --simple [file]", "Convert one file (or standard input) to standard output")
  .option("--archive", "Archive originals before overwriting them")
  .option("--no-archive", "Do not archive originals")
  .option("-k, --archive-path <path>", "Root directory for archives")
  .option("--archive-format <format>", "Archive layout: directory or bundle")
  .option("-r, --recover <archive>", "Restore originals from an archive directory or bundle")
  .option("--remove-archive", "After recovery, remove the restored archive files")
  .option("--remove-archive-dir", "After recovery, also remove emptied archive directories")
  .option("--source-version <version>", "Grammar version of the sources (3.9 to 3.13)")
  .option("-l, --linesep <sep>", "Line separator for inserted code: LF, CRLF or CR")
  .option("-t, --indentation <indent>", "Indentation for inserted code: number of spaces or 't' for tabs")
  .option("--pep8", "Separate hoisted bindings with blank lines")
  .option("--no-pep8", "Insert hoisted bindings without blank lines")
  .option("-b, --binding-prefix <name>", "Prefix of the names given to hoisted bindings")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--stats <file>", "Export the run summary as JSON")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location and resolved settings
program
  .command("config")
  .description("Show configuration file location and resolved settings")
  .option("-c, --config <path>", "Path to custom config file")
  .action(configCommand);

await program.parseAsync();
