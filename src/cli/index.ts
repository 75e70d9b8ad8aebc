#!/usr/bin/env node

/**
 * typegraph-rdf CLI
 * Serializes the type surface of a compiled module as N-Triples or Turtle
 */

import { Command } from "commander";
import chalk from "chalk";
import { extractCommand } from "./commands/extract.js";
import { wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("typegraph-rdf")
  .description("Extract the type graph of a compiled module as RDF")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Command
// =============================================================================

program
  .argument("<dump>", "Symbol dump (JSON) describing the module and its references")
  .option("-o, --output <file>", "Output file, or - for stdout (default: dump path with .nt/.ttl)")
  .option("-f, --format <format>", "Output format (ntriples, turtle)", "ntriples")
  .option("-b, --base-uri <uri>", "Base URI for minted IRIs")
  .option("--include-private", "Include private types and members")
  .option("--no-include-internal", "Exclude internal types and members")
  .option("--include-compiler-generated", "Include compiler-synthesized symbols")
  .option("--exclude-attributes", "Do not emit attribute instances")
  .option("--exclude-external-types", "Do not describe types from referenced modules")
  .option("--no-extract-exceptions", "Skip documented exceptions")
  .option("--no-extract-seealso", "Skip documented see-also references")
  .option("-v, --verbose", "Enable debug logging")
  .option("-q, --quiet", "Suppress progress output")
  .action(extractCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  logger.error({ err: wrapped }, "CLI error occurred");
  console.error(chalk.red(`\nError: ${wrapped.message}`) + chalk.dim(` [${wrapped.code}]`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(wrapped.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
