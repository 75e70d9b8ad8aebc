/**
 * extract command - Serialize a module's type graph as RDF
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Writable } from "node:stream";
import chalk from "chalk";
import ora from "ora";
import { ConfigurationError } from "../../core/errors.js";
import { SymbolGraphExtractor, type ExtractionOptionsInput } from "../../core/extraction/index.js";
import { createTripleSink, FORMAT_EXTENSIONS, type TripleFormat } from "../../core/sink/index.js";
import { loadSymbolSetFromFile } from "../../core/symbols/metadata-loader.js";
import { createLogger, setLogLevel } from "../../utils/logger.js";
import { formatZodError, safeValidate, TripleFormatSchema } from "../../utils/validation.js";

const logger = createLogger("extract");

export const STDOUT_PATH = "-";

export interface ExtractCommandOptions {
  output?: string;
  format: string;
  baseUri?: string;
  includePrivate?: boolean;
  includeInternal: boolean;
  includeCompilerGenerated?: boolean;
  excludeAttributes?: boolean;
  excludeExternalTypes?: boolean;
  extractExceptions: boolean;
  extractSeealso: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Map command-line flags onto extraction options.
 */
export function toExtractionOptions(options: ExtractCommandOptions): ExtractionOptionsInput {
  return {
    baseUri: options.baseUri,
    includePrivate: options.includePrivate ?? false,
    includeInternal: options.includeInternal,
    includeCompilerGenerated: options.includeCompilerGenerated ?? false,
    includeAttributes: !options.excludeAttributes,
    includeExternalTypes: !options.excludeExternalTypes,
    extractExceptions: options.extractExceptions,
    extractSeeAlso: options.extractSeealso,
  };
}

export function parseFormat(value: string): TripleFormat {
  const result = safeValidate(TripleFormatSchema, value);
  if (!result.success) {
    throw new ConfigurationError(`Unknown output format "${value}"`, {
      issues: formatZodError(result.error),
    });
  }
  return result.data;
}

/**
 * `-` means stdout; otherwise the dump path with its extension swapped for the format's.
 */
export function resolveOutputPath(inputPath: string, format: TripleFormat, output?: string): string {
  if (output) return output;
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${FORMAT_EXTENSIONS[format]}`);
}

/**
 * Load a symbol dump, extract its target module and write the triples.
 */
export async function extractCommand(input: string, options: ExtractCommandOptions): Promise<void> {
  if (options.quiet) {
    setLogLevel("silent");
  } else if (options.verbose) {
    setLogLevel("debug");
  }

  const format = parseFormat(options.format);
  const extractionOptions = toExtractionOptions(options);
  const outputPath = resolveOutputPath(input, format, options.output);
  const toStdout = outputPath === STDOUT_PATH;

  logger.debug({ input, outputPath, format, extractionOptions }, "Starting extraction");

  const spinner = ora({ text: "Loading symbols...", stream: process.stderr, isSilent: options.quiet }).start();

  try {
    const symbols = await loadSymbolSetFromFile(input);

    spinner.text = `Extracting ${symbols.targetModule.name}...`;
    const output: Writable = toStdout ? process.stdout : fs.createWriteStream(outputPath);
    const sink = createTripleSink(format, output, { endOnClose: !toStdout });

    try {
      const extractor = new SymbolGraphExtractor(sink, extractionOptions);
      const stats = extractor.extract(symbols, symbols.targetModule);

      spinner.text = "Writing triples...";
      await sink.close();

      spinner.succeed(
        chalk.green(`Wrote ${stats.tripleCount} triples for ${stats.typeCount} types`) +
          chalk.dim(` (${stats.durationMs}ms)`)
      );
    } catch (error) {
      // Release the partial file; stdout stays open
      if (!toStdout) output.destroy();
      throw error;
    }

    if (!toStdout && !options.quiet) {
      console.error(chalk.dim(`  Output: ${outputPath}`));
    }
  } catch (error) {
    spinner.fail(chalk.red("Extraction failed"));
    throw error;
  }
}
