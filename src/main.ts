#!/usr/bin/env node
/**
 * Cell-Line Registry CLI
 *
 * Builds the canonical cell-line registry and annotates SDRF
 * (Sample and Data Relationship Format) files against it.
 */

import { parseArgs } from 'node:util';
import { AnnotateArgs, annotateSdrf } from './app/commands/annotate.command';
import {
  BuildRegistryArgs,
  SourceFileArg,
  buildRegistry,
  parseSourceArg,
} from './app/commands/build-registry.command';
import { Diagnostic, MalformedInputError } from './app/core/models/diagnostics';

const USAGE = `Usage:
  cellline-registry build-registry --cellosaurus <txt|txt.gz> --bto <obo> --cl <obo> --output <tsv>
                                   [--config <json>] [--source <name>=<path> ...] [--verbose]
  cellline-registry annotate --sdrf <tsv> --registry <tsv> --output <tsv>
                             [--label-column <name>] [--no-suggestions] [--verbose]`;

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function requireOption(values: Record<string, unknown>, name: string): string {
  const value = values[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new UsageError(`Missing required option --${name}`);
  }
  return value;
}

function reportDiagnostics(diagnostics: Diagnostic[], verbose: boolean): void {
  for (const diagnostic of diagnostics) {
    if (diagnostic.type === 'warning') {
      console.warn(`[${diagnostic.code}] ${diagnostic.message}`);
    } else if (verbose) {
      console.info(`[${diagnostic.code}] ${diagnostic.message}`);
    }
  }
}

async function runBuildRegistry(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      cellosaurus: { type: 'string' },
      bto: { type: 'string' },
      cl: { type: 'string' },
      output: { type: 'string' },
      config: { type: 'string' },
      source: { type: 'string', multiple: true },
      verbose: { type: 'boolean', default: false },
    },
  });

  const sources: SourceFileArg[] = (values.source ?? []).map((value) => {
    const parsed = parseSourceArg(value);
    if (!parsed) {
      throw new UsageError(`Invalid --source "${value}", expected <name>=<path>`);
    }
    return parsed;
  });

  const args: BuildRegistryArgs = {
    cellosaurusPath: requireOption(values, 'cellosaurus'),
    btoPath: requireOption(values, 'bto'),
    clPath: requireOption(values, 'cl'),
    outputPath: requireOption(values, 'output'),
    configPath: values.config,
    sources,
  };

  console.log(`Building registry from ${args.cellosaurusPath}`);
  const result = await buildRegistry(args);
  reportDiagnostics(result.diagnostics, values.verbose === true);

  const { stats } = result;
  console.log(
    `Registry written to ${args.outputPath}: ${stats.rowCount} cell lines ` +
      `(${stats.entryCount} catalog entries, ${stats.skippedEntryCount} skipped, ` +
      `${stats.supplementaryRecordCount} supplementary records, ${stats.droppedCount} dropped, ` +
      `${stats.conflictCount} conflicts)`
  );
}

async function runAnnotate(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      sdrf: { type: 'string' },
      registry: { type: 'string' },
      output: { type: 'string' },
      'label-column': { type: 'string' },
      'no-suggestions': { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
    },
  });

  const args: AnnotateArgs = {
    sdrfPath: requireOption(values, 'sdrf'),
    registryPath: requireOption(values, 'registry'),
    outputPath: requireOption(values, 'output'),
    labelColumn: values['label-column'],
    suggestCandidates: values['no-suggestions'] !== true,
  };

  console.log(`Annotating SDRF file: ${args.sdrfPath}`);
  const result = await annotateSdrf(args);
  reportDiagnostics(result.diagnostics, values.verbose === true);

  const { stats } = result;
  console.log(
    `Annotated data saved to ${args.outputPath}: ${stats.matchedCount}/${stats.rowCount} rows matched ` +
      `(${stats.unmatchedCount} unmatched, ${stats.ambiguousCount} ambiguous)`
  );
}

/**
 * Runs the CLI and returns the exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'build-registry':
        await runBuildRegistry(rest);
        return EXIT_OK;
      case 'annotate':
        await runAnnotate(rest);
        return EXIT_OK;
      case '--help':
      case '-h':
        console.log(USAGE);
        return EXIT_OK;
      default:
        throw new UsageError(command ? `Unknown command: ${command}` : 'No command given');
    }
  } catch (error) {
    if (error instanceof UsageError || (error instanceof TypeError && 'code' in error)) {
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof MalformedInputError) {
      console.error(`Error [${error.code}]: ${error.message}`);
      return EXIT_FAILURE;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = EXIT_FAILURE;
    });
}
