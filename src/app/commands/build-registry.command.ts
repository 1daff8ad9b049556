/**
 * Build Registry Command
 *
 * Loads the ontologies, the catalog and the supplementary sources, merges
 * them and writes the canonical registry TSV. Sources load concurrently;
 * the merge waits for all of them. Nothing is written unless every source
 * parsed.
 */

import { Diagnostic } from '../core/models/diagnostics';
import { PartialRecord, CanonicalRow } from '../core/models/registry';
import { resolveSourcePriority } from '../core/models/pipeline-config';
import { TermGraph } from '../core/models/term-graph';
import { AnnotationExtractorService } from '../core/services/annotation-extractor.service';
import { cellosaurusParser } from '../core/services/cellosaurus-parser.service';
import { configService } from '../core/services/config.service';
import { oboParser } from '../core/services/obo-parser.service';
import { registryIo } from '../core/services/registry-io.service';
import { registryReconciler } from '../core/services/registry-reconciler.service';
import { sourceFiles } from '../core/services/source-file.service';
import { supplementarySource } from '../core/services/supplementary-source.service';
import { tableParser } from '../core/services/table-parser.service';

/**
 * A supplementary file given on the command line.
 */
export interface SourceFileArg {
  /** Source name as defined in the configuration */
  name: string;

  /** Path to the file */
  path: string;
}

/**
 * Inputs of the build-registry command.
 */
export interface BuildRegistryArgs {
  cellosaurusPath: string;
  btoPath: string;
  clPath: string;
  outputPath: string;
  configPath?: string;
  sources?: SourceFileArg[];
}

/**
 * Outcome of the build-registry command.
 */
export interface BuildRegistryResult {
  rows: CanonicalRow[];
  diagnostics: Diagnostic[];
  stats: {
    entryCount: number;
    skippedEntryCount: number;
    supplementaryRecordCount: number;
    rowCount: number;
    droppedCount: number;
    conflictCount: number;
  };
}

/**
 * Parses a "name=path" source argument.
 */
export function parseSourceArg(value: string): SourceFileArg | null {
  const separator = value.indexOf('=');
  if (separator <= 0 || separator === value.length - 1) {
    return null;
  }
  return { name: value.substring(0, separator).trim(), path: value.substring(separator + 1).trim() };
}

async function loadOntology(path: string, sourceName: string): Promise<TermGraph> {
  return oboParser.parse(await sourceFiles.readText(path), { sourceName });
}

/**
 * Runs the registry build.
 *
 * @throws MalformedInputError when any source is structurally invalid
 */
export async function buildRegistry(args: BuildRegistryArgs): Promise<BuildRegistryResult> {
  const config = await configService.load(args.configPath);
  const sourceArgs = args.sources ?? [];
  // Resolve every source definition before reading anything
  const sourceConfigs = sourceArgs.map((arg) => ({
    arg,
    config: configService.getSource(config, arg.name),
  }));

  const [bto, cl, catalog, supplementary] = await Promise.all([
    loadOntology(args.btoPath, 'bto'),
    loadOntology(args.clPath, 'cl'),
    sourceFiles
      .readText(args.cellosaurusPath)
      .then((content) => cellosaurusParser.parse(content)),
    Promise.all(
      sourceConfigs.map(async ({ arg, config: sourceConfig }) => {
        const { table, diagnostics } = tableParser.parse(await sourceFiles.readText(arg.path), {
          delimiter: sourceConfig.delimiter,
          sourceName: sourceConfig.name,
        });
        const read = supplementarySource.read(table, sourceConfig);
        return { records: read.records, diagnostics: [...diagnostics, ...read.diagnostics] };
      })
    ),
  ]);

  const extractor = new AnnotationExtractorService({ bto, cl });
  const annotated = extractor.annotateAll(catalog.entries);

  const records: PartialRecord[] = [
    ...annotated.entries.map((entry) => extractor.toPartialRecord(entry)),
    ...supplementary.flatMap((s) => s.records),
  ];

  const reconciled = registryReconciler.reconcile(records, {
    sourcePriority: resolveSourcePriority(config),
  });

  await sourceFiles.writeText(args.outputPath, registryIo.exportToTsv(reconciled.rows));

  return {
    rows: reconciled.rows,
    diagnostics: [
      ...catalog.diagnostics,
      ...annotated.diagnostics,
      ...supplementary.flatMap((s) => s.diagnostics),
      ...reconciled.diagnostics,
    ],
    stats: {
      entryCount: catalog.stats.entryCount,
      skippedEntryCount: catalog.stats.skippedCount,
      supplementaryRecordCount: supplementary.reduce((sum, s) => sum + s.records.length, 0),
      rowCount: reconciled.rows.length,
      droppedCount: reconciled.stats.droppedCount,
      conflictCount: reconciled.stats.conflictCount,
    },
  };
}
