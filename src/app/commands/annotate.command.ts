/**
 * Annotate Command
 *
 * Reads an SDRF file and the registry, annotates every row and writes the
 * result in one piece.
 */

import { Diagnostic } from '../core/models/diagnostics';
import { MatchResult } from '../core/models/annotation';
import { CellLineRegistry } from '../core/services/label-matcher.service';
import { registryIo } from '../core/services/registry-io.service';
import { SdrfAnnotateOptions, sdrfAnnotator } from '../core/services/sdrf-annotator.service';
import { sourceFiles } from '../core/services/source-file.service';
import { tableExport } from '../core/services/table-export.service';
import { tableParser } from '../core/services/table-parser.service';

/**
 * Inputs of the annotate command.
 */
export interface AnnotateArgs {
  sdrfPath: string;
  registryPath: string;
  outputPath: string;
  labelColumn?: string;
  suggestCandidates?: boolean;
}

/**
 * Outcome of the annotate command.
 */
export interface AnnotateResult {
  matches: MatchResult[];
  diagnostics: Diagnostic[];
  stats: {
    rowCount: number;
    matchedCount: number;
    unmatchedCount: number;
    ambiguousCount: number;
  };
}

/**
 * Runs the annotation.
 *
 * @throws MalformedInputError when either input is structurally invalid
 */
export async function annotateSdrf(args: AnnotateArgs): Promise<AnnotateResult> {
  const [sdrfContent, registryContent] = await Promise.all([
    sourceFiles.readText(args.sdrfPath),
    sourceFiles.readText(args.registryPath),
  ]);

  const sdrf = tableParser.parse(sdrfContent, { sourceName: 'sdrf' });
  const registry = new CellLineRegistry(registryIo.parseFromContent(registryContent));

  const options: SdrfAnnotateOptions = {};
  if (args.labelColumn) {
    options.labelColumn = args.labelColumn;
  }
  if (args.suggestCandidates !== undefined) {
    options.suggestCandidates = args.suggestCandidates;
  }

  const result = sdrfAnnotator.annotate(sdrf.table, registry, options);

  await sourceFiles.writeText(args.outputPath, tableExport.exportToTsv(result.table));

  return {
    matches: result.matches,
    diagnostics: [...sdrf.diagnostics, ...result.diagnostics],
    stats: result.stats,
  };
}
