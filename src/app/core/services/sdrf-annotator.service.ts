/**
 * SDRF Annotator Service
 *
 * Matches the cell-line label of every SDRF row against the registry and
 * writes the registry's fields back into the table. Every input column is
 * kept; annotation columns are appended, or overwritten in place when the
 * SDRF already has them.
 */

import {
  DEFAULT_LABEL_COLUMN,
  MATCH_RULE_COLUMN,
  MatchResult,
  SampleLabel,
} from '../models/annotation';
import { Diagnostic, MalformedInputError } from '../models/diagnostics';
import { FlatTable, findColumnIndex } from '../models/flat-table';
import { NOT_AVAILABLE, REGISTRY_FIELDS } from '../models/registry';
import { CellLineRegistry, LabelMatchOptions, labelMatcher } from './label-matcher.service';

/**
 * Columns written for every annotated row, in output order.
 */
export const ANNOTATION_COLUMNS = [
  'cell line',
  'cellosaurus name',
  'cellosaurus accession',
  ...REGISTRY_FIELDS,
  MATCH_RULE_COLUMN,
] as const;

type AnnotationColumn = (typeof ANNOTATION_COLUMNS)[number];

/**
 * Options for annotating an SDRF table.
 */
export interface SdrfAnnotateOptions extends LabelMatchOptions {
  /** Column holding the free-text cell-line label */
  labelColumn?: string;
}

/**
 * Result of annotating an SDRF table.
 */
export interface SdrfAnnotateResult {
  /** Input table with annotation columns */
  table: FlatTable;

  /** One result per data row, in row order */
  matches: MatchResult[];

  diagnostics: Diagnostic[];

  stats: {
    rowCount: number;
    matchedCount: number;
    unmatchedCount: number;
    ambiguousCount: number;
  };
}

const DEFAULT_OPTIONS: Required<Pick<SdrfAnnotateOptions, 'labelColumn'>> = {
  labelColumn: DEFAULT_LABEL_COLUMN,
};

/**
 * Value written to one annotation column for a match result.
 */
export function annotationValue(result: MatchResult, column: AnnotationColumn): string {
  if (column === MATCH_RULE_COLUMN) {
    return result.rule;
  }

  const row = result.row;
  if (!row) {
    return NOT_AVAILABLE;
  }

  switch (column) {
    case 'cell line':
      return row.code;
    case 'cellosaurus name':
      return row.name;
    case 'cellosaurus accession':
      return row.accession;
    default:
      return row.values[column];
  }
}

/**
 * SDRF Annotator Service
 */
export class SdrfAnnotatorService {
  /**
   * Annotates a parsed SDRF table.
   *
   * @throws MalformedInputError when the label column is missing
   */
  annotate(
    sdrf: FlatTable,
    registry: CellLineRegistry,
    options: SdrfAnnotateOptions = {}
  ): SdrfAnnotateResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    const labelIndex = findColumnIndex(sdrf, opts.labelColumn);
    if (labelIndex === -1) {
      throw new MalformedInputError(
        `SDRF file must contain the column: ${opts.labelColumn}`,
        'MISSING_COLUMN',
        'sdrf'
      );
    }

    const labels = sdrf.rows.map((cells, index) => this.toLabel(sdrf, cells, index, labelIndex));
    const batch = labelMatcher.matchAll(registry, labels, opts);

    // Existing columns are overwritten in place, the rest appended
    const headers = [...sdrf.headers];
    const targets = ANNOTATION_COLUMNS.map((column) => {
      const existing = findColumnIndex(sdrf, column);
      if (existing !== -1 && existing !== labelIndex) {
        return { column, index: existing };
      }
      headers.push(column);
      return { column, index: headers.length - 1 };
    });

    const rows = sdrf.rows.map((cells, rowIndex) => {
      const out = [...cells];
      while (out.length < headers.length) {
        out.push('');
      }
      for (const { column, index } of targets) {
        out[index] = annotationValue(batch.results[rowIndex], column);
      }
      return out;
    });

    return {
      table: { headers, rows },
      matches: batch.results,
      diagnostics: batch.diagnostics,
      stats: {
        rowCount: sdrf.rows.length,
        matchedCount: batch.stats.matchedCount,
        unmatchedCount: batch.stats.unmatchedCount,
        ambiguousCount: batch.stats.ambiguousCount,
      },
    };
  }

  private toLabel(
    sdrf: FlatTable,
    cells: string[],
    index: number,
    labelIndex: number
  ): SampleLabel {
    const context: Record<string, string> = {};
    const seen = new Set<string>();
    sdrf.headers.forEach((header, column) => {
      if (column !== labelIndex && !seen.has(header)) {
        seen.add(header);
        context[header] = cells[column] ?? '';
      }
    });

    return {
      text: cells[labelIndex] ?? '',
      row: index + 1,
      context,
    };
  }
}

// Export singleton instance for convenience
export const sdrfAnnotator = new SdrfAnnotatorService();
