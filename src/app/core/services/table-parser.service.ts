/**
 * Table Parser Service
 *
 * Parses delimited text (TSV by default) into a FlatTable with PapaParse.
 * Used for the registry, SDRF files and supplementary sources.
 */

import Papa from 'papaparse';
import { Diagnostic, MalformedInputError, warning } from '../models/diagnostics';
import { FlatTable } from '../models/flat-table';

/**
 * Options for parsing tables.
 */
export interface TableParseOptions {
  /** Field delimiter (default: tab) */
  delimiter?: string;

  /** Whether to trim whitespace from values */
  trimValues?: boolean;

  /** Source name used in diagnostics and errors */
  sourceName?: string;
}

/**
 * Result of parsing a table.
 */
export interface TableParseResult {
  table: FlatTable;

  /** Non-fatal findings (duplicate headers) */
  diagnostics: Diagnostic[];
}

const DEFAULT_OPTIONS: Required<TableParseOptions> = {
  delimiter: '\t',
  trimValues: true,
  sourceName: 'table',
};

/**
 * Table Parser Service
 */
export class TableParserService {
  /**
   * Parses delimited content.
   *
   * Short rows are padded; a row with values past the last header is rejected.
   *
   * @throws MalformedInputError for empty input, unbalanced quotes or over-long rows
   */
  parse(content: string, options: TableParseOptions = {}): TableParseResult {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const diagnostics: Diagnostic[] = [];

    const parseResult = Papa.parse<string[]>(content.replace(/^\uFEFF/, ''), {
      delimiter: opts.delimiter,
      header: false,
      skipEmptyLines: true,
    });

    const quoteError = parseResult.errors.find((e) => e.type === 'Quotes');
    if (quoteError) {
      throw new MalformedInputError(
        `Parse error in ${opts.sourceName}: ${quoteError.message}`,
        'INVALID_TABLE',
        opts.sourceName,
        quoteError.row !== undefined ? quoteError.row + 1 : undefined
      );
    }

    const data = parseResult.data;
    if (data.length === 0) {
      throw new MalformedInputError(`${opts.sourceName} is empty`, 'EMPTY_FILE', opts.sourceName);
    }

    const headers = data[0].map((h) => h.trim());
    const seen = new Map<string, number>();
    for (const header of headers) {
      const key = header.toLowerCase();
      const count = (seen.get(key) ?? 0) + 1;
      seen.set(key, count);
      if (count === 2) {
        diagnostics.push(
          warning('DUPLICATE_COLUMN_NAME', `Duplicate column name: "${header}"`, {
            source: opts.sourceName,
          })
        );
      }
    }

    const rows = data.slice(1).map((row, index) => {
      if (row.slice(headers.length).some((value) => value.trim() !== '')) {
        throw new MalformedInputError(
          `Row ${index + 1} of ${opts.sourceName} has ${row.length} cells but only ${headers.length} columns`,
          'INVALID_TABLE',
          opts.sourceName
        );
      }
      const padded = headers.map((_, index) => row[index] ?? '');
      return opts.trimValues ? padded.map((value) => value.trim()) : padded;
    });

    return { table: { headers, rows }, diagnostics };
  }
}

// Export singleton instance for convenience
export const tableParser = new TableParserService();
