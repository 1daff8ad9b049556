/**
 * Table Export Service
 *
 * Serializes flat tables to TSV.
 */

import Papa from 'papaparse';
import { FlatTable } from '../models/flat-table';

/**
 * Export options.
 */
export interface TableExportOptions {
  /** Line ending style */
  lineEnding?: 'unix' | 'windows';

  /** Whether to include BOM for UTF-8 */
  includeBom?: boolean;

  /** Whether to end the content with a line ending */
  trailingNewline?: boolean;
}

const DEFAULT_OPTIONS: Required<TableExportOptions> = {
  lineEnding: 'unix',
  includeBom: false,
  trailingNewline: true,
};

/**
 * Table Export Service
 */
export class TableExportService {
  /**
   * Exports a table to TSV content.
   */
  exportToTsv(table: FlatTable, options: TableExportOptions = {}): string {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const lineEnding = opts.lineEnding === 'windows' ? '\r\n' : '\n';

    let content = Papa.unparse(
      { fields: table.headers, data: table.rows },
      { delimiter: '\t', newline: lineEnding }
    );

    if (opts.trailingNewline) {
      content += lineEnding;
    }

    if (opts.includeBom) {
      content = '\ufeff' + content;
    }

    return content;
  }
}

// Export singleton instance for convenience
export const tableExport = new TableExportService();
