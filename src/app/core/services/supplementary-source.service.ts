/**
 * Supplementary Source Service
 *
 * Turns a flat table (model-passport export, expression-atlas export,
 * manually curated sheet) into partial records using the column map from
 * the pipeline configuration.
 */

import { Diagnostic, warning } from '../models/diagnostics';
import { FlatTable, cellValue, findColumnIndex } from '../models/flat-table';
import { SupplementarySourceConfig } from '../models/pipeline-config';
import {
  PartialRecord,
  RegistryField,
  SourceCuration,
  presentValue,
} from '../models/registry';
import { splitSynonyms } from './cellosaurus-parser.service';

/**
 * Result of reading a supplementary source.
 */
export interface SupplementaryReadResult {
  records: PartialRecord[];
  diagnostics: Diagnostic[];
}

/**
 * Maps a per-row curation value to a source curation level.
 *
 * @example
 * parseCurationValue('manual curated') // "manual"
 * parseCurationValue('AI curated')     // "ai"
 */
export function parseCurationValue(value: string | undefined): SourceCuration | undefined {
  const lower = presentValue(value)?.toLowerCase();
  if (!lower) return undefined;
  if (lower.startsWith('manual')) return 'manual';
  if (lower.startsWith('ai')) return 'ai';
  if (lower.startsWith('not')) return 'none';
  return undefined;
}

/**
 * Supplementary Source Service
 */
export class SupplementarySourceService {
  /**
   * Reads partial records from a parsed table.
   * Rows without a cell-line name are skipped with a warning.
   */
  read(table: FlatTable, config: SupplementarySourceConfig): SupplementaryReadResult {
    const records: PartialRecord[] = [];
    const diagnostics: Diagnostic[] = [];

    const mapped = Object.entries(config.columns)
      .map(([column, field]) => ({ index: findColumnIndex(table, column), column, field }))
      .filter((entry) => {
        if (entry.index === -1) {
          diagnostics.push(
            warning('MISSING_SOURCE_COLUMN', `Column "${entry.column}" is not present in ${config.name}`, {
              source: config.name,
            })
          );
          return false;
        }
        return true;
      });

    table.rows.forEach((row, rowIndex) => {
      const name = presentValue(cellValue(table, row, config.nameColumn));
      if (!name) {
        diagnostics.push(
          warning('SKIPPED_ROW', `Row ${rowIndex + 1} of ${config.name} has no cell-line name`, {
            source: config.name,
          })
        );
        return;
      }

      const values: Partial<Record<RegistryField, string>> = {};
      for (const { index, field } of mapped) {
        const value = presentValue(row[index]);
        if (value !== undefined && values[field] === undefined) {
          values[field] = value;
        }
      }

      const synonymsText = config.synonymsColumn
        ? presentValue(cellValue(table, row, config.synonymsColumn))
        : undefined;

      const rowCuration = config.curationColumn
        ? parseCurationValue(cellValue(table, row, config.curationColumn))
        : undefined;

      records.push({
        source: config.name,
        name,
        accession: config.accessionColumn
          ? presentValue(cellValue(table, row, config.accessionColumn))
          : undefined,
        values,
        synonyms: synonymsText ? splitSynonyms(synonymsText, config.synonymSeparator) : [],
        curation: rowCuration ?? config.curation,
      });
    });

    return { records, diagnostics };
  }
}

// Export singleton instance for convenience
export const supplementarySource = new SupplementarySourceService();
