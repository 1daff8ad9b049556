/**
 * Registry I/O Service
 *
 * Serializes canonical rows to the registry TSV and reads them back.
 * Both directions use the same column set and the same sentinel.
 */

import { MalformedInputError } from '../models/diagnostics';
import { FlatTable, cellValue, missingColumns } from '../models/flat-table';
import {
  CanonicalRow,
  CurationStatus,
  NOT_AVAILABLE,
  REGISTRY_COLUMNS,
  REGISTRY_FIELDS,
  cellLineCode,
  emptyRegistryValues,
  presentValue,
} from '../models/registry';
import { splitSynonyms } from './cellosaurus-parser.service';
import { TableExportOptions, tableExport } from './table-export.service';
import { tableParser } from './table-parser.service';

/**
 * Columns a registry file must carry for matching.
 */
export const REQUIRED_REGISTRY_COLUMNS = [
  'cell line',
  'cellosaurus name',
  'cellosaurus accession',
  'synonyms',
] as const;

/**
 * Parses a curation tag as written in the registry.
 */
export function parseCurationStatus(value: string | undefined): CurationStatus {
  const lower = presentValue(value)?.toLowerCase();
  if (lower === 'manual curated') return 'manual curated';
  if (lower === 'ai curated') return 'AI curated';
  return 'not curated';
}

/**
 * Registry I/O Service
 */
export class RegistryIoService {
  /**
   * Converts canonical rows to a flat table in registry column order.
   */
  toTable(rows: CanonicalRow[]): FlatTable {
    return {
      headers: [...REGISTRY_COLUMNS],
      rows: rows.map((row) => [
        row.code,
        row.name,
        row.accession,
        ...REGISTRY_FIELDS.map((field) => row.values[field]),
        row.synonyms.length > 0 ? row.synonyms.join(';') : NOT_AVAILABLE,
        row.curation,
      ]),
    };
  }

  /**
   * Converts canonical rows to TSV content.
   */
  exportToTsv(rows: CanonicalRow[], options: TableExportOptions = {}): string {
    return tableExport.exportToTsv(this.toTable(rows), options);
  }

  /**
   * Parses registry TSV content into canonical rows.
   *
   * @throws MalformedInputError when a required column is missing
   */
  parseFromContent(content: string, sourceName: string = 'registry'): CanonicalRow[] {
    const { table } = tableParser.parse(content, { sourceName });
    return this.fromTable(table, sourceName);
  }

  /**
   * Builds canonical rows from a parsed registry table.
   */
  fromTable(table: FlatTable, sourceName: string = 'registry'): CanonicalRow[] {
    const missing = missingColumns(table, REQUIRED_REGISTRY_COLUMNS);
    if (missing.length > 0) {
      throw new MalformedInputError(
        `${sourceName} must contain the columns: ${missing.join(', ')}`,
        'MISSING_COLUMN',
        sourceName
      );
    }

    return table.rows.map((cells) => {
      const name = cellValue(table, cells, 'cellosaurus name') ?? '';
      const values = emptyRegistryValues();
      for (const field of REGISTRY_FIELDS) {
        values[field] = presentValue(cellValue(table, cells, field)) ?? NOT_AVAILABLE;
      }

      const synonymsText = presentValue(cellValue(table, cells, 'synonyms'));

      return {
        code: presentValue(cellValue(table, cells, 'cell line')) ?? cellLineCode(name),
        name: presentValue(name) ?? NOT_AVAILABLE,
        accession: presentValue(cellValue(table, cells, 'cellosaurus accession')) ?? NOT_AVAILABLE,
        values,
        synonyms: synonymsText ? splitSynonyms(synonymsText) : [],
        curation: parseCurationStatus(cellValue(table, cells, 'curated')),
      };
    });
  }
}

// Export singleton instance for convenience
export const registryIo = new RegistryIoService();
