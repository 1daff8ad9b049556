/**
 * Registry Reconciler Service
 *
 * Merges partial records from every source into one canonical row per
 * cell line. Field values are taken in explicit source-priority order;
 * conflicts are kept visible as diagnostics and lower the curation tag.
 */

import { Diagnostic, warning } from '../models/diagnostics';
import {
  CanonicalRow,
  CurationStatus,
  NOT_AVAILABLE,
  PartialRecord,
  REGISTRY_FIELDS,
  cellLineCode,
  emptyRegistryValues,
  presentValue,
} from '../models/registry';

/**
 * Options for reconciliation.
 */
export interface ReconcileOptions {
  /** Source names, highest priority first */
  sourcePriority: string[];
}

/**
 * Result of reconciliation.
 */
export interface ReconcileResult {
  /** Canonical rows sorted by cell-line code */
  rows: CanonicalRow[];

  /** Conflicts, ambiguous merges and dropped groups */
  diagnostics: Diagnostic[];

  stats: {
    recordCount: number;
    groupCount: number;
    droppedCount: number;
    conflictCount: number;
  };
}

/**
 * Compares strings by code unit, independent of locale.
 */
export function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Registry Reconciler Service
 */
export class RegistryReconcilerService {
  /**
   * Groups records by cell-line code and merges each group.
   */
  reconcile(records: PartialRecord[], options: ReconcileOptions): ReconcileResult {
    const diagnostics: Diagnostic[] = [];
    const rank = this.buildRanking(records, options.sourcePriority, diagnostics);
    const ordered = [...records].sort((a, b) => this.compareRecords(a, b, rank));

    // One-hop link: an accession seen first in a higher-priority source fixes the group
    const accessionIndex = new Map<string, string>();
    for (const record of ordered) {
      const code = cellLineCode(record.name);
      if (record.accession && code && !accessionIndex.has(record.accession)) {
        accessionIndex.set(record.accession, code);
      }
    }

    const groups = new Map<string, PartialRecord[]>();
    for (const record of ordered) {
      const code =
        (record.accession ? accessionIndex.get(record.accession) : undefined) ??
        cellLineCode(record.name);

      if (!code) {
        diagnostics.push(
          warning('SKIPPED_ROW', `Record "${record.name}" has no usable cell-line code`, {
            subject: record.name,
            source: record.source,
          })
        );
        continue;
      }

      const group = groups.get(code);
      if (group) {
        group.push(record);
      } else {
        groups.set(code, [record]);
      }
    }

    const rows: CanonicalRow[] = [];
    let droppedCount = 0;
    let conflictCount = 0;

    for (const [code, group] of groups) {
      const merged = this.mergeGroup(code, group, diagnostics);
      conflictCount += merged.conflicts;

      if (!merged.row) {
        droppedCount++;
        continue;
      }
      rows.push(merged.row);
    }

    rows.sort((a, b) => compareCodes(a.code, b.code));

    return {
      rows,
      diagnostics,
      stats: {
        recordCount: records.length,
        groupCount: groups.size,
        droppedCount,
        conflictCount,
      },
    };
  }

  /**
   * Merges one group whose records are already in priority order.
   */
  private mergeGroup(
    code: string,
    group: PartialRecord[],
    diagnostics: Diagnostic[]
  ): { row?: CanonicalRow; conflicts: number } {
    const withAccession = group.filter((record) => record.accession);
    const accession = withAccession[0]?.accession ?? NOT_AVAILABLE;
    const distinctAccessions = [...new Set(withAccession.map((record) => record.accession))];
    if (distinctAccessions.length > 1) {
      diagnostics.push(
        warning(
          'AMBIGUOUS_MERGE',
          `${code} maps to accessions ${distinctAccessions.join(', ')}; using ${accession}`,
          { subject: code }
        )
      );
    }

    // Records of another accession describe another cell line: they only lend synonyms.
    const contributing = group.filter((record) => !record.accession || record.accession === accession);

    const values = emptyRegistryValues();
    let conflicts = 0;
    let unresolvedConflict = false;

    for (const field of REGISTRY_FIELDS) {
      const candidates = contributing
        .map((record) => ({ record, value: presentValue(record.values[field]) }))
        .filter((c): c is { record: PartialRecord; value: string } => c.value !== undefined);

      if (candidates.length === 0) {
        continue;
      }

      const [winner, ...others] = candidates;
      values[field] = winner.value;

      const losers = others.filter(
        (c) => c.value.toLowerCase() !== winner.value.toLowerCase()
      );
      if (losers.length > 0) {
        conflicts++;
        if (winner.record.curation === 'none') {
          unresolvedConflict = true;
        }
        diagnostics.push(
          warning(
            'FIELD_CONFLICT',
            `${code} ${field}: kept "${winner.value}" from ${winner.record.source}; ` +
              `other values: ${losers.map((c) => `"${c.value}" (${c.record.source})`).join(', ')}`,
            { subject: code, source: winner.record.source }
          )
        );
      }
    }

    if (values.organism === NOT_AVAILABLE) {
      diagnostics.push(
        warning('INSUFFICIENT_SOURCE', `${code} has no organism in any source and was dropped`, {
          subject: code,
        })
      );
      return { conflicts };
    }

    const primary = withAccession.find((record) => record.accession === accession) ?? group[0];
    const synonyms = new Set<string>();
    for (const record of group) {
      synonyms.add(record.name);
      for (const synonym of record.synonyms) {
        synonyms.add(synonym);
      }
    }
    if (accession !== NOT_AVAILABLE) {
      synonyms.add(accession);
    }

    return {
      row: {
        code,
        name: primary.name,
        accession,
        values,
        synonyms: [...synonyms],
        curation: unresolvedConflict ? 'not curated' : this.curationOf(contributing),
      },
      conflicts,
    };
  }

  private curationOf(group: PartialRecord[]): CurationStatus {
    if (group.some((record) => record.curation === 'manual')) return 'manual curated';
    if (group.some((record) => record.curation === 'ai')) return 'AI curated';
    return 'not curated';
  }

  /**
   * Maps source names to ranks. Unknown sources rank after every listed one,
   * in the order first seen.
   */
  private buildRanking(
    records: PartialRecord[],
    priority: string[],
    diagnostics: Diagnostic[]
  ): Map<string, number> {
    const rank = new Map<string, number>();
    priority.forEach((source, index) => {
      if (!rank.has(source)) {
        rank.set(source, index);
      }
    });

    for (const record of records) {
      if (!rank.has(record.source)) {
        rank.set(record.source, priority.length + rank.size);
        diagnostics.push(
          warning(
            'UNKNOWN_SOURCE',
            `Source "${record.source}" is not in the priority list; ranking it last`,
            { source: record.source }
          )
        );
      }
    }

    return rank;
  }

  private compareRecords(a: PartialRecord, b: PartialRecord, rank: Map<string, number>): number {
    const byRank = (rank.get(a.source) ?? 0) - (rank.get(b.source) ?? 0);
    if (byRank !== 0) return byRank;
    return (
      compareCodes(a.accession ?? '', b.accession ?? '') ||
      compareCodes(a.name, b.name)
    );
  }
}

// Export singleton instance for convenience
export const registryReconciler = new RegistryReconcilerService();
