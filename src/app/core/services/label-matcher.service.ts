/**
 * Label Matcher Service
 *
 * Resolves free-text cell-line labels to registry rows. Rules are tried in
 * priority order and the first rule with any candidate wins; a tie within a
 * rule is broken by the smallest cell-line code and reported.
 */

import { Diagnostic, info, warning } from '../models/diagnostics';
import { MATCH_RULES, MatchResult, MatchRule, SampleLabel } from '../models/annotation';
import { CanonicalRow, presentValue } from '../models/registry';
import { compareCodes } from './registry-reconciler.service';
import { bestSimilarity } from '../utils/similarity';

/**
 * Options for matching.
 */
export interface LabelMatchOptions {
  /** Whether to suggest close registry entries for unmatched labels */
  suggestCandidates?: boolean;

  /** Minimum normalized similarity for a suggestion (0-1) */
  suggestionThreshold?: number;
}

/**
 * Result of matching a batch of labels.
 */
export interface LabelMatchBatch {
  results: MatchResult[];
  diagnostics: Diagnostic[];
  stats: {
    labelCount: number;
    matchedCount: number;
    unmatchedCount: number;
    ambiguousCount: number;
  };
}

const DEFAULT_OPTIONS: Required<LabelMatchOptions> = {
  suggestCandidates: true,
  suggestionThreshold: 0.75,
};

type Index = ReadonlyMap<string, readonly CanonicalRow[]>;

function buildIndex(rows: readonly CanonicalRow[], key: (row: CanonicalRow) => string | undefined): Index {
  const index = new Map<string, CanonicalRow[]>();
  for (const row of rows) {
    const value = key(row);
    if (value === undefined) continue;
    const bucket = index.get(value);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(value, [row]);
    }
  }
  return index;
}

/**
 * The loaded registry. Built once per run and shared read-only.
 */
export class CellLineRegistry {
  readonly rows: readonly CanonicalRow[];
  private readonly byCode: Index;
  private readonly byName: Index;
  private readonly byAccession: Index;
  private readonly synonymsLower: ReadonlyMap<CanonicalRow, readonly string[]>;

  constructor(rows: readonly CanonicalRow[]) {
    this.rows = Object.freeze([...rows].sort((a, b) => compareCodes(a.code, b.code)));
    this.byCode = buildIndex(this.rows, (row) => presentValue(row.code));
    this.byName = buildIndex(this.rows, (row) => presentValue(row.name)?.toLowerCase());
    this.byAccession = buildIndex(this.rows, (row) => presentValue(row.accession)?.toLowerCase());
    this.synonymsLower = new Map(
      this.rows.map((row) => [
        row,
        row.synonyms.map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0),
      ])
    );
  }

  get size(): number {
    return this.rows.length;
  }

  /**
   * Rows satisfying one rule for a label, sorted by code. Only the code rule
   * is case-sensitive.
   */
  candidates(rule: Exclude<MatchRule, 'none'>, label: string): readonly CanonicalRow[] {
    switch (rule) {
      case 'cell line':
        return this.byCode.get(label) ?? [];
      case 'cellosaurus name':
        return this.byName.get(label.toLowerCase()) ?? [];
      case 'cellosaurus accession':
        return this.byAccession.get(label.toLowerCase()) ?? [];
      case 'synonym': {
        const needle = label.toLowerCase();
        return this.rows.filter((row) =>
          (this.synonymsLower.get(row) ?? []).some((synonym) => synonym.includes(needle))
        );
      }
    }
  }

  /**
   * Lookup by cell-line code.
   */
  get(code: string): CanonicalRow | undefined {
    return this.byCode.get(code)?.[0];
  }
}

/**
 * Label Matcher Service
 */
export class LabelMatcherService {
  /**
   * Matches one label. Diagnostics for ties and misses are appended.
   */
  match(registry: CellLineRegistry, label: SampleLabel, diagnostics: Diagnostic[] = []): MatchResult {
    const text = presentValue(label.text);

    if (text !== undefined) {
      for (const rule of MATCH_RULES) {
        const candidates = registry.candidates(rule, text);
        if (candidates.length === 0) {
          continue;
        }

        const [chosen] = candidates;
        if (candidates.length > 1) {
          diagnostics.push(
            warning(
              'AMBIGUOUS_MATCH',
              `Label "${text}" (row ${label.row}) matches ${candidates.length} entries by ${rule}: ` +
                `${candidates.map((c) => c.code).join(', ')}; using ${chosen.code}`,
              { subject: text }
            )
          );
        }

        return {
          label,
          code: chosen.code,
          row: chosen,
          rule,
          candidateCount: candidates.length,
        };
      }
    }

    diagnostics.push(
      warning('UNMATCHED_LABEL', `No match found for cell line: ${label.text}`, {
        subject: label.text,
      })
    );
    return { label, rule: 'none', candidateCount: 0 };
  }

  /**
   * Matches a sequence of labels in order.
   */
  matchAll(
    registry: CellLineRegistry,
    labels: readonly SampleLabel[],
    options: LabelMatchOptions = {}
  ): LabelMatchBatch {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const diagnostics: Diagnostic[] = [];
    const results = labels.map((label) => this.match(registry, label, diagnostics));

    const unmatched = [
      ...new Set(results.filter((r) => r.rule === 'none').map((r) => r.label.text)),
    ];

    if (unmatched.length > 0) {
      diagnostics.push(
        info('UNMATCHED_LABEL', `Unknown cell lines: ${unmatched.join(', ')}`)
      );
      if (opts.suggestCandidates) {
        diagnostics.push(...this.suggest(registry, unmatched, opts.suggestionThreshold));
      }
    }

    return {
      results,
      diagnostics,
      stats: {
        labelCount: labels.length,
        matchedCount: results.filter((r) => r.rule !== 'none').length,
        unmatchedCount: results.filter((r) => r.rule === 'none').length,
        ambiguousCount: results.filter((r) => r.candidateCount > 1).length,
      },
    };
  }

  /**
   * Closest registry entry per unmatched label, for human review only.
   */
  private suggest(
    registry: CellLineRegistry,
    labels: string[],
    threshold: number
  ): Diagnostic[] {
    const suggestions: Diagnostic[] = [];

    for (const label of labels) {
      const text = presentValue(label);
      if (text === undefined) continue;

      let best: { row: CanonicalRow; score: number } | undefined;
      for (const row of registry.rows) {
        const score = bestSimilarity(text, [row.code, row.name, ...row.synonyms]);
        if (score >= threshold && (!best || score > best.score)) {
          best = { row, score };
        }
      }

      if (best) {
        suggestions.push(
          info(
            'MATCH_SUGGESTION',
            `Closest entry for "${text}": ${best.row.code} (${best.row.name}, similarity ${best.score.toFixed(2)})`,
            { subject: text }
          )
        );
      }
    }

    return suggestions;
  }
}

// Export singleton instance for convenience
export const labelMatcher = new LabelMatcherService();
