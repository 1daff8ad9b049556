/**
 * Annotation Models
 *
 * Sample labels taken from an SDRF file and the outcome of matching each
 * one against the registry.
 */

import { CanonicalRow } from './registry';

/**
 * Rule that produced a match, in priority order. "none" means no match.
 */
export type MatchRule =
  | 'cell line'
  | 'cellosaurus name'
  | 'cellosaurus accession'
  | 'synonym'
  | 'none';

export const MATCH_RULES: readonly Exclude<MatchRule, 'none'>[] = [
  'cell line',
  'cellosaurus name',
  'cellosaurus accession',
  'synonym',
];

/**
 * Default SDRF column holding the free-text cell-line label.
 */
export const DEFAULT_LABEL_COLUMN = 'characteristics[cell line]';

/**
 * Audit column appended to annotated output.
 */
export const MATCH_RULE_COLUMN = 'match rule';

/**
 * A free-text cell-line mention and the row it came from.
 */
export interface SampleLabel {
  /** Label as written in the SDRF */
  text: string;

  /** Row index in the SDRF (1-based, like sample indices) */
  row: number;

  /** Every other column of the row, passed through unchanged */
  context: Record<string, string>;
}

/**
 * Outcome of matching one label.
 */
export interface MatchResult {
  label: SampleLabel;

  /** Code of the matched row; undefined when unmatched */
  code?: string;

  /** The matched row itself */
  row?: CanonicalRow;

  /** Rule that produced the match */
  rule: MatchRule;

  /** Number of rows that satisfied the winning rule (>1 means a tie-break was applied) */
  candidateCount: number;
}
