/**
 * Diagnostic Models
 *
 * Warnings and errors produced while building the registry or annotating
 * SDRF files. Services collect diagnostics instead of printing them.
 */

/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'warning' | 'info';

/**
 * Codes for recoverable conditions.
 */
export type DiagnosticCode =
  // Catalog parsing
  | 'MISSING_ORGANISM'

  // Cross-reference resolution
  | 'UNRESOLVED_CROSS_REFERENCE'

  // Reconciliation
  | 'INSUFFICIENT_SOURCE'
  | 'FIELD_CONFLICT'
  | 'AMBIGUOUS_MERGE'
  | 'UNKNOWN_SOURCE'

  // Matching
  | 'AMBIGUOUS_MATCH'
  | 'UNMATCHED_LABEL'
  | 'MATCH_SUGGESTION'

  // Tables
  | 'DUPLICATE_COLUMN_NAME'
  | 'MISSING_SOURCE_COLUMN'
  | 'SKIPPED_ROW';

/**
 * A single recoverable finding.
 */
export interface Diagnostic {
  /** Severity level */
  type: DiagnosticSeverity;

  /** Code for programmatic handling */
  code: DiagnosticCode;

  /** Human-readable message */
  message: string;

  /** What the diagnostic is about (accession, cell-line code, label) */
  subject?: string;

  /** Source name (e.g. "cellosaurus", "model-passport") */
  source?: string;
}

/**
 * Creates a warning diagnostic.
 */
export function warning(
  code: DiagnosticCode,
  message: string,
  extra: Pick<Diagnostic, 'subject' | 'source'> = {}
): Diagnostic {
  return { type: 'warning', code, message, ...extra };
}

/**
 * Creates an info diagnostic.
 */
export function info(
  code: DiagnosticCode,
  message: string,
  extra: Pick<Diagnostic, 'subject' | 'source'> = {}
): Diagnostic {
  return { type: 'info', code, message, ...extra };
}

/**
 * Returns only the warnings, optionally filtered by code.
 */
export function warningsOf(diagnostics: Diagnostic[], code?: DiagnosticCode): Diagnostic[] {
  return diagnostics.filter(
    (d) => d.type === 'warning' && (code === undefined || d.code === code)
  );
}

// ============ Error Types ============

/**
 * Error codes for structurally invalid input.
 */
export type MalformedInputCode =
  | 'MISSING_TERM_ID'
  | 'MISSING_ENTRY_ID'
  | 'UNTERMINATED_ENTRY'
  | 'MISSING_COLUMN'
  | 'INVALID_TABLE'
  | 'INVALID_CONFIG'
  | 'EMPTY_FILE';

/**
 * Structurally invalid source. Aborts the whole run; nothing is written.
 */
export class MalformedInputError extends Error {
  constructor(
    message: string,
    public readonly code: MalformedInputCode,
    public readonly source?: string,
    public readonly line?: number
  ) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'MalformedInputError';
  }
}
