/**
 * Registry Models
 *
 * Catalog entries as parsed from the Cellosaurus text dump, partial
 * records contributed by each source, and the canonical registry row.
 */

/**
 * Missing-value sentinel shared by the registry writer and the annotator.
 */
export const NOT_AVAILABLE = 'not available';

/**
 * Name of the primary catalog source.
 */
export const CELLOSAURUS_SOURCE = 'cellosaurus';

/**
 * A cross-reference from a catalog entry into another database.
 */
export interface CrossReference {
  /** Database name as written in the catalog (e.g., "BTO", "EFO") */
  database: string;

  /** Identifier within that database (e.g., "BTO_0000567") */
  identifier: string;
}

/**
 * One parsed catalog block (ID ... //).
 */
export interface RawEntry {
  /** Primary accession (AC), e.g. "CVCL_0030" */
  accession: string;

  /** Primary name (ID), e.g. "HeLa" */
  name: string;

  /** Organism text (first OX line) */
  organism: string;

  /** Synonyms (SY, split on ";") */
  synonyms: string[];

  /** Cross-references (DR) */
  crossReferences: CrossReference[];

  /** Disease lines (DI), e.g. "NCIt; C27677; Cervical adenocarcinoma" */
  diseases: string[];

  /** Sex (SX) */
  sex?: string;

  /** Age at sampling (AG) */
  age?: string;

  /** Category (CA), e.g. "Cancer cell line" */
  category?: string;

  /** Comment lines (CC), one per line */
  comments: string[];

  /** Every tag's value; repeated tags joined with "; " */
  fields: Record<string, string>;

  /** Structured attributes attached by the annotation extractor */
  annotations?: EntryAnnotations;
}

/**
 * Structured attributes derived from a catalog entry.
 * Undefined means unresolved.
 */
export interface EntryAnnotations {
  organism?: string;
  taxonId?: string;
  organismPart?: string;
  samplingSite?: string;
  age?: string;
  developmentalStage?: string;
  sex?: string;
  ancestryCategory?: string;
  disease?: string;
  cellType?: string;
  btoCellLine?: string;
  materialType?: string;

  /** Comment lines no extraction rule consumed */
  unmatchedComments: string[];
}

/**
 * Curation levels, lowest first.
 */
export type CurationStatus = 'not curated' | 'AI curated' | 'manual curated';

/**
 * How a source's values were produced.
 */
export type SourceCuration = 'none' | 'ai' | 'manual';

/**
 * Registry fields that are merged value by value.
 */
export const REGISTRY_FIELDS = [
  'bto cell line',
  'organism',
  'organism part',
  'sampling site',
  'age',
  'developmental stage',
  'sex',
  'ancestry category',
  'disease',
  'cell type',
  'material type',
] as const;

export type RegistryField = (typeof REGISTRY_FIELDS)[number];

/**
 * Registry file columns in output order.
 */
export const REGISTRY_COLUMNS = [
  'cell line',
  'cellosaurus name',
  'cellosaurus accession',
  ...REGISTRY_FIELDS,
  'synonyms',
  'curated',
] as const;

export type RegistryColumn = (typeof REGISTRY_COLUMNS)[number];

/**
 * What one source knows about one cell line.
 */
export interface PartialRecord {
  /** Source name, matched against the priority list */
  source: string;

  /** Primary name in that source */
  name: string;

  /** Cellosaurus accession, when the source carries one */
  accession?: string;

  /** Field values; absent or sentinel values count as missing */
  values: Partial<Record<RegistryField, string>>;

  /** Synonyms in that source */
  synonyms: string[];

  /** How the values were produced */
  curation: SourceCuration;
}

/**
 * The single authoritative row for one cell line.
 */
export interface CanonicalRow {
  /** Cell-line code: upper-cased name without non-alphanumerics */
  code: string;

  /** Cellosaurus name, or the highest-priority source's name */
  name: string;

  /** Cellosaurus accession (sentinel when no source carries one) */
  accession: string;

  /** Field values, sentinel where unresolved */
  values: Record<RegistryField, string>;

  /** Union of every source's synonyms, name and accession included */
  synonyms: string[];

  /** Curation tag */
  curation: CurationStatus;
}

/**
 * Derives the cell-line code from a name.
 *
 * @example
 * cellLineCode('HeLa S3')  // "HELAS3"
 * cellLineCode('MCF-7')    // "MCF7"
 */
export function cellLineCode(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '');
}

/**
 * Whether a value is missing (empty or the sentinel).
 */
export function isMissing(value: string | undefined | null): boolean {
  return presentValue(value) === undefined;
}

/**
 * Returns the trimmed value, or undefined when it is missing.
 */
export function presentValue(value: string | undefined | null): string | undefined {
  if (value === undefined || value === null) return undefined;
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  if (trimmed === '' || lower === NOT_AVAILABLE || lower === 'no available') {
    return undefined;
  }
  return trimmed;
}

/**
 * Creates a value record with every field set to the sentinel.
 */
export function emptyRegistryValues(): Record<RegistryField, string> {
  return {
    'bto cell line': NOT_AVAILABLE,
    organism: NOT_AVAILABLE,
    'organism part': NOT_AVAILABLE,
    'sampling site': NOT_AVAILABLE,
    age: NOT_AVAILABLE,
    'developmental stage': NOT_AVAILABLE,
    sex: NOT_AVAILABLE,
    'ancestry category': NOT_AVAILABLE,
    disease: NOT_AVAILABLE,
    'cell type': NOT_AVAILABLE,
    'material type': NOT_AVAILABLE,
  };
}
