/**
 * Extraction Rules
 *
 * Pure functions that turn free-text catalog values into structured
 * attributes. Each returns undefined when the text does not qualify.
 */

/**
 * Parsed organism text.
 */
export interface Taxonomy {
  /** Scientific name (e.g., "Homo sapiens") */
  name: string;

  /** NCBI taxonomy ID, undefined when absent */
  taxonId?: string;
}

/**
 * Parsed "Derived from site" comment.
 */
export interface SamplingSite {
  /** Site kind (e.g., "in situ", "metastatic") */
  site?: string;

  /** Anatomical location (e.g., "uterus, cervix") */
  organismPart?: string;

  /** UBERON identifier when given */
  uberonId?: string;
}

/**
 * Comment categories consumed by the extractor.
 */
export const COMMENT_CATEGORIES = {
  samplingSite: 'Derived from site',
  cellType: 'Cell type',
  population: 'Population',
} as const;

/**
 * Age patterns, tried in order. Group 1 is the start, group 2 the optional range end.
 */
const AGE_PATTERNS: RegExp[] = [
  // "22Y-31Y", "22 Y - 31 Y"
  /^(\d+(?:\.\d+)?)\s*Y\s*-\s*(\d+(?:\.\d+)?)\s*Y\b/i,
  // "22-31Y", "22-31 Y"
  /^(\d+(?:\.\d+)?)\s*-\s*(\d+(?:\.\d+)?)\s*Y\b/i,
  // "45Y", "45 Y", "45.0Y", "30Y6M", "45 years"
  /^(\d+(?:\.\d+)?)\s*Y(?:ears?)?(?![a-z])/i,
];

/**
 * Formats a number without a decimal point.
 */
function formatWholeNumber(value: string): string {
  return String(Math.trunc(parseFloat(value)));
}

/**
 * Extracts the age in years.
 *
 * @example
 * extractAge('45 Y')     // "45"
 * extractAge('22Y-31Y')  // "22-31"
 * extractAge('unknown')  // undefined
 */
export function extractAge(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const trimmed = text.trim();

  for (const pattern of AGE_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match) {
      const start = formatWholeNumber(match[1]);
      return match[2] !== undefined ? `${start}-${formatWholeNumber(match[2])}` : start;
    }
  }

  return undefined;
}

/**
 * Finds the first comment of a category and returns its value.
 * The keyword match is case-insensitive; a trailing period is removed.
 *
 * @example
 * extractCommentCategory(['Population: Caucasian.'], 'Population') // "Caucasian"
 */
export function extractCommentCategory(
  comments: readonly string[],
  keyword: string
): string | undefined {
  return findCommentCategory(comments, keyword)?.value;
}

/**
 * Like extractCommentCategory, also returning the index of the consumed line.
 */
export function findCommentCategory(
  comments: readonly string[],
  keyword: string
): { index: number; value: string } | undefined {
  const prefix = `${keyword.toLowerCase()}:`;

  for (let index = 0; index < comments.length; index++) {
    const comment = comments[index];
    if (comment.toLowerCase().startsWith(prefix)) {
      const value = comment.substring(prefix.length).trim().replace(/\.$/, '').trim();
      return value ? { index, value } : undefined;
    }
  }

  return undefined;
}

/**
 * Splits organism text into name and taxon ID.
 *
 * @example
 * resolveTaxonomy('Homo sapiens (9606)')                      // { name: "Homo sapiens", taxonId: "9606" }
 * resolveTaxonomy('NCBI_TaxID=9606; ! Homo sapiens (Human)')  // { name: "Homo sapiens", taxonId: "9606" }
 * resolveTaxonomy('Homo sapiens')                             // { name: "Homo sapiens" }
 */
export function resolveTaxonomy(text: string | undefined): Taxonomy | undefined {
  if (!text || !text.trim()) return undefined;
  const trimmed = text.trim();

  const catalogForm = trimmed.match(/^NCBI_TaxID=(\d+)\s*;\s*!\s*(.+)$/i);
  if (catalogForm) {
    return {
      name: catalogForm[2].replace(/\s*\([^)]*\)\s*$/, '').trim(),
      taxonId: catalogForm[1],
    };
  }

  const parenthesized = trimmed.match(/^(.+?)\s*\((?:NCBI_TaxID=|NCBITaxon:)?(\d+)\)$/i);
  if (parenthesized) {
    return { name: parenthesized[1].trim(), taxonId: parenthesized[2] };
  }

  return { name: trimmed };
}

/**
 * Parses a "Derived from site" value.
 *
 * @example
 * parseSamplingSite('In situ; Uterus, cervix; UBERON=UBERON_0000002')
 * // { site: "in situ", organismPart: "uterus, cervix", uberonId: "UBERON_0000002" }
 */
export function parseSamplingSite(text: string | undefined): SamplingSite | undefined {
  if (!text || !text.trim()) return undefined;

  const result: SamplingSite = {};
  const parts = text.split(';').map((p) => p.trim()).filter((p) => p.length > 0);

  for (const part of parts) {
    const xref = part.match(/^UBERON=(\S+)$/i);
    if (xref) {
      if (result.uberonId === undefined) {
        result.uberonId = xref[1];
      }
    } else if (result.site === undefined) {
      result.site = part.toLowerCase();
    } else if (result.organismPart === undefined) {
      result.organismPart = part.toLowerCase();
    }
  }

  // A single descriptive part is the location itself
  if (result.organismPart === undefined && result.site !== undefined && !isSiteKind(result.site)) {
    result.organismPart = result.site;
    result.site = undefined;
  }

  return result;
}

const SITE_KINDS = new Set(['in situ', 'metastatic', 'primary', 'recurrent', 'unspecified']);

function isSiteKind(value: string): boolean {
  return SITE_KINDS.has(value);
}

/**
 * Parses a cell-type comment into its name and CL identifier.
 *
 * @example
 * parseCellType('Epithelial cell of cervix; CL=CL_0002535')
 * // { name: "epithelial cell of cervix", clId: "CL_0002535" }
 */
export function parseCellType(
  text: string | undefined
): { name?: string; clId?: string } | undefined {
  if (!text || !text.trim()) return undefined;

  const result: { name?: string; clId?: string } = {};
  for (const part of text.split(';').map((p) => p.trim())) {
    const xref = part.match(/^CL=(\S+)$/i);
    if (xref) {
      if (result.clId === undefined) {
        result.clId = xref[1];
      }
    } else if (part && result.name === undefined) {
      result.name = part.toLowerCase();
    }
  }
  return result;
}

/**
 * Normalizes the catalog sex value.
 */
export function normalizeSex(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const lower = text.trim().toLowerCase();
  if (lower === '' || lower.includes('unspecified')) return undefined;
  return lower;
}

/**
 * Extracts the disease name from a DI value ("NCIt; C27677; Name").
 */
export function extractDiseaseName(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const parts = text.split(';').map((p) => p.trim());
  const name = parts.length >= 3 ? parts.slice(2).join('; ') : parts[parts.length - 1];
  return name ? name.toLowerCase() : undefined;
}

/**
 * Infers a developmental stage from age text.
 *
 * @example
 * inferDevelopmentalStage('45Y')   // "adult"
 * inferDevelopmentalStage('Fetal') // "fetal"
 */
export function inferDevelopmentalStage(ageText: string | undefined): string | undefined {
  if (!ageText) return undefined;
  const lower = ageText.trim().toLowerCase();

  if (lower.includes('embryo')) return 'embryonic';
  if (lower.includes('fetal') || lower.includes('fetus')) return 'fetal';

  const years = extractAge(ageText);
  if (years !== undefined) {
    const value = parseInt(years, 10);
    if (value < 2) return 'infant';
    if (value < 13) return 'child';
    if (value < 18) return 'adolescent';
    return 'adult';
  }

  // Month or day ages without a year part
  if (/^\d+(?:\.\d+)?\s*[MD]\b/i.test(lower)) return 'infant';

  return undefined;
}
