/**
 * Annotation Extractor Service
 *
 * Derives structured attributes from catalog entries: organism, age, sex,
 * sampling site, cell type, ancestry, disease and the BTO cell-line term.
 * Ontology cross-references are resolved against the loaded term graphs.
 */

import { Diagnostic, info } from '../models/diagnostics';
import {
  CELLOSAURUS_SOURCE,
  EntryAnnotations,
  NOT_AVAILABLE,
  PartialRecord,
  RawEntry,
  RegistryField,
} from '../models/registry';
import { TermGraph, lookupTerm } from '../models/term-graph';
import {
  COMMENT_CATEGORIES,
  extractAge,
  extractDiseaseName,
  findCommentCategory,
  inferDevelopmentalStage,
  normalizeSex,
  parseCellType,
  parseSamplingSite,
  resolveTaxonomy,
} from '../utils/extraction-rules';

/**
 * Ontologies used for cross-reference resolution.
 */
export interface OntologySet {
  /** BRENDA Tissue Ontology */
  bto: TermGraph;

  /** Cell Ontology */
  cl: TermGraph;
}

/**
 * Result of annotating a batch of entries.
 */
export interface AnnotationResult {
  /** The same entries, with annotations attached */
  entries: RawEntry[];

  /** Unresolved cross-references */
  diagnostics: Diagnostic[];
}

/**
 * Material type recorded for catalog cell lines.
 */
const CELL_LINE_MATERIAL_TYPE = 'cell';

/**
 * Resolves an ontology identifier to its term name.
 * Unknown identifiers resolve to the missing-value sentinel.
 */
export function resolveCrossReference(graph: TermGraph, identifier: string): string {
  return lookupTerm(graph, identifier)?.name ?? NOT_AVAILABLE;
}

/**
 * Annotation Extractor Service
 */
export class AnnotationExtractorService {
  constructor(private readonly ontologies: OntologySet) {}

  /**
   * Attaches annotations to every entry.
   */
  annotateAll(entries: RawEntry[]): AnnotationResult {
    const diagnostics: Diagnostic[] = [];
    for (const entry of entries) {
      this.annotate(entry, diagnostics);
    }
    return { entries, diagnostics };
  }

  /**
   * Attaches annotations to one entry and returns them.
   */
  annotate(entry: RawEntry, diagnostics: Diagnostic[] = []): EntryAnnotations {
    const taxonomy = resolveTaxonomy(entry.organism);
    const consumed = new Set<number>();

    const siteComment = findCommentCategory(entry.comments, COMMENT_CATEGORIES.samplingSite);
    const cellTypeComment = findCommentCategory(entry.comments, COMMENT_CATEGORIES.cellType);
    const populationComment = findCommentCategory(entry.comments, COMMENT_CATEGORIES.population);

    for (const found of [siteComment, cellTypeComment, populationComment]) {
      if (found) {
        consumed.add(found.index);
      }
    }

    const site = parseSamplingSite(siteComment?.value);
    const cellType = parseCellType(cellTypeComment?.value);

    const annotations: EntryAnnotations = {
      organism: taxonomy?.name.toLowerCase(),
      taxonId: taxonomy?.taxonId,
      organismPart: site?.organismPart,
      samplingSite: site?.site,
      age: extractAge(entry.age),
      developmentalStage: inferDevelopmentalStage(entry.age),
      sex: normalizeSex(entry.sex),
      ancestryCategory: populationComment?.value,
      disease: extractDiseaseName(entry.diseases[0]),
      cellType: this.resolveCellType(entry, cellType, diagnostics),
      btoCellLine: this.resolveBtoCellLine(entry, diagnostics),
      materialType: entry.category ? CELL_LINE_MATERIAL_TYPE : undefined,
      unmatchedComments: entry.comments.filter((_, index) => !consumed.has(index)),
    };

    entry.annotations = annotations;
    return annotations;
  }

  /**
   * Converts an annotated entry into the catalog's partial record.
   */
  toPartialRecord(entry: RawEntry): PartialRecord {
    const annotations = entry.annotations ?? this.annotate(entry);
    const values: Partial<Record<RegistryField, string>> = {
      'bto cell line': annotations.btoCellLine,
      organism: annotations.organism,
      'organism part': annotations.organismPart,
      'sampling site': annotations.samplingSite,
      age: annotations.age,
      'developmental stage': annotations.developmentalStage,
      sex: annotations.sex,
      'ancestry category': annotations.ancestryCategory,
      disease: annotations.disease,
      'cell type': annotations.cellType,
      'material type': annotations.materialType,
    };

    return {
      source: CELLOSAURUS_SOURCE,
      name: entry.name,
      accession: entry.accession || undefined,
      values,
      synonyms: entry.synonyms,
      curation: 'none',
    };
  }

  private resolveBtoCellLine(entry: RawEntry, diagnostics: Diagnostic[]): string | undefined {
    const refs = entry.crossReferences.filter((ref) => ref.database.toUpperCase() === 'BTO');

    for (const ref of refs) {
      const name = resolveCrossReference(this.ontologies.bto, ref.identifier);
      if (name !== NOT_AVAILABLE) {
        return name;
      }
      diagnostics.push(this.unresolved('BTO', ref.identifier, entry));
    }

    return undefined;
  }

  private resolveCellType(
    entry: RawEntry,
    cellType: { name?: string; clId?: string } | undefined,
    diagnostics: Diagnostic[]
  ): string | undefined {
    if (!cellType) {
      return undefined;
    }

    if (cellType.clId) {
      const name = resolveCrossReference(this.ontologies.cl, cellType.clId);
      if (name !== NOT_AVAILABLE) {
        return name;
      }
      diagnostics.push(this.unresolved('CL', cellType.clId, entry));
    }

    return cellType.name;
  }

  private unresolved(ontology: string, identifier: string, entry: RawEntry): Diagnostic {
    return info(
      'UNRESOLVED_CROSS_REFERENCE',
      `${ontology} term ${identifier} referenced by ${entry.accession || entry.name} is not in the loaded ontology`,
      { subject: entry.accession || entry.name, source: ontology.toLowerCase() }
    );
  }
}
