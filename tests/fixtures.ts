import {
  CanonicalRow,
  CurationStatus,
  PartialRecord,
  RegistryField,
  cellLineCode,
  emptyRegistryValues,
} from '../src/app/core/models/registry';

export const CATALOG = `----------------------------------------------------------------------
        Cellosaurus: a knowledge resource on cell lines
----------------------------------------------------------------------
Description: test extract
AC   Primary accession

ID   HeLa
AC   CVCL_0030
SY   HELA; Hela; He La
DR   BTO; BTO_0000567
DR   EFO; EFO_0001185
CC   Population: African American.
CC   Omics: Deep exome analysis.
CC   Derived from site: In situ; Uterus, cervix; UBERON=UBERON_0000002.
CC   Cell type: Epithelial cell of cervix; CL=CL_0002535.
DI   NCIt; C27677; Human papillomavirus-related cervical adenocarcinoma
OX   NCBI_TaxID=9606; ! Homo sapiens (Human)
SX   Female
AG   30Y6M
CA   Cancer cell line
//
ID   Mystery line
AC   CVCL_X001
CA   Cancer cell line
//
`;

export const BTO_OBO = `format-version: 1.2
ontology: bto

[Term]
id: BTO:0000214
name: cell culture

[Term]
id: BTO:0000567
name: HeLa cell
is_a: BTO:0000214 ! cell culture
`;

export const CL_OBO = `format-version: 1.2
ontology: cl

[Term]
id: CL:0002535
name: epithelial cell of uterine cervix
`;

/**
 * Builds a registry row with sentinel values except those given.
 */
export function makeRow(
  name: string,
  accession: string,
  synonyms: string[],
  values: Partial<Record<RegistryField, string>> = {},
  curation: CurationStatus = 'not curated'
): CanonicalRow {
  return {
    code: cellLineCode(name),
    name,
    accession,
    values: { ...emptyRegistryValues(), ...values },
    synonyms,
    curation,
  };
}

/**
 * Builds a partial record with curation "none" unless given.
 */
export function makeRecord(
  source: string,
  name: string,
  values: Partial<Record<RegistryField, string>>,
  extra: Partial<Pick<PartialRecord, 'accession' | 'synonyms' | 'curation'>> = {}
): PartialRecord {
  return {
    source,
    name,
    values,
    synonyms: extra.synonyms ?? [],
    curation: extra.curation ?? 'none',
    ...(extra.accession !== undefined ? { accession: extra.accession } : {}),
  };
}
