import { describe, test, expect } from 'vitest';
import { MalformedInputError } from '../src/app/core/models/diagnostics';
import { parseCurationStatus, registryIo } from '../src/app/core/services/registry-io.service';
import { makeRow } from './fixtures';

const rows = [
  makeRow(
    'HeLa',
    'CVCL_0030',
    ['HeLa', 'CVCL_0030'],
    { organism: 'homo sapiens', 'organism part': 'uterus, cervix' },
    'manual curated'
  ),
  makeRow('Orphan X', 'not available', []),
];

const NA = 'not available';

describe('RegistryIoService', () => {
  test('writes the registry columns in order', () => {
    const lines = registryIo.exportToTsv(rows).split('\n');

    expect(lines[0]).toBe(
      [
        'cell line',
        'cellosaurus name',
        'cellosaurus accession',
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
        'synonyms',
        'curated',
      ].join('\t')
    );
    expect(lines[1]).toBe(
      ['HELA', 'HeLa', 'CVCL_0030', NA, 'homo sapiens', 'uterus, cervix', ...new Array<string>(8).fill(NA), 'HeLa;CVCL_0030', 'manual curated'].join('\t')
    );
    expect(lines[2]).toBe(['ORPHANX', 'Orphan X', ...new Array<string>(13).fill(NA), 'not curated'].join('\t'));
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe('');
  });

  test('reads back what it writes', () => {
    expect(registryIo.parseFromContent(registryIo.exportToTsv(rows))).toEqual(rows);
  });

  test('accepts a registry with only the matching columns', () => {
    const content =
      'cell line\tcellosaurus name\tcellosaurus accession\tsynonyms\n' +
      '\tMCF-7\tCVCL_0031\tMCF7; MCF 7\n';
    const [row] = registryIo.parseFromContent(content);

    expect(row.code).toBe('MCF7');
    expect(row.synonyms).toEqual(['MCF7', 'MCF 7']);
    expect(row.values.organism).toBe(NA);
    expect(row.curation).toBe('not curated');
  });

  test('rejects a registry without the required columns', () => {
    try {
      registryIo.parseFromContent('cell line\tcellosaurus name\nHELA\tHeLa\n');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      if (error instanceof MalformedInputError) {
        expect(error.code).toBe('MISSING_COLUMN');
        expect(error.message).toBe('registry must contain the columns: cellosaurus accession, synonyms');
      }
    }
  });
});

describe('parseCurationStatus', () => {
  test('maps the written tags', () => {
    expect(parseCurationStatus('manual curated')).toBe('manual curated');
    expect(parseCurationStatus('AI Curated')).toBe('AI curated');
    expect(parseCurationStatus('whatever')).toBe('not curated');
    expect(parseCurationStatus(undefined)).toBe('not curated');
  });
});
