import { describe, test, expect } from 'vitest';
import { MalformedInputError } from '../src/app/core/models/diagnostics';
import { CellLineRegistry } from '../src/app/core/services/label-matcher.service';
import { ANNOTATION_COLUMNS, sdrfAnnotator } from '../src/app/core/services/sdrf-annotator.service';
import { makeRow } from './fixtures';

const registry = new CellLineRegistry([
  makeRow('HeLa', 'CVCL_0030', ['HeLa', 'HELA', 'CVCL_0030'], {
    organism: 'homo sapiens',
    'cell type': 'epithelial cell',
  }),
]);

const NA = 'not available';

describe('SdrfAnnotatorService.annotate', () => {
  test('appends the annotation columns and keeps every input column', () => {
    const sdrf = {
      headers: ['source name', 'characteristics[cell line]', 'assay name'],
      rows: [
        ['S1', 'HeLa', 'run 1'],
        ['S2', 'Unknown-1', 'run 2'],
      ],
    };

    const result = sdrfAnnotator.annotate(sdrf, registry);

    expect(result.table.headers).toEqual([...sdrf.headers, ...ANNOTATION_COLUMNS]);
    expect(result.table.rows[0]).toEqual([
      'S1',
      'HeLa',
      'run 1',
      'HELA',
      'HeLa',
      'CVCL_0030',
      NA,
      'homo sapiens',
      NA,
      NA,
      NA,
      NA,
      NA,
      NA,
      NA,
      'epithelial cell',
      NA,
      'cellosaurus name',
    ]);
    expect(result.table.rows[1]).toEqual(['S2', 'Unknown-1', 'run 2', ...new Array<string>(14).fill(NA), 'none']);
    expect(result.stats).toEqual({ rowCount: 2, matchedCount: 1, unmatchedCount: 1, ambiguousCount: 0 });
  });

  test('passes the other columns through as label context', () => {
    const sdrf = {
      headers: ['source name', 'characteristics[cell line]', 'assay name'],
      rows: [['S1', 'HeLa', 'run 1']],
    };

    const [match] = sdrfAnnotator.annotate(sdrf, registry).matches;

    expect(match.label).toEqual({
      text: 'HeLa',
      row: 1,
      context: { 'source name': 'S1', 'assay name': 'run 1' },
    });
  });

  test('label context keeps the first of repeated headers', () => {
    const sdrf = {
      headers: ['source name', 'characteristics[cell line]', 'source name', 'constructor'],
      rows: [['S1', 'HeLa', 'S1-repeat', 'pLKO']],
    };

    const [match] = sdrfAnnotator.annotate(sdrf, registry).matches;

    expect(match.label.context).toEqual({ 'source name': 'S1', constructor: 'pLKO' });
  });

  test('overwrites existing annotation columns in place', () => {
    const sdrf = {
      headers: ['source name', 'Characteristics[Cell Line]', 'Organism'],
      rows: [['S1', 'HELA', 'human']],
    };

    const result = sdrfAnnotator.annotate(sdrf, registry);

    expect(result.table.headers).toHaveLength(3 + ANNOTATION_COLUMNS.length - 1);
    expect(result.table.headers.slice(0, 4)).toEqual([
      'source name',
      'Characteristics[Cell Line]',
      'Organism',
      'cell line',
    ]);
    expect(result.table.rows[0][2]).toBe('homo sapiens');
    expect(result.table.rows[0][1]).toBe('HELA');
    expect(result.table.rows[0][result.table.headers.length - 1]).toBe('cell line');
  });

  test('never overwrites the label column itself', () => {
    const sdrf = { headers: ['cell line'], rows: [['HeLa']] };

    const result = sdrfAnnotator.annotate(sdrf, registry, { labelColumn: 'cell line' });

    expect(result.table.headers.slice(0, 2)).toEqual(['cell line', 'cell line']);
    expect(result.table.rows[0].slice(0, 2)).toEqual(['HeLa', 'HELA']);
  });

  test('rejects an SDRF without the label column', () => {
    const sdrf = { headers: ['source name'], rows: [['S1']] };

    try {
      sdrfAnnotator.annotate(sdrf, registry);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      if (error instanceof MalformedInputError) {
        expect(error.code).toBe('MISSING_COLUMN');
        expect(error.message).toBe('SDRF file must contain the column: characteristics[cell line]');
      }
    }
  });
});
