import { describe, test, expect } from 'vitest';
import { warningsOf } from '../src/app/core/models/diagnostics';
import { compareCodes, registryReconciler } from '../src/app/core/services/registry-reconciler.service';
import { makeRecord } from './fixtures';

const catalogHela = makeRecord(
  'cellosaurus',
  'HeLa',
  { organism: 'homo sapiens', sex: 'female', age: '30' },
  { accession: 'CVCL_0030', synonyms: ['HELA'] }
);

const passportHela = makeRecord(
  'model-passport',
  'HELA',
  { organism: 'Homo Sapiens', sex: 'male', 'organism part': 'cervix' },
  { synonyms: ['Hela S'] }
);

describe('RegistryReconcilerService.reconcile', () => {
  test('takes each field from the highest-priority source and reports conflicts', () => {
    const result = registryReconciler.reconcile([passportHela, catalogHela], {
      sourcePriority: ['cellosaurus', 'model-passport'],
    });

    expect(result.rows).toHaveLength(1);
    const [row] = result.rows;
    expect(row.code).toBe('HELA');
    expect(row.name).toBe('HeLa');
    expect(row.accession).toBe('CVCL_0030');
    expect(row.values.organism).toBe('homo sapiens');
    expect(row.values.sex).toBe('female');
    expect(row.values['organism part']).toBe('cervix');
    expect(row.values.disease).toBe('not available');
    expect(row.synonyms).toEqual(['HeLa', 'HELA', 'Hela S', 'CVCL_0030']);
    expect(row.curation).toBe('not curated');

    expect(result.diagnostics).toEqual([
      {
        type: 'warning',
        code: 'FIELD_CONFLICT',
        message: 'HELA sex: kept "female" from cellosaurus; other values: "male" (model-passport)',
        subject: 'HELA',
        source: 'cellosaurus',
      },
    ]);
    expect(result.stats).toEqual({
      recordCount: 2,
      groupCount: 1,
      droppedCount: 0,
      conflictCount: 1,
    });
  });

  test('reordering the priority changes only the conflicting fields', () => {
    const result = registryReconciler.reconcile([catalogHela, passportHela], {
      sourcePriority: ['model-passport', 'cellosaurus'],
    });

    const [row] = result.rows;
    expect(row.values.sex).toBe('male');
    expect(row.values.organism).toBe('Homo Sapiens');
    expect(row.values.age).toBe('30');
    expect(row.name).toBe('HeLa');
    expect(row.synonyms).toEqual(['HELA', 'Hela S', 'HeLa', 'CVCL_0030']);
    expect(warningsOf(result.diagnostics, 'FIELD_CONFLICT')[0].message).toBe(
      'HELA sex: kept "male" from model-passport; other values: "female" (cellosaurus)'
    );
  });

  test('a manually curated winner keeps its curation tag', () => {
    const manual = makeRecord('manual-curation', 'HeLa', { sex: 'female' }, { curation: 'manual' });
    const catalog = makeRecord('cellosaurus', 'HeLa', { organism: 'homo sapiens', sex: 'male' });

    const result = registryReconciler.reconcile([catalog, manual], {
      sourcePriority: ['manual-curation', 'cellosaurus'],
    });

    expect(result.rows[0].values.sex).toBe('female');
    expect(result.rows[0].curation).toBe('manual curated');
    expect(result.stats.conflictCount).toBe(1);
  });

  test('AI-curated values without conflict tag the row AI curated', () => {
    const ai = makeRecord('model-passport', 'MCF-7', { disease: 'breast carcinoma' }, { curation: 'ai' });
    const catalog = makeRecord('cellosaurus', 'MCF-7', { organism: 'homo sapiens' });

    const result = registryReconciler.reconcile([ai, catalog], {
      sourcePriority: ['cellosaurus', 'model-passport'],
    });

    expect(result.rows[0].code).toBe('MCF7');
    expect(result.rows[0].curation).toBe('AI curated');
    expect(result.diagnostics).toEqual([]);
  });

  test('drops groups that no source gives an organism', () => {
    const orphan = makeRecord('model-passport', 'Orphan', { sex: 'male', organism: 'not available' });

    const result = registryReconciler.reconcile([orphan, catalogHela], {
      sourcePriority: ['cellosaurus', 'model-passport'],
    });

    expect(result.rows.map((r) => r.code)).toEqual(['HELA']);
    expect(result.stats.droppedCount).toBe(1);
    expect(warningsOf(result.diagnostics, 'INSUFFICIENT_SOURCE')).toEqual([
      {
        type: 'warning',
        code: 'INSUFFICIENT_SOURCE',
        message: 'ORPHAN has no organism in any source and was dropped',
        subject: 'ORPHAN',
      },
    ]);
  });

  test('names that collapse to one code with different accessions are reported', () => {
    const hek = makeRecord('cellosaurus', 'HEK293', { organism: 'homo sapiens' }, { accession: 'CVCL_0045' });
    const hekDash = makeRecord('cellosaurus', 'HEK-293', { organism: 'homo sapiens' }, { accession: 'CVCL_9999' });

    const result = registryReconciler.reconcile([hekDash, hek], { sourcePriority: ['cellosaurus'] });

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].accession).toBe('CVCL_0045');
    expect(result.rows[0].name).toBe('HEK293');
    expect(result.rows[0].synonyms).toEqual(['HEK293', 'HEK-293', 'CVCL_0045']);
    expect(warningsOf(result.diagnostics, 'AMBIGUOUS_MERGE').map((d) => d.message)).toEqual([
      'HEK293 maps to accessions CVCL_0045, CVCL_9999; using CVCL_0045',
    ]);
  });

  test('fields of a record with the other accession stay out of the row', () => {
    const hek = makeRecord('cellosaurus', 'HEK293', { organism: 'homo sapiens' }, { accession: 'CVCL_0045' });
    const hekDash = makeRecord(
      'cellosaurus',
      'HEK-293',
      { organism: 'homo sapiens', disease: 'other disease', sex: 'male' },
      { accession: 'CVCL_9999' }
    );
    const passport = makeRecord('model-passport', 'HEK 293', { 'cell type': 'kidney cell' });

    const result = registryReconciler.reconcile([passport, hekDash, hek], {
      sourcePriority: ['cellosaurus', 'model-passport'],
    });
    const [row] = result.rows;

    expect(row.accession).toBe('CVCL_0045');
    expect(row.values.disease).toBe('not available');
    expect(row.values.sex).toBe('not available');
    expect(row.values['cell type']).toBe('kidney cell');
    expect(row.synonyms).toEqual(['HEK293', 'HEK-293', 'HEK 293', 'CVCL_0045']);
    expect(warningsOf(result.diagnostics, 'FIELD_CONFLICT')).toEqual([]);
  });

  test('a shared accession links records whose names differ', () => {
    const curated = makeRecord(
      'manual-curation',
      'Hela cells',
      { 'cell type': 'epithelial cell' },
      { accession: 'CVCL_0030', curation: 'manual' }
    );

    const result = registryReconciler.reconcile([curated, catalogHela], {
      sourcePriority: ['cellosaurus', 'manual-curation'],
    });

    expect(result.rows.map((r) => r.code)).toEqual(['HELA']);
    expect(result.rows[0].values['cell type']).toBe('epithelial cell');
    expect(result.rows[0].synonyms).toContain('Hela cells');
    expect(result.rows[0].curation).toBe('manual curated');
  });

  test('unknown sources rank last and are reported once', () => {
    const notes = makeRecord('lab-notes', 'HeLa', { sex: 'unknown' });
    const notesAgain = makeRecord('lab-notes', 'A549', { organism: 'homo sapiens' });

    const result = registryReconciler.reconcile([notes, notesAgain, catalogHela], {
      sourcePriority: ['cellosaurus'],
    });

    expect(result.rows.map((r) => r.code)).toEqual(['A549', 'HELA']);
    expect(result.rows[1].values.sex).toBe('female');
    expect(warningsOf(result.diagnostics, 'UNKNOWN_SOURCE')).toEqual([
      {
        type: 'warning',
        code: 'UNKNOWN_SOURCE',
        message: 'Source "lab-notes" is not in the priority list; ranking it last',
        source: 'lab-notes',
      },
    ]);
  });

  test('records without a usable code are skipped', () => {
    const blank = makeRecord('cellosaurus', '--', { organism: 'homo sapiens' });
    const result = registryReconciler.reconcile([blank], { sourcePriority: ['cellosaurus'] });

    expect(result.rows).toEqual([]);
    expect(result.diagnostics.map((d) => d.code)).toEqual(['SKIPPED_ROW']);
  });

  test('output does not depend on input order', () => {
    const records = [
      makeRecord('cellosaurus', 'U-2 OS', { organism: 'homo sapiens' }),
      catalogHela,
      passportHela,
      makeRecord('cellosaurus', 'A549', { organism: 'homo sapiens' }),
    ];
    const options = { sourcePriority: ['cellosaurus', 'model-passport'] };

    const forward = registryReconciler.reconcile(records, options);
    const backward = registryReconciler.reconcile([...records].reverse(), options);

    expect(forward.rows.map((r) => r.code)).toEqual(['A549', 'HELA', 'U2OS']);
    expect(backward.rows).toEqual(forward.rows);
    expect(backward.diagnostics).toEqual(forward.diagnostics);
  });
});

describe('compareCodes', () => {
  test('orders by code unit', () => {
    expect(['b', 'B', 'a', '1'].sort(compareCodes)).toEqual(['1', 'B', 'a', 'b']);
  });
});
