import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { describe, test, expect } from 'vitest';
import { MalformedInputError } from '../src/app/core/models/diagnostics';
import { DEFAULT_PIPELINE_CONFIG, resolveSourcePriority } from '../src/app/core/models/pipeline-config';
import { configService } from '../src/app/core/services/config.service';

function configError(content: string): MalformedInputError | undefined {
  try {
    configService.parse(content);
  } catch (error) {
    if (error instanceof MalformedInputError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('ConfigService', () => {
  test('loads the shipped source definitions', async () => {
    const config = await configService.load(resolve(__dirname, '../config/sources.json'));

    expect(config.sources.map((s) => s.name)).toEqual([
      'manual-curation',
      'model-passport',
      'expression-atlas',
    ]);
    expect(resolveSourcePriority(config)).toEqual([
      'cellosaurus',
      'manual-curation',
      'model-passport',
      'expression-atlas',
    ]);
  });

  test('fills in source defaults', () => {
    const config = configService.parse(
      '{"sources":[{"name":"lab","nameColumn":"line","columns":{"tissue":"organism part"}}]}'
    );
    const [source] = config.sources;

    expect(source.delimiter).toBe('\t');
    expect(source.synonymSeparator).toBe(';');
    expect(source.curation).toBe('none');
    expect(resolveSourcePriority(config)).toEqual(['cellosaurus', 'lab']);
  });

  test('appends sources missing from an explicit priority list', () => {
    const config = configService.parse(
      '{"sourcePriority":["lab"],"sources":[{"name":"lab","nameColumn":"line","columns":{}},' +
        '{"name":"atlas","nameColumn":"line","columns":{}}]}'
    );
    expect(resolveSourcePriority(config)).toEqual(['lab', 'cellosaurus', 'atlas']);
  });

  test('rejects malformed configuration', () => {
    expect(configError('{not json')?.message).toMatch(/^config is not valid JSON: /);
    expect(
      configError('{"sources":[{"name":"lab","nameColumn":"line","columns":{"colour":"hue"}}]}')?.code
    ).toBe('INVALID_CONFIG');
    expect(
      configError(
        '{"sources":[{"name":"lab","nameColumn":"a","columns":{}},{"name":"lab","nameColumn":"b","columns":{}}]}'
      )?.message
    ).toBe('config declares source "lab" more than once');
  });

  test('reports unknown source names', () => {
    expect(() => configService.getSource(DEFAULT_PIPELINE_CONFIG, 'lab')).toThrow(
      'Source "lab" is not defined in the configuration'
    );
  });

  test('uses the defaults without a path', async () => {
    expect(await configService.load()).toEqual({ sources: [] });
  });

  test('keeps the explicit source priority', () => {
    const content = readFileSync(resolve(__dirname, '../config/sources.json'), 'utf-8');
    expect(configService.parse(content).sourcePriority).toHaveLength(4);
  });
});
