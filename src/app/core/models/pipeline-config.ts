/**
 * Pipeline Configuration
 *
 * Describes the supplementary flat tables merged into the registry and the
 * order in which sources take priority.
 */

import { z } from 'zod';
import { CELLOSAURUS_SOURCE, REGISTRY_FIELDS } from './registry';

const registryFieldSchema = z.enum(REGISTRY_FIELDS);

const SupplementarySourceSchema = z.object({
  /** Source name used in diagnostics and the priority list */
  name: z.string().min(1),
  /** Field delimiter of the file */
  delimiter: z.string().min(1).default('\t'),
  /** Column holding the cell-line name (the merge key) */
  nameColumn: z.string().min(1),
  /** Column holding a Cellosaurus accession (CVCL_...) */
  accessionColumn: z.string().optional(),
  /** Column holding synonyms */
  synonymsColumn: z.string().optional(),
  /** Separator between synonyms in synonymsColumn */
  synonymSeparator: z.string().min(1).default(';'),
  /** How the whole source was curated */
  curation: z.enum(['none', 'ai', 'manual']).default('none'),
  /** Per-row curation column ("manual curated", "AI curated", ...) */
  curationColumn: z.string().optional(),
  /** Source header -> registry field */
  columns: z.record(registryFieldSchema),
});

const PipelineConfigSchema = z.object({
  sources: z.array(SupplementarySourceSchema).default([]),
  /** Source names, highest priority first. Defaults to cellosaurus then config order. */
  sourcePriority: z.array(z.string().min(1)).optional(),
});

export type SupplementarySourceConfig = z.infer<typeof SupplementarySourceSchema>;

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  sources: [],
};

/**
 * Validates a parsed configuration object.
 */
export function validatePipelineConfig(
  config: unknown
): { valid: true; config: PipelineConfig } | { valid: false; errors: z.ZodError } {
  const result = PipelineConfigSchema.safeParse(config);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: result.error };
}

/**
 * Resolves the effective source priority.
 * Sources missing from an explicit list are appended in config order.
 */
export function resolveSourcePriority(config: PipelineConfig): string[] {
  const priority = config.sourcePriority
    ? [...config.sourcePriority]
    : [CELLOSAURUS_SOURCE];

  for (const name of [CELLOSAURUS_SOURCE, ...config.sources.map((s) => s.name)]) {
    if (!priority.includes(name)) {
      priority.push(name);
    }
  }

  return priority;
}
