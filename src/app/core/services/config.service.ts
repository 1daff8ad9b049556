/**
 * Config Service
 *
 * Loads and validates the pipeline configuration (supplementary sources
 * and source priority).
 */

import { MalformedInputError } from '../models/diagnostics';
import {
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfig,
  SupplementarySourceConfig,
  validatePipelineConfig,
} from '../models/pipeline-config';
import { sourceFiles } from './source-file.service';

/**
 * Config Service
 */
export class ConfigService {
  /**
   * Parses configuration JSON.
   *
   * @throws MalformedInputError for invalid JSON or a failing schema
   */
  parse(content: string, sourceName: string = 'config'): PipelineConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MalformedInputError(
        `${sourceName} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG',
        sourceName
      );
    }

    const result = validatePipelineConfig(parsed);
    if (!result.valid) {
      const details = result.errors.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new MalformedInputError(`${sourceName} is invalid: ${details}`, 'INVALID_CONFIG', sourceName);
    }

    const names = result.config.sources.map((s) => s.name);
    const duplicate = names.find((name, index) => names.indexOf(name) !== index);
    if (duplicate) {
      throw new MalformedInputError(
        `${sourceName} declares source "${duplicate}" more than once`,
        'INVALID_CONFIG',
        sourceName
      );
    }

    return result.config;
  }

  /**
   * Loads configuration from a file, or the defaults when no path is given.
   */
  async load(path?: string): Promise<PipelineConfig> {
    if (!path) {
      return DEFAULT_PIPELINE_CONFIG;
    }
    return this.parse(await sourceFiles.readText(path), path);
  }

  /**
   * Finds a source definition by name.
   *
   * @throws MalformedInputError when the source is not configured
   */
  getSource(config: PipelineConfig, name: string): SupplementarySourceConfig {
    const source = config.sources.find((s) => s.name === name);
    if (!source) {
      throw new MalformedInputError(
        `Source "${name}" is not defined in the configuration`,
        'INVALID_CONFIG',
        'config'
      );
    }
    return source;
  }
}

// Export singleton instance for convenience
export const configService = new ConfigService();
