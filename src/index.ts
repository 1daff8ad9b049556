/**
 * Cell-Line Registry - Public API
 */

export * from './app/core/models';
export * from './app/core/services';
export * from './app/core/utils/extraction-rules';
export * from './app/core/utils/similarity';
export * from './app/commands/build-registry.command';
export * from './app/commands/annotate.command';
