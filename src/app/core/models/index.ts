/**
 * Core Models - Barrel Export
 */

export * from './annotation';
export * from './diagnostics';
export * from './flat-table';
export * from './pipeline-config';
export * from './registry';
export * from './term-graph';
