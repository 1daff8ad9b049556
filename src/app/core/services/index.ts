/**
 * Core Services - Barrel Export
 */

export * from './obo-parser.service';
export * from './cellosaurus-parser.service';
export * from './annotation-extractor.service';
export * from './supplementary-source.service';
export * from './registry-reconciler.service';
export * from './registry-io.service';
export * from './label-matcher.service';
export * from './sdrf-annotator.service';
export * from './table-parser.service';
export * from './table-export.service';
export * from './config.service';
export * from './source-file.service';
