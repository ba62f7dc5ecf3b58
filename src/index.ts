/**
 * Merge CloudFormation-style template fragments into a base template.
 *
 * Library entry point; the command line lives in ./cli.
 */

export * from './parser/index.js';
export * from './merge/index.js';
export * from './schema/index.js';
export * from './errors.js';
