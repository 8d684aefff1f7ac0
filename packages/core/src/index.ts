/**
 * @spa/core - Vocabulary primitives for module composition
 *
 * - Vocabularies: dimension-keyed shared pointer spaces
 * - Ports: target objects with raw or resolved vocabulary bindings
 * - Errors, diagnostics and runtime configuration
 */

export * from './types';
export * from './rng';
export * from './vocab';
export * from './errors';
export * from './diagnostics';
export * from './config';
export * from './similarity';
