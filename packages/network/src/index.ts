/**
 * @spa/network - Hierarchical module composition
 *
 * - Network: scoped construction and per-class defaults
 * - Module: named ports, named submodules, structural validation
 * - Resolver: dotted-path addressing of modules and ports
 */

export * from './network';
export * from './params';
export * from './module';
export * from './registration';
export * from './resolver';
