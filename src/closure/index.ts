/**
 * Transitive closure collection over the type registry.
 *
 * @packageDocumentation
 */

export { collectClosure, collectDeclarations } from './collector.js';
export type { ClosureResult, CollectOptions } from './collector.js';
