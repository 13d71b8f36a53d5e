/**
 * @reconciler/agents - Agent implementations
 *
 * - reconcile/  : Batch source reconciliation over a snapshot
 * - shared/     : Common utilities
 */

export * from './shared/index.js';
export * from './reconcile/index.js';
