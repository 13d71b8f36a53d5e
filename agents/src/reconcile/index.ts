/**
 * Reconcile Agents - Cross-platform posting reconciliation
 *
 * Agents in this module:
 * - SourceReconcilerAgent: Batch duplicate, delta and company-quality analysis
 */

export * from './source-reconciler-agent.js';
export * from './types.js';
