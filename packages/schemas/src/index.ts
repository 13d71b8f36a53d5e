/**
 * @reconciler/schemas — record shapes shared by the core, the agents and the scripts
 */

export * from './enums';
export * from './source';
export * from './analysis';
