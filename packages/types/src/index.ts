/**
 * @sluice/types - Shared type definitions for the Sluice strategy engine
 *
 * This is the leaf package in the dependency tree.
 * Every other @sluice/* package depends on this one.
 */

export * from './common.js';
export * from './venues.js';
export * from './strategy.js';
