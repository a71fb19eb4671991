/**
 * Hierarchy Services Index
 */

export { SheetNode, buildSheetForest } from './sheet-node.js';
export type { SheetForest } from './sheet-node.js';
export { lowestCommonAncestor, resolveNetScopes, resolveScopes } from './scope-resolver.js';
export type { NetScopeResolution } from './scope-resolver.js';
export { HierarchicalSynchronizer, synchronizeProject } from './hierarchical-synchronizer.js';
