/**
 * Reconciliation Services Index
 */

export {
  buildMergePlan,
  diffPins,
  hasChanges,
  isNoOp,
  OVERWRITE_FIELDS,
  PRESERVED_FIELDS,
} from './merge-planner.js';
export { reconcile } from './reconciler.js';
export type { ReconciliationResult } from './reconciler.js';
export {
  buildSheetReport,
  formatSheetReport,
  formatSyncReport,
  summarizeTotals,
  toReportedError,
  unsyncedSheetReport,
} from './sync-report.js';
export type { SheetReportInput } from './sync-report.js';
