/**
 * Schematic Sync
 *
 * Reconciles an existing schematic with a regenerated circuit description
 * while keeping the designer's manual edits. The engine does no I/O: the file
 * codec hands it parsed snapshots and applies the merge plan it returns.
 */

export { config, getConfig, loadConfig } from './config.js';
export type { Config, Environment } from './config.js';

export { log, createLogger } from './utils/logger.js';
export type { Logger, LogMetadata } from './utils/logger.js';

export {
  SyncEngineError,
  ValidationError,
  StructuralError,
  SheetReconciliationError,
  InternalError,
  isSyncEngineError,
  handleError,
} from './utils/errors.js';
export type { ErrorContext } from './utils/errors.js';

export * from './types/index.js';
export {
  buildTargetCircuit,
  buildTargetProject,
  buildDestinationSnapshot,
  deriveNets,
  normalizeConnectivity,
} from './types/schemas.js';

export { createSyncContext, defaultSyncOptions, forSheet, addWarning } from './services/context.js';
export type { SyncContext, SyncOptions } from './services/context.js';

export {
  canonicalize,
  comparePins,
  groupBySignature,
  signatureIndex,
  DEFAULT_MAX_REFINEMENT_ITERATIONS,
} from './services/canonical/canonical-circuit.js';
export type { CanonicalizeOptions } from './services/canonical/canonical-circuit.js';

export * from './services/matching/index.js';
export * from './services/reconciliation/index.js';
export * from './services/hierarchy/index.js';
