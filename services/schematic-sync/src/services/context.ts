/**
 * Sync Context
 *
 * Per-run state handed explicitly to every stage of a reconciliation pass:
 * options, the logger to write to and the warnings collected so far.
 * Nothing here is module-global; two runs never share a context.
 */

import { config } from '../config.js';
import { log, type Logger } from '../utils/logger.js';
import type { MatchMode, SyncWarning } from '../types/index.js';

export interface SyncOptions {
  preserveUnmatchedDestination: boolean;
  maxRefinementIterations: number;
  matchMode: MatchMode;
}

export interface SyncContext {
  readonly options: SyncOptions;
  readonly logger: Logger;
  readonly warnings: SyncWarning[];
  readonly sheet?: string;
}

export function defaultSyncOptions(): SyncOptions {
  return {
    preserveUnmatchedDestination: config.sync.preserveUnmatchedDestination,
    maxRefinementIterations: config.sync.maxRefinementIterations,
    matchMode: config.sync.matchMode,
  };
}

export function createSyncContext(
  options: Partial<SyncOptions> = {},
  logger: Logger = log
): SyncContext {
  return {
    options: { ...defaultSyncOptions(), ...options },
    logger: logger.child({ operation: 'sync' }),
    warnings: [],
  };
}

/**
 * Narrows a context to one sheet. The returned context collects its own
 * warnings so a failed sheet's warnings can be reported with it.
 */
export function forSheet(context: SyncContext, sheet: string): SyncContext {
  return {
    options: context.options,
    logger: context.logger.child({ sheet }),
    warnings: [],
    sheet,
  };
}

export function addWarning(context: SyncContext, warning: SyncWarning): void {
  const entry: SyncWarning = context.sheet && !warning.sheet
    ? { ...warning, sheet: context.sheet }
    : warning;
  context.warnings.push(entry);
  context.logger.warn(entry.message, { kind: entry.kind, references: entry.references });
}
