/**
 * Sync Report
 *
 * Per-sheet and project-level summaries of a reconciliation pass, plus the
 * plain-text rendering shown to the designer after a sync.
 */

import type { SyncEngineError } from '../../utils/errors.js';
import { hasChanges } from './merge-planner.js';
import type {
  MatchMode,
  MatchResult,
  MergePlan,
  PinLabelChange,
  ProjectSyncReport,
  ReportedError,
  SheetSyncReport,
  SheetSyncStatus,
  SyncTotals,
  SyncWarning,
} from '../../types/index.js';

export interface SheetReportInput {
  sheet: string;
  path: string;
  matchMode: MatchMode;
  match: MatchResult;
  plan: MergePlan;
  warnings: SyncWarning[];
}

export function buildSheetReport(input: SheetReportInput): SheetSyncReport {
  const { plan } = input;
  const labels: SheetSyncReport['labels'] = { added: [], removed: [], updated: [] };

  for (const update of plan.updates) {
    for (const delta of update.pinDeltas) {
      const change: PinLabelChange = {
        reference: update.sourceReference,
        pinIndex: delta.pinIndex,
        net: delta.after,
        previousNet: delta.before,
      };
      labels[delta.kind].push(change);
    }
  }

  return {
    sheet: input.sheet,
    path: input.path,
    status: 'synchronized',
    matchMode: input.matchMode,
    matched: input.match.pairs.map((pair) => ({
      sourceReference: pair.source.reference,
      destinationReference: pair.destination.reference,
      destinationId: pair.destination.id,
      strategy: pair.strategy,
      confidence: pair.confidence,
    })),
    added: plan.toAdd.map((c) => c.reference),
    modified: plan.updates.filter(hasChanges).map((u) => u.destinationReference),
    removed: plan.toRemove.map((c) => c.reference),
    preserved: plan.preserved.map((c) => c.reference),
    labels,
    warnings: input.warnings,
    error: null,
    plan,
  };
}

export function toReportedError(error: SyncEngineError, fallbackSheets: string[]): ReportedError {
  const sheets = Array.isArray(error.context.sheets)
    ? error.context.sheets.map(String)
    : fallbackSheets;
  return { code: error.code, message: error.message, sheets };
}

export function unsyncedSheetReport(
  sheet: string,
  path: string,
  matchMode: MatchMode,
  status: Exclude<SheetSyncStatus, 'synchronized'>,
  error: SyncEngineError,
  warnings: SyncWarning[] = []
): SheetSyncReport {
  return {
    sheet,
    path,
    status,
    matchMode,
    matched: [],
    added: [],
    modified: [],
    removed: [],
    preserved: [],
    labels: { added: [], removed: [], updated: [] },
    warnings,
    error: toReportedError(error, [sheet]),
    plan: null,
  };
}

export function summarizeTotals(sheets: SheetSyncReport[]): SyncTotals {
  return sheets.reduce<SyncTotals>(
    (totals, sheet) => ({
      matched: totals.matched + sheet.matched.length,
      added: totals.added + sheet.added.length,
      modified: totals.modified + sheet.modified.length,
      removed: totals.removed + sheet.removed.length,
      preserved: totals.preserved + sheet.preserved.length,
      failedSheets: totals.failedSheets + (sheet.status === 'synchronized' ? 0 : 1),
    }),
    { matched: 0, added: 0, modified: 0, removed: 0, preserved: 0, failedSheets: 0 }
  );
}

function formatLabel(change: PinLabelChange, kind: keyof SheetSyncReport['labels']): string {
  switch (kind) {
    case 'added':
      return `Label added: ${change.reference} pin ${change.pinIndex} -> ${change.net}`;
    case 'removed':
      return `Label removed: ${change.reference} pin ${change.pinIndex} (was ${change.previousNet})`;
    case 'updated':
      return `Label updated: ${change.reference} pin ${change.pinIndex} '${change.previousNet}' -> '${change.net}'`;
  }
}

export function formatSheetReport(sheet: SheetSyncReport): string[] {
  const lines = [`Sheet ${sheet.path} [${sheet.status}]`];

  for (const entry of sheet.matched) {
    lines.push(
      `  Keep: ${entry.destinationReference} <- ${entry.sourceReference} (${entry.strategy}, ${entry.confidence.toFixed(2)})`
    );
  }
  for (const update of sheet.plan?.updates ?? []) {
    for (const delta of update.deltas) {
      lines.push(`  Update: ${update.destinationReference} ${delta.field} ${delta.before ?? '(none)'} -> ${delta.after ?? '(none)'}`);
    }
  }
  for (const ref of sheet.added) lines.push(`  Add: ${ref}`);
  for (const ref of sheet.removed) lines.push(`  Remove: ${ref}`);
  for (const ref of sheet.preserved) lines.push(`  Preserved: ${ref} (user-added, preserved)`);
  for (const kind of ['added', 'removed', 'updated'] as const) {
    for (const change of sheet.labels[kind]) {
      lines.push(`  ${formatLabel(change, kind)}`);
    }
  }
  for (const warning of sheet.warnings) lines.push(`  Warning: ${warning.message}`);
  if (sheet.error) lines.push(`  Error: ${sheet.error.message}`);

  if (lines.length === 1) lines.push('  (no changes)');
  return lines;
}

export function formatSyncReport(report: ProjectSyncReport): string {
  const { totals } = report;
  const lines = [
    `Synchronization Summary (run ${report.runId})`,
    `Totals: matched ${totals.matched}, added ${totals.added}, modified ${totals.modified}, ` +
      `removed ${totals.removed}, preserved ${totals.preserved}, failed sheets ${totals.failedSheets}`,
  ];

  for (const sheet of report.sheets) {
    lines.push('', ...formatSheetReport(sheet));
  }

  const scoped = report.netScopes.filter((s) => s.shared.length + s.passThrough.length > 0);
  if (scoped.length > 0) {
    lines.push('', 'Net scopes:');
    for (const scope of scoped) {
      lines.push(`  ${scope.path}: shared [${scope.shared.join(', ')}], pass-through [${scope.passThrough.join(', ')}]`);
    }
  }

  if (report.errors.length > 0) {
    lines.push('', 'Errors:');
    for (const error of report.errors) {
      lines.push(`  ${error.code}: ${error.message}`);
    }
  }

  return lines.join('\n');
}
