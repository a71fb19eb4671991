/**
 * Hierarchical Synchronizer
 *
 * Reconciles a multi-sheet project one sheet at a time:
 * 1. Build the sheet forest from the target's hierarchy metadata
 * 2. Resolve net scopes per tree, rejecting nets that span unrelated trees
 * 3. Reconcile every sheet against its own destination fragment
 * 4. Aggregate plans, scopes and errors into one project report
 *
 * A sheet that fails (bad destination fragment, say) is reported and its
 * siblings carry on. Structural errors exclude the affected subtree; they are
 * thrown only once every unaffected sheet has been reconciled, carrying the
 * report built so far.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  SheetReconciliationError,
  StructuralError,
  handleError,
  isSyncEngineError,
} from '../../utils/errors.js';
import { buildDestinationSnapshot, deriveNets } from '../../types/schemas.js';
import { createSyncContext, forSheet, type SyncContext, type SyncOptions } from '../context.js';
import { reconcile } from '../reconciliation/reconciler.js';
import {
  buildSheetReport,
  summarizeTotals,
  toReportedError,
  unsyncedSheetReport,
} from '../reconciliation/sync-report.js';
import { buildSheetForest, type SheetNode } from './sheet-node.js';
import { resolveNetScopes } from './scope-resolver.js';
import type {
  ComponentRecord,
  DestinationProject,
  DestinationSnapshot,
  NetScopeAssignment,
  ProjectSyncReport,
  ReportedError,
  SheetSyncReport,
  SyncWarning,
  TargetCircuit,
  TargetProject,
} from '../../types/index.js';

function netsOf(components: ComponentRecord[]): Set<string> {
  const nets = new Set<string>();
  for (const component of components) {
    for (const net of Object.values(component.pins)) nets.add(net);
  }
  return nets;
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort((a, b) => a.localeCompare(b));
}

export class HierarchicalSynchronizer extends EventEmitter {
  private readonly context: SyncContext;

  constructor(context: SyncContext = createSyncContext()) {
    super();
    this.context = context;
  }

  /**
   * Synchronize every sheet of the project
   */
  synchronize(target: TargetProject, destination: DestinationProject): ProjectSyncReport {
    const { logger, options } = this.context;
    const startTime = Date.now();
    const runId = uuidv4();

    this.emit('project:start', { runId, sheets: target.sheets.length });
    logger.info('Starting hierarchical synchronization', { runId, sheets: target.sheets.length });

    const forest = buildSheetForest(target.sheets);
    const structuralErrors: StructuralError[] = [...forest.errors];
    const excluded = new Map<string, StructuralError>(forest.detached);

    const byReference = new Map(target.components.map((c) => [c.reference, c]));
    const placed = new Set(target.sheets.flatMap((s) => s.childComponentRefs));
    const unplaced = target.components.filter((c) => !placed.has(c.reference));

    const componentsOf = (node: SheetNode): ComponentRecord[] => {
      const own = node.componentRefs
        .map((ref) => byReference.get(ref))
        .filter((c): c is ComponentRecord => c !== undefined);
      // Components not assigned to any sheet belong to the first root
      return node === forest.roots[0] ? [...own, ...unplaced] : own;
    };

    // Nets referenced from more than one tree have no common ancestor
    const treesUsing = new Map<string, Set<SheetNode>>();
    const declared = new Map<SheetNode, Set<string>>();
    for (const root of forest.roots) {
      for (const node of root.descendants()) {
        const nets = netsOf(componentsOf(node));
        declared.set(node, nets);
        for (const net of nets) {
          const trees = treesUsing.get(net) ?? new Set<SheetNode>();
          trees.add(root);
          treesUsing.set(net, trees);
        }
      }
    }

    for (const [net, trees] of treesUsing) {
      if (trees.size < 2) continue;
      const sheets = [...trees].flatMap((root) =>
        root.descendants().filter((node) => declared.get(node)?.has(net)).map((node) => node.name)
      );
      const affected = [...trees].flatMap((root) => root.descendants().map((node) => node.name));
      const error = new StructuralError(
        `Net ${net} is referenced in sheets with no common ancestor: ${sheets.join(', ')}`,
        affected,
        { operation: 'resolveScopes', net }
      );
      structuralErrors.push(error);
      for (const name of affected) {
        if (!excluded.has(name)) excluded.set(name, error);
      }
    }

    const netScopes: NetScopeAssignment[] = [];
    for (const root of forest.roots) {
      if (excluded.has(root.name)) continue;
      const nodes = root.descendants();
      try {
        const resolution = resolveNetScopes(root, new Map(nodes.map((n) => [n, declared.get(n) ?? new Set<string>()])));
        for (const node of nodes) {
          const shared = resolution.shared.get(node) ?? new Set<string>();
          const local = resolution.local.get(node) ?? new Set<string>();
          shared.forEach((net) => node.sharedNets.add(net));
          local.forEach((net) => node.localNets.add(net));
          netScopes.push({
            sheet: node.name,
            path: node.path,
            shared: sorted(shared),
            passThrough: sorted(resolution.passThrough.get(node) ?? []),
            local: sorted(local),
          });
        }
      } catch (error) {
        const structural = error instanceof StructuralError
          ? error
          : new StructuralError(handleError(error).message, nodes.map((n) => n.name), { operation: 'resolveScopes' });
        structuralErrors.push(structural);
        for (const node of nodes) excluded.set(node.name, structural);
      }
    }

    const sheets: SheetSyncReport[] = [];
    for (const meta of target.sheets) {
      const node = forest.nodes.get(meta.sheetName);
      const path = node ? node.path : `?/${meta.sheetName}`;
      const error = excluded.get(meta.sheetName);

      if (error || !node) {
        const reason = error ?? new StructuralError(`Sheet ${meta.sheetName} is not part of the hierarchy`, [meta.sheetName]);
        sheets.push(unsyncedSheetReport(meta.sheetName, path, options.matchMode, 'skipped', reason));
        this.emit('sheet:skipped', { sheet: meta.sheetName, error: reason });
        continue;
      }

      sheets.push(this.synchronizeSheet(node, componentsOf(node), destination.sheets[meta.sheetName]));
    }

    const warnings: SyncWarning[] = sheets.flatMap((s) => s.warnings);
    const targetSheets = new Set(target.sheets.map((s) => s.sheetName));
    for (const name of Object.keys(destination.sheets)) {
      if (!targetSheets.has(name)) {
        warnings.push({
          kind: 'orphaned-destination-sheet',
          message: `Destination sheet ${name} has no counterpart in the target circuit and was left untouched`,
          references: [],
          sheet: name,
        });
      }
    }

    const errors: ReportedError[] = [
      ...structuralErrors.map((e) => toReportedError(e, e.sheets)),
      ...sheets
        .filter((s) => s.status === 'failed')
        .flatMap((s) => (s.error ? [s.error] : [])),
    ];

    const report: ProjectSyncReport = {
      runId,
      generatedAt: new Date().toISOString(),
      preserveUnmatchedDestination: options.preserveUnmatchedDestination,
      sheets,
      netScopes,
      totals: summarizeTotals(sheets),
      errors,
      warnings,
    };

    this.emit('project:complete', { runId, report, duration: Date.now() - startTime });
    logger.info('Hierarchical synchronization complete', {
      runId,
      ...report.totals,
      duration: Date.now() - startTime,
    });

    if (structuralErrors.length > 0) {
      const message = structuralErrors.map((e) => e.message).join('; ');
      const sheetsAffected = [...new Set(structuralErrors.flatMap((e) => e.sheets))];
      throw new StructuralError(message, sheetsAffected, { operation: 'synchronize' }, report);
    }

    return report;
  }

  /**
   * Reconcile one sheet; any failure is confined to this sheet's report
   */
  private synchronizeSheet(node: SheetNode, components: ComponentRecord[], fragment: unknown): SheetSyncReport {
    const context = forSheet(this.context, node.name);
    const { matchMode } = context.options;
    this.emit('sheet:start', { sheet: node.name, path: node.path });

    try {
      const existing: DestinationSnapshot = fragment === undefined
        ? { sheetName: node.name, components: [], nets: [], artifacts: [] }
        : buildDestinationSnapshot(fragment, node.name);
      const targetCircuit: TargetCircuit = { components, nets: deriveNets(components) };

      const { match, plan } = reconcile(existing, targetCircuit, context);
      const report = buildSheetReport({
        sheet: node.name,
        path: node.path,
        matchMode,
        match,
        plan,
        warnings: context.warnings,
      });

      this.emit('sheet:complete', { sheet: node.name, report });
      return report;
    } catch (error) {
      const syncError = isSyncEngineError(error)
        ? error
        : new SheetReconciliationError(node.name, handleError(error).message, { operation: 'synchronizeSheet' });
      context.logger.error('Sheet reconciliation failed', syncError);
      this.emit('sheet:error', { sheet: node.name, error: syncError });
      return unsyncedSheetReport(node.name, node.path, matchMode, 'failed', syncError, context.warnings);
    }
  }
}

/**
 * Reconcile a whole project in one call
 */
export function synchronizeProject(
  target: TargetProject,
  destination: DestinationProject,
  options: Partial<SyncOptions> = {}
): ProjectSyncReport {
  return new HierarchicalSynchronizer(createSyncContext(options)).synchronize(target, destination);
}
