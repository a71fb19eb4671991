/**
 * Single-sheet reconciliation: match, then plan.
 */

import { canonicalize } from '../canonical/canonical-circuit.js';
import { addWarning, createSyncContext, type SyncContext } from '../context.js';
import { matchByIdentity } from '../matching/component-matcher.js';
import { matchByTopology } from '../matching/topology-matcher.js';
import { buildMergePlan } from './merge-planner.js';
import type {
  DestinationSnapshot,
  MatchResult,
  MergePlan,
  TargetCircuit,
} from '../../types/index.js';

export interface ReconciliationResult {
  match: MatchResult;
  plan: MergePlan;
}

export function reconcile(
  existing: DestinationSnapshot,
  target: TargetCircuit,
  context: SyncContext = createSyncContext()
): ReconciliationResult {
  const { matchMode, maxRefinementIterations, preserveUnmatchedDestination } = context.options;
  let match: MatchResult;

  if (matchMode === 'topology') {
    match = matchByTopology(
      canonicalize(existing.components, existing.nets, { maxIterations: maxRefinementIterations }),
      canonicalize(target.components, target.nets, { maxIterations: maxRefinementIterations })
    );
    for (const warning of match.warnings) {
      addWarning(context, warning);
    }
  } else {
    match = matchByIdentity(existing, target, context);
  }

  return { match, plan: buildMergePlan(match, preserveUnmatchedDestination, context) };
}
