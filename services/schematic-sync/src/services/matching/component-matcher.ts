/**
 * Multi-Strategy Component Matcher
 *
 * Update-mode matching between the schematic on disk and a new revision of
 * the same circuit. Strategies run in order; each one only sees target and
 * destination components that no earlier strategy paired.
 */

import { canonicalize, signatureIndex } from '../canonical/canonical-circuit.js';
import { addWarning, createSyncContext, type SyncContext } from '../context.js';
import {
  createDefaultStrategies,
  isUnannotatedReference,
  type MatchStrategy,
  type StrategyContext,
} from './strategies/index.js';
import type {
  ComponentRecord,
  DestinationComponent,
  DestinationSnapshot,
  MatchPair,
  MatchResult,
  TargetCircuit,
} from '../../types/index.js';

export function matchByIdentity(
  existing: DestinationSnapshot,
  target: TargetCircuit,
  context: SyncContext = createSyncContext(),
  strategies: MatchStrategy[] = createDefaultStrategies()
): MatchResult {
  const logger = context.logger.child({ operation: 'matchByIdentity' });
  const warningsBefore = context.warnings.length;

  const maxIterations = context.options.maxRefinementIterations;
  const existingCanonical = canonicalize(existing.components, existing.nets, { maxIterations });
  const targetCanonical = canonicalize(target.components, target.nets, { maxIterations });

  for (const [side, circuit] of [['destination', existingCanonical], ['target', targetCanonical]] as const) {
    if (!circuit.converged) {
      addWarning(context, {
        kind: 'refinement-bound-exceeded',
        message: `Canonicalization of the ${side} circuit did not converge in ${circuit.iterations} rounds; connection matches use partial signatures`,
        references: [],
      });
    }
  }

  const strategyContext: StrategyContext = {
    sourceSignatures: signatureIndex(targetCanonical),
    destinationSignatures: signatureIndex(existingCanonical),
  };

  for (const source of target.components) {
    if (isUnannotatedReference(source.reference)) {
      addWarning(context, {
        kind: 'unannotated-reference',
        message: `Component ${source.reference} is unannotated and cannot be matched by reference`,
        references: [source.reference],
      });
    }
  }

  const pairs: MatchPair[] = [];
  let remainingSource: ComponentRecord[] = [...target.components];
  let remainingDest: DestinationComponent[] = [...existing.components];

  for (const strategy of strategies) {
    const unmatched: ComponentRecord[] = [];
    let found = 0;

    for (const source of remainingSource) {
      const match = strategy.tryMatch(source, remainingDest, strategyContext);
      if (!match) {
        unmatched.push(source);
        continue;
      }

      pairs.push({
        source,
        destination: match.destination,
        strategy: strategy.name,
        confidence: strategy.confidence,
      });
      remainingDest = remainingDest.filter((d) => d !== match.destination);
      found++;

      if (match.alternatives.length > 0) {
        addWarning(context, {
          kind: 'ambiguous-match',
          message:
            `${source.reference} matched ${match.destination.reference} by ${strategy.name}; ` +
            `${match.alternatives.length} other candidate(s) tied and were left for later`,
          references: [source.reference, match.destination.reference, ...match.alternatives.map((a) => a.reference)],
        });
      }
    }

    logger.debug('Strategy pass complete', { strategy: strategy.name, matched: found });
    remainingSource = unmatched;
  }

  const order = new Map(target.components.map((c, i) => [c, i]));
  pairs.sort((a, b) => (order.get(a.source) ?? 0) - (order.get(b.source) ?? 0));

  logger.info('Component matching complete', {
    matched: pairs.length,
    unmatchedSource: remainingSource.length,
    unmatchedDest: remainingDest.length,
  });

  return {
    pairs,
    unmatchedSource: remainingSource,
    unmatchedDest: remainingDest,
    warnings: context.warnings.slice(warningsBefore),
  };
}
