/**
 * Topology Matcher
 *
 * First-generation matching onto a schematic that already exists but has
 * never been synchronized: there is no identity to go by, so components are
 * paired purely by canonical signature. Components with equal signatures are
 * interchangeable as far as connectivity can tell, so within a signature
 * group they are paired in canonical (signature, reference) order. When the
 * two sides have different group sizes only the smaller count is paired.
 */

import { groupBySignature } from '../canonical/canonical-circuit.js';
import type {
  CanonicalCircuit,
  ComponentRecord,
  DestinationComponent,
  MatchPair,
  MatchResult,
  SyncWarning,
} from '../../types/index.js';

export const TOPOLOGY_CONFIDENCE = 1.0;

export function matchByTopology(
  existing: CanonicalCircuit<DestinationComponent>,
  target: CanonicalCircuit<ComponentRecord>
): MatchResult {
  const existingGroups = groupBySignature(existing);
  const targetGroups = groupBySignature(target);

  const pairs: MatchPair[] = [];
  const unmatchedSource: ComponentRecord[] = [];
  const unmatchedDest: DestinationComponent[] = [];
  const warnings: SyncWarning[] = [];

  for (const [signature, sources] of targetGroups) {
    const destinations = existingGroups.get(signature) ?? [];
    const count = Math.min(sources.length, destinations.length);

    for (let i = 0; i < count; i++) {
      pairs.push({
        source: sources[i],
        destination: destinations[i],
        strategy: 'topology',
        confidence: TOPOLOGY_CONFIDENCE,
      });
    }
    unmatchedSource.push(...sources.slice(count));

    if (sources.length > 1 && destinations.length > 1) {
      warnings.push({
        kind: 'ambiguous-match',
        message:
          `${sources.length} target and ${destinations.length} existing components share ` +
          'one topology signature; paired in canonical order',
        references: [...sources.map((s) => s.reference), ...destinations.map((d) => d.reference)],
      });
    }
  }

  for (const [signature, destinations] of existingGroups) {
    const sources = targetGroups.get(signature) ?? [];
    unmatchedDest.push(...destinations.slice(Math.min(sources.length, destinations.length)));
  }

  for (const [side, circuit] of [['existing', existing], ['target', target]] as const) {
    if (!circuit.converged) {
      warnings.push({
        kind: 'refinement-bound-exceeded',
        message: `Canonicalization of the ${side} circuit did not converge in ${circuit.iterations} rounds; topology match confidence is reduced`,
        references: [],
      });
    }
  }

  return { pairs, unmatchedSource, unmatchedDest, warnings };
}
