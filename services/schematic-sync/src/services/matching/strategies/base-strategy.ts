/**
 * Base Match Strategy
 *
 * A strategy proposes a destination partner for one target component from
 * the destinations no earlier strategy has claimed. Strategies never see
 * claimed components, so they cannot override an earlier match.
 */

import type {
  ComponentRecord,
  DestinationComponent,
  MatchStrategyName,
} from '../../../types/index.js';

export interface StrategyContext {
  sourceSignatures: Map<ComponentRecord, string>;
  destinationSignatures: Map<DestinationComponent, string>;
}

export interface StrategyMatch {
  destination: DestinationComponent;
  /** Other candidates that satisfied the strategy equally well. */
  alternatives: DestinationComponent[];
}

export interface MatchStrategy {
  readonly name: MatchStrategyName;
  readonly confidence: number;
  tryMatch(
    source: ComponentRecord,
    remainingDest: readonly DestinationComponent[],
    context: StrategyContext
  ): StrategyMatch | null;
}

export abstract class BaseMatchStrategy implements MatchStrategy {
  abstract readonly name: MatchStrategyName;
  abstract readonly confidence: number;

  /**
   * Whether this strategy can say anything about the source at all.
   */
  protected accepts(_source: ComponentRecord, _context: StrategyContext): boolean {
    return true;
  }

  protected abstract matches(
    source: ComponentRecord,
    candidate: DestinationComponent,
    context: StrategyContext
  ): boolean;

  /**
   * Candidates are scanned in destination order; the first one wins and the
   * rest are returned as alternatives.
   */
  public tryMatch(
    source: ComponentRecord,
    remainingDest: readonly DestinationComponent[],
    context: StrategyContext
  ): StrategyMatch | null {
    if (!this.accepts(source, context)) {
      return null;
    }

    const candidates = remainingDest.filter((candidate) => this.matches(source, candidate, context));
    if (candidates.length === 0) {
      return null;
    }

    return { destination: candidates[0], alternatives: candidates.slice(1) };
  }
}
