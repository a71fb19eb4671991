/**
 * Connection Strategy
 *
 * Canonical signature equality: the component sits in the same place in the
 * circuit even though its designator changed.
 */

import { BaseMatchStrategy, type StrategyContext } from './base-strategy.js';
import type { ComponentRecord, DestinationComponent } from '../../../types/index.js';

export class ConnectionMatchStrategy extends BaseMatchStrategy {
  readonly name = 'connection' as const;
  readonly confidence = 0.8;

  protected accepts(source: ComponentRecord, context: StrategyContext): boolean {
    return context.sourceSignatures.has(source);
  }

  protected matches(
    source: ComponentRecord,
    candidate: DestinationComponent,
    context: StrategyContext
  ): boolean {
    const signature = context.sourceSignatures.get(source);
    return signature !== undefined && context.destinationSignatures.get(candidate) === signature;
  }
}
