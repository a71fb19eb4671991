/**
 * Value + Footprint Strategy
 *
 * Last resort: same symbol, value and footprint. Several destinations
 * commonly tie here (a board full of 100nF decoupling caps); the first one in
 * destination order is taken and the tie is reported by the matcher.
 */

import { BaseMatchStrategy } from './base-strategy.js';
import type { ComponentRecord, DestinationComponent } from '../../../types/index.js';

export class ValueFootprintStrategy extends BaseMatchStrategy {
  readonly name = 'value-footprint' as const;
  readonly confidence = 0.5;

  protected matches(source: ComponentRecord, candidate: DestinationComponent): boolean {
    return (
      source.symbolId === candidate.symbolId &&
      source.value === candidate.value &&
      source.footprint === candidate.footprint
    );
  }
}
