/**
 * Reference Strategy
 *
 * Exact reference designator equality. Unannotated designators ("R?") carry
 * no identity and never match here.
 */

import { BaseMatchStrategy } from './base-strategy.js';
import type { ComponentRecord, DestinationComponent } from '../../../types/index.js';

export function isUnannotatedReference(reference: string): boolean {
  return reference.endsWith('?');
}

export class ReferenceMatchStrategy extends BaseMatchStrategy {
  readonly name = 'reference' as const;
  readonly confidence = 1.0;

  protected accepts(source: ComponentRecord): boolean {
    return !isUnannotatedReference(source.reference);
  }

  protected matches(source: ComponentRecord, candidate: DestinationComponent): boolean {
    return source.reference === candidate.reference;
  }
}
