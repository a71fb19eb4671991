/**
 * Match Strategies Index
 *
 * Strategies run in the order `createDefaultStrategies` returns them.
 */

export { BaseMatchStrategy } from './base-strategy.js';
export type { MatchStrategy, StrategyContext, StrategyMatch } from './base-strategy.js';

export { ReferenceMatchStrategy, isUnannotatedReference } from './reference-strategy.js';
export { ConnectionMatchStrategy } from './connection-strategy.js';
export { ValueFootprintStrategy } from './value-footprint-strategy.js';

import type { MatchStrategy } from './base-strategy.js';
import { ReferenceMatchStrategy } from './reference-strategy.js';
import { ConnectionMatchStrategy } from './connection-strategy.js';
import { ValueFootprintStrategy } from './value-footprint-strategy.js';

/**
 * Strategy factory - reference, then connection, then value+footprint
 */
export function createDefaultStrategies(): MatchStrategy[] {
  return [
    new ReferenceMatchStrategy(),
    new ConnectionMatchStrategy(),
    new ValueFootprintStrategy(),
  ];
}

/**
 * Strategy map by name
 */
export const StrategyRegistry = {
  'reference': ReferenceMatchStrategy,
  'connection': ConnectionMatchStrategy,
  'value-footprint': ValueFootprintStrategy,
} as const;

export type StrategyName = keyof typeof StrategyRegistry;

/**
 * Create a specific strategy by name
 */
export function createStrategy(name: StrategyName): MatchStrategy {
  const StrategyClass = StrategyRegistry[name];
  return new StrategyClass();
}
