/**
 * Matching Services Index
 */

export { matchByIdentity } from './component-matcher.js';
export { matchByTopology, TOPOLOGY_CONFIDENCE } from './topology-matcher.js';
export {
  BaseMatchStrategy,
  ReferenceMatchStrategy,
  ConnectionMatchStrategy,
  ValueFootprintStrategy,
  StrategyRegistry,
  createDefaultStrategies,
  createStrategy,
  isUnannotatedReference,
} from './strategies/index.js';
export type { MatchStrategy, StrategyContext, StrategyMatch, StrategyName } from './strategies/index.js';
