/**
 * Canonical Circuit Model
 *
 * Reduces a circuit to naming-independent signatures by colour refinement:
 * every component starts coloured by its symbol, every net is coloured by the
 * multiset of (pin, component colour) pairs touching it, and every component
 * is then recoloured by its own colour plus the (pin, net colour) pairs on its
 * pins. Repeating this a fixed number of rounds makes each signature a digest
 * of the component's neighbourhood up to that depth.
 *
 * Signatures are always taken at the full round count so that two different
 * circuits canonicalized with the same bound are directly comparable.
 * `converged` reports whether the colour partition stopped splitting within
 * the bound. Symmetric components (two identical resistors in parallel) keep
 * identical signatures; that is inherent to topology and is left to the
 * matchers' tie-break rules.
 */

import { createHash } from 'crypto';
import type {
  CanonicalCircuit,
  CanonicalComponent,
  CanonicalNet,
  ComponentRecord,
  NetEndpoint,
  NetRecord,
} from '../../types/index.js';

export const DEFAULT_MAX_REFINEMENT_ITERATIONS = 4;

export interface CanonicalizeOptions {
  maxIterations?: number;
}

interface PinLink {
  pinIndex: string;
  net: number;
}

interface EndpointLink {
  pinIndex: string;
  component: number;
}

const pinCollator = new Intl.Collator('en', { numeric: true });

export function comparePins(a: string, b: string): number {
  return pinCollator.compare(a, b);
}

function digest(input: string): string {
  return createHash('sha256').update(input).digest('hex').slice(0, 16);
}

function sortedJoin(parts: string[]): string {
  return [...parts].sort().join(',');
}

function countDistinct(values: string[]): number {
  return new Set(values).size;
}

/**
 * Index-based adjacency. Pin maps are authoritative; explicit net endpoints
 * only add pins the maps do not already list. Destination snapshots may carry
 * repeated references (multi-unit symbols), so endpoints resolve to the first
 * component with that reference.
 */
function buildAdjacency(components: ComponentRecord[], nets: NetRecord[]) {
  const netIndex = new Map<string, number>();
  const netNames: string[] = [];
  const pinLinks: PinLink[][] = components.map(() => []);
  const endpointLinks: EndpointLink[][] = [];
  const firstByReference = new Map<string, number>();
  const claimed = new Set<string>();

  const netId = (name: string): number => {
    let id = netIndex.get(name);
    if (id === undefined) {
      id = netNames.length;
      netIndex.set(name, id);
      netNames.push(name);
      endpointLinks.push([]);
    }
    return id;
  };

  const link = (component: number, pinIndex: string, netName: string): void => {
    const key = `${component}\u0000${pinIndex}`;
    if (claimed.has(key)) return;
    claimed.add(key);
    const net = netId(netName);
    pinLinks[component].push({ pinIndex, net });
    endpointLinks[net].push({ pinIndex, component });
  };

  components.forEach((component, i) => {
    if (!firstByReference.has(component.reference)) {
      firstByReference.set(component.reference, i);
    }
    for (const [pinIndex, netName] of Object.entries(component.pins)) {
      link(i, pinIndex, netName);
    }
  });

  for (const net of nets) {
    netId(net.name);
    for (const endpoint of net.endpoints) {
      const component = firstByReference.get(endpoint.reference);
      if (component !== undefined) {
        link(component, endpoint.pinIndex, net.name);
      }
    }
  }

  return { netNames, pinLinks, endpointLinks };
}

export function canonicalize<T extends ComponentRecord>(
  components: T[],
  nets: NetRecord[],
  options: CanonicalizeOptions = {}
): CanonicalCircuit<T> {
  const maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_REFINEMENT_ITERATIONS);
  const { netNames, pinLinks, endpointLinks } = buildAdjacency(components, nets);

  let componentColors = components.map((c) => digest(`symbol|${c.symbolId}`));
  let netColors: string[] = netNames.map(() => '');
  let previousCount = countDistinct(componentColors);
  let stableAt: number | null = null;

  for (let round = 1; round <= maxIterations; round++) {
    const colorsIn = componentColors;
    netColors = endpointLinks.map((endpoints) =>
      digest(`net|${sortedJoin(endpoints.map((e) => `${e.pinIndex}=${colorsIn[e.component]}`))}`)
    );
    componentColors = components.map((component, i) =>
      digest(
        `component|${colorsIn[i]}|${component.symbolId}|` +
          sortedJoin(pinLinks[i].map((p) => `${p.pinIndex}=${netColors[p.net]}`))
      )
    );

    const count = countDistinct(componentColors) + countDistinct(netColors);
    if (stableAt === null && round > 1 && count === previousCount) {
      stableAt = round;
    }
    if (stableAt === null && round === 1 && netNames.length === 0) {
      stableAt = round;
    }
    previousCount = count;
  }

  const canonicalComponents: CanonicalComponent<T>[] = components
    .map((record, i) => ({ record, signature: componentColors[i] }))
    .sort(
      (a, b) =>
        a.signature.localeCompare(b.signature) ||
        a.record.reference.localeCompare(b.record.reference)
    );

  const canonicalNets: CanonicalNet[] = netNames
    .map((name, i) => ({
      name,
      signature: netColors[i],
      endpoints: endpointLinks[i]
        .map((e): NetEndpoint => ({ reference: components[e.component].reference, pinIndex: e.pinIndex }))
        .sort((a, b) => a.reference.localeCompare(b.reference) || comparePins(a.pinIndex, b.pinIndex)),
    }))
    .sort((a, b) => a.signature.localeCompare(b.signature) || a.name.localeCompare(b.name));

  return {
    components: canonicalComponents,
    nets: canonicalNets,
    iterations: stableAt ?? maxIterations,
    converged: stableAt !== null,
  };
}

/** Signature lookup keyed by record identity. */
export function signatureIndex<T extends ComponentRecord>(circuit: CanonicalCircuit<T>): Map<T, string> {
  return new Map(circuit.components.map((c) => [c.record, c.signature]));
}

/** Components grouped by signature, groups in signature order. */
export function groupBySignature<T extends ComponentRecord>(
  circuit: CanonicalCircuit<T>
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const component of circuit.components) {
    const group = groups.get(component.signature);
    if (group) {
      group.push(component.record);
    } else {
      groups.set(component.signature, [component.record]);
    }
  }
  return groups;
}
