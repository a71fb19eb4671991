/**
 * Shared builders for engine tests.
 */

import { deriveNets } from '../types/schemas.js';
import type {
  ComponentRecord,
  DestinationComponent,
  DestinationSnapshot,
  TargetCircuit,
} from '../types/index.js';

export function resistor(
  reference: string,
  pins: Record<string, string>,
  overrides: Partial<ComponentRecord> = {}
): ComponentRecord {
  return {
    reference,
    symbolId: 'Device:R',
    value: '10k',
    footprint: 'Resistor_SMD:R_0603_1608Metric',
    pins,
    extraFields: {},
    ...overrides,
  };
}

export function capacitor(
  reference: string,
  pins: Record<string, string>,
  overrides: Partial<ComponentRecord> = {}
): ComponentRecord {
  return resistor(reference, pins, {
    symbolId: 'Device:C',
    value: '100nF',
    footprint: 'Capacitor_SMD:C_0402_1005Metric',
    ...overrides,
  });
}

export function placed(
  component: ComponentRecord,
  x: number,
  y: number,
  rotation = 0,
  id = `id-${component.reference}`
): DestinationComponent {
  return { ...component, id, position: { x, y }, rotation };
}

export function circuit(components: ComponentRecord[]): TargetCircuit {
  return { components, nets: deriveNets(components) };
}

export function snapshot(components: DestinationComponent[], sheetName = 'root'): DestinationSnapshot {
  return { sheetName, components, nets: deriveNets(components), artifacts: [] };
}

/** Destination that already matches the target exactly. */
export function mirror(target: TargetCircuit): DestinationSnapshot {
  return snapshot(target.components.map((c, i) => placed(c, 10 * (i + 1), 10)));
}

/** R1..Rn in series; pin 1 faces N(i-1), pin 2 faces N(i). */
export function seriesChain(length: number): ComponentRecord[] {
  return Array.from({ length }, (_, i) =>
    resistor(`R${i + 1}`, { '1': `N${i}`, '2': `N${i + 1}` })
  );
}
