/**
 * Boundary schemas and builders.
 *
 * Everything that crosses into the engine (the compiled target circuit and
 * the parsed destination snapshot) goes through one of these builders, so a
 * record missing a collaborator fails here instead of halfway through a merge.
 */

import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import type {
  ComponentRecord,
  DestinationComponent,
  DestinationSnapshot,
  NetRecord,
  TargetCircuit,
  TargetProject,
} from './index.js';

// ============================================================================
// Schemas
// ============================================================================

export const PositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const ComponentRecordSchema = z.object({
  reference: z.string().min(1),
  symbolId: z.string().min(1),
  value: z.string(),
  footprint: z.string(),
  pins: z.record(z.string().min(1)),
  extraFields: z.record(z.string()).default({}),
});

export const DestinationComponentSchema = ComponentRecordSchema.extend({
  id: z.string().min(1),
  position: PositionSchema,
  rotation: z.number().finite(),
});

export const NetRecordSchema = z.object({
  name: z.string().min(1),
  endpoints: z.array(z.object({
    reference: z.string().min(1),
    pinIndex: z.string().min(1),
  })).default([]),
});

export const SheetMetadataSchema = z.object({
  sheetName: z.string().min(1),
  parentSheetName: z.string().min(1).nullable().default(null),
  childComponentRefs: z.array(z.string().min(1)).default([]),
});

export const TargetCircuitSchema = z.object({
  components: z.array(ComponentRecordSchema),
  nets: z.array(NetRecordSchema).default([]),
});

export const TargetProjectSchema = TargetCircuitSchema.extend({
  sheets: z.array(SheetMetadataSchema).min(1),
});

export const DestinationSnapshotSchema = z.object({
  sheetName: z.string().min(1).optional(),
  components: z.array(DestinationComponentSchema),
  nets: z.array(NetRecordSchema).default([]),
  artifacts: z.array(z.unknown()).default([]),
});

// ============================================================================
// Helpers
// ============================================================================

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  operation: string
): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid input for ${operation}`, issues, { operation });
  }
  return result.data;
}

/**
 * Folds explicit net endpoints into the components' pin maps and derives the
 * net list from the result. A pin claimed by two different nets is rejected.
 */
export function normalizeConnectivity<T extends ComponentRecord>(
  components: T[],
  nets: NetRecord[],
  operation: string
): { components: T[]; nets: NetRecord[] } {
  const issues: string[] = [];
  const byReference = new Map<string, T>();
  const pins = new Map<string, Record<string, string>>();

  for (const component of components) {
    if (!byReference.has(component.reference)) {
      byReference.set(component.reference, component);
      pins.set(component.reference, { ...component.pins });
    }
  }

  for (const net of nets) {
    for (const endpoint of net.endpoints) {
      const pinMap = pins.get(endpoint.reference);
      if (!pinMap) {
        issues.push(`net ${net.name}: unknown component ${endpoint.reference}`);
        continue;
      }
      const existing = Object.hasOwn(pinMap, endpoint.pinIndex) ? pinMap[endpoint.pinIndex] : undefined;
      if (existing !== undefined && existing !== net.name) {
        issues.push(
          `${endpoint.reference}.${endpoint.pinIndex}: connected to both ${existing} and ${net.name}`
        );
        continue;
      }
      pinMap[endpoint.pinIndex] = net.name;
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(`Inconsistent connectivity for ${operation}`, issues, { operation });
  }

  // Endpoints resolve to the first component carrying a reference; later
  // units of a multi-unit symbol keep their own pin maps.
  const normalized = components.map((component) => {
    const merged = pins.get(component.reference);
    return merged && byReference.get(component.reference) === component
      ? { ...component, pins: merged }
      : component;
  });

  return { components: normalized, nets: deriveNets(normalized, nets) };
}

/**
 * Builds the net list from pin maps. Names from `declared` that no pin uses
 * are kept as empty nets.
 */
export function deriveNets(components: ComponentRecord[], declared: NetRecord[] = []): NetRecord[] {
  const nets = new Map<string, NetRecord>();
  const seen = new Set<string>();

  for (const component of components) {
    for (const [pinIndex, netName] of Object.entries(component.pins)) {
      const key = `${component.reference}\u0000${pinIndex}`;
      if (seen.has(key)) continue;
      seen.add(key);

      let net = nets.get(netName);
      if (!net) {
        net = { name: netName, endpoints: [] };
        nets.set(netName, net);
      }
      net.endpoints.push({ reference: component.reference, pinIndex });
    }
  }

  for (const net of declared) {
    if (!nets.has(net.name)) {
      nets.set(net.name, { name: net.name, endpoints: [] });
    }
  }

  return [...nets.values()];
}

function duplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) repeated.add(value);
    seen.add(value);
  }
  return [...repeated];
}

// ============================================================================
// Builders
// ============================================================================

export function buildTargetCircuit(raw: unknown): TargetCircuit {
  const parsed = parseOrThrow(TargetCircuitSchema, raw, 'buildTargetCircuit');
  const components: ComponentRecord[] = parsed.components;

  const repeated = duplicates(components.map((c) => c.reference));
  if (repeated.length > 0) {
    throw new ValidationError(
      'Target circuit has duplicate references',
      repeated.map((ref) => `duplicate reference ${ref}`),
      { operation: 'buildTargetCircuit' }
    );
  }

  return normalizeConnectivity(components, parsed.nets, 'buildTargetCircuit');
}

export function buildTargetProject(raw: unknown): TargetProject {
  const parsed = parseOrThrow(TargetProjectSchema, raw, 'buildTargetProject');
  const circuit = buildTargetCircuit({ components: parsed.components, nets: parsed.nets });

  const repeatedSheets = duplicates(parsed.sheets.map((s) => s.sheetName));
  if (repeatedSheets.length > 0) {
    throw new ValidationError(
      'Target project has duplicate sheet names',
      repeatedSheets.map((name) => `duplicate sheet ${name}`),
      { operation: 'buildTargetProject' }
    );
  }

  const known = new Set(circuit.components.map((c) => c.reference));
  const issues: string[] = [];
  const owner = new Map<string, string>();
  for (const sheet of parsed.sheets) {
    for (const ref of sheet.childComponentRefs) {
      if (!known.has(ref)) {
        issues.push(`sheet ${sheet.sheetName}: unknown component ${ref}`);
      }
      const previous = owner.get(ref);
      if (previous !== undefined && previous !== sheet.sheetName) {
        issues.push(`component ${ref} placed on both ${previous} and ${sheet.sheetName}`);
      }
      owner.set(ref, sheet.sheetName);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError('Target project has inconsistent sheet contents', issues, {
      operation: 'buildTargetProject',
    });
  }

  return { ...circuit, sheets: parsed.sheets };
}

export function buildDestinationSnapshot(raw: unknown, sheetName = 'root'): DestinationSnapshot {
  const parsed = parseOrThrow(DestinationSnapshotSchema, raw, 'buildDestinationSnapshot');
  const components: DestinationComponent[] = parsed.components;

  const repeated = duplicates(components.map((c) => c.id));
  if (repeated.length > 0) {
    throw new ValidationError(
      'Destination snapshot has duplicate component ids',
      repeated.map((id) => `duplicate id ${id}`),
      { operation: 'buildDestinationSnapshot', sheet: parsed.sheetName ?? sheetName }
    );
  }

  const connectivity = normalizeConnectivity(components, parsed.nets, 'buildDestinationSnapshot');

  return {
    sheetName: parsed.sheetName ?? sheetName,
    components: connectivity.components,
    nets: connectivity.nets,
    artifacts: parsed.artifacts,
  };
}
