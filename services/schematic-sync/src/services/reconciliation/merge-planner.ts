/**
 * Reconciliation Engine
 *
 * Turns a match result into a merge plan. The target circuit owns electrical
 * intent and bill-of-materials fields; the designer owns placement. Anything
 * the plan does not mention (wires, labels, junctions, power symbols,
 * graphics) is left alone by the codec, so the plan never lists it.
 */

import { InternalError } from '../../utils/errors.js';
import { comparePins } from '../canonical/canonical-circuit.js';
import type { SyncContext } from '../context.js';
import type {
  ComponentUpdate,
  FieldDelta,
  MatchPair,
  MatchResult,
  MergePlan,
  OverwriteField,
  PinDelta,
  PinMap,
  PreservedField,
} from '../../types/index.js';

export const OVERWRITE_FIELDS: readonly OverwriteField[] = [
  'reference',
  'symbolId',
  'value',
  'footprint',
  'pins',
  'extraFields',
];

export const PRESERVED_FIELDS: readonly PreservedField[] = ['position', 'rotation', 'annotations'];

const SCALAR_FIELDS = ['reference', 'symbolId', 'value', 'footprint'] as const;

function ownValue(record: Record<string, string>, key: string): string | null {
  return Object.hasOwn(record, key) ? record[key] : null;
}

export function diffPins(before: PinMap, after: PinMap): PinDelta[] {
  const pins = new Set([...Object.keys(before), ...Object.keys(after)]);
  const deltas: PinDelta[] = [];

  for (const pinIndex of [...pins].sort(comparePins)) {
    const previous = ownValue(before, pinIndex);
    const next = ownValue(after, pinIndex);
    if (previous === next) continue;

    deltas.push({
      pinIndex,
      kind: previous === null ? 'added' : next === null ? 'removed' : 'updated',
      before: previous,
      after: next,
    });
  }

  return deltas;
}

function planUpdate(pair: MatchPair): ComponentUpdate {
  const { source, destination } = pair;
  const deltas: FieldDelta[] = [];

  for (const field of SCALAR_FIELDS) {
    if (source[field] !== destination[field]) {
      deltas.push({ field, before: destination[field], after: source[field] });
    }
  }

  for (const key of Object.keys(source.extraFields).sort()) {
    const before = ownValue(destination.extraFields, key);
    if (before !== source.extraFields[key]) {
      deltas.push({ field: `extraFields.${key}`, before, after: source.extraFields[key] });
    }
  }

  const annotations: Record<string, string> = {};
  for (const [key, value] of Object.entries(destination.extraFields)) {
    if (!Object.hasOwn(source.extraFields, key)) {
      annotations[key] = value;
    }
  }

  return {
    destinationId: destination.id,
    destinationReference: destination.reference,
    sourceReference: source.reference,
    strategy: pair.strategy,
    confidence: pair.confidence,
    fieldsToOverwrite: OVERWRITE_FIELDS,
    fieldsToPreserve: PRESERVED_FIELDS,
    overwrite: {
      reference: source.reference,
      symbolId: source.symbolId,
      value: source.value,
      footprint: source.footprint,
      pins: { ...source.pins },
      extraFields: { ...source.extraFields },
    },
    preserve: {
      position: { ...destination.position },
      rotation: destination.rotation,
      annotations,
    },
    deltas,
    pinDeltas: diffPins(destination.pins, source.pins),
  };
}

export function hasChanges(update: ComponentUpdate): boolean {
  return update.deltas.length > 0 || update.pinDeltas.length > 0;
}

function assertOneToOne(match: MatchResult): void {
  const destinations = new Set<string>();
  const sources = new Set<string>();

  for (const pair of match.pairs) {
    if (destinations.has(pair.destination.id)) {
      throw new InternalError(`Destination ${pair.destination.id} appears in more than one match`, {
        operation: 'buildMergePlan',
      });
    }
    if (sources.has(pair.source.reference)) {
      throw new InternalError(`Source ${pair.source.reference} appears in more than one match`, {
        operation: 'buildMergePlan',
      });
    }
    destinations.add(pair.destination.id);
    sources.add(pair.source.reference);
  }
}

export function buildMergePlan(
  match: MatchResult,
  preserveUnmatchedDestination: boolean,
  context?: SyncContext
): MergePlan {
  assertOneToOne(match);

  const updates = match.pairs.map(planUpdate);
  const plan: MergePlan = {
    updates,
    toAdd: [...match.unmatchedSource],
    toRemove: preserveUnmatchedDestination ? [] : [...match.unmatchedDest],
    preserved: preserveUnmatchedDestination ? [...match.unmatchedDest] : [],
    preserveUnmatchedDestination,
  };

  context?.logger.info('Merge plan built', {
    operation: 'buildMergePlan',
    updates: updates.length,
    modified: updates.filter(hasChanges).length,
    toAdd: plan.toAdd.length,
    toRemove: plan.toRemove.length,
    preserved: plan.preserved.length,
  });

  return plan;
}

/** True when applying the plan would not change the destination file. */
export function isNoOp(plan: MergePlan): boolean {
  return plan.toAdd.length === 0 && plan.toRemove.length === 0 && !plan.updates.some(hasChanges);
}
