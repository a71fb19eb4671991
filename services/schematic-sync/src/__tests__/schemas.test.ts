/**
 * Tests for types/schemas.ts
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../utils/errors.js';
import { createSyncContext } from '../services/context.js';
import { isNoOp } from '../services/reconciliation/merge-planner.js';
import { reconcile } from '../services/reconciliation/reconciler.js';
import {
  buildDestinationSnapshot,
  buildTargetCircuit,
  buildTargetProject,
  deriveNets,
} from '../types/schemas.js';
import { resistor } from './fixtures.js';

function validationIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

const component = (reference: string, pins: Record<string, string> = {}) => ({
  reference,
  symbolId: 'Device:R',
  value: '10k',
  footprint: 'Resistor_SMD:R_0603_1608Metric',
  pins,
});

describe('buildTargetCircuit', () => {
  it('fills defaults and derives nets from pins', () => {
    const result = buildTargetCircuit({ components: [component('R1', { '1': 'VCC', '2': 'GND' })] });

    expect(result.components[0].extraFields).toEqual({});
    expect(result.nets).toEqual([
      { name: 'VCC', endpoints: [{ reference: 'R1', pinIndex: '1' }] },
      { name: 'GND', endpoints: [{ reference: 'R1', pinIndex: '2' }] },
    ]);
  });

  it('folds explicit net endpoints into pin maps', () => {
    const result = buildTargetCircuit({
      components: [component('R1', { '1': 'VCC' })],
      nets: [{ name: 'OUT', endpoints: [{ reference: 'R1', pinIndex: '2' }] }, { name: 'SPARE' }],
    });

    expect(result.components[0].pins).toEqual({ '1': 'VCC', '2': 'OUT' });
    expect(result.nets.map((n) => [n.name, n.endpoints.length])).toEqual([
      ['VCC', 1],
      ['OUT', 1],
      ['SPARE', 0],
    ]);
  });

  it('reports the path of each shape problem', () => {
    const issues = validationIssues(() => buildTargetCircuit({ components: [{ reference: 'R1', value: '1k' }] }));

    expect(issues).toContain('components.0.symbolId: Required');
    expect(issues).toContain('components.0.pins: Required');
  });

  it('rejects duplicate references', () => {
    const issues = validationIssues(() => buildTargetCircuit({ components: [component('R1'), component('R1')] }));

    expect(issues).toEqual(['duplicate reference R1']);
  });

  it('rejects a pin claimed by two nets', () => {
    const issues = validationIssues(() =>
      buildTargetCircuit({
        components: [component('R1', { '1': 'VCC' })],
        nets: [{ name: 'GND', endpoints: [{ reference: 'R1', pinIndex: '1' }] }],
      })
    );

    expect(issues).toEqual(['R1.1: connected to both VCC and GND']);
  });

  it('rejects endpoints on unknown components', () => {
    const issues = validationIssues(() =>
      buildTargetCircuit({
        components: [component('R1')],
        nets: [{ name: 'VCC', endpoints: [{ reference: 'U9', pinIndex: '1' }] }],
      })
    );

    expect(issues).toEqual(['net VCC: unknown component U9']);
  });
});

describe('buildTargetProject', () => {
  it('defaults the parent to null', () => {
    const result = buildTargetProject({
      components: [component('R1')],
      sheets: [{ sheetName: 'root', childComponentRefs: ['R1'] }],
    });

    expect(result.sheets).toEqual([{ sheetName: 'root', parentSheetName: null, childComponentRefs: ['R1'] }]);
  });

  it('rejects inconsistent sheet contents', () => {
    const issues = validationIssues(() =>
      buildTargetProject({
        components: [component('R1')],
        sheets: [
          { sheetName: 'root', childComponentRefs: ['R1', 'R7'] },
          { sheetName: 'child', parentSheetName: 'root', childComponentRefs: ['R1'] },
        ],
      })
    );

    expect(issues).toEqual(['sheet root: unknown component R7', 'component R1 placed on both root and child']);
  });

  it('rejects duplicate sheet names', () => {
    const issues = validationIssues(() =>
      buildTargetProject({
        components: [],
        sheets: [{ sheetName: 'root' }, { sheetName: 'root' }],
      })
    );

    expect(issues).toEqual(['duplicate sheet root']);
  });
});

describe('buildDestinationSnapshot', () => {
  const placedRaw = (id: string) => ({ ...component('R1', { '1': 'A' }), id, position: { x: 1, y: 2 }, rotation: 0 });

  it('names the sheet and keeps artifacts untouched', () => {
    const wire = { kind: 'wire', from: [0, 0], to: [10, 0] };
    const result = buildDestinationSnapshot({ components: [placedRaw('a')], artifacts: [wire] }, 'power');

    expect(result.sheetName).toBe('power');
    expect(result.artifacts).toEqual([wire]);
    expect(result.nets).toEqual([{ name: 'A', endpoints: [{ reference: 'R1', pinIndex: '1' }] }]);
  });

  it('folds net endpoints into pin maps', () => {
    const result = buildDestinationSnapshot({
      components: [placedRaw('a')],
      nets: [{ name: 'B', endpoints: [{ reference: 'R1', pinIndex: '2' }] }],
    });

    expect(result.components[0].pins).toEqual({ '1': 'A', '2': 'B' });
    expect(result.nets).toEqual([
      { name: 'A', endpoints: [{ reference: 'R1', pinIndex: '1' }] },
      { name: 'B', endpoints: [{ reference: 'R1', pinIndex: '2' }] },
    ]);
  });

  it('plans nothing when both sides describe connectivity as net endpoints', () => {
    const bare = (reference: string) => component(reference);
    const nets = [
      { name: 'VCC', endpoints: [{ reference: 'R1', pinIndex: '1' }] },
      {
        name: 'MID',
        endpoints: [
          { reference: 'R1', pinIndex: '2' },
          { reference: 'R2', pinIndex: '1' },
        ],
      },
      { name: 'GND', endpoints: [{ reference: 'R2', pinIndex: '2' }] },
    ];
    const target = buildTargetCircuit({ components: [bare('R1'), bare('R2')], nets });
    const existing = buildDestinationSnapshot({
      components: [
        { ...bare('R1'), id: 'a', position: { x: 10, y: 10 }, rotation: 0 },
        { ...bare('R2'), id: 'b', position: { x: 20, y: 10 }, rotation: 0 },
      ],
      nets,
    });

    const { plan } = reconcile(existing, target, createSyncContext({ matchMode: 'identity' }));

    expect(plan.updates.map((u) => u.pinDeltas)).toEqual([[], []]);
    expect(isNoOp(plan)).toBe(true);
  });

  it('keeps the pin maps of repeated references apart', () => {
    const unitA = { ...component('U1', { '1': 'IN_A' }), id: 'u1a', position: { x: 0, y: 0 }, rotation: 0 };
    const unitB = { ...component('U1', { '5': 'IN_B' }), id: 'u1b', position: { x: 0, y: 20 }, rotation: 0 };

    const result = buildDestinationSnapshot({ components: [unitA, unitB] });

    expect(result.components.map((c) => c.pins)).toEqual([{ '1': 'IN_A' }, { '5': 'IN_B' }]);
  });

  it('rejects a component without a position', () => {
    const { position: _position, ...raw } = placedRaw('a');

    expect(validationIssues(() => buildDestinationSnapshot({ components: [raw] }))).toEqual([
      'components.0.position: Required',
    ]);
  });

  it('rejects duplicate ids', () => {
    expect(validationIssues(() => buildDestinationSnapshot({ components: [placedRaw('a'), placedRaw('a')] }))).toEqual([
      'duplicate id a',
    ]);
  });
});

describe('deriveNets', () => {
  it('keeps declared nets with no endpoints', () => {
    expect(deriveNets([resistor('R1', { '1': 'A' })], [{ name: 'A', endpoints: [] }, { name: 'NC', endpoints: [] }])).toEqual([
      { name: 'A', endpoints: [{ reference: 'R1', pinIndex: '1' }] },
      { name: 'NC', endpoints: [] },
    ]);
  });
});
