/**
 * Tests for services/hierarchy/hierarchical-synchronizer.ts
 */

import { describe, it, expect } from 'vitest';
import { StructuralError } from '../utils/errors.js';
import { createSyncContext } from '../services/context.js';
import {
  HierarchicalSynchronizer,
  synchronizeProject,
} from '../services/hierarchy/hierarchical-synchronizer.js';
import type { DestinationProject, ProjectSyncReport, TargetProject } from '../types/index.js';
import { placed, resistor, snapshot } from './fixtures.js';

const r1 = resistor('R1', { '1': 'VCC', '2': 'GND' });
const r2 = resistor('R2', { '1': 'VCC', '2': 'MID' });
const r3 = resistor('R3', { '1': 'MID', '2': 'GND' });

function project(): TargetProject {
  return {
    components: [r1, r2, r3],
    nets: [],
    sheets: [
      { sheetName: 'root', parentSheetName: null, childComponentRefs: ['R1'] },
      { sheetName: 'power', parentSheetName: 'root', childComponentRefs: ['R2'] },
      { sheetName: 'io', parentSheetName: 'root', childComponentRefs: ['R3'] },
    ],
  };
}

function destination(): DestinationProject {
  return {
    sheets: {
      root: snapshot([placed(r1, 10, 10)], 'root'),
      power: snapshot([placed(r2, 20, 10)], 'power'),
    },
  };
}

function catchStructural(run: () => unknown): StructuralError {
  try {
    run();
  } catch (error) {
    if (error instanceof StructuralError) return error;
    throw error;
  }
  throw new Error('expected a StructuralError');
}

describe('HierarchicalSynchronizer', () => {
  it('reconciles every sheet against its own fragment', () => {
    const report = synchronizeProject(project(), destination());

    expect(report.sheets.map((s) => [s.sheet, s.path, s.status])).toEqual([
      ['root', '/', 'synchronized'],
      ['power', '/power', 'synchronized'],
      ['io', '/io', 'synchronized'],
    ]);
    expect(report.sheets[2].added).toEqual(['R3']);
    expect(report.totals).toEqual({
      matched: 2,
      added: 1,
      modified: 0,
      removed: 0,
      preserved: 0,
      failedSheets: 0,
    });
    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('declares nets used across sheets at their common ancestor', () => {
    const report = synchronizeProject(project(), destination());

    expect(report.netScopes).toEqual([
      { sheet: 'root', path: '/', shared: ['GND', 'MID', 'VCC'], passThrough: [], local: [] },
      { sheet: 'power', path: '/power', shared: [], passThrough: [], local: [] },
      { sheet: 'io', path: '/io', shared: [], passThrough: [], local: [] },
    ]);
  });

  it('confines a malformed fragment to its own sheet', () => {
    const dest = destination();
    dest.sheets.power = { components: [{ reference: 'R2' }] };

    const report = synchronizeProject(project(), dest);

    expect(report.sheets.map((s) => s.status)).toEqual(['synchronized', 'failed', 'synchronized']);
    expect(report.sheets[1].error?.code).toBe('VALIDATION_ERROR');
    expect(report.sheets[1].plan).toBeNull();
    expect(report.errors).toEqual([
      { code: 'VALIDATION_ERROR', message: 'Invalid input for buildDestinationSnapshot', sheets: ['power'] },
    ]);
    expect(report.totals.failedSheets).toBe(1);
    expect(report.sheets[2].added).toEqual(['R3']);
  });

  it('emits progress events', () => {
    const synchronizer = new HierarchicalSynchronizer(createSyncContext());
    const events: string[] = [];
    for (const name of ['project:start', 'sheet:start', 'sheet:complete', 'sheet:error', 'project:complete']) {
      synchronizer.on(name, () => events.push(name));
    }

    synchronizer.synchronize(project(), destination());

    expect(events).toEqual([
      'project:start',
      'sheet:start',
      'sheet:complete',
      'sheet:start',
      'sheet:complete',
      'sheet:start',
      'sheet:complete',
      'project:complete',
    ]);
  });

  it('throws a structural error carrying the partial report', () => {
    const target: TargetProject = {
      components: [r1, r2],
      nets: [],
      sheets: [
        { sheetName: 'root', parentSheetName: null, childComponentRefs: ['R1'] },
        { sheetName: 'a', parentSheetName: 'b', childComponentRefs: ['R2'] },
        { sheetName: 'b', parentSheetName: 'a', childComponentRefs: [] },
      ],
    };

    const error = catchStructural(() => synchronizeProject(target, { sheets: {} }));

    expect(error.message).toBe('Cyclic sheet reference: a -> b -> a');
    expect(error.sheets).toEqual(['a', 'b']);
    const report: ProjectSyncReport | undefined = error.partialReport;
    expect(report?.sheets.map((s) => [s.sheet, s.status])).toEqual([
      ['root', 'synchronized'],
      ['a', 'skipped'],
      ['b', 'skipped'],
    ]);
    expect(report?.sheets[0].added).toEqual(['R1']);
    expect(report?.sheets[1].path).toBe('?/a');
    expect(report?.errors.map((e) => e.code)).toEqual(['STRUCTURAL_ERROR']);
  });

  it('rejects a net shared between unrelated trees', () => {
    const target: TargetProject = {
      components: [resistor('R1', { '1': 'VCC', '2': 'A' }), resistor('R2', { '1': 'VCC', '2': 'B' })],
      nets: [],
      sheets: [
        { sheetName: 'left', parentSheetName: null, childComponentRefs: ['R1'] },
        { sheetName: 'right', parentSheetName: null, childComponentRefs: ['R2'] },
      ],
    };

    const error = catchStructural(() => synchronizeProject(target, { sheets: {} }));

    expect(error.message).toBe('Net VCC is referenced in sheets with no common ancestor: left, right');
    expect(error.partialReport?.sheets.map((s) => s.status)).toEqual(['skipped', 'skipped']);
    expect(error.partialReport?.netScopes).toEqual([]);
  });

  it('puts components without a sheet on the first root', () => {
    const target = project();
    const r5 = resistor('R5', { '1': 'VCC', '2': 'GND' }, { value: '1k' });
    target.components.push(r5);

    const report = synchronizeProject(target, destination());

    expect(report.sheets[0].added).toEqual(['R5']);
  });

  it('removes user-added components only when preservation is off', () => {
    const dest = destination();
    dest.sheets.root = snapshot([placed(r1, 10, 10), placed(resistor('R99', { '1': 'TP' }), 90, 90)], 'root');

    const kept = synchronizeProject(project(), dest);
    const removed = synchronizeProject(project(), dest, { preserveUnmatchedDestination: false });

    expect(kept.sheets[0].preserved).toEqual(['R99']);
    expect(kept.preserveUnmatchedDestination).toBe(true);
    expect(removed.sheets[0].removed).toEqual(['R99']);
    expect(removed.preserveUnmatchedDestination).toBe(false);
  });

  it('warns about destination sheets the target no longer has', () => {
    const dest = destination();
    dest.sheets.legacy = snapshot([], 'legacy');

    const report = synchronizeProject(project(), dest);

    expect(report.warnings.map((w) => [w.kind, w.sheet])).toEqual([['orphaned-destination-sheet', 'legacy']]);
  });
});
