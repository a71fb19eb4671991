/**
 * Schematic Sync - Core Type Definitions
 *
 * Data model shared by canonicalization, matching, reconciliation and the
 * sheet hierarchy.
 */

// ============================================================================
// Circuit Types
// ============================================================================

export interface Position2D {
  x: number;
  y: number;
}

/** Pin number (as printed on the symbol, e.g. "1" or "A3") to net name. */
export type PinMap = Record<string, string>;

export interface ComponentRecord {
  reference: string;
  symbolId: string;
  value: string;
  footprint: string;
  pins: PinMap;
  extraFields: Record<string, string>;
}

/**
 * A component as it exists in the schematic on disk. `id` is the stable
 * identity the file codec assigned; placement is owned by the designer.
 */
export interface DestinationComponent extends ComponentRecord {
  id: string;
  position: Position2D;
  rotation: number;
}

export interface NetEndpoint {
  reference: string;
  pinIndex: string;
}

export interface NetRecord {
  name: string;
  endpoints: NetEndpoint[];
}

export interface TargetCircuit {
  components: ComponentRecord[];
  nets: NetRecord[];
}

export interface SheetMetadata {
  sheetName: string;
  parentSheetName: string | null;
  childComponentRefs: string[];
}

export interface TargetProject extends TargetCircuit {
  sheets: SheetMetadata[];
}

export interface DestinationSnapshot {
  sheetName: string;
  components: DestinationComponent[];
  nets: NetRecord[];
  /** Wires, labels, junctions, power symbols: passed through unexamined. */
  artifacts: unknown[];
}

/** Per-sheet fragments, validated one sheet at a time. */
export interface DestinationProject {
  sheets: Record<string, unknown>;
}

// ============================================================================
// Canonical Types
// ============================================================================

export interface CanonicalComponent<T extends ComponentRecord = ComponentRecord> {
  record: T;
  signature: string;
}

export interface CanonicalNet {
  name: string;
  signature: string;
  endpoints: NetEndpoint[];
}

export interface CanonicalCircuit<T extends ComponentRecord = ComponentRecord> {
  components: CanonicalComponent<T>[];
  nets: CanonicalNet[];
  iterations: number;
  converged: boolean;
}

// ============================================================================
// Warning Types
// ============================================================================

export type SyncWarningKind =
  | 'ambiguous-match'
  | 'refinement-bound-exceeded'
  | 'unannotated-reference'
  | 'orphaned-destination-sheet';

export interface SyncWarning {
  kind: SyncWarningKind;
  message: string;
  references: string[];
  sheet?: string;
}

// ============================================================================
// Match Types
// ============================================================================

export type MatchStrategyName = 'reference' | 'connection' | 'value-footprint' | 'topology';

export interface MatchPair {
  source: ComponentRecord;
  destination: DestinationComponent;
  strategy: MatchStrategyName;
  confidence: number;
}

export interface MatchResult {
  pairs: MatchPair[];
  unmatchedSource: ComponentRecord[];
  unmatchedDest: DestinationComponent[];
  warnings: SyncWarning[];
}

// ============================================================================
// Merge Plan Types
// ============================================================================

export type OverwriteField = 'reference' | 'symbolId' | 'value' | 'footprint' | 'pins' | 'extraFields';

export type PreservedField = 'position' | 'rotation' | 'annotations';

export interface FieldDelta {
  /** Field name; free-form fields are reported as `extraFields.<key>`. */
  field: string;
  before: string | null;
  after: string | null;
}

export type PinDeltaKind = 'added' | 'removed' | 'updated';

export interface PinDelta {
  pinIndex: string;
  kind: PinDeltaKind;
  before: string | null;
  after: string | null;
}

export interface ComponentUpdate {
  destinationId: string;
  destinationReference: string;
  sourceReference: string;
  strategy: MatchStrategyName;
  confidence: number;
  fieldsToOverwrite: readonly OverwriteField[];
  fieldsToPreserve: readonly PreservedField[];
  overwrite: ComponentRecord;
  preserve: {
    position: Position2D;
    rotation: number;
    annotations: Record<string, string>;
  };
  deltas: FieldDelta[];
  pinDeltas: PinDelta[];
}

export interface MergePlan {
  updates: ComponentUpdate[];
  /** New components; position is chosen by the placement collaborator. */
  toAdd: ComponentRecord[];
  toRemove: DestinationComponent[];
  /** Destination-only components kept because the policy preserves them. */
  preserved: DestinationComponent[];
  preserveUnmatchedDestination: boolean;
}

// ============================================================================
// Report Types
// ============================================================================

export type MatchMode = 'identity' | 'topology';

export interface MatchedEntry {
  sourceReference: string;
  destinationReference: string;
  destinationId: string;
  strategy: MatchStrategyName;
  confidence: number;
}

export interface PinLabelChange {
  reference: string;
  pinIndex: string;
  net: string | null;
  previousNet: string | null;
}

export interface ReportedError {
  code: string;
  message: string;
  sheets: string[];
}

export type SheetSyncStatus = 'synchronized' | 'failed' | 'skipped';

export interface SheetSyncReport {
  sheet: string;
  path: string;
  status: SheetSyncStatus;
  matchMode: MatchMode;
  matched: MatchedEntry[];
  added: string[];
  modified: string[];
  removed: string[];
  preserved: string[];
  labels: {
    added: PinLabelChange[];
    removed: PinLabelChange[];
    updated: PinLabelChange[];
  };
  warnings: SyncWarning[];
  error: ReportedError | null;
  plan: MergePlan | null;
}

export interface NetScopeAssignment {
  sheet: string;
  path: string;
  shared: string[];
  passThrough: string[];
  local: string[];
}

export interface SyncTotals {
  matched: number;
  added: number;
  modified: number;
  removed: number;
  preserved: number;
  failedSheets: number;
}

export interface ProjectSyncReport {
  runId: string;
  generatedAt: string;
  preserveUnmatchedDestination: boolean;
  sheets: SheetSyncReport[];
  netScopes: NetScopeAssignment[];
  totals: SyncTotals;
  errors: ReportedError[];
  warnings: SyncWarning[];
}
