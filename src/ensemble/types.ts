/**
 * Ensemble and consensus types
 */

export type ModelTier = 'fast' | 'expert';

/**
 * Outcome of running both extraction tiers. Each tier either produced a
 * candidate or an error; one tier's failure never hides the other's result.
 */
export interface EnsembleResult<T> {
  fast: T | null;
  expert: T | null;
  fastError: Error | null;
  expertError: Error | null;
  hasAnyCandidate: boolean;
}

// ============================================================================
// Conflicts
// ============================================================================

/**
 * How a field is resolved when the two tiers disagree
 */
export type ModelWeight = 'prefer_expert' | 'prefer_fast' | 'require_match';

export type ConflictSeverity = 'critical' | 'warning';

export interface FieldConflict {
  field: string;
  fastValue: string | null;
  expertValue: string | null;
  chosenValue: string | null;
  chosenSource: ModelTier | 'none';
  severity: ConflictSeverity;
  rationale: string;
}

export interface ConflictReport {
  conflicts: FieldConflict[];
  hasConflicts: boolean;
  criticalCount: number;
  warningCount: number;
}

export function createConflictReport(conflicts: FieldConflict[]): ConflictReport {
  const criticalCount = conflicts.filter(c => c.severity === 'critical').length;
  return {
    conflicts,
    hasConflicts: conflicts.length > 0,
    criticalCount,
    warningCount: conflicts.length - criticalCount,
  };
}

/**
 * One line per conflict, critical first
 */
export function summarizeConflicts(report: ConflictReport): string[] {
  return [...report.conflicts]
    .sort((a, b) => (a.severity === b.severity ? 0 : a.severity === 'critical' ? -1 : 1))
    .map(c => `${c.field}: fast="${c.fastValue ?? ''}" expert="${c.expertValue ?? ''}" -> ${c.chosenValue === null ? 'unresolved' : `"${c.chosenValue}" (${c.chosenSource})`}`);
}

// ============================================================================
// Consensus outcome
// ============================================================================

export type ConsensusResult<T> =
  | { kind: 'no_data' }
  | { kind: 'single_source'; data: T; source: ModelTier }
  | { kind: 'unanimous'; data: T }
  | { kind: 'with_conflicts'; data: T; report: ConflictReport };

/**
 * Merged data of a consensus outcome, or null for no_data
 */
export function consensusData<T>(result: ConsensusResult<T>): T | null {
  return result.kind === 'no_data' ? null : result.data;
}

/**
 * Conflict report of a consensus outcome; null unless there were conflicts
 */
export function consensusReport<T>(result: ConsensusResult<T>): ConflictReport | null {
  return result.kind === 'with_conflicts' ? result.report : null;
}
