export interface MigrationStep {
  /** Position in the sequence; strictly increasing, never reused. */
  sequence: number;
  id: string;
  forward: string;
  reverse?: string;
}

export interface AppliedMigration {
  sequence: number;
  id: string;
  runId: string;
  appliedAt: string;
  reversible: boolean;
}

export interface ApplyResult {
  applied: string[];
  skipped: string[];
}

/**
 * Applied-state contract the deploy step relies on. Steps are never reordered.
 */
export interface MigrationLedger {
  isApplied(sequence: number): boolean;
  /** Returns false when the step was already applied. */
  apply(step: MigrationStep): boolean;
  applyAll(steps: MigrationStep[]): ApplyResult;
  revert(sequence: number): void;
  pending(steps: MigrationStep[]): MigrationStep[];
}

export type ScriptExecutor = (sql: string) => void;
