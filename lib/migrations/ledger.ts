import type Database from "better-sqlite3";
import { v4 as uuid } from "uuid";
import { initLedgerSchema } from "../db";
import {
  MigrationConflictError,
  MigrationLockedError,
  NoReverseDefinedError,
  NotAppliedError,
  OutOfOrderMigrationError,
} from "./errors";
import type { AppliedMigration, ApplyResult, MigrationLedger, MigrationStep, ScriptExecutor } from "./types";

interface DbMigration {
  sequence: number;
  id: string;
  forward_script: string;
  reverse_script: string | null;
  run_id: string;
  applied_at: string;
}

interface DbLock {
  holder: string;
  acquired_at: string;
}

export interface SqliteLedgerOptions {
  /** Runs forward and reverse scripts. Defaults to executing them on the ledger's own database. */
  execute?: ScriptExecutor;
  runId?: string;
}

/**
 * Migration ledger stored in the schema_migrations table.
 *
 * Running a script and recording it happen in one immediate transaction, so a
 * failing script leaves no record behind. A single lock row keeps concurrent
 * runs against the same database out.
 */
export class SqliteMigrationLedger implements MigrationLedger {
  readonly runId: string;
  private readonly execute: ScriptExecutor;
  private lockDepth = 0;

  constructor(
    private readonly db: Database.Database,
    options: SqliteLedgerOptions = {}
  ) {
    initLedgerSchema(db);
    this.runId = options.runId ?? uuid();
    this.execute = options.execute ?? ((sql: string) => db.exec(sql));
  }

  isApplied(sequence: number): boolean {
    return this.getRecord(sequence) !== undefined;
  }

  listApplied(): AppliedMigration[] {
    const rows = this.db
      .prepare<[], DbMigration>("SELECT * FROM schema_migrations ORDER BY sequence")
      .all();
    return rows.map((row) => ({
      sequence: row.sequence,
      id: row.id,
      runId: row.run_id,
      appliedAt: row.applied_at,
      reversible: hasScript(row.reverse_script),
    }));
  }

  highestApplied(): number | undefined {
    const row = this.db
      .prepare<[], { highest: number | null }>("SELECT MAX(sequence) AS highest FROM schema_migrations")
      .get();
    return row?.highest ?? undefined;
  }

  pending(steps: MigrationStep[]): MigrationStep[] {
    return sortSteps(steps).filter((step) => !this.isApplied(step.sequence));
  }

  apply(step: MigrationStep): boolean {
    return this.withLock(() => {
      if (this.checkRecorded(step)) return false;

      const highest = this.highestApplied();
      if (highest !== undefined && step.sequence < highest) {
        throw new OutOfOrderMigrationError(step.sequence, highest, "apply");
      }

      const record = this.db.prepare(`
        INSERT INTO schema_migrations (sequence, id, forward_script, reverse_script, run_id)
        VALUES (?, ?, ?, ?, ?)
      `);
      const run = this.db.transaction(() => {
        this.execute(step.forward);
        record.run(step.sequence, step.id, step.forward, step.reverse ?? null, this.runId);
      });
      run.immediate();

      console.log(`[ledger] Applied ${step.sequence} ${step.id}`);
      return true;
    });
  }

  /**
   * Apply every pending step in ascending sequence order.
   * Ordering problems are detected before any script runs.
   */
  applyAll(steps: MigrationStep[]): ApplyResult {
    validateSteps(steps);

    return this.withLock(() => {
      const ordered = sortSteps(steps);
      const highest = this.highestApplied();
      const pending = ordered.filter((step) => !this.checkRecorded(step));

      const late = pending.find((step) => highest !== undefined && step.sequence < highest);
      if (late && highest !== undefined) {
        throw new OutOfOrderMigrationError(late.sequence, highest, "apply");
      }

      const result: ApplyResult = { applied: [], skipped: [] };
      for (const step of ordered) {
        if (pending.includes(step)) {
          this.apply(step);
          result.applied.push(step.id);
        } else {
          result.skipped.push(step.id);
        }
      }
      return result;
    });
  }

  /**
   * Run the stored reverse script of the newest applied step and drop its record.
   */
  revert(sequence: number): void {
    this.withLock(() => {
      const row = this.getRecord(sequence);
      if (!row) {
        throw new NotAppliedError(sequence);
      }
      if (!hasScript(row.reverse_script)) {
        throw new NoReverseDefinedError(sequence, row.id);
      }
      const reverse = row.reverse_script;

      const highest = this.highestApplied();
      if (highest !== undefined && highest > sequence) {
        throw new OutOfOrderMigrationError(sequence, highest, "revert");
      }

      const remove = this.db.prepare("DELETE FROM schema_migrations WHERE sequence = ?");
      const run = this.db.transaction(() => {
        this.execute(reverse);
        remove.run(sequence);
      });
      run.immediate();

      console.log(`[ledger] Reverted ${sequence} ${row.id}`);
    });
  }

  /** Returns the reverted sequence, or undefined when nothing is applied. */
  revertLast(): number | undefined {
    const highest = this.highestApplied();
    if (highest === undefined) return undefined;
    this.revert(highest);
    return highest;
  }

  lockHolder(): DbLock | undefined {
    return this.db.prepare<[], DbLock>("SELECT holder, acquired_at FROM schema_migrations_lock WHERE id = 1").get();
  }

  /** Drop a lock left behind by a crashed run. */
  forceUnlock(): boolean {
    return this.db.prepare("DELETE FROM schema_migrations_lock WHERE id = 1").run().changes > 0;
  }

  private withLock<T>(fn: () => T): T {
    if (this.lockDepth === 0) {
      const inserted = this.db
        .prepare("INSERT OR IGNORE INTO schema_migrations_lock (id, holder) VALUES (1, ?)")
        .run(this.runId);
      if (inserted.changes === 0) {
        const lock = this.lockHolder();
        throw new MigrationLockedError(lock?.holder ?? "unknown", lock?.acquired_at ?? "unknown");
      }
    }

    this.lockDepth++;
    try {
      return fn();
    } finally {
      this.lockDepth--;
      if (this.lockDepth === 0) {
        this.db.prepare("DELETE FROM schema_migrations_lock WHERE id = 1 AND holder = ?").run(this.runId);
      }
    }
  }

  private getRecord(sequence: number): DbMigration | undefined {
    return this.db.prepare<[number], DbMigration>("SELECT * FROM schema_migrations WHERE sequence = ?").get(sequence);
  }

  /**
   * True when the step is already recorded. A recorded step is immutable:
   * its sequence and identifier must still belong together.
   */
  private checkRecorded(step: MigrationStep): boolean {
    const bySequence = this.getRecord(step.sequence);
    if (bySequence && bySequence.id !== step.id) {
      throw new MigrationConflictError(
        `Migration ${step.sequence} was applied as ${bySequence.id} but is now named ${step.id}`
      );
    }

    const byId = this.db
      .prepare<[string], DbMigration>("SELECT * FROM schema_migrations WHERE id = ?")
      .get(step.id);
    if (byId && byId.sequence !== step.sequence) {
      throw new MigrationConflictError(
        `Migration ${step.id} was applied as ${byId.sequence} but now has sequence ${step.sequence}`
      );
    }

    return bySequence !== undefined;
  }
}

function hasScript(script: string | null | undefined): script is string {
  return typeof script === "string" && script.trim().length > 0;
}

export function sortSteps(steps: MigrationStep[]): MigrationStep[] {
  return [...steps].sort((a, b) => a.sequence - b.sequence);
}

/**
 * Sequence numbers and identifiers must each be unique within one set of steps.
 */
export function validateSteps(steps: MigrationStep[]): void {
  const sequences = new Map<number, string>();
  const ids = new Set<string>();

  for (const step of steps) {
    if (!Number.isInteger(step.sequence) || step.sequence < 0) {
      throw new MigrationConflictError(`Migration ${step.id} has invalid sequence ${step.sequence}`);
    }
    const other = sequences.get(step.sequence);
    if (other !== undefined) {
      throw new MigrationConflictError(`Migrations ${other} and ${step.id} share sequence ${step.sequence}`);
    }
    if (ids.has(step.id)) {
      throw new MigrationConflictError(`Migration id ${step.id} is used more than once`);
    }
    sequences.set(step.sequence, step.id);
    ids.add(step.id);
  }
}
