export type MigrationErrorCode =
  | "NOT_APPLIED"
  | "NO_REVERSE_DEFINED"
  | "OUT_OF_ORDER_MIGRATION"
  | "MIGRATION_CONFLICT"
  | "MIGRATION_LOCKED";

export abstract class MigrationError extends Error {
  abstract readonly code: MigrationErrorCode;
}

export class NotAppliedError extends MigrationError {
  readonly code = "NOT_APPLIED" as const;

  constructor(readonly sequence: number) {
    super(`Migration ${sequence} has not been applied`);
    this.name = "NotAppliedError";
  }
}

export class NoReverseDefinedError extends MigrationError {
  readonly code = "NO_REVERSE_DEFINED" as const;

  constructor(
    readonly sequence: number,
    readonly id: string
  ) {
    super(`Migration ${id} has no reverse script`);
    this.name = "NoReverseDefinedError";
  }
}

export class OutOfOrderMigrationError extends MigrationError {
  readonly code = "OUT_OF_ORDER_MIGRATION" as const;

  constructor(
    readonly sequence: number,
    readonly highestApplied: number,
    action: "apply" | "revert"
  ) {
    super(
      action === "apply"
        ? `Cannot apply migration ${sequence}: migration ${highestApplied} is already applied`
        : `Cannot revert migration ${sequence}: migration ${highestApplied} is applied after it`
    );
    this.name = "OutOfOrderMigrationError";
  }
}

export class MigrationConflictError extends MigrationError {
  readonly code = "MIGRATION_CONFLICT" as const;

  constructor(message: string) {
    super(message);
    this.name = "MigrationConflictError";
  }
}

export class MigrationLockedError extends MigrationError {
  readonly code = "MIGRATION_LOCKED" as const;

  constructor(
    readonly holder: string,
    readonly acquiredAt: string
  ) {
    super(`Migrations are locked by run ${holder} since ${acquiredAt}`);
    this.name = "MigrationLockedError";
  }
}
