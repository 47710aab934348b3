/**
 * Planning errors. All of them abort planning for the whole corpus.
 */

import type { ObjectName } from "./types";

export type PlanningErrorCode =
  | "MALFORMED_DEFINITION"
  | "DANGLING_REFERENCE"
  | "CYCLIC_DEPENDENCY"
  | "DUPLICATE_DECLARATION";

export abstract class PlanningError extends Error {
  abstract readonly code: PlanningErrorCode;

  /** Identifiers involved, as written in the sources. */
  abstract readonly objects: ObjectName[];
}

export class MalformedDefinitionError extends PlanningError {
  readonly code = "MALFORMED_DEFINITION" as const;
  readonly objects: ObjectName[];

  constructor(
    readonly origin: string,
    readonly reason: string,
    objects: ObjectName[] = []
  ) {
    super(`Malformed definition in ${origin}: ${reason}`);
    this.name = "MalformedDefinitionError";
    this.objects = objects;
  }
}

export class DanglingReferenceError extends PlanningError {
  readonly code = "DANGLING_REFERENCE" as const;
  readonly objects: ObjectName[];

  constructor(
    readonly missing: ObjectName,
    readonly referencedBy?: ObjectName
  ) {
    super(
      referencedBy
        ? `"${referencedBy}" references "${missing}", which is neither a known table nor a defined object`
        : `"${missing}" is neither a known table nor a defined object`
    );
    this.name = "DanglingReferenceError";
    this.objects = referencedBy ? [missing, referencedBy] : [missing];
  }
}

export class CyclicDependencyError extends PlanningError {
  readonly code = "CYCLIC_DEPENDENCY" as const;

  /** Each element deploys before the next; the last one before the first. */
  readonly cycle: ObjectName[];
  readonly objects: ObjectName[];

  constructor(cycle: ObjectName[]) {
    super(`Circular dependency detected: ${[...cycle, cycle[0]].join(" -> ")}`);
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
    this.objects = cycle;
  }
}

export class DuplicateDeclarationError extends PlanningError {
  readonly code = "DUPLICATE_DECLARATION" as const;
  readonly objects: ObjectName[];

  constructor(
    readonly object: ObjectName,
    readonly origins: [string, string]
  ) {
    super(`"${object}" is declared by both ${origins[0]} and ${origins[1]}`);
    this.name = "DuplicateDeclarationError";
    this.objects = [object];
  }
}
