import { CyclicDependencyError, PlanningError } from "./errors";
import { MigrationError } from "./migrations/errors";

/**
 * Lines describing an error for terminal output.
 */
export function formatError(error: unknown): string[] {
  if (error instanceof CyclicDependencyError) {
    return [
      `[${error.code}] ${error.message}`,
      `  cycle: ${[...error.cycle, error.cycle[0]].join(" -> ")}`,
    ];
  }
  if (error instanceof PlanningError) {
    return [`[${error.code}] ${error.message}`, `  objects: ${error.objects.join(", ")}`];
  }
  if (error instanceof MigrationError) {
    return [`[${error.code}] ${error.message}`];
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return [String(error)];
}

/**
 * Print an error and mark the process as failed.
 */
export function reportFailure(error: unknown): void {
  for (const line of formatError(error)) {
    console.error(`❌ ${line}`);
  }
  process.exitCode = 1;
}
