/**
 * Outcome of one extraction or capture step. `degraded` carries a usable value
 * together with the parts that could not be read.
 */
export type StepResult<T> =
  | { status: "success"; value: T }
  | { status: "degraded"; value: T; issues: string[] }
  | { status: "failed"; error: string };

export function success<T>(value: T): StepResult<T> {
  return { status: "success", value };
}

export function degraded<T>(value: T, issues: string[]): StepResult<T> {
  return { status: "degraded", value, issues };
}

/** `success` when nothing went missing, `degraded` otherwise. */
export function withIssues<T>(value: T, issues: string[]): StepResult<T> {
  return issues.length ? degraded(value, issues) : success(value);
}
