/**
 * Error taxonomy for the decision engine.
 *
 * Only ConfigurationError escapes to callers, and only at startup. The others
 * are raised inside a tick and resolved into a move by the decision loop.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigurationError"
  }
}

export class InvalidStateSnapshotError extends Error {
  readonly problems: string[]

  constructor(problems: string[]) {
    super(`Invalid state snapshot: ${problems.join("; ")}`)
    this.name = "InvalidStateSnapshotError"
    this.problems = problems
  }
}

export class DeadlineExceededError extends Error {
  readonly elapsedMs: number
  readonly budgetMs: number
  readonly stage: string

  constructor(stage: string, elapsedMs: number, budgetMs: number) {
    super(`Tick budget of ${budgetMs}ms exceeded during ${stage} (${elapsedMs}ms elapsed)`)
    this.name = "DeadlineExceededError"
    this.stage = stage
    this.elapsedMs = elapsedMs
    this.budgetMs = budgetMs
  }
}

export class TickAbortedError extends Error {
  constructor(stage: string) {
    super(`Tick aborted during ${stage}`)
    this.name = "TickAbortedError"
  }
}

/**
 * Raised by the scorer for a target with no path. Never leaves the scorer:
 * the candidate is dropped.
 */
export class UnreachableTargetError extends Error {
  constructor(targetId: string) {
    super(`Target ${targetId} is unreachable`)
    this.name = "UnreachableTargetError"
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
