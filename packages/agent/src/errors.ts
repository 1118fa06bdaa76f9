export type ErrorCategory =
  | "input_validation"
  | "transient_io"
  | "state_conflict"
  | "fatal";

export abstract class AgentError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidSignalError extends AgentError {
  readonly category = "input_validation";
  readonly retryable = false;
}

export class StaleMarketDataError extends AgentError {
  readonly category = "input_validation";
  readonly retryable = false;
}

export class TransientIOError extends AgentError {
  readonly category = "transient_io";
  readonly retryable = true;
}

export class TimeoutError extends TransientIOError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class StateConflictError extends AgentError {
  readonly category = "state_conflict";
  readonly retryable = false;
}

export class InsufficientBankrollError extends AgentError {
  readonly category = "state_conflict";
  readonly retryable = false;

  constructor(
    readonly stake: number,
    readonly available: number,
  ) {
    super(`Stake ${stake.toFixed(2)} exceeds available bankroll ${available.toFixed(2)}`);
  }
}

export class FatalError extends AgentError {
  readonly category = "fatal";
  readonly retryable = false;
}

export class ConfigError extends FatalError {}

export class PersistenceUnavailableError extends FatalError {}

export function isRetryable(err: unknown): boolean {
  if (err instanceof AgentError) return err.retryable;
  // Unknown failures from fetch/sdk calls are treated as transient
  return true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for a filesystem error caused by a missing file or directory. */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
