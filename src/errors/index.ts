// src/errors/index.ts
import { GameErrorKind } from "../enums";

export class GameError extends Error {
  constructor(
    readonly kind: GameErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoProviderConfiguredError extends GameError {
  constructor() {
    super(
      GameErrorKind.NoProviderConfigured,
      "No question providers are configured"
    );
  }
}

export class ExhaustedSourceError extends GameError {
  constructor(readonly sourceName: string, cause?: unknown) {
    super(
      GameErrorKind.ExhaustedSource,
      `Question source "${sourceName}" could not produce a question`,
      { cause }
    );
  }
}

export class PublishFailureError extends GameError {
  constructor(readonly operation: string, cause?: unknown) {
    super(GameErrorKind.PublishFailure, `Failed to ${operation}`, { cause });
  }
}

export class PersistenceFailureError extends GameError {
  constructor(readonly operation: string, cause?: unknown) {
    super(GameErrorKind.PersistenceFailure, `Failed to ${operation}`, {
      cause,
    });
  }
}

export class ConfigValidationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

export function isRetryable(error: unknown): boolean {
  if (!(error instanceof GameError)) return false;
  return (
    error.kind === GameErrorKind.ExhaustedSource ||
    error.kind === GameErrorKind.PublishFailure
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A wait ended by shutdown rather than by its timer or the operator. */
export class WaitCancelledError extends Error {
  constructor(readonly reason: string) {
    super(`Wait cancelled: ${reason}`);
    this.name = "WaitCancelledError";
  }
}
