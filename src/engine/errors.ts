/**
 * Engine error kinds.
 *
 * InvalidArgument is a programming error (out-of-domain input). StateCorruption
 * is unrecoverable for the current run and ends it. PersistenceUnavailable is
 * surfaced as a warning; the game keeps its score in memory.
 * GenerationExhausted never throws -- it is reported through a hook.
 */

export type GameErrorKind =
  | 'InvalidArgument'
  | 'StateCorruption'
  | 'PersistenceUnavailable';

export type WarningKind = 'GenerationExhausted' | 'PersistenceUnavailable' | 'TickFailed';

export class GameError extends Error {
  constructor(readonly kind: GameErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends GameError {
  constructor(message: string) {
    super('InvalidArgument', message);
  }
}

export class StateCorruptionError extends GameError {
  constructor(message: string) {
    super('StateCorruption', message);
  }
}

export class PersistenceUnavailableError extends GameError {
  constructor(message: string, cause?: unknown) {
    super('PersistenceUnavailable', message, { cause });
  }
}

/** Human-readable message for any thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
