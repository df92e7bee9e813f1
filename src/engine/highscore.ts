/**
 * High score persistence contract.
 *
 * Stores hold a single non-negative integer. Implementations throw
 * PersistenceUnavailableError when the backing medium cannot be read or
 * written; the controller turns that into a warning and keeps playing.
 */

export interface HighScoreStore {
  loadHighScore(): number;
  saveHighScore(value: number): void;
}

/**
 * Parse a stored high score. Anything that is not a plain non-negative
 * integer reads as 0.
 */
export function parseHighScore(text: string | null | undefined): number {
  if (text == null) return 0;
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : 0;
}

/** Serialized form: the integer followed by a newline. */
export function formatHighScore(value: number): string {
  return `${Math.max(0, Math.floor(value))}\n`;
}

/** Keeps the high score for the lifetime of the process. */
export class MemoryHighScoreStore implements HighScoreStore {
  constructor(private value = 0) {}

  loadHighScore(): number {
    return this.value;
  }

  saveHighScore(value: number): void {
    this.value = value;
  }
}
