import { PersistenceUnavailableError } from '../engine/errors';
import { formatHighScore, parseHighScore, type HighScoreStore } from '../engine/highscore';

export const HIGH_SCORE_KEY = 'vanishing-point-high-score';

/** Browser high score in localStorage, stored as a plain integer string. */
export class LocalStorageHighScoreStore implements HighScoreStore {
  constructor(private readonly key: string = HIGH_SCORE_KEY) {}

  loadHighScore(): number {
    try {
      return parseHighScore(globalThis.localStorage.getItem(this.key));
    } catch (err) {
      throw new PersistenceUnavailableError('localStorage is not readable', err);
    }
  }

  saveHighScore(value: number): void {
    try {
      globalThis.localStorage.setItem(this.key, formatHighScore(value).trim());
    } catch (err) {
      throw new PersistenceUnavailableError('localStorage is not writable', err);
    }
  }
}
