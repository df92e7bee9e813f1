/**
 * File-backed high score for Node: a text file holding one integer.
 * A missing file reads as 0; any other I/O failure is PersistenceUnavailable.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { PersistenceUnavailableError } from '../engine/errors';
import { formatHighScore, parseHighScore, type HighScoreStore } from '../engine/highscore';
import { silentLogger, type Logger } from '../utils/log';

export const DEFAULT_HIGH_SCORE_FILE = 'highscore.txt';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileHighScoreStore implements HighScoreStore {
  constructor(
    readonly path: string = DEFAULT_HIGH_SCORE_FILE,
    private readonly log: Logger = silentLogger,
  ) {}

  loadHighScore(): number {
    let text: string;
    try {
      text = readFileSync(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.log.debug(`no high score file at ${this.path}, starting from 0`);
        return 0;
      }
      throw new PersistenceUnavailableError(`cannot read ${this.path}`, err);
    }
    return parseHighScore(text);
  }

  saveHighScore(value: number): void {
    try {
      writeFileSync(this.path, formatHighScore(value), 'utf8');
    } catch (err) {
      throw new PersistenceUnavailableError(`cannot write ${this.path}`, err);
    }
    this.log.info(`high score ${value} saved to ${this.path}`);
  }
}
