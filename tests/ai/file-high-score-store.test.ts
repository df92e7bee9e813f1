import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileHighScoreStore } from '../../src/ai/file-high-score-store';
import { PersistenceUnavailableError } from '../../src/engine/errors';

describe('FileHighScoreStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'highscore-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a missing file as 0', () => {
    expect(new FileHighScoreStore(join(dir, 'none.txt')).loadHighScore()).toBe(0);
  });

  it('writes the score as a line of text', () => {
    const path = join(dir, 'best.txt');
    new FileHighScoreStore(path).saveHighScore(321);
    expect(readFileSync(path, 'utf8')).toBe('321\n');
  });

  it('reads back what it saved', () => {
    const store = new FileHighScoreStore(join(dir, 'best.txt'));
    store.saveHighScore(88);
    expect(store.loadHighScore()).toBe(88);
  });

  it('reads unparseable content as 0', () => {
    const path = join(dir, 'best.txt');
    writeFileSync(path, 'not a number');
    expect(new FileHighScoreStore(path).loadHighScore()).toBe(0);
  });

  it('throws PersistenceUnavailableError when the path cannot be read', () => {
    expect(() => new FileHighScoreStore(dir).loadHighScore()).toThrow(PersistenceUnavailableError);
  });

  it('throws PersistenceUnavailableError when the file cannot be written', () => {
    const store = new FileHighScoreStore(join(dir, 'missing', 'best.txt'));
    expect(() => store.saveHighScore(1)).toThrow(`cannot write ${join(dir, 'missing', 'best.txt')}`);
  });
});
