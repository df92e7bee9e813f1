import { describe, it, expect, afterEach, vi } from 'vitest';
import { HIGH_SCORE_KEY, LocalStorageHighScoreStore } from '../../src/renderer/HighScoreStorage';
import { PersistenceUnavailableError } from '../../src/engine/errors';

/** Map-backed stand-in for the browser's localStorage. */
function memoryStorage(initial: Record<string, string> = {}) {
  const items = new Map(Object.entries(initial));
  return {
    items,
    getItem: (key: string): string | null => items.get(key) ?? null,
    setItem: (key: string, value: string): void => {
      items.set(key, value);
    },
  };
}

describe('LocalStorageHighScoreStore', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads 0 when nothing is stored', () => {
    vi.stubGlobal('localStorage', memoryStorage());
    expect(new LocalStorageHighScoreStore().loadHighScore()).toBe(0);
  });

  it('stores the score as a plain integer string', () => {
    const storage = memoryStorage();
    vi.stubGlobal('localStorage', storage);
    new LocalStorageHighScoreStore().saveHighScore(57.8);
    expect(storage.items.get(HIGH_SCORE_KEY)).toBe('57');
  });

  it('reads back a stored score', () => {
    vi.stubGlobal('localStorage', memoryStorage({ [HIGH_SCORE_KEY]: '1200' }));
    expect(new LocalStorageHighScoreStore().loadHighScore()).toBe(1200);
  });

  it('reads garbage as 0', () => {
    vi.stubGlobal('localStorage', memoryStorage({ [HIGH_SCORE_KEY]: '-5' }));
    expect(new LocalStorageHighScoreStore().loadHighScore()).toBe(0);
  });

  it('uses a custom key', () => {
    vi.stubGlobal('localStorage', memoryStorage({ other: '9' }));
    expect(new LocalStorageHighScoreStore('other').loadHighScore()).toBe(9);
  });

  it('wraps a missing localStorage in PersistenceUnavailableError', () => {
    vi.stubGlobal('localStorage', undefined);
    const store = new LocalStorageHighScoreStore();
    expect(() => store.loadHighScore()).toThrow(PersistenceUnavailableError);
    expect(() => store.saveHighScore(1)).toThrow('localStorage is not writable');
  });

  it('wraps a failing setItem', () => {
    vi.stubGlobal('localStorage', {
      getItem: () => null,
      setItem: () => {
        throw new Error('quota exceeded');
      },
    });
    expect(() => new LocalStorageHighScoreStore().saveHighScore(3)).toThrow(PersistenceUnavailableError);
  });
});
