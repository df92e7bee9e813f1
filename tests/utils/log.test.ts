import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, formatLogEntry, type LogEntry } from '../../src/utils/log';

const T0 = Date.UTC(2026, 0, 1);

describe('formatLogEntry', () => {
  it('prints timestamp, level and subsystem', () => {
    expect(formatLogEntry({ level: 'warn', subsystem: 'game:track', message: 'rerolls exhausted', timestamp: T0 }))
      .toBe('2026-01-01T00:00:00.000Z [WARN][game:track] rerolls exhausted');
  });
});

describe('createLogger', () => {
  let entries: LogEntry[];
  const capture = (entry: LogEntry): void => {
    entries.push(entry);
  };

  beforeEach(() => {
    entries = [];
  });

  it('hands entries to the writer', () => {
    createLogger('game', { writer: capture, now: () => T0 }).info('started', { seed: 3 });
    expect(entries).toEqual([
      { level: 'info', subsystem: 'game', message: 'started', timestamp: T0, context: { seed: 3 } },
    ]);
  });

  it('drops entries below minLevel', () => {
    const log = createLogger('game', { writer: capture, minLevel: 'warn' });
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    expect(entries.map((e) => e.message)).toEqual(['c', 'd']);
  });

  it('names child loggers after the parent', () => {
    createLogger('game', { writer: capture }).child('track').warn('x');
    expect(entries[0]?.subsystem).toBe('game:track');
  });

  it('falls back to "unknown" for a blank subsystem', () => {
    createLogger('  ', { writer: capture }).error('x');
    expect(entries[0]?.subsystem).toBe('unknown');
  });
});
