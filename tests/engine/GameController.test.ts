/**
 * GameController Tests
 *
 * Phase machine (menu, playing, paused, game over), event delivery after
 * each tick, difficulty selection, high score persistence and the tick
 * failure paths.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GameController, GamePhase, type FrameResult } from '../../src/engine/GameController';
import type { GameConfigOverrides } from '../../src/engine/config';
import type { GameEvent } from '../../src/engine/events';
import { PersistenceUnavailableError } from '../../src/engine/errors';
import { MemoryHighScoreStore, type HighScoreStore } from '../../src/engine/highscore';
import { DIFFICULTY_PRESETS } from '../../src/engine/constants';
import type { InputSnapshot } from '../../src/engine/types';
import { createLogger, type LogEntry } from '../../src/utils/log';

// --- Helpers ---

const NO_INPUT: InputSnapshot = {
  leftHeld: false,
  rightHeld: false,
  pauseToggled: false,
  confirmPressed: false,
  jumpPressed: false,
};

const CONFIRM: InputSnapshot = { ...NO_INPUT, confirmPressed: true };
const PAUSE: InputSnapshot = { ...NO_INPUT, pauseToggled: true };

/** One lane full of obstacles from distance 20: every run ends in a crash. */
const CRASH_COURSE: GameConfigOverrides = {
  initialSpeed: 0.25,
  obstacleStartLevel: 0,
  obstacleBaseDensity: 1,
  obstacleMaxDensity: 1,
  lanes: [0],
  collisionThreshold: 0.5,
  initialStraightLength: 20,
};

class FailingStore implements HighScoreStore {
  saves = 0;

  loadHighScore(): number {
    throw new PersistenceUnavailableError('disk unavailable');
  }

  saveHighScore(): void {
    this.saves++;
    throw new PersistenceUnavailableError('disk full');
  }
}

function recordEvents(controller: GameController): GameEvent[] {
  const events: GameEvent[] = [];
  controller.onEvent((event) => events.push(event));
  return events;
}

function playUntilGameOver(controller: GameController): FrameResult {
  let frame = controller.tick(NO_INPUT, 1);
  for (let i = 0; i < 5000 && frame.phase !== GamePhase.GameOver; i++) {
    frame = controller.tick(NO_INPUT, 1);
  }
  return frame;
}

// --- Phases ---

describe('GameController phases', () => {
  let controller: GameController;
  let events: GameEvent[];

  beforeEach(() => {
    controller = new GameController({ config: { initialSpeed: 0.25 } });
    events = recordEvents(controller);
  });

  it('starts in the menu with a drawable frame', () => {
    const frame = controller.tick(NO_INPUT, 1);
    expect(frame.phase).toBe(GamePhase.Menu);
    expect(frame.commands).not.toBeNull();
    expect(controller.position).toBe(0);
  });

  it('does not scroll in the menu', () => {
    for (let i = 0; i < 10; i++) controller.tick(NO_INPUT, 1);
    expect(controller.position).toBe(0);
  });

  it('starts a run on confirm', () => {
    const frame = controller.tick(CONFIRM, 1);
    expect(frame.phase).toBe(GamePhase.Playing);
    expect(events).toEqual([
      { type: 'phase-changed', from: GamePhase.Menu, to: GamePhase.Playing },
      { type: 'game-started', difficulty: 'normal', seed: 2 },
    ]);
  });

  it('scrolls while playing', () => {
    controller.tick(CONFIRM, 1);
    controller.tick(NO_INPUT, 1);
    controller.tick(NO_INPUT, 1);
    expect(controller.position).toBe(0.5);
  });

  it('pauses and resumes on the pause toggle', () => {
    controller.tick(CONFIRM, 1);
    controller.tick(NO_INPUT, 1);

    expect(controller.tick(PAUSE, 1).phase).toBe(GamePhase.Paused);
    for (let i = 0; i < 5; i++) controller.tick(NO_INPUT, 1);
    expect(controller.position).toBe(0.25);

    expect(controller.tick(PAUSE, 1).phase).toBe(GamePhase.Playing);
    controller.tick(NO_INPUT, 1);
    expect(controller.position).toBe(0.5);
  });

  it('ignores transitions that do not apply to the current phase', () => {
    controller.pause();
    controller.resume();
    controller.acknowledge();
    expect(controller.phase).toBe(GamePhase.Menu);

    controller.start();
    controller.start();
    expect(controller.phase).toBe(GamePhase.Playing);
    expect(events.filter((e) => e.type === 'game-started')).toHaveLength(1);
  });

  it('delivers events from direct calls immediately', () => {
    controller.start();
    expect(events.map((e) => e.type)).toEqual(['phase-changed', 'game-started']);
  });

  it('seeds each run with the base seed plus the run number', () => {
    controller.start();
    expect(controller.state.seed).toBe(2);
    controller.reset();
    expect(controller.state.seed).toBe(2);
  });

  it('reset keeps the phase and rewinds the run', () => {
    controller.tick(CONFIRM, 1);
    for (let i = 0; i < 10; i++) controller.tick(NO_INPUT, 1);
    controller.reset();
    expect(controller.phase).toBe(GamePhase.Playing);
    expect(controller.position).toBe(0);
    expect(controller.score).toBe(0);
    expect(controller.speed).toBe(0.25);
  });
});

// --- Difficulty ---

describe('GameController difficulty', () => {
  it('picks a preset from menu input', () => {
    const controller = new GameController();
    controller.tick({ ...NO_INPUT, difficulty: 'hard' }, 1);
    expect(controller.difficulty).toBe('hard');

    controller.tick(CONFIRM, 1);
    expect(controller.speed).toBe(DIFFICULTY_PRESETS.hard.initialSpeed);
    expect(controller.state.steerSpeed).toBe(DIFFICULTY_PRESETS.hard.steerSpeed);
  });

  it('applies the difficulty option at construction', () => {
    const controller = new GameController({ difficulty: 'easy' });
    controller.start();
    expect(controller.speed).toBe(DIFFICULTY_PRESETS.easy.initialSpeed);
  });

  it('refuses to change difficulty mid-run', () => {
    const controller = new GameController();
    controller.start();
    expect(controller.setDifficulty('hard')).toBe(false);
    expect(controller.difficulty).toBe('normal');
  });
});

// --- Scoring & HUD ---

describe('GameController scoring', () => {
  it('emits one milestone per level crossed in a single tick', () => {
    const controller = new GameController({ config: { initialSpeed: 3, scoreUnitsPerLevel: 1 } });
    const events = recordEvents(controller);
    controller.start();
    const frame = controller.tick(NO_INPUT, 1);

    expect(events.filter((e) => e.type === 'score-milestone')).toEqual([
      { type: 'score-milestone', level: 1, score: 3 },
      { type: 'score-milestone', level: 2, score: 3 },
      { type: 'score-milestone', level: 3, score: 3 },
    ]);
    expect(frame.hud.level).toBe(3);
    expect(frame.hud.ticksSinceLevelUp).toBe(0);
  });

  it('counts ticks since the last level-up', () => {
    const controller = new GameController({ config: { initialSpeed: 3, scoreUnitsPerLevel: 100 } });
    controller.start();
    expect(controller.tick(NO_INPUT, 1).hud.ticksSinceLevelUp).toBeNull();
  });

  it('emits a jump event and reports the ship airborne', () => {
    const controller = new GameController();
    const events = recordEvents(controller);
    controller.start();
    const frame = controller.tick({ ...NO_INPUT, jumpPressed: true }, 1);
    expect(events.some((e) => e.type === 'jump')).toBe(true);
    expect(frame.hud.airborne).toBe(true);
    expect(frame.hud.jumpReady).toBe(false);
  });

  it('redraws the background for a new viewport', () => {
    const controller = new GameController();
    controller.setViewport({ width: 640, height: 480, horizonY: 120 });
    const [sky] = controller.tick(NO_INPUT, 1).commands ?? [];
    expect(sky).toMatchObject({ shape: 'rect', width: 640, height: 120 });
  });
});

// --- Game over & high score ---

describe('GameController game over', () => {
  it('ends the run on a crash and records a new high score', () => {
    const store = new MemoryHighScoreStore(5);
    const controller = new GameController({ config: CRASH_COURSE, store, now: () => 1234 });
    const events = recordEvents(controller);

    controller.tick(CONFIRM, 1);
    const frame = playUntilGameOver(controller);
    const score = controller.score;

    expect(frame.phase).toBe(GamePhase.GameOver);
    expect(score).toBeGreaterThan(5);
    expect(events).toContainEqual({ type: 'collision', obstacleId: 0, score });
    expect(events[events.length - 1]).toEqual({
      type: 'phase-changed',
      from: GamePhase.Playing,
      to: GamePhase.GameOver,
    });
    expect(store.loadHighScore()).toBe(score);
    expect(frame.hud.highScore).toBe(score);
    expect(frame.hud.newHighScore).toBe(true);
    expect(events.some((e) => e.type === 'high-score')).toBe(false);

    const menu = controller.tick(CONFIRM, 1);
    expect(menu.phase).toBe(GamePhase.Menu);
    expect(menu.hud.newHighScore).toBe(false);
    expect(events).toContainEqual({ type: 'high-score', outcome: { value: score, timestamp: 1234 } });
  });

  it('keeps the stored score when the run falls short', () => {
    const store = new MemoryHighScoreStore(1000);
    const controller = new GameController({ config: CRASH_COURSE, store });
    const events = recordEvents(controller);

    controller.start();
    const frame = playUntilGameOver(controller);
    expect(frame.hud.newHighScore).toBe(false);
    expect(frame.hud.highScore).toBe(1000);

    controller.acknowledge();
    expect(store.loadHighScore()).toBe(1000);
    expect(events.some((e) => e.type === 'high-score')).toBe(false);
  });

  it('ignores play input after the crash', () => {
    const controller = new GameController({ config: CRASH_COURSE });
    controller.start();
    playUntilGameOver(controller);
    const position = controller.position;
    controller.tick({ ...NO_INPUT, rightHeld: true, pauseToggled: true }, 1);
    expect(controller.phase).toBe(GamePhase.GameOver);
    expect(controller.position).toBe(position);
  });
});

// --- Failures ---

describe('GameController failures', () => {
  it('turns persistence failures into warnings and keeps playing', () => {
    const entries: LogEntry[] = [];
    const store = new FailingStore();
    const controller = new GameController({
      config: CRASH_COURSE,
      store,
      logger: createLogger('game', { writer: (entry) => entries.push(entry) }),
    });
    const events = recordEvents(controller);

    controller.tick(CONFIRM, 1);
    expect(events[0]).toEqual({
      type: 'warning',
      kind: 'PersistenceUnavailable',
      message: 'high score load failed: disk unavailable',
    });

    playUntilGameOver(controller);
    expect(store.saves).toBe(1);
    expect(controller.highScore).toBe(controller.score);
    expect(events).toContainEqual({
      type: 'warning',
      kind: 'PersistenceUnavailable',
      message: 'high score save failed: disk full',
    });
    expect(entries.filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'high score load failed: disk unavailable',
      'high score save failed: disk full',
    ]);
  });

  it('ends the run with no frame when state is corrupted', () => {
    const controller = new GameController({ config: { initialSpeed: 1e300 } });
    controller.start();
    const frame = controller.tick(NO_INPUT, 1e10);
    expect(frame.phase).toBe(GamePhase.GameOver);
    expect(frame.commands).toBeNull();
  });

  it('reports other tick failures as warnings without changing phase', () => {
    const controller = new GameController();
    const events = recordEvents(controller);
    controller.start();
    const frame = controller.tick(NO_INPUT, -1);

    expect(frame.phase).toBe(GamePhase.Playing);
    expect(frame.commands).toBeNull();
    expect(events[events.length - 1]).toMatchObject({ type: 'warning', kind: 'TickFailed' });
  });

  it.each([-1, NaN])('leaves the run untouched when deltaTime is %s', (deltaTime) => {
    const controller = new GameController();
    controller.start();
    controller.tick({ ...NO_INPUT, rightHeld: true }, 1);
    const player = { ...controller.state.player };
    const jump = { ...controller.state.jump };
    const position = controller.position;

    const frame = controller.tick({ ...NO_INPUT, leftHeld: true, jumpPressed: true }, deltaTime);

    expect(frame.commands).toBeNull();
    expect(controller.state.player).toEqual(player);
    expect(controller.state.jump).toEqual(jump);
    expect(controller.position).toBe(position);
  });

  it('can still jump after a failed tick', () => {
    const controller = new GameController();
    controller.start();
    controller.tick({ ...NO_INPUT, jumpPressed: true }, NaN);
    const frame = controller.tick({ ...NO_INPUT, jumpPressed: true }, 1);
    expect(frame.hud.airborne).toBe(true);
  });

  it('keeps delivering events when a listener throws', () => {
    const entries: LogEntry[] = [];
    const controller = new GameController({
      logger: createLogger('game', { writer: (entry) => entries.push(entry) }),
    });
    controller.onEvent(() => {
      throw new Error('listener broke');
    });
    const events = recordEvents(controller);

    controller.start();
    expect(events.map((e) => e.type)).toEqual(['phase-changed', 'game-started']);
    expect(entries.some((e) => e.message === 'listener failed on phase-changed: listener broke')).toBe(true);
  });

  it('stops delivering after unsubscribe', () => {
    const controller = new GameController();
    const events: GameEvent[] = [];
    const unsubscribe = controller.onEvent((event) => events.push(event));
    unsubscribe();
    controller.start();
    expect(events).toEqual([]);
  });
});
