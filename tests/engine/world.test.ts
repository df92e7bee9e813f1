/**
 * Run State & Step Function Tests
 *
 * createRun / resetRun buffering, the per-tick sequence (steer, jump,
 * scroll, score, window, collision) and jumping over hazards.
 */

import { describe, it, expect } from 'vitest';
import { createRun, resetRun, stepRun, bufferHorizon, playerForwardDistance, type RunState } from '../../src/engine/world';
import { resolveConfig, type GameConfig, type GameConfigOverrides } from '../../src/engine/config';
import { isAirborne } from '../../src/engine/player';
import type { InputSnapshot } from '../../src/engine/types';

// --- Helpers ---

/** Binary-exact speeds keep positions exact. */
const PRESET = { initialSpeed: 0.25, steerSpeed: 0.5 };

function makeInput(overrides: Partial<InputSnapshot> = {}): InputSnapshot {
  return {
    leftHeld: false,
    rightHeld: false,
    pauseToggled: false,
    confirmPressed: false,
    jumpPressed: false,
    ...overrides,
  };
}

function makeRun(overrides: GameConfigOverrides = {}, seed = 3): { run: RunState; config: GameConfig } {
  const config = resolveConfig(overrides);
  return { run: createRun(config, PRESET, seed), config };
}

function stepTimes(run: RunState, config: GameConfig, ticks: number, input = makeInput()) {
  let last = stepRun(run, input, 1, config);
  for (let i = 1; i < ticks; i++) last = stepRun(run, input, 1, config);
  return last;
}

/** A road whose single lane is full of obstacles from distance 20 on. */
const OBSTACLE_COURSE: GameConfigOverrides = {
  obstacleStartLevel: 0,
  obstacleBaseDensity: 1,
  obstacleMaxDensity: 1,
  lanes: [0],
  collisionThreshold: 0.5,
  initialStraightLength: 20,
};

// --- createRun / resetRun ---

describe('createRun', () => {
  it('buffers the road past the draw distance', () => {
    const { run, config } = makeRun();
    expect(run.track.coveredDistance).toBeGreaterThanOrEqual(bufferHorizon(0, config));
    expect(bufferHorizon(0, config)).toBe(76);
  });

  it('starts at rest on segment 0', () => {
    const { run } = makeRun();
    expect(run.scroll.position).toBe(0);
    expect(run.scroll.speed).toBe(0.25);
    expect(run.player).toEqual({ lateralPosition: 0, currentSegmentId: 0 });
    expect(run.tick).toBe(0);
    expect(run.seed).toBe(3);
  });

  it('places the player ahead of the camera', () => {
    const { config } = makeRun();
    expect(playerForwardDistance(10, config)).toBeCloseTo(11.2, 10);
  });
});

describe('resetRun', () => {
  it('returns to position 0 with a regenerated road', () => {
    const { run, config } = makeRun();
    stepTimes(run, config, 400, makeInput({ rightHeld: true }));
    resetRun(run, config, { initialSpeed: 0.5, steerSpeed: 0.25 }, 11);

    expect(run.scroll.position).toBe(0);
    expect(run.scroll.score).toBe(0);
    expect(run.scroll.speed).toBe(0.5);
    expect(run.steerSpeed).toBe(0.25);
    expect(run.tick).toBe(0);
    expect(run.seed).toBe(11);
    expect(run.player.lateralPosition).toBe(0);
    expect(run.track.activeSegments()[0]).toMatchObject({ id: 0, startDistance: 0 });
  });
});

// --- stepRun ---

describe('stepRun', () => {
  it('advances by speed each tick', () => {
    const { run, config } = makeRun();
    stepTimes(run, config, 3);
    expect(run.scroll.position).toBe(0.75);
    expect(run.tick).toBe(3);
  });

  it('scores one point per row travelled', () => {
    const { run, config } = makeRun();
    const third = stepTimes(run, config, 3);
    expect(third.scoreGained).toBe(0);
    const fourth = stepRun(run, makeInput(), 1, config);
    expect(fourth.scoreGained).toBe(1);
    expect(run.scroll.score).toBe(1);
  });

  it('reports levels gained and speeds up', () => {
    const { run, config } = makeRun({ scoreUnitsPerLevel: 2 });
    const result = stepTimes(run, config, 8);
    expect(result.levelsGained).toBe(1);
    expect(run.scroll.level).toBe(1);
    expect(run.scroll.speed).toBeCloseTo(0.27, 10);
  });

  it('steers at the preset lateral speed', () => {
    const { run, config } = makeRun();
    stepRun(run, makeInput({ leftHeld: true }), 1, config);
    expect(run.player.lateralPosition).toBe(-0.5);
  });

  it('starts a jump on request', () => {
    const { run, config } = makeRun();
    const result = stepRun(run, makeInput({ jumpPressed: true }), 1, config);
    expect(result.jumped).toBe(true);
    expect(isAirborne(run.jump)).toBe(true);
  });

  it('does not move with a zero deltaTime', () => {
    const { run, config } = makeRun();
    const result = stepRun(run, makeInput({ rightHeld: true }), 0, config);
    expect(run.scroll.position).toBe(0);
    expect(run.player.lateralPosition).toBe(0);
    expect(result.verdict).toEqual({ kind: 'none' });
  });

  it('prunes the road behind the camera', () => {
    const { run, config } = makeRun();
    stepTimes(run, config, 800);
    const [first] = run.track.activeSegments();
    expect(first.id).toBeGreaterThan(0);
    expect(first.startDistance + first.length).toBeGreaterThanOrEqual(run.scroll.position - config.retentionMargin);
    expect(run.track.coveredDistance).toBeGreaterThanOrEqual(bufferHorizon(run.scroll.position, config));
  });

  it('tracks the segment under the player', () => {
    const { run, config } = makeRun();
    stepTimes(run, config, 500);
    const seg = run.track.segmentAt(playerForwardDistance(run.scroll.position, config));
    expect(run.player.currentSegmentId).toBe(seg?.id);
  });
});

// --- Collisions ---

describe('stepRun collisions', () => {
  it('hits the first obstacle in the lane', () => {
    const { run, config } = makeRun(OBSTACLE_COURSE);
    let result = stepRun(run, makeInput(), 1, config);
    for (let i = 0; i < 2000 && result.verdict.kind === 'none'; i++) {
      result = stepRun(run, makeInput(), 1, config);
    }
    expect(result.verdict).toEqual({ kind: 'hit', obstacleId: 0 });
    const [first] = run.track.activeObstacles();
    const player = playerForwardDistance(run.scroll.position, config);
    expect(Math.abs(first.distance - player)).toBeLessThanOrEqual(config.collisionDepth);
  });

  it('never hits anything on the opening straight', () => {
    const { run, config } = makeRun(OBSTACLE_COURSE);
    // 67 ticks leave the player at 17.95, short of the first obstacle at 20
    const result = stepTimes(run, config, 67);
    expect(result.verdict.kind).toBe('none');
  });

  it('clears hazards while the ship stays airborne', () => {
    const { run, config } = makeRun({ ...OBSTACLE_COURSE, hazardShare: 1, jumpCooldownFrames: 0 });
    for (let i = 0; i < 1500; i++) {
      const result = stepRun(run, makeInput({ jumpPressed: true }), 1, config);
      expect(result.verdict.kind).toBe('none');
    }
  });

  it('cannot jump over blocks', () => {
    const { run, config } = makeRun({ ...OBSTACLE_COURSE, hazardShare: 0, jumpCooldownFrames: 0 });
    let hit = false;
    for (let i = 0; i < 2000 && !hit; i++) {
      hit = stepRun(run, makeInput({ jumpPressed: true }), 1, config).verdict.kind === 'hit';
    }
    expect(hit).toBe(true);
  });
});
