/**
 * Player Steering & Jump Tests
 */

import { describe, it, expect } from 'vitest';
import {
  clampLateral,
  createInitialJumpState,
  createInitialPlayerState,
  isAirborne,
  steerPlayer,
  stepJump,
} from '../../src/engine/player';

const TIMING = { jumpDurationFrames: 3, jumpCooldownFrames: 2 };

// --- Steering ---

describe('steerPlayer', () => {
  it('moves right at steerSpeed * deltaTime', () => {
    const player = steerPlayer(createInitialPlayerState(), { leftHeld: false, rightHeld: true }, 0.1, 2);
    expect(player.lateralPosition).toBeCloseTo(0.2, 10);
  });

  it('moves left', () => {
    const player = steerPlayer(createInitialPlayerState(), { leftHeld: true, rightHeld: false }, 0.25, 1);
    expect(player.lateralPosition).toBe(-0.25);
  });

  it('cancels out when both directions are held', () => {
    const start = createInitialPlayerState();
    expect(steerPlayer(start, { leftHeld: true, rightHeld: true }, 0.1, 1)).toBe(start);
  });

  it('clamps at the road edges', () => {
    let player = createInitialPlayerState();
    for (let i = 0; i < 50; i++) {
      player = steerPlayer(player, { leftHeld: false, rightHeld: true }, 0.1, 1);
    }
    expect(player.lateralPosition).toBe(1);
  });

  it('keeps the segment id', () => {
    const player = steerPlayer(
      { lateralPosition: 0, currentSegmentId: 4 },
      { leftHeld: true, rightHeld: false },
      0.1,
      1,
    );
    expect(player.currentSegmentId).toBe(4);
  });
});

describe('clampLateral', () => {
  it('limits to [-1, 1]', () => {
    expect(clampLateral(-3)).toBe(-1);
    expect(clampLateral(0.4)).toBe(0.4);
    expect(clampLateral(1.5)).toBe(1);
  });
});

// --- Jumping ---

describe('stepJump', () => {
  it('starts a jump from rest', () => {
    const { jump, started } = stepJump(createInitialJumpState(), true, TIMING, 1);
    expect(started).toBe(true);
    expect(jump).toEqual({ airborneFrames: 3, cooldownFrames: 5 });
    expect(isAirborne(jump)).toBe(true);
  });

  it('does nothing without a request', () => {
    const { jump, started } = stepJump(createInitialJumpState(), false, TIMING, 1);
    expect(started).toBe(false);
    expect(isAirborne(jump)).toBe(false);
  });

  it('lands after jumpDurationFrames and waits out the cooldown', () => {
    let jump = stepJump(createInitialJumpState(), true, TIMING, 1).jump;
    for (let i = 0; i < 3; i++) {
      jump = stepJump(jump, false, TIMING, 1).jump;
    }
    expect(jump).toEqual({ airborneFrames: 0, cooldownFrames: 2 });
    expect(isAirborne(jump)).toBe(false);

    const blocked = stepJump(jump, true, TIMING, 1);
    expect(blocked.started).toBe(false);
    expect(blocked.jump).toEqual({ airborneFrames: 0, cooldownFrames: 1 });

    const ready = stepJump(blocked.jump, true, TIMING, 1);
    expect(ready.started).toBe(true);
  });

  it('ignores a request while airborne', () => {
    const first = stepJump(createInitialJumpState(), true, TIMING, 1).jump;
    const again = stepJump(first, true, TIMING, 1);
    expect(again.started).toBe(false);
    expect(again.jump.airborneFrames).toBe(2);
  });

  it('never counts timers below zero', () => {
    const { jump } = stepJump({ airborneFrames: 1, cooldownFrames: 1 }, false, TIMING, 10);
    expect(jump).toEqual({ airborneFrames: 0, cooldownFrames: 0 });
  });
});
