/**
 * Player steering and jump timers.
 *
 * Steering moves the ship across the lanes at a constant lateral speed and is
 * always clamped to [-1, 1]. A jump keeps the ship airborne for a fixed
 * number of frames, followed by a cooldown before the next one.
 */

import type { InputSnapshot, JumpState, PlayerState } from './types';

export function createInitialPlayerState(): PlayerState {
  return { lateralPosition: 0, currentSegmentId: null };
}

export function createInitialJumpState(): JumpState {
  return { airborneFrames: 0, cooldownFrames: 0 };
}

export function clampLateral(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

/**
 * Apply held steering keys for deltaTime frames.
 * Holding both directions cancels out.
 */
export function steerPlayer(
  player: PlayerState,
  input: Pick<InputSnapshot, 'leftHeld' | 'rightHeld'>,
  steerSpeed: number,
  deltaTime: number,
): PlayerState {
  const direction = (input.rightHeld ? 1 : 0) - (input.leftHeld ? 1 : 0);
  if (direction === 0) return player;
  return {
    ...player,
    lateralPosition: clampLateral(player.lateralPosition + direction * steerSpeed * deltaTime),
  };
}

export function isAirborne(jump: JumpState): boolean {
  return jump.airborneFrames > 0;
}

/**
 * Count jump timers down, then start a new jump if one was requested and the
 * cooldown has expired.
 * @returns The new state and whether a jump started this tick
 */
export function stepJump(
  jump: JumpState,
  jumpPressed: boolean,
  timing: { readonly jumpDurationFrames: number; readonly jumpCooldownFrames: number },
  deltaTime: number,
): { jump: JumpState; started: boolean } {
  const next: JumpState = {
    airborneFrames: Math.max(0, jump.airborneFrames - deltaTime),
    cooldownFrames: Math.max(0, jump.cooldownFrames - deltaTime),
  };

  if (jumpPressed && next.airborneFrames === 0 && next.cooldownFrames === 0) {
    return {
      jump: {
        airborneFrames: timing.jumpDurationFrames,
        cooldownFrames: timing.jumpDurationFrames + timing.jumpCooldownFrames,
      },
      started: true,
    };
  }

  return { jump: next, started: false };
}
