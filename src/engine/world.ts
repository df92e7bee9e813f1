/**
 * Run State & Step Function
 *
 * One run owns its ScrollState, TrackGenerator, player and jump timers.
 * stepRun() is the PLAYING tick the controller, the headless env and the
 * tests all share.
 *
 * Step sequence per tick:
 *   1. Steer (lateral speed scales with the level speed factor)
 *   2. Count jump timers down, start a jump if requested
 *   3. Advance scroll position
 *   4. Convert newly travelled rows into score (one score event per tick)
 *   5. Buffer the road ahead, prune what is behind the camera
 *   6. Look up the segment under the player
 *   7. Test collisions in the near field
 */

import type { GameConfig } from './config';
import type { DifficultyPreset } from './constants';
import type { CollisionVerdict, InputSnapshot, JumpState, PlayerState } from './types';
import { ScrollState } from './scroll';
import { TrackGenerator, type TrackGeneratorOptions } from './track';
import { createInitialJumpState, createInitialPlayerState, isAirborne, steerPlayer, stepJump } from './player';
import { checkCollision, collidableObstacles, nearFieldEpsilon } from './collision';

export interface RunState {
  readonly scroll: ScrollState;
  readonly track: TrackGenerator;
  player: PlayerState;
  jump: JumpState;
  /** Lateral speed at level 0, lane units/frame */
  steerSpeed: number;
  /** PLAYING ticks since the run started */
  tick: number;
  seed: number;
}

export interface RunStepResult {
  readonly verdict: CollisionVerdict;
  readonly scoreGained: number;
  readonly levelsGained: number;
  readonly jumped: boolean;
}

/** Distance the road must be generated up to for a camera at `position`. */
export function bufferHorizon(position: number, config: GameConfig): number {
  return position + config.drawDistance + config.segmentLength.max;
}

/** Forward distance of the player for a camera at `position`. */
export function playerForwardDistance(position: number, config: GameConfig): number {
  return position + config.playerDistance;
}

export function createRun(
  config: GameConfig,
  preset: DifficultyPreset,
  seed: number,
  options: TrackGeneratorOptions = {},
): RunState {
  const scroll = new ScrollState({
    initialSpeed: preset.initialSpeed,
    speedGrowthPerLevel: config.speedGrowthPerLevel,
    scoreUnitsPerLevel: config.scoreUnitsPerLevel,
  });
  const run: RunState = {
    scroll,
    track: new TrackGenerator(config, scroll, seed, options),
    player: createInitialPlayerState(),
    jump: createInitialJumpState(),
    steerSpeed: preset.steerSpeed,
    tick: 0,
    seed,
  };
  run.track.ensureBuffered(bufferHorizon(0, config));
  run.player.currentSegmentId = run.track.segmentAt(playerForwardDistance(0, config))?.id ?? null;
  return run;
}

/** Back to position 0, score 0 and a road regenerated from segment 0. */
export function resetRun(run: RunState, config: GameConfig, preset: DifficultyPreset, seed: number): void {
  run.scroll.reset(preset.initialSpeed);
  run.track.reset(seed);
  run.player = createInitialPlayerState();
  run.jump = createInitialJumpState();
  run.steerSpeed = preset.steerSpeed;
  run.tick = 0;
  run.seed = seed;
  run.track.ensureBuffered(bufferHorizon(0, config));
  run.player.currentSegmentId = run.track.segmentAt(playerForwardDistance(0, config))?.id ?? null;
}

/** Advance a run by deltaTime frames. */
export function stepRun(
  run: RunState,
  input: InputSnapshot,
  deltaTime: number,
  config: GameConfig,
): RunStepResult {
  const { scroll, track } = run;

  // 1-2. Player. Committed only once scroll.advance() has accepted deltaTime.
  const player = steerPlayer(run.player, input, run.steerSpeed * scroll.speedFactor, deltaTime);
  const jumpStep = stepJump(run.jump, input.jumpPressed, config, deltaTime);

  // 3. Scroll. The collision window is sized on the speed the tick travelled at.
  const tickSpeed = scroll.speed;
  scroll.advance(deltaTime);
  run.player = player;
  run.jump = jumpStep.jump;

  // 4. Score from distance
  const earned = Math.floor(scroll.position / config.distancePerPoint);
  const scoreGained = Math.max(0, earned - scroll.score);
  const levelsGained = scoreGained > 0 ? scroll.recordScoreEvent(scoreGained) : 0;

  // 5. Road window
  track.ensureBuffered(bufferHorizon(scroll.position, config));
  track.prune(scroll.position);

  // 6. Segment lookup
  const playerDistance = playerForwardDistance(scroll.position, config);
  run.player = { ...run.player, currentSegmentId: track.segmentAt(playerDistance)?.id ?? null };

  // 7. Collision
  const epsilon = nearFieldEpsilon(tickSpeed, deltaTime, config.collisionDepth);
  const verdict = checkCollision(
    run.player,
    collidableObstacles(track.activeObstacles(), isAirborne(run.jump)),
    playerDistance,
    { collisionThreshold: config.collisionThreshold, epsilon },
  );

  run.tick++;
  return { verdict, scoreGained, levelsGained, jumped: jumpStep.started };
}
