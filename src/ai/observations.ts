/**
 * Observation Vector Builder: normalized vector for a scripted or learning agent.
 *
 * Layout for L lanes (L = config.lanes.length):
 *   [0]              lateral position           [-1, 1]
 *   [1]              speed factor               [0, 1]
 *   [2 .. 2+L)       nearest obstacle per lane  [0, 1], 1 = nothing within lookahead
 *   [2+L .. 2+2L)    that obstacle is a block   {0, 1}
 *   [2+2L]           airborne                   {0, 1}
 *   [2+2L+1]         jump cooldown remaining    [0, 1]
 */

import type { GameConfig } from '../engine/config';
import type { Obstacle } from '../engine/types';
import { ObstacleKind } from '../engine/types';
import type { RunState } from '../engine/world';
import { isAirborne } from '../engine/player';
import { OBS } from './ai-config';

export function observationSize(laneCount: number): number {
  return 4 + 2 * laneCount;
}

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Nearest obstacle per lane that the player has not yet passed, or null.
 * An obstacle belongs to the lane whose offset it sits on.
 */
export function nearestPerLane(
  obstacles: readonly Obstacle[],
  lanes: readonly number[],
  playerDistance: number,
  obstacleLength: number,
): (Obstacle | null)[] {
  const nearest: (Obstacle | null)[] = lanes.map(() => null);
  for (const o of obstacles) {
    if (o.distance + obstacleLength < playerDistance) continue;
    const lane = lanes.indexOf(o.lateralOffset);
    if (lane < 0) continue;
    const current = nearest[lane];
    if (current === null || o.distance < current.distance) nearest[lane] = o;
  }
  return nearest;
}

export function buildObservation(run: RunState, config: GameConfig): number[] {
  const { scroll, track, player, jump } = run;
  const lanes = config.lanes;
  const playerDistance = scroll.position + config.playerDistance;
  const nearest = nearestPerLane(track.activeObstacles(), lanes, playerDistance, config.obstacleLength);

  const obs: number[] = [
    clamp(player.lateralPosition, -1, 1),
    clamp(scroll.speedFactor / OBS.maxSpeedFactor, 0, 1),
  ];
  for (const o of nearest) {
    obs.push(o === null ? 1 : clamp((o.distance - playerDistance) / OBS.lookahead, 0, 1));
  }
  for (const o of nearest) {
    obs.push(o !== null && o.kind === ObstacleKind.Block ? 1 : 0);
  }
  obs.push(isAirborne(jump) ? 1 : 0);

  const cooldownSpan = config.jumpDurationFrames + config.jumpCooldownFrames;
  obs.push(cooldownSpan > 0 ? clamp(jump.cooldownFrames / cooldownSpan, 0, 1) : 0);

  return obs;
}
