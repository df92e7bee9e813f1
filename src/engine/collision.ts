/**
 * Obstacle Collision Detection
 *
 * Simplified lane overlap: an obstacle hits when it is inside the near-field
 * distance window around the player AND laterally closer than the collision
 * threshold. The window must be at least one frame of travel deep, otherwise
 * a fast player skips over obstacles between ticks (tunnelling).
 */

import type { CollisionVerdict, Obstacle, PlayerState } from './types';
import { ObstacleKind } from './types';

export interface CollisionOptions {
  /** Lateral distance below which player and obstacle overlap */
  readonly collisionThreshold: number;
  /** Half-depth of the near-field window, in rows */
  readonly epsilon: number;
}

export const NO_COLLISION: CollisionVerdict = { kind: 'none' };

/**
 * Near-field half-window for a tick: never shallower than the distance
 * travelled during the tick.
 */
export function nearFieldEpsilon(speed: number, deltaTime: number, minimum: number): number {
  return Math.max(minimum, speed * deltaTime);
}

/**
 * Test the player against obstacles near playerForwardDistance.
 * When several overlap, the lowest obstacle id wins.
 */
export function checkCollision(
  player: PlayerState,
  obstacles: Iterable<Obstacle>,
  playerForwardDistance: number,
  options: CollisionOptions,
): CollisionVerdict {
  const minDistance = playerForwardDistance - options.epsilon;
  const maxDistance = playerForwardDistance + options.epsilon;

  let hitId: number | null = null;
  for (const obstacle of obstacles) {
    if (obstacle.distance < minDistance || obstacle.distance > maxDistance) continue;
    if (Math.abs(player.lateralPosition - obstacle.lateralOffset) >= options.collisionThreshold) continue;
    if (hitId === null || obstacle.id < hitId) hitId = obstacle.id;
  }

  return hitId === null ? NO_COLLISION : { kind: 'hit', obstacleId: hitId };
}

/** Obstacles that can still hit the player; hazards are cleared while airborne. */
export function collidableObstacles(obstacles: readonly Obstacle[], airborne: boolean): readonly Obstacle[] {
  return airborne ? obstacles.filter((o) => o.kind !== ObstacleKind.Hazard) : obstacles;
}
