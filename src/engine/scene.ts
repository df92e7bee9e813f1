/**
 * Scene Projection
 *
 * Turns the active track window, nearby obstacles and the player into
 * screen-space geometry for the compositor. The road is cut into slices on
 * absolute sliceLength boundaries so stripes stay glued to the road as it
 * scrolls; each slice edge gets the curve drift accumulated up to it.
 *
 * Nothing behind the camera reaches project(): slices and obstacles are
 * clipped to [cameraPosition, cameraPosition + drawDistance] first.
 */

import type { Obstacle, ObstacleKind, PlayerState, ProjectedPoint, TrackSegment } from './types';
import { curveDrift, project, type CameraParams } from './projection';
import { SHIP } from './constants';

/** Four lateral points across the road at one distance, left to right. */
export interface ProjectedEdge {
  readonly outerLeft: ProjectedPoint;
  readonly innerLeft: ProjectedPoint;
  readonly innerRight: ProjectedPoint;
  readonly outerRight: ProjectedPoint;
}

export interface ProjectedSlice {
  readonly segmentId: number;
  readonly colorThemeIndex: number;
  /** Alternating stripe flag, fixed to the slice's absolute position */
  readonly stripe: boolean;
  /** Rows from the camera to the slice's far edge */
  readonly depth: number;
  readonly near: ProjectedEdge;
  readonly far: ProjectedEdge;
}

export interface ProjectedObstacle {
  readonly obstacleId: number;
  readonly kind: ObstacleKind;
  /** Rows from the camera to the obstacle's far edge */
  readonly depth: number;
  readonly nearLeft: ProjectedPoint;
  readonly nearRight: ProjectedPoint;
  readonly farLeft: ProjectedPoint;
  readonly farRight: ProjectedPoint;
}

export interface ProjectedPlayer {
  /** Rows from the camera to the ship's nose */
  readonly depth: number;
  readonly left: ProjectedPoint;
  readonly right: ProjectedPoint;
  readonly nose: ProjectedPoint;
  readonly airborne: boolean;
}

export interface ProjectedScene {
  readonly segments: readonly ProjectedSlice[];
  readonly obstacles: readonly ProjectedObstacle[];
  readonly player: ProjectedPlayer;
}

export interface SceneInput {
  readonly segments: readonly TrackSegment[];
  readonly obstacles: readonly Obstacle[];
  readonly player: PlayerState;
  /** Absolute distance of the camera */
  readonly cameraPosition: number;
  /** Rows between camera and player */
  readonly playerDistance: number;
  readonly airborne: boolean;
}

export interface SceneOptions {
  readonly drawDistance: number;
  readonly sliceLength: number;
  readonly obstacleLength: number;
  readonly obstacleHalfWidth: number;
}

export function projectScene(input: SceneInput, camera: CameraParams, options: SceneOptions): ProjectedScene {
  const { segments, cameraPosition } = input;
  const cameraDrift = curveDrift(segments, cameraPosition);
  const horizon = cameraPosition + options.drawDistance;

  /** Drift at an absolute distance, relative to the camera. */
  const driftAt = (distance: number): number => curveDrift(segments, distance) - cameraDrift;

  const projectAt = (lateral: number, distance: number, drift: number): ProjectedPoint =>
    project(lateral, distance - cameraPosition, camera, drift);

  const edgeAt = (distance: number, halfWidth: number): ProjectedEdge => {
    const drift = driftAt(distance);
    return {
      outerLeft: projectAt(-halfWidth, distance, drift),
      innerLeft: projectAt(-1, distance, drift),
      innerRight: projectAt(1, distance, drift),
      outerRight: projectAt(halfWidth, distance, drift),
    };
  };

  // ── Road slices ──
  const slices: ProjectedSlice[] = [];
  for (const seg of segments) {
    const from = Math.max(seg.startDistance, cameraPosition);
    const to = Math.min(seg.startDistance + seg.length, horizon);
    let a = from;
    while (a < to) {
      const index = Math.floor(a / options.sliceLength);
      let next = (index + 1) * options.sliceLength;
      if (next <= a) next += options.sliceLength;
      const b = Math.min(next, to);

      slices.push({
        segmentId: seg.id,
        colorThemeIndex: seg.colorThemeIndex,
        stripe: Math.abs(index) % 2 === 1,
        depth: b - cameraPosition,
        near: edgeAt(a, seg.widthAtStart),
        far: edgeAt(b, seg.widthAtStart),
      });
      a = b;
    }
  }

  // ── Obstacles ──
  const projectedObstacles: ProjectedObstacle[] = [];
  for (const o of input.obstacles) {
    const farDistance = o.distance + options.obstacleLength;
    if (farDistance <= cameraPosition || o.distance > horizon) continue;
    const nearDistance = Math.max(o.distance, cameraPosition);

    const nearDrift = driftAt(nearDistance);
    const farDrift = driftAt(farDistance);
    const left = o.lateralOffset - options.obstacleHalfWidth;
    const right = o.lateralOffset + options.obstacleHalfWidth;

    projectedObstacles.push({
      obstacleId: o.id,
      kind: o.kind,
      depth: farDistance - cameraPosition,
      nearLeft: projectAt(left, nearDistance, nearDrift),
      nearRight: projectAt(right, nearDistance, nearDrift),
      farLeft: projectAt(left, farDistance, farDrift),
      farRight: projectAt(right, farDistance, farDrift),
    });
  }

  // ── Player ship ──
  const base = cameraPosition + input.playerDistance;
  const tip = base + SHIP.length;
  const baseDrift = driftAt(base);
  const lateral = input.player.lateralPosition;
  const player: ProjectedPlayer = {
    depth: tip - cameraPosition,
    left: projectAt(lateral - SHIP.halfWidth, base, baseDrift),
    right: projectAt(lateral + SHIP.halfWidth, base, baseDrift),
    nose: projectAt(lateral, tip, driftAt(tip)),
    airborne: input.airborne,
  };

  return { segments: slices, obstacles: projectedObstacles, player };
}
