/**
 * Render Compositor
 *
 * Pure: projected scene + theme -> ordered DrawCommand list. Commands are
 * painted in array order, so index 0 is the farthest thing.
 *
 * Layering:
 *   0  background  sky and ground rectangles
 *   1  road        slices, far -> near
 *   2  objects     obstacles and the player ship, far -> near
 *
 * All road slices sit below all objects. A near road slice can never
 * overpaint a farther obstacle, since flat ground never occludes anything
 * standing on it.
 */

import type { DrawCommand, ProjectedPoint, Theme, Viewport } from './types';
import { ObstacleKind } from './types';
import type { ProjectedObstacle, ProjectedPlayer, ProjectedSlice } from './scene';
import { themeFor } from './themes';
import { BLOCK_HEIGHT, SHIP } from './constants';

enum Layer {
  Background = 0,
  Road = 1,
  Objects = 2,
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A command before its final position is known. */
type PendingCommand = DistributiveOmit<DrawCommand, 'zIndex'>;

interface Entry {
  readonly layer: Layer;
  /** Rows from the camera; larger is painted first */
  readonly depth: number;
  readonly command: PendingCommand;
}

function flatten(points: readonly ProjectedPoint[], lift = 0): number[] {
  const out: number[] = [];
  for (const p of points) {
    out.push(p.screenX, p.screenY - lift * p.scale);
  }
  return out;
}

function polygon(points: number[], color: number, outline?: { color: number; width: number }): PendingCommand {
  return outline
    ? { shape: 'polygon', points, color, alpha: 1, outline }
    : { shape: 'polygon', points, color, alpha: 1 };
}

function sliceEntries(slice: ProjectedSlice): Entry[] {
  const theme = themeFor(slice.colorThemeIndex);
  const { near, far } = slice;
  const rumble = slice.stripe ? theme.rumbleAlt : theme.rumble;

  const road = polygon(
    flatten([near.outerLeft, near.outerRight, far.outerRight, far.outerLeft]),
    slice.stripe ? theme.roadAlt : theme.road,
  );
  const leftRumble = polygon(flatten([near.outerLeft, near.innerLeft, far.innerLeft, far.outerLeft]), rumble);
  const rightRumble = polygon(flatten([near.innerRight, near.outerRight, far.outerRight, far.innerRight]), rumble);

  return [road, leftRumble, rightRumble].map((command) => ({ layer: Layer.Road, depth: slice.depth, command }));
}

function obstacleEntries(obstacle: ProjectedObstacle, theme: Theme): Entry[] {
  const { nearLeft, nearRight, farLeft, farRight } = obstacle;

  if (obstacle.kind === ObstacleKind.Hazard) {
    return [{
      layer: Layer.Objects,
      depth: obstacle.depth,
      command: polygon(flatten([nearLeft, nearRight, farRight, farLeft]), theme.hazard),
    }];
  }

  // Block: front face rising from the near edge, then the raised top
  const face = polygon(
    [
      nearLeft.screenX, nearLeft.screenY,
      nearRight.screenX, nearRight.screenY,
      ...flatten([nearRight, nearLeft], BLOCK_HEIGHT),
    ],
    theme.blockFace,
  );
  const top = polygon(flatten([nearLeft, nearRight, farRight, farLeft], BLOCK_HEIGHT), theme.block);

  return [
    { layer: Layer.Objects, depth: obstacle.depth, command: face },
    { layer: Layer.Objects, depth: obstacle.depth, command: top },
  ];
}

function playerEntry(player: ProjectedPlayer, theme: Theme): Entry {
  const lift = player.airborne ? SHIP.jumpLift : 0;
  const outline = player.airborne ? { color: theme.playerOutline, width: SHIP.outlineWidth } : undefined;
  return {
    layer: Layer.Objects,
    depth: player.depth,
    command: polygon(flatten([player.left, player.nose, player.right], lift), theme.player, outline),
  };
}

/**
 * Build the frame's draw list, back to front.
 * Road slices use the theme they were generated with; background, obstacles
 * and the ship use the active `theme`.
 */
export function compose(
  segments: readonly ProjectedSlice[],
  obstacles: readonly ProjectedObstacle[],
  player: ProjectedPlayer,
  theme: Theme,
  viewport: Viewport,
): DrawCommand[] {
  const entries: Entry[] = [
    {
      layer: Layer.Background,
      depth: 0,
      command: { shape: 'rect', x: 0, y: 0, width: viewport.width, height: viewport.horizonY, color: theme.sky, alpha: 1 },
    },
    {
      layer: Layer.Background,
      depth: 0,
      command: {
        shape: 'rect',
        x: 0,
        y: viewport.horizonY,
        width: viewport.width,
        height: viewport.height - viewport.horizonY,
        color: theme.ground,
        alpha: 1,
      },
    },
  ];

  for (const slice of segments) entries.push(...sliceEntries(slice));
  for (const obstacle of obstacles) entries.push(...obstacleEntries(obstacle, theme));
  entries.push(playerEntry(player, theme));

  // Array.prototype.sort is stable: ties keep insertion order
  entries.sort((a, b) => a.layer - b.layer || b.depth - a.depth);

  return entries.map((entry, zIndex) => ({ ...entry.command, zIndex }));
}
