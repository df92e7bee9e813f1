/**
 * Fixed Constants
 *
 * Values that are not per-game tunables: timing, reference screen size,
 * difficulty presets and sprite proportions. Tunables live in config.ts.
 */

import type { DifficultyName } from './types';

/** Engine frames per second. deltaTime = 1 is one frame at this rate. */
export const FRAMES_PER_SECOND = 60;

/** Logical screen the renderer draws into before scaling to the window. */
export const REFERENCE_VIEWPORT = {
  width: 1024,
  height: 800,
  /** Vanishing line at 25% from the top */
  horizonY: 200,
} as const;

/** Number of colour themes; the active one is level mod THEME_COUNT. */
export const THEME_COUNT = 4;

export interface DifficultyPreset {
  /** Forward speed in rows/frame */
  initialSpeed: number;
  /** Lateral speed in lane units/frame */
  steerSpeed: number;
}

/** Easy / normal / hard differ only in forward and lateral speed. */
export const DIFFICULTY_PRESETS = {
  easy: { initialSpeed: 0.04, steerSpeed: 0.025 },
  normal: { initialSpeed: 0.055, steerSpeed: 0.035 },
  hard: { initialSpeed: 0.075, steerSpeed: 0.045 },
} as const satisfies Record<DifficultyName, DifficultyPreset>;

export const DIFFICULTY_NAMES: readonly DifficultyName[] = ['easy', 'normal', 'hard'];

/** Player ship proportions, in lane units and rows. */
export const SHIP = {
  /** Half of the triangle base */
  halfWidth: 0.16,
  /** Nose length along the road */
  length: 0.45,
  /** Screen pixels (at scale 1) the ship rises while airborne */
  jumpLift: 60,
  outlineWidth: 2,
} as const;

/** Screen pixels (at scale 1) a block's front face rises above the road. */
export const BLOCK_HEIGHT = 90;
