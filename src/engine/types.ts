/**
 * Engine Type Contracts
 *
 * All interfaces shared by the projection, track generation, collision and
 * composition systems. Track data is immutable once generated; projected
 * geometry is rebuilt every frame and never persisted.
 *
 * Units: forward distance is measured in rows (one row = one score point),
 * lateral position in lane units (-1 = left lane edge, +1 = right lane edge),
 * time in 60Hz frames.
 */

/** Obstacle flavour. Hazards sit low and can be jumped; blocks cannot. */
export enum ObstacleKind {
  Block = 'block',
  Hazard = 'hazard',
}

/** One generated stretch of road. Never mutated after creation. */
export interface TrackSegment {
  /** Strictly increasing in generation order, restarts at 0 on reset */
  readonly id: number;
  /** Forward distance where the segment begins */
  readonly startDistance: number;
  readonly length: number;
  /** Signed lateral drift of the lane centre per unit of forward distance */
  readonly curvature: number;
  /** Road half-width in lane units (rumble strips reach this far) */
  readonly widthAtStart: number;
  /** Theme in effect when the segment was generated: level mod 4 */
  readonly colorThemeIndex: number;
}

export interface Obstacle {
  readonly id: number;
  /** Forward distance of the obstacle's near edge */
  readonly distance: number;
  /** Offset from the lane centre in [-1, 1] */
  readonly lateralOffset: number;
  readonly kind: ObstacleKind;
}

export interface PlayerState {
  /** Lateral position, always clamped to [-1, 1] */
  lateralPosition: number;
  /** Segment under the player. Lookup only, may point at a pruned segment. */
  currentSegmentId: number | null;
}

/** Jump timers, counted down in frames. */
export interface JumpState {
  airborneFrames: number;
  cooldownFrames: number;
}

/** Screen-space result of a perspective projection. */
export interface ProjectedPoint {
  readonly screenX: number;
  readonly screenY: number;
  /** Perspective shrink factor: 1 at the camera, approaching 0 at the horizon */
  readonly scale: number;
}

/** High score record handed to persistence. */
export interface GameOutcome {
  readonly value: number;
  /** Milliseconds since the epoch */
  readonly timestamp: number;
}

export type DifficultyName = 'easy' | 'normal' | 'hard';

/** Per-tick input snapshot. Read-only to the engine. */
export interface InputSnapshot {
  leftHeld: boolean;
  rightHeld: boolean;
  /** True on the tick a pause toggle was requested */
  pauseToggled: boolean;
  /** True on the tick a confirm (start / acknowledge) was requested */
  confirmPressed: boolean;
  /** True on the tick a jump was requested */
  jumpPressed: boolean;
  /** Difficulty picked in the menu this tick, if any */
  difficulty?: DifficultyName;
}

export type CollisionVerdict =
  | { readonly kind: 'none' }
  | { readonly kind: 'hit'; readonly obstacleId: number };

/** Screen dimensions the projection targets, in pixels. */
export interface Viewport {
  width: number;
  height: number;
  /** Screen y of the vanishing line (y grows downward) */
  horizonY: number;
}

/** One colour theme. Colours are 0xRRGGBB numbers. */
export interface Theme {
  readonly name: string;
  readonly sky: number;
  readonly ground: number;
  readonly road: number;
  readonly roadAlt: number;
  readonly rumble: number;
  readonly rumbleAlt: number;
  readonly block: number;
  readonly blockFace: number;
  readonly hazard: number;
  readonly player: number;
  readonly playerOutline: number;
}

/** A display-ready shape. Commands are already sorted; zIndex is the final draw position. */
export type DrawCommand =
  | {
      readonly shape: 'polygon';
      /** Flat [x0, y0, x1, y1, ...] screen coordinates */
      readonly points: readonly number[];
      readonly color: number;
      readonly alpha: number;
      readonly outline?: { readonly color: number; readonly width: number };
      readonly zIndex: number;
    }
  | {
      readonly shape: 'rect';
      readonly x: number;
      readonly y: number;
      readonly width: number;
      readonly height: number;
      readonly color: number;
      readonly alpha: number;
      readonly zIndex: number;
    };
