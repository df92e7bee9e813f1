/**
 * Game Configuration -- types, defaults, and validation.
 *
 * Every tunable of projection, generation, obstacles, collision and jumping
 * lives here. The density curve and sharp-turn threshold have no derivation;
 * they are exposed as configuration instead of hardcoded.
 */

import { DIFFICULTY_PRESETS } from './constants';
import { InvalidArgumentError } from './errors';

export interface Range {
  readonly min: number;
  readonly max: number;
}

export interface GameConfig {
  // --- Scroll & scoring ---
  /** Forward speed at level 0, rows/frame */
  readonly initialSpeed: number;
  /** Speed multiplier growth per level crossed (0.08 = +8%) */
  readonly speedGrowthPerLevel: number;
  /** Score points per level */
  readonly scoreUnitsPerLevel: number;
  /** Rows travelled per score point */
  readonly distancePerPoint: number;

  // --- Projection ---
  readonly cameraDepth: number;
  /** Screen pixels from lane centre to lane edge at scale 1 */
  readonly laneHalfWidth: number;
  /** Rows ahead of the camera that get projected */
  readonly drawDistance: number;
  /** Road is drawn in slices of this many rows; stripes alternate per slice */
  readonly sliceLength: number;
  /** Throw on out-of-domain projection input instead of clamping */
  readonly strictProjection: boolean;

  // --- Track generation ---
  readonly segmentLength: Range;
  readonly curvature: Range;
  /** Curvature magnitude above which two same-sign neighbours are rejected */
  readonly sharpTurnThreshold: number;
  readonly maxCurvatureRerolls: number;
  /** Max accumulated lateral drift (lane units) before turns are forced back */
  readonly driftLimit: number;
  /** Length of the straight opening segment */
  readonly initialStraightLength: number;
  /** Road half-width in lane units */
  readonly trackHalfWidth: number;
  /** Rows kept behind the camera before pruning */
  readonly retentionMargin: number;

  // --- Obstacles ---
  /** Lateral offsets obstacles are placed on */
  readonly lanes: readonly number[];
  /** First level that spawns obstacles */
  readonly obstacleStartLevel: number;
  /** Spawn probability per row at obstacleStartLevel... */
  readonly obstacleBaseDensity: number;
  /** ...plus this much per level... */
  readonly obstacleDensityPerLevel: number;
  /** ...capped here */
  readonly obstacleMaxDensity: number;
  /** Spawn rolls happen once per slot of this many rows */
  readonly obstacleSlotLength: number;
  /** Depth of an obstacle in rows */
  readonly obstacleLength: number;
  /** Visual half-width of an obstacle in lane units */
  readonly obstacleHalfWidth: number;
  /** Frames the player gets to react between obstacles sharing a lane */
  readonly reactionFrames: number;
  readonly maxActiveObstacles: number;
  /** Probability that a spawned obstacle is a hazard rather than a block */
  readonly hazardShare: number;

  // --- Player & collision ---
  /** Lateral speed in lane units/frame at level 0 */
  readonly steerSpeed: number;
  /** Rows between the camera and the player */
  readonly playerDistance: number;
  /** Lateral distance below which player and obstacle overlap */
  readonly collisionThreshold: number;
  /** Smallest near-field half-window in rows */
  readonly collisionDepth: number;
  readonly jumpDurationFrames: number;
  readonly jumpCooldownFrames: number;

  /** Base PRNG seed; run n uses seed + n */
  readonly seed: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export const DEFAULT_GAME_CONFIG = {
  initialSpeed: DIFFICULTY_PRESETS.normal.initialSpeed,
  speedGrowthPerLevel: 0.08,
  scoreUnitsPerLevel: 100,
  distancePerPoint: 1,

  cameraDepth: 3,
  laneHalfWidth: 420,
  drawDistance: 60,
  sliceLength: 1,
  strictProjection: false,

  segmentLength: { min: 6, max: 16 },
  curvature: { min: -0.06, max: 0.06 },
  sharpTurnThreshold: 0.04,
  maxCurvatureRerolls: 5,
  driftLimit: 2.5,
  initialStraightLength: 12,
  trackHalfWidth: 1.25,
  retentionMargin: 3,

  lanes: [-0.65, 0, 0.65],
  obstacleStartLevel: 1,
  obstacleBaseDensity: 0.15,
  obstacleDensityPerLevel: 0.05,
  obstacleMaxDensity: 0.4,
  obstacleSlotLength: 1,
  obstacleLength: 0.6,
  obstacleHalfWidth: 0.22,
  reactionFrames: 30,
  maxActiveObstacles: 24,
  hazardShare: 0.4,

  steerSpeed: DIFFICULTY_PRESETS.normal.steerSpeed,
  playerDistance: 1.2,
  collisionThreshold: 0.32,
  collisionDepth: 0.3,
  jumpDurationFrames: 36,
  jumpCooldownFrames: 18,

  seed: 1,
} as const satisfies GameConfig;

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive number, got ${value}`);
  }
}

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative number, got ${value}`);
  }
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

function requireRange(name: string, range: Range): void {
  if (!Number.isFinite(range.min) || !Number.isFinite(range.max) || range.min > range.max) {
    throw new InvalidArgumentError(`${name} must satisfy min <= max, got [${range.min}, ${range.max}]`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws InvalidArgumentError naming the first offending option.
 */
export function resolveConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const config: GameConfig = { ...DEFAULT_GAME_CONFIG, ...overrides };

  requirePositive('initialSpeed', config.initialSpeed);
  requireNonNegative('speedGrowthPerLevel', config.speedGrowthPerLevel);
  requireInteger('scoreUnitsPerLevel', config.scoreUnitsPerLevel, 1);
  requirePositive('distancePerPoint', config.distancePerPoint);

  requirePositive('cameraDepth', config.cameraDepth);
  requirePositive('laneHalfWidth', config.laneHalfWidth);
  requirePositive('drawDistance', config.drawDistance);
  requirePositive('sliceLength', config.sliceLength);

  requireRange('segmentLength', config.segmentLength);
  requirePositive('segmentLength.min', config.segmentLength.min);
  requireRange('curvature', config.curvature);
  requireNonNegative('sharpTurnThreshold', config.sharpTurnThreshold);
  requireInteger('maxCurvatureRerolls', config.maxCurvatureRerolls, 0);
  requirePositive('driftLimit', config.driftLimit);
  requirePositive('initialStraightLength', config.initialStraightLength);
  requirePositive('trackHalfWidth', config.trackHalfWidth);
  requireNonNegative('retentionMargin', config.retentionMargin);

  if (config.lanes.length === 0 || config.lanes.some((lane) => !(lane >= -1 && lane <= 1))) {
    throw new InvalidArgumentError('lanes must be a non-empty list of offsets in [-1, 1]');
  }
  requireInteger('obstacleStartLevel', config.obstacleStartLevel, 0);
  requireNonNegative('obstacleBaseDensity', config.obstacleBaseDensity);
  requireNonNegative('obstacleDensityPerLevel', config.obstacleDensityPerLevel);
  requireNonNegative('obstacleMaxDensity', config.obstacleMaxDensity);
  requirePositive('obstacleSlotLength', config.obstacleSlotLength);
  requirePositive('obstacleLength', config.obstacleLength);
  requirePositive('obstacleHalfWidth', config.obstacleHalfWidth);
  requireNonNegative('reactionFrames', config.reactionFrames);
  requireInteger('maxActiveObstacles', config.maxActiveObstacles, 0);
  if (!(config.hazardShare >= 0 && config.hazardShare <= 1)) {
    throw new InvalidArgumentError(`hazardShare must be in [0, 1], got ${config.hazardShare}`);
  }

  requirePositive('steerSpeed', config.steerSpeed);
  requireNonNegative('playerDistance', config.playerDistance);
  requirePositive('collisionThreshold', config.collisionThreshold);
  requireNonNegative('collisionDepth', config.collisionDepth);
  requireInteger('jumpDurationFrames', config.jumpDurationFrames, 0);
  requireInteger('jumpCooldownFrames', config.jumpCooldownFrames, 0);
  if (!Number.isFinite(config.seed)) {
    throw new InvalidArgumentError(`seed must be finite, got ${config.seed}`);
  }

  return config;
}
