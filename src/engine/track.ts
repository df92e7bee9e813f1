/**
 * Procedural Track Generator
 *
 * Pull-based buffer over an endless road. Callers ask for coverage up to a
 * distance (ensureBuffered) and drop what is behind the camera (prune); the
 * active window is always a contiguous, gap-free run of segment ids.
 *
 * Generation rules:
 *   - Segment 0 is a straight opening run.
 *   - Curvature is rerolled when it would repeat a sharp turn in the same
 *     direction; exhausted rerolls fall back to a straight segment.
 *   - A turn that would carry the road past the drift limit is mirrored so it
 *     heads back toward the centre.
 *   - Obstacle density follows the live level; spacing follows the live speed
 *     so every obstacle leaves a reachable free lane.
 */

import type { GameConfig } from './config';
import type { Obstacle, TrackSegment } from './types';
import { ObstacleKind } from './types';
import { THEME_COUNT } from './constants';
import { InvalidArgumentError } from './errors';
import { mulberry32, randomRange, type RandomSource } from './random';

/** Live difficulty, read at generation time (never cached). */
export interface DifficultySource {
  readonly level: number;
  readonly speed: number;
}

export interface GenerationExhaustedInfo {
  readonly segmentId: number;
  readonly attempts: number;
}

export interface TrackGeneratorOptions {
  /** Called when curvature rerolls run out and a straight segment is used instead. */
  onGenerationExhausted?: (info: GenerationExhaustedInfo) => void;
}

/**
 * Minimum distance between two obstacles on the same lateral offset:
 * the distance covered during the reaction window plus one obstacle depth.
 */
export function minObstacleSpacing(
  speed: number,
  config: Pick<GameConfig, 'reactionFrames' | 'obstacleLength'>,
): number {
  return speed * config.reactionFrames + config.obstacleLength;
}

/** Obstacles per row at a given level. Zero below obstacleStartLevel. */
export function obstacleDensity(
  level: number,
  config: Pick<
    GameConfig,
    'obstacleStartLevel' | 'obstacleBaseDensity' | 'obstacleDensityPerLevel' | 'obstacleMaxDensity'
  >,
): number {
  if (level < config.obstacleStartLevel) return 0;
  const steps = level - config.obstacleStartLevel;
  return Math.min(
    config.obstacleBaseDensity + config.obstacleDensityPerLevel * steps,
    config.obstacleMaxDensity,
  );
}

export class TrackGenerator {
  private segments: TrackSegment[] = [];
  private obstacles: Obstacle[] = [];
  private nextSegmentId = 0;
  private nextObstacleId = 0;
  /** Distance where the next segment will start */
  private generatedEnd = 0;
  /** Absolute lane-centre drift at generatedEnd */
  private endDrift = 0;
  private lastCurvature = 0;
  private random: RandomSource;

  constructor(
    private readonly config: GameConfig,
    private readonly difficulty: DifficultySource,
    seed: number = config.seed,
    private readonly options: TrackGeneratorOptions = {},
  ) {
    this.random = mulberry32(seed);
  }

  /** Forget everything; the next segment generated has id 0 again. */
  reset(seed: number = this.config.seed): void {
    this.segments = [];
    this.obstacles = [];
    this.nextSegmentId = 0;
    this.nextObstacleId = 0;
    this.generatedEnd = 0;
    this.endDrift = 0;
    this.lastCurvature = 0;
    this.random = mulberry32(seed);
  }

  /** Distance up to which the road has been generated. */
  get coveredDistance(): number {
    return this.generatedEnd;
  }

  /** Append segments (and their obstacles) until the road reaches upToDistance. */
  ensureBuffered(upToDistance: number): void {
    if (Number.isNaN(upToDistance) || upToDistance === Infinity) {
      throw new InvalidArgumentError(`cannot buffer up to ${upToDistance}`);
    }
    while (this.generatedEnd < upToDistance) {
      this.appendSegment();
    }
  }

  /** Snapshot of the active window, ordered by startDistance. */
  activeSegments(): readonly TrackSegment[] {
    return this.segments.slice();
  }

  /** Snapshot of live obstacles, ordered by id (and therefore distance). */
  activeObstacles(): readonly Obstacle[] {
    return this.obstacles.slice();
  }

  /** Segment containing an absolute distance, if it is in the window. */
  segmentAt(distance: number): TrackSegment | undefined {
    return this.segments.find(
      (seg) => distance >= seg.startDistance && distance < seg.startDistance + seg.length,
    );
  }

  /**
   * Drop segments and obstacles that ended more than retentionMargin rows
   * before `beforeDistance`. Only the front of the window is removed.
   */
  prune(beforeDistance: number): void {
    const cutoff = beforeDistance - this.config.retentionMargin;

    let drop = 0;
    while (
      drop < this.segments.length &&
      this.segments[drop].startDistance + this.segments[drop].length < cutoff
    ) {
      drop++;
    }
    if (drop > 0) this.segments.splice(0, drop);

    this.obstacles = this.obstacles.filter(
      (o) => o.distance + this.config.obstacleLength >= cutoff,
    );
  }

  // ─── Segment generation ────────────────────────────────

  private appendSegment(): void {
    const cfg = this.config;
    const id = this.nextSegmentId++;
    const opening = id === 0;

    const length = opening
      ? cfg.initialStraightLength
      : randomRange(this.random, cfg.segmentLength.min, cfg.segmentLength.max);
    const curvature = opening ? 0 : this.pickCurvature(id, length);

    const segment: TrackSegment = {
      id,
      startDistance: this.generatedEnd,
      length,
      curvature,
      widthAtStart: cfg.trackHalfWidth,
      colorThemeIndex: this.difficulty.level % THEME_COUNT,
    };

    this.segments.push(segment);
    this.generatedEnd += length;
    this.endDrift += curvature * length;
    this.lastCurvature = curvature;

    this.placeObstacles(segment);
  }

  private pickCurvature(segmentId: number, length: number): number {
    const cfg = this.config;
    const attempts = cfg.maxCurvatureRerolls + 1;

    for (let attempt = 0; attempt < attempts; attempt++) {
      let candidate = randomRange(this.random, cfg.curvature.min, cfg.curvature.max);

      // Forced turn back toward the centre at the drift limit
      if (Math.abs(this.endDrift + candidate * length) > cfg.driftLimit) {
        candidate = -candidate;
      }

      if (this.repeatsSharpTurn(candidate)) continue;
      if (Math.abs(this.endDrift + candidate * length) > cfg.driftLimit) continue;
      return candidate;
    }

    this.options.onGenerationExhausted?.({ segmentId, attempts });
    return 0;
  }

  private repeatsSharpTurn(candidate: number): boolean {
    const threshold = this.config.sharpTurnThreshold;
    return (
      Math.abs(this.lastCurvature) > threshold &&
      Math.abs(candidate) > threshold &&
      Math.sign(candidate) === Math.sign(this.lastCurvature)
    );
  }

  // ─── Obstacle placement ────────────────────────────────

  private placeObstacles(segment: TrackSegment): void {
    const cfg = this.config;
    const density = obstacleDensity(this.difficulty.level, cfg);
    if (density <= 0) return;

    const spacing = minObstacleSpacing(this.difficulty.speed, cfg);
    const chance = Math.min(1, density * cfg.obstacleSlotLength);
    const end = segment.startDistance + segment.length;

    for (let slotStart = segment.startDistance; slotStart < end; slotStart += cfg.obstacleSlotLength) {
      if (this.obstacles.length >= cfg.maxActiveObstacles) return;
      if (this.random() >= chance) continue;

      const slotEnd = Math.min(slotStart + cfg.obstacleSlotLength, end);
      const distance = randomRange(this.random, slotStart, slotEnd);
      if (distance < cfg.initialStraightLength) continue;

      const lane = this.pickFreeLane(distance, spacing);
      if (lane === null) continue;

      this.obstacles.push({
        id: this.nextObstacleId++,
        distance,
        lateralOffset: lane,
        kind: this.random() < cfg.hazardShare ? ObstacleKind.Hazard : ObstacleKind.Block,
      });
    }
  }

  /**
   * Pick a lane for an obstacle at `distance`, starting from a random lane
   * and rotating through the rest. A lane qualifies when it has no obstacle
   * within `spacing` and taking it still leaves another lane open.
   */
  private pickFreeLane(distance: number, spacing: number): number | null {
    const lanes = this.config.lanes;
    const start = Math.floor(this.random() * lanes.length) % lanes.length;

    for (let k = 0; k < lanes.length; k++) {
      const lane = lanes[(start + k) % lanes.length];
      if (this.laneOccupied(lane, distance, spacing)) continue;

      const others = lanes.filter((other) => other !== lane);
      if (others.length > 0 && others.every((other) => this.laneOccupied(other, distance, spacing))) {
        continue;
      }
      return lane;
    }
    return null;
  }

  private laneOccupied(lane: number, distance: number, spacing: number): boolean {
    return this.obstacles.some(
      (o) => o.lateralOffset === lane && Math.abs(o.distance - distance) < spacing,
    );
  }
}
