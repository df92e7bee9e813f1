/**
 * ScrollState -- forward position, speed, score and level of one run.
 *
 * Owned by the game controller (one instance per game, no module singleton).
 * Position and speed change only through advance(), recordScoreEvent() and
 * reset(). Speed grows by the level delta, not per frame, so a score jump
 * across several level boundaries applies the multiplier once per boundary
 * regardless of frame timing.
 */

import { THEME_COUNT } from './constants';
import { InvalidArgumentError, StateCorruptionError } from './errors';

export interface ScrollOptions {
  readonly initialSpeed: number;
  readonly speedGrowthPerLevel: number;
  readonly scoreUnitsPerLevel: number;
}

export class ScrollState {
  private _initialSpeed: number;
  private _position = 0;
  private _speed: number;
  private _speedFactor = 1;
  private _score = 0;
  private _level = 0;

  constructor(private readonly options: ScrollOptions) {
    this._initialSpeed = options.initialSpeed;
    this._speed = options.initialSpeed;
  }

  /** Total forward distance travelled this run, in rows. */
  get position(): number { return this._position; }
  /** Rows per frame. */
  get speed(): number { return this._speed; }
  get score(): number { return this._score; }
  /** floor(score / scoreUnitsPerLevel) */
  get level(): number { return this._level; }
  /** Active colour theme: level mod 4. */
  get colorThemeIndex(): number { return this._level % THEME_COUNT; }
  /** Cumulative speed multiplier, (1 + growth)^level. */
  get speedFactor(): number { return this._speedFactor; }
  get initialSpeed(): number { return this._initialSpeed; }

  /** Move forward by speed * deltaTime (deltaTime in frames). */
  advance(deltaTime: number): void {
    if (!(Number.isFinite(deltaTime) && deltaTime >= 0)) {
      throw new InvalidArgumentError(`deltaTime must be a finite number >= 0, got ${deltaTime}`);
    }
    this._position += this._speed * deltaTime;
    this.assertHealthy();
  }

  /**
   * Add points and apply one speed step per level boundary crossed, in order.
   * @returns Number of levels gained
   */
  recordScoreEvent(delta: number): number {
    if (!Number.isInteger(delta) || delta < 0) {
      throw new InvalidArgumentError(`score delta must be a non-negative integer, got ${delta}`);
    }

    this._score += delta;
    const newLevel = Math.floor(this._score / this.options.scoreUnitsPerLevel);
    const gained = newLevel - this._level;

    const multiplier = 1 + this.options.speedGrowthPerLevel;
    for (let i = 0; i < gained; i++) {
      this._speed *= multiplier;
      this._speedFactor *= multiplier;
    }
    this._level = newLevel;

    this.assertHealthy();
    return gained;
  }

  /** Back to a fresh run. Optionally switch the initial speed (difficulty change). */
  reset(initialSpeed: number = this._initialSpeed): void {
    if (!(Number.isFinite(initialSpeed) && initialSpeed > 0)) {
      throw new InvalidArgumentError(`initialSpeed must be a positive number, got ${initialSpeed}`);
    }
    this._initialSpeed = initialSpeed;
    this._position = 0;
    this._speed = initialSpeed;
    this._speedFactor = 1;
    this._score = 0;
    this._level = 0;
  }

  private assertHealthy(): void {
    if (!Number.isFinite(this._position)) {
      throw new StateCorruptionError(`scroll position is not finite: ${this._position}`);
    }
    if (!(this._speed >= 0) || !Number.isFinite(this._speed)) {
      throw new StateCorruptionError(`scroll speed is invalid: ${this._speed}`);
    }
  }
}
