/**
 * HeadlessEnv: Headless environment controller wrapping one engine run.
 *
 * Adapts the game into an episode-based interface for scripted or learning
 * agents: reset() starts a run, step() advances it one 60Hz tick. An episode
 * terminates on a crash and is truncated at maxSteps. No rendering, no PixiJS.
 */

import { resolveConfig, type GameConfig, type GameConfigOverrides } from '../engine/config';
import { DIFFICULTY_PRESETS } from '../engine/constants';
import { describeError } from '../engine/errors';
import type { HighScoreStore } from '../engine/highscore';
import type { DifficultyName, InputSnapshot } from '../engine/types';
import { createRun, resetRun, stepRun, type RunState } from '../engine/world';
import { silentLogger, type Logger } from '../utils/log';
import { ACTION, DEFAULT_AI_CONFIG, type AiConfig } from './ai-config';
import { buildObservation } from './observations';
import { computeReward } from './reward';

export interface ResetResult {
  observation: number[];
  info: Record<string, unknown>;
}

export interface StepResult {
  observation: number[];
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: Record<string, unknown>;
}

/** Agent action: steer in [-1, 1], jump in [0, 1]. */
export type Action = [steer: number, jump: number];

export interface HeadlessEnvOptions {
  config?: GameConfigOverrides;
  ai?: AiConfig;
  difficulty?: DifficultyName;
  /** Best episode score is kept here when provided */
  store?: HighScoreStore;
  logger?: Logger;
}

export function validateAction(raw: unknown): Action {
  if (!Array.isArray(raw) || raw.length !== 2) {
    throw new Error('action must be a 2-element array [steer, jump]');
  }
  const steer: unknown = raw[0];
  const jump: unknown = raw[1];
  if (typeof steer !== 'number' || typeof jump !== 'number' || !Number.isFinite(steer) || !Number.isFinite(jump)) {
    throw new Error('action elements must be finite numbers');
  }
  return [Math.max(-1, Math.min(1, steer)), Math.max(0, Math.min(1, jump))];
}

/** Map an agent action to the engine's input snapshot. */
export function actionToInput([steer, jump]: Action): InputSnapshot {
  return {
    leftHeld: steer <= -ACTION.steerThreshold,
    rightHeld: steer >= ACTION.steerThreshold,
    pauseToggled: false,
    confirmPressed: false,
    jumpPressed: jump >= ACTION.jumpThreshold,
  };
}

export class HeadlessEnv {
  readonly config: GameConfig;
  private readonly ai: AiConfig;
  private readonly store: HighScoreStore | null;
  private readonly log: Logger;
  private difficulty: DifficultyName;
  private run: RunState | null = null;
  private episode = 0;
  private stepCount = 0;
  private done = false;
  private bestScore = 0;

  constructor(options: HeadlessEnvOptions = {}) {
    this.config = resolveConfig(options.config);
    this.ai = options.ai ?? DEFAULT_AI_CONFIG;
    this.difficulty = options.difficulty ?? 'normal';
    this.store = options.store ?? null;
    this.log = options.logger ?? silentLogger;
    this.bestScore = this.loadBest();
  }

  reset(difficulty: DifficultyName = this.difficulty): ResetResult {
    this.difficulty = difficulty;
    const preset = DIFFICULTY_PRESETS[difficulty];
    const seed = this.config.seed + this.episode;
    this.episode++;

    if (this.run) {
      resetRun(this.run, this.config, preset, seed);
    } else {
      this.run = createRun(this.config, preset, seed, {
        onGenerationExhausted: (info) =>
          this.log.warn(`curvature rerolls exhausted for segment ${info.segmentId}`),
      });
    }
    this.stepCount = 0;
    this.done = false;

    return {
      observation: buildObservation(this.run, this.config),
      info: { episode: this.episode, seed, difficulty, stepCount: 0, highScore: this.bestScore },
    };
  }

  step(action: Action): StepResult {
    const run = this.run;
    if (!run) {
      throw new Error('step() called before reset()');
    }
    if (this.done) {
      throw new Error('episode is over; call reset()');
    }

    const result = stepRun(run, actionToInput(validateAction(action)), 1, this.config);
    this.stepCount++;

    const reward = computeReward(result, this.ai.weights);
    const terminated = result.verdict.kind === 'hit';
    const truncated = !terminated && this.stepCount >= this.ai.episode.maxSteps;
    this.done = terminated || truncated;
    if (this.done) this.recordScore(run.scroll.score);

    return {
      observation: buildObservation(run, this.config),
      reward: reward.total,
      terminated,
      truncated,
      info: {
        progress: reward.progress,
        crash: reward.crash,
        jump: reward.jump,
        score: run.scroll.score,
        level: run.scroll.level,
        speed: run.scroll.speed,
        obstacleId: result.verdict.kind === 'hit' ? result.verdict.obstacleId : null,
        stepCount: this.stepCount,
        highScore: this.bestScore,
      },
    };
  }

  get highScore(): number { return this.bestScore; }

  private loadBest(): number {
    if (!this.store) return 0;
    try {
      return this.store.loadHighScore();
    } catch (err) {
      this.log.warn(`high score load failed: ${describeError(err)}`);
      return 0;
    }
  }

  private recordScore(score: number): void {
    if (score <= this.bestScore) return;
    this.bestScore = score;
    if (!this.store) return;
    try {
      this.store.saveHighScore(score);
    } catch (err) {
      this.log.warn(`high score save failed: ${describeError(err)}`);
    }
  }
}
