/**
 * GameController: Headless Game State Machine
 *
 * Owns the phase machine (menu, playing, paused, game over) and one run.
 * Lives in src/engine/ with zero renderer/browser imports: the renderer's
 * GameLoop, the headless env and the tests all drive it through tick().
 *
 * A tick is atomic as far as listeners can tell: events raised while it runs
 * are buffered and delivered after it returns its frame.
 */

import type { DifficultyName, DrawCommand, InputSnapshot, Viewport } from './types';
import type { GameEvent, GameEventListener } from './events';
import { resolveConfig, type GameConfig, type GameConfigOverrides } from './config';
import { DIFFICULTY_PRESETS, REFERENCE_VIEWPORT, type DifficultyPreset } from './constants';
import { StateCorruptionError, describeError } from './errors';
import { MemoryHighScoreStore, type HighScoreStore } from './highscore';
import { cameraForViewport, type CameraParams } from './projection';
import { projectScene } from './scene';
import { compose } from './compositor';
import { themeFor } from './themes';
import { isAirborne } from './player';
import { createRun, resetRun, stepRun, type RunState } from './world';
import { silentLogger, type Logger } from '../utils/log';

// ─────────────────────────────────────────────────────────
// Phases & frame result
// ─────────────────────────────────────────────────────────

export enum GamePhase {
  Menu     = 'menu',
  Playing  = 'playing',
  Paused   = 'paused',
  GameOver = 'game-over',
}

/** Everything the HUD shows, read once per frame. */
export interface HudState {
  score: number;
  highScore: number;
  level: number;
  /** Cumulative speed multiplier of the run */
  speedFactor: number;
  difficulty: DifficultyName;
  airborne: boolean;
  /** A jump would start if requested now */
  jumpReady: boolean;
  /** PLAYING ticks since the last level-up, null before the first */
  ticksSinceLevelUp: number | null;
  /** The current run beat the stored high score */
  newHighScore: boolean;
}

export interface FrameResult {
  phase: GamePhase;
  /** Null when the tick failed and the frame should not be drawn */
  commands: DrawCommand[] | null;
  hud: HudState;
}

export interface GameControllerOptions {
  config?: GameConfigOverrides;
  store?: HighScoreStore;
  logger?: Logger;
  viewport?: Viewport;
  /** Applies that preset's speeds; without it config.initialSpeed/steerSpeed are used */
  difficulty?: DifficultyName;
  /** Clock for GameOutcome timestamps */
  now?: () => number;
}

// ─────────────────────────────────────────────────────────
// GameController
// ─────────────────────────────────────────────────────────

export class GameController {
  readonly config: GameConfig;

  private _phase = GamePhase.Menu;
  private _difficulty: DifficultyName;
  private preset: DifficultyPreset;
  private readonly run: RunState;
  private runIndex = 0;

  private readonly store: HighScoreStore;
  private _highScore: number;
  /** Set on game over when the run beat the stored score, cleared on acknowledge */
  private pendingOutcome: number | null = null;
  private lastLevelUpTick: number | null = null;

  private _viewport: Viewport;
  private camera: CameraParams;

  private readonly log: Logger;
  private readonly now: () => number;
  private readonly listeners = new Set<GameEventListener>();
  private queued: GameEvent[] = [];
  private ticking = false;

  constructor(options: GameControllerOptions = {}) {
    this.config = resolveConfig(options.config);
    this.log = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.store = options.store ?? new MemoryHighScoreStore();

    this._difficulty = options.difficulty ?? 'normal';
    this.preset = options.difficulty
      ? DIFFICULTY_PRESETS[options.difficulty]
      : { initialSpeed: this.config.initialSpeed, steerSpeed: this.config.steerSpeed };

    this._viewport = options.viewport ?? { ...REFERENCE_VIEWPORT };
    this.camera = this.cameraFor(this._viewport);

    const trackLog = this.log.child('track');
    this.run = createRun(this.config, this.preset, this.config.seed, {
      onGenerationExhausted: (info) => {
        const message = `curvature rerolls exhausted for segment ${info.segmentId} after ${info.attempts} attempts`;
        trackLog.warn(message);
        this.emit({ type: 'warning', kind: 'GenerationExhausted', message });
      },
    });

    this._highScore = this.loadHighScore();
  }

  // ─── Read-only state ───────────────────────────────────

  get phase(): GamePhase { return this._phase; }
  get highScore(): number { return this._highScore; }
  get difficulty(): DifficultyName { return this._difficulty; }
  get viewport(): Viewport { return this._viewport; }
  get score(): number { return this.run.scroll.score; }
  get level(): number { return this.run.scroll.level; }
  get position(): number { return this.run.scroll.position; }
  get speed(): number { return this.run.scroll.speed; }
  /** Live run state for observers (headless env, tests). Do not mutate. */
  get state(): Readonly<RunState> { return this.run; }

  // ─── Events ────────────────────────────────────────────

  /** Subscribe to game events. Returns an unsubscribe function. */
  onEvent(listener: GameEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Per-tick entry point ──────────────────────────────

  /**
   * Advance one tick and build the frame.
   * Never throws: failures become a warning event and a null command list.
   */
  tick(input: InputSnapshot, deltaTime: number): FrameResult {
    this.ticking = true;
    let commands: DrawCommand[] | null = null;

    try {
      this.applyInput(input, deltaTime);
      commands = this.buildFrame();
    } catch (err) {
      commands = null;
      this.handleTickFailure(err);
    } finally {
      this.ticking = false;
    }

    this.flush();
    return { phase: this._phase, commands, hud: this.hud() };
  }

  // ─── Phase transitions ─────────────────────────────────

  /** MENU -> PLAYING with a fresh run. Ignored in any other phase. */
  start(): void {
    if (this._phase !== GamePhase.Menu) return;

    this.runIndex++;
    this.resetRunState();
    this.setPhase(GamePhase.Playing);
    this.log.info(`run ${this.runIndex} started (${this._difficulty}, seed ${this.run.seed})`);
    this.emit({ type: 'game-started', difficulty: this._difficulty, seed: this.run.seed });
    this.flushIfIdle();
  }

  pause(): void {
    if (this._phase !== GamePhase.Playing) return;
    this.setPhase(GamePhase.Paused);
    this.flushIfIdle();
  }

  resume(): void {
    if (this._phase !== GamePhase.Paused) return;
    this.setPhase(GamePhase.Playing);
    this.flushIfIdle();
  }

  /** GAME_OVER -> MENU; reports the outcome if the run set a new high score. */
  acknowledge(): void {
    if (this._phase !== GamePhase.GameOver) return;

    if (this.pendingOutcome !== null) {
      this.emit({ type: 'high-score', outcome: { value: this.pendingOutcome, timestamp: this.now() } });
      this.pendingOutcome = null;
    }
    this.setPhase(GamePhase.Menu);
    this.flushIfIdle();
  }

  /** Position 0, score 0, initial speed, road regenerated from segment 0. Phase is kept. */
  reset(): void {
    this.resetRunState();
  }

  /** Switch difficulty preset. Only takes effect in the menu. */
  setDifficulty(name: DifficultyName): boolean {
    if (this._phase !== GamePhase.Menu) return false;
    this._difficulty = name;
    this.preset = DIFFICULTY_PRESETS[name];
    this.log.debug(`difficulty set to ${name}`);
    return true;
  }

  setViewport(viewport: Viewport): void {
    this._viewport = { ...viewport };
    this.camera = this.cameraFor(this._viewport);
  }

  // ─── Tick internals ────────────────────────────────────

  private applyInput(input: InputSnapshot, deltaTime: number): void {
    switch (this._phase) {
      case GamePhase.Menu:
        if (input.difficulty) this.setDifficulty(input.difficulty);
        if (input.confirmPressed) this.start();
        return;

      case GamePhase.Playing:
        if (input.pauseToggled) {
          this.pause();
          return;
        }
        this.stepPlaying(input, deltaTime);
        return;

      case GamePhase.Paused:
        if (input.pauseToggled) this.resume();
        return;

      case GamePhase.GameOver:
        if (input.confirmPressed) this.acknowledge();
        return;

      default: {
        const _exhaustive: never = this._phase;
        return _exhaustive;
      }
    }
  }

  private stepPlaying(input: InputSnapshot, deltaTime: number): void {
    const result = stepRun(this.run, input, deltaTime, this.config);
    const { scroll } = this.run;

    if (result.jumped) this.emit({ type: 'jump' });

    if (result.levelsGained > 0) {
      this.lastLevelUpTick = this.run.tick;
      const firstLevel = scroll.level - result.levelsGained + 1;
      for (let level = firstLevel; level <= scroll.level; level++) {
        this.emit({ type: 'score-milestone', level, score: scroll.score });
      }
      this.log.debug(`level ${scroll.level} reached at score ${scroll.score}`);
    }

    if (result.verdict.kind === 'hit') {
      this.emit({ type: 'collision', obstacleId: result.verdict.obstacleId, score: scroll.score });
      this.enterGameOver();
    }
  }

  private enterGameOver(): void {
    const score = this.run.scroll.score;
    this.setPhase(GamePhase.GameOver);
    this.log.info(`run ${this.runIndex} over at score ${score}`);

    if (score > this._highScore) {
      this._highScore = score;
      this.pendingOutcome = score;
      this.saveHighScore(score);
    }
  }

  private handleTickFailure(err: unknown): void {
    const message = describeError(err);

    if (err instanceof StateCorruptionError) {
      this.log.error(`state corrupted, ending run: ${message}`);
      if (this._phase === GamePhase.Playing || this._phase === GamePhase.Paused) {
        this.enterGameOver();
      }
      return;
    }

    this.log.warn(`tick failed: ${message}`);
    this.emit({ type: 'warning', kind: 'TickFailed', message });
  }

  private buildFrame(): DrawCommand[] {
    const { scroll, track, player, jump } = this.run;
    const scene = projectScene(
      {
        segments: track.activeSegments(),
        obstacles: track.activeObstacles(),
        player,
        cameraPosition: scroll.position,
        playerDistance: this.config.playerDistance,
        airborne: isAirborne(jump),
      },
      this.camera,
      this.config,
    );
    return compose(scene.segments, scene.obstacles, scene.player, themeFor(scroll.colorThemeIndex), this._viewport);
  }

  private hud(): HudState {
    const { scroll, jump, tick } = this.run;
    return {
      score: scroll.score,
      highScore: this._highScore,
      level: scroll.level,
      speedFactor: scroll.speedFactor,
      difficulty: this._difficulty,
      airborne: isAirborne(jump),
      jumpReady: jump.airborneFrames === 0 && jump.cooldownFrames === 0,
      ticksSinceLevelUp: this.lastLevelUpTick === null ? null : tick - this.lastLevelUpTick,
      newHighScore: this.pendingOutcome !== null,
    };
  }

  // ─── Helpers ───────────────────────────────────────────

  private resetRunState(): void {
    resetRun(this.run, this.config, this.preset, this.config.seed + this.runIndex);
    this.lastLevelUpTick = null;
    this.pendingOutcome = null;
  }

  private cameraFor(viewport: Viewport): CameraParams {
    return cameraForViewport(viewport, this.config.cameraDepth, this.config.laneHalfWidth, this.config.strictProjection);
  }

  private setPhase(next: GamePhase): void {
    const from = this._phase;
    if (from === next) return;
    this._phase = next;
    this.emit({ type: 'phase-changed', from, to: next });
  }

  private loadHighScore(): number {
    try {
      return this.store.loadHighScore();
    } catch (err) {
      this.reportPersistenceFailure('load', err);
      return 0;
    }
  }

  private saveHighScore(value: number): void {
    try {
      this.store.saveHighScore(value);
    } catch (err) {
      this.reportPersistenceFailure('save', err);
    }
  }

  private reportPersistenceFailure(action: 'load' | 'save', err: unknown): void {
    const message = `high score ${action} failed: ${describeError(err)}`;
    this.log.warn(message);
    this.emit({ type: 'warning', kind: 'PersistenceUnavailable', message });
  }

  private emit(event: GameEvent): void {
    this.queued.push(event);
  }

  private flushIfIdle(): void {
    if (!this.ticking) this.flush();
  }

  private flush(): void {
    const events = this.queued;
    this.queued = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.log.warn(`listener failed on ${event.type}: ${describeError(err)}`);
        }
      }
    }
  }
}
