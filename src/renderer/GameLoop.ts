import type { FrameResult, GameController } from '../engine/GameController';
import { InputSampler, readControls, type RawControls } from './InputHandler';

const FIXED_DT_MS = 1000 / 60;       // 16.667ms
/** Accumulator cap: after a tab switch, drop the backlog instead of fast-forwarding */
const MAX_BACKLOG_MS = 200;

/** Callbacks that other renderers register to receive each new frame. */
export type RenderCallback = (frame: FrameResult) => void;
export type MuteCallback = () => void;

/**
 * Fixed-step driver: turns variable display frames into 60Hz engine ticks.
 * Each fixed step samples input once and calls controller.tick(input, 1).
 */
export class GameLoop {
  private accumulator = 0;
  private renderCallbacks: RenderCallback[] = [];
  private muteCallbacks: MuteCallback[] = [];
  private sampler = new InputSampler();
  private lastFrame: FrameResult | null = null;

  constructor(
    private readonly controller: GameController,
    private readonly sampleControls: () => RawControls = readControls,
  ) {}

  /** Register a callback called after every display frame that ran at least one tick. */
  onRender(cb: RenderCallback): void {
    this.renderCallbacks.push(cb);
  }

  onMuteToggle(cb: MuteCallback): void {
    this.muteCallbacks.push(cb);
  }

  /**
   * Main ticker callback. Called every animation frame by PixiJS Ticker.
   * deltaMS: real elapsed milliseconds since last frame.
   * @returns Number of engine ticks run
   */
  tick(deltaMS: number): number {
    this.accumulator = Math.min(this.accumulator + deltaMS, MAX_BACKLOG_MS);

    let steps = 0;
    while (this.accumulator >= FIXED_DT_MS) {
      const controls = this.sampler.sample(this.sampleControls());
      if (controls.muteToggled) {
        for (const cb of this.muteCallbacks) cb();
      }

      this.lastFrame = this.controller.tick(controls.input, 1);
      this.accumulator -= FIXED_DT_MS;
      steps++;
    }

    if (steps > 0 && this.lastFrame) {
      for (const cb of this.renderCallbacks) cb(this.lastFrame);
    }
    return steps;
  }

  get currentFrame(): FrameResult | null { return this.lastFrame; }
}
