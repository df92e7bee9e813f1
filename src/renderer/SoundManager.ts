/**
 * SoundManager -- All game audio via Web Audio API synthesis.
 *
 * Engine drone plus one-shot cues driven by game events:
 *   start       -- rising two-note beep
 *   jump        -- short upward sine sweep
 *   level-up    -- chime with octave harmony
 *   crash       -- noise burst over a falling thud
 *   high-score  -- three-note arpeggio
 *
 * Gain routing: sources -> category gains (engine/sfx) -> master -> destination
 * AudioContext created lazily on first user gesture (browser autoplay policy).
 */

import type { GameEvent } from '../engine/events';
import { GamePhase, type FrameResult } from '../engine/GameController';
import { createLogger } from '../utils/log';

const log = createLogger('audio');

// -----------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------

/** Engine drone frequency at speed factor 1, and its ceiling (Hz) */
const ENGINE_FREQ_BASE = 90;
const ENGINE_FREQ_MAX = 320;
const ENGINE_VOLUME = 0.12;

/** C5 / E5 / G5 */
const NOTE_C5 = 523.25;
const NOTE_E5 = 659.25;
const NOTE_G5 = 784;

const CHIME_DURATION = 0.9;
const CRASH_DURATION = 0.5;

export type SoundCue = 'start' | 'jump' | 'level-up' | 'crash' | 'high-score';

/** Which cue, if any, an event plays. */
export function cueForEvent(event: GameEvent): SoundCue | null {
  switch (event.type) {
    case 'game-started': return 'start';
    case 'jump': return 'jump';
    case 'score-milestone': return 'level-up';
    case 'collision': return 'crash';
    case 'high-score': return 'high-score';
    case 'phase-changed':
    case 'warning':
      return null;
  }
}

/** Drone pitch for a speed factor; grows with speed, capped. */
export function engineFrequency(speedFactor: number): number {
  return Math.min(ENGINE_FREQ_MAX, ENGINE_FREQ_BASE * speedFactor);
}

// -----------------------------------------------------------------
// SoundManager
// -----------------------------------------------------------------

export class SoundManager {
  private ctx: AudioContext | null = null;

  private masterGain: GainNode | null = null;
  private engineGain: GainNode | null = null;
  private sfxGain: GainNode | null = null;

  private engineOsc: OscillatorNode | null = null;
  private noiseBuffer: AudioBuffer | null = null;

  private _enabled = true;
  private initialized = false;
  // Guard AudioContext.resume() so it is not requested every frame
  private resumeRequested = false;

  // --- Initialization ------------------------------------------------

  /**
   * Initialize the audio context. Must be called from a user gesture
   * (click/keydown) to satisfy browser autoplay policy.
   */
  init(): void {
    if (this.initialized) return;

    let ctx: AudioContext;
    try {
      ctx = new AudioContext();
    } catch (err) {
      log.warn('Web Audio unavailable, playing without sound', { error: String(err) });
      return;
    }
    this.ctx = ctx;

    this.masterGain = ctx.createGain();
    this.masterGain.gain.value = this._enabled ? 0.5 : 0;
    this.masterGain.connect(ctx.destination);

    this.engineGain = ctx.createGain();
    this.engineGain.gain.value = 0;
    this.engineGain.connect(this.masterGain);

    this.sfxGain = ctx.createGain();
    this.sfxGain.gain.value = 0.8;
    this.sfxGain.connect(this.masterGain);

    this.noiseBuffer = this.createNoiseBuffer(ctx, 1);

    this.engineOsc = ctx.createOscillator();
    this.engineOsc.type = 'sawtooth';
    this.engineOsc.frequency.value = ENGINE_FREQ_BASE;
    this.engineOsc.connect(this.engineGain);
    this.engineOsc.start();

    this.initialized = true;
  }

  get enabled(): boolean { return this._enabled; }

  /** Sound on/off (M key). */
  toggle(): boolean {
    this._enabled = !this._enabled;
    if (this.ctx && this.masterGain) {
      this.masterGain.gain.setTargetAtTime(this._enabled ? 0.5 : 0, this.ctx.currentTime, 0.02);
    }
    return this._enabled;
  }

  // --- Per-frame update & events -------------------------------------

  /** Engine drone follows the run; silent outside PLAYING. */
  update(frame: FrameResult): void {
    const ctx = this.ctx;
    if (!ctx || !this.engineOsc || !this.engineGain) return;

    if (ctx.state === 'suspended' && !this.resumeRequested) {
      this.resumeRequested = true;
      ctx.resume()
        .then(() => { this.resumeRequested = false; })
        .catch((err: unknown) => {
          this.resumeRequested = false;
          log.debug('AudioContext resume rejected', { error: String(err) });
        });
    }

    const t = ctx.currentTime;
    const active = frame.phase === GamePhase.Playing;
    this.engineOsc.frequency.setTargetAtTime(engineFrequency(frame.hud.speedFactor), t, 0.1);
    this.engineGain.gain.setTargetAtTime(active ? ENGINE_VOLUME : 0, t, 0.08);
  }

  handleEvent(event: GameEvent): void {
    const cue = cueForEvent(event);
    if (cue === null || !this.ctx || !this.sfxGain) return;

    switch (cue) {
      case 'start':
        this.playTone(NOTE_C5, 0.1, 0.35, 0);
        this.playTone(NOTE_G5, 0.16, 0.4, 0.1);
        break;
      case 'jump':
        this.playSweep(300, 900, 0.18, 0.3);
        break;
      case 'level-up':
        this.playTone(NOTE_E5, CHIME_DURATION, 0.35, 0);
        this.playTone(NOTE_E5 * 2, CHIME_DURATION * 0.8, 0.15, 0.06);
        break;
      case 'crash':
        this.playCrash();
        break;
      case 'high-score':
        this.playTone(NOTE_C5, 0.2, 0.35, 0);
        this.playTone(NOTE_E5, 0.2, 0.35, 0.15);
        this.playTone(NOTE_G5, 0.5, 0.4, 0.3);
        break;
    }
  }

  /** Tear down all audio nodes and close the context. */
  destroy(): void {
    this.engineOsc?.stop();
    const ctx = this.ctx;
    this.ctx = null;
    this.initialized = false;
    ctx?.close().catch((err: unknown) => log.debug('AudioContext close failed', { error: String(err) }));
  }

  // --- Synthesis -----------------------------------------------------

  private playTone(freq: number, duration: number, volume: number, delay: number): void {
    if (!this.ctx || !this.sfxGain) return;

    const t = this.ctx.currentTime + delay;
    const osc = this.ctx.createOscillator();
    osc.type = 'sine';
    osc.frequency.value = freq;

    const gain = this.ctx.createGain();
    gain.gain.setValueAtTime(0, t);
    gain.gain.linearRampToValueAtTime(volume, t + 0.02);
    gain.gain.exponentialRampToValueAtTime(0.00001, t + duration);

    osc.connect(gain);
    gain.connect(this.sfxGain);
    osc.start(t);
    osc.stop(t + duration + 0.01);
    osc.onended = () => { osc.disconnect(); gain.disconnect(); };
  }

  private playSweep(from: number, to: number, duration: number, volume: number): void {
    if (!this.ctx || !this.sfxGain) return;

    const t = this.ctx.currentTime;
    const osc = this.ctx.createOscillator();
    osc.type = 'triangle';
    osc.frequency.setValueAtTime(from, t);
    osc.frequency.exponentialRampToValueAtTime(to, t + duration);

    const gain = this.ctx.createGain();
    gain.gain.setValueAtTime(0, t);
    gain.gain.linearRampToValueAtTime(volume, t + 0.01);
    gain.gain.exponentialRampToValueAtTime(0.00001, t + duration);

    osc.connect(gain);
    gain.connect(this.sfxGain);
    osc.start(t);
    osc.stop(t + duration + 0.01);
    osc.onended = () => { osc.disconnect(); gain.disconnect(); };
  }

  private playCrash(): void {
    if (!this.ctx || !this.sfxGain || !this.noiseBuffer) return;

    const t = this.ctx.currentTime;

    // Noise burst through a closing lowpass
    const noise = this.ctx.createBufferSource();
    noise.buffer = this.noiseBuffer;
    const filter = this.ctx.createBiquadFilter();
    filter.type = 'lowpass';
    filter.frequency.setValueAtTime(4000, t);
    filter.frequency.exponentialRampToValueAtTime(200, t + CRASH_DURATION);
    const noiseGain = this.ctx.createGain();
    noiseGain.gain.setValueAtTime(0.5, t);
    noiseGain.gain.exponentialRampToValueAtTime(0.00001, t + CRASH_DURATION);

    noise.connect(filter);
    filter.connect(noiseGain);
    noiseGain.connect(this.sfxGain);
    noise.start(t);
    noise.stop(t + CRASH_DURATION + 0.01);
    noise.onended = () => { noise.disconnect(); filter.disconnect(); noiseGain.disconnect(); };

    this.playSweep(180, 40, CRASH_DURATION, 0.5);
  }

  private createNoiseBuffer(ctx: AudioContext, durationSec: number): AudioBuffer {
    const length = ctx.sampleRate * durationSec;
    const buffer = ctx.createBuffer(1, length, ctx.sampleRate);
    const data = buffer.getChannelData(0);
    // Cosmetic audio, determinism irrelevant
    for (let i = 0; i < length; i++) {
      data[i] = Math.random() * 2 - 1;
    }
    return buffer;
  }
}
