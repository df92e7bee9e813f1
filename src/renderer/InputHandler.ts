import type { DifficultyName, InputSnapshot } from '../engine/types';

/** Dead zone for analog stick: ignore tiny drift near center. */
const STICK_DEADZONE = 0.25;

/** Standard-mapping gamepad buttons */
const PAD_BUTTON_A = 0;
const PAD_BUTTON_START = 9;

const LEFT_KEYS = ['ArrowLeft', 'KeyA'];
const RIGHT_KEYS = ['ArrowRight', 'KeyD'];
const PAUSE_KEYS = ['KeyP', 'Escape'];
const CONFIRM_KEYS = ['Enter', 'NumpadEnter'];
const JUMP_KEYS = ['Space'];
const MUTE_KEYS = ['KeyM'];

const DIFFICULTY_KEYS: ReadonlyArray<readonly [string, DifficultyName]> = [
  ['Digit1', 'easy'], ['Numpad1', 'easy'],
  ['Digit2', 'normal'], ['Numpad2', 'normal'],
  ['Digit3', 'hard'], ['Numpad3', 'hard'],
];

/** Keys whose browser default (page scroll) is suppressed. */
const CAPTURED_KEYS = new Set(['ArrowLeft', 'ArrowRight', 'ArrowUp', 'ArrowDown', 'Space']);

/** One gamepad reading, already reduced to what the game uses. */
export interface GamepadSample {
  /** Left stick X, -1..1 */
  stickX: number;
  jumpDown: boolean;
  startDown: boolean;
}

/** Raw device state for one sample. */
export interface RawControls {
  /** Key codes currently held */
  held: ReadonlySet<string>;
  /** Key codes pressed (not auto-repeated) since the previous sample */
  pressed: ReadonlySet<string>;
  /** Which half of the screen a pointer is held on, 0 when none */
  pointerSide: -1 | 0 | 1;
  gamepad: GamepadSample | null;
}

export interface ControlFrame {
  input: InputSnapshot;
  /** Sound on/off requested this sample (renderer-only, not an engine input) */
  muteToggled: boolean;
}

/** Apply dead zone and remap remaining range to 0-1. */
export function applyDeadzone(value: number, deadzone: number): number {
  const abs = Math.abs(value);
  if (abs < deadzone) return 0;
  return Math.sign(value) * (abs - deadzone) / (1 - deadzone);
}

const anyOf = (codes: readonly string[], set: ReadonlySet<string>): boolean => codes.some((c) => set.has(c));

/**
 * Turns raw device state into engine input snapshots.
 *
 * Held controls (steering) are read as-is. One-shot controls (pause, confirm,
 * jump, difficulty) fire once per press: keyboard presses come in through
 * `pressed`, gamepad buttons are edge-detected here.
 */
export class InputSampler {
  private padJumpWasDown = false;
  private padStartWasDown = false;

  sample(raw: RawControls): ControlFrame {
    const pad = raw.gamepad;
    const stick = pad ? applyDeadzone(pad.stickX, STICK_DEADZONE) : 0;

    const padJump = pad !== null && pad.jumpDown && !this.padJumpWasDown;
    const padStart = pad !== null && pad.startDown && !this.padStartWasDown;
    this.padJumpWasDown = pad?.jumpDown ?? false;
    this.padStartWasDown = pad?.startDown ?? false;

    let difficulty: DifficultyName | undefined;
    for (const [code, name] of DIFFICULTY_KEYS) {
      if (raw.pressed.has(code)) difficulty = name;
    }

    const input: InputSnapshot = {
      leftHeld: anyOf(LEFT_KEYS, raw.held) || raw.pointerSide < 0 || stick < 0,
      rightHeld: anyOf(RIGHT_KEYS, raw.held) || raw.pointerSide > 0 || stick > 0,
      pauseToggled: anyOf(PAUSE_KEYS, raw.pressed) || padStart,
      confirmPressed: anyOf(CONFIRM_KEYS, raw.pressed) || padStart,
      jumpPressed: anyOf(JUMP_KEYS, raw.pressed) || padJump,
    };
    if (difficulty) input.difficulty = difficulty;

    return { input, muteToggled: anyOf(MUTE_KEYS, raw.pressed) };
  }
}

// ──────────────────────────────────────────────────────────
// Browser listeners
// ──────────────────────────────────────────────────────────

/** Tracks which keys are currently held down. */
const keys = new Set<string>();
/** Keys pressed since the last drain. */
const pressed = new Set<string>();
let pointerSide: -1 | 0 | 1 = 0;

/** Initialization flag: attach listeners only once. */
let initialized = false;

export function initInputHandler(target: HTMLElement): void {
  if (initialized) return;
  initialized = true;

  window.addEventListener('keydown', (e: KeyboardEvent) => {
    keys.add(e.code);
    if (!e.repeat) pressed.add(e.code);
    if (CAPTURED_KEYS.has(e.code)) e.preventDefault();
  });

  window.addEventListener('keyup', (e: KeyboardEvent) => {
    keys.delete(e.code);
  });

  // Clear held keys when focus leaves, otherwise a key released elsewhere sticks
  window.addEventListener('blur', () => {
    keys.clear();
    pointerSide = 0;
  });

  const updatePointer = (e: PointerEvent): void => {
    if (e.buttons === 0) {
      pointerSide = 0;
      return;
    }
    const rect = target.getBoundingClientRect();
    pointerSide = e.clientX - rect.left < rect.width / 2 ? -1 : 1;
  };
  target.addEventListener('pointerdown', updatePointer);
  target.addEventListener('pointermove', updatePointer);
  target.addEventListener('pointerup', () => { pointerSide = 0; });
  target.addEventListener('pointercancel', () => { pointerSide = 0; });
}

/** Poll the first connected gamepad, or null. */
function readGamepad(): GamepadSample | null {
  if (typeof navigator.getGamepads !== 'function') return null;
  for (const gp of navigator.getGamepads()) {
    if (!gp || !gp.connected) continue;
    return {
      stickX: gp.axes[0] ?? 0,
      jumpDown: gp.buttons[PAD_BUTTON_A]?.pressed ?? false,
      startDown: gp.buttons[PAD_BUTTON_START]?.pressed ?? false,
    };
  }
  return null;
}

/** Snapshot the live devices and clear the pressed-key latch. */
export function readControls(): RawControls {
  const raw: RawControls = {
    held: new Set(keys),
    pressed: new Set(pressed),
    pointerSide,
    gamepad: readGamepad(),
  };
  pressed.clear();
  return raw;
}
