import { Container, Graphics, Text } from 'pixi.js';
import { GamePhase, type FrameResult, type HudState } from '../engine/GameController';
import { DIFFICULTY_NAMES, FRAMES_PER_SECOND, REFERENCE_VIEWPORT } from '../engine/constants';

// ──────────────────────────────────────────────────────────
// Layout constants (logical screen coordinates)
// ──────────────────────────────────────────────────────────
const MARGIN = 16;
const PANEL_ALPHA = 0.7;
const { width: SCREEN_W, height: SCREEN_H } = REFERENCE_VIEWPORT;

/** "LEVEL N" banner stays up for one second after a level-up */
const BANNER_TICKS = FRAMES_PER_SECOND;
/** White flash on level-up: 150ms */
const FLASH_TICKS = Math.round(0.15 * FRAMES_PER_SECOND);
const FLASH_ALPHA = 0.6;

const TITLE = 'VANISHING POINT';

const HUD_TEXT_STYLE = {
  fontFamily: 'monospace',
  fontSize: 22,
  fill: '#ffffff',
} as const;

const HUD_TEXT_STYLE_SMALL = {
  fontFamily: 'monospace',
  fontSize: 15,
  fill: '#aaaaaa',
} as const;

const BANNER_STYLE = {
  fontFamily: 'monospace',
  fontSize: 64,
  fill: '#ffffff',
  fontWeight: 'bold',
  letterSpacing: 6,
} as const;

const TITLE_STYLE = {
  fontFamily: 'monospace',
  fontSize: 56,
  fill: '#b300ff',
  fontWeight: 'bold',
  letterSpacing: 8,
} as const;

/** Banner and flash visibility for a HUD state. */
export function levelUpEffects(hud: HudState): { banner: boolean; flash: boolean } {
  const since = hud.ticksSinceLevelUp;
  if (since === null) return { banner: false, flash: false };
  return { banner: since < BANNER_TICKS, flash: since < FLASH_TICKS };
}

/** Menu help line; the active difficulty is bracketed. */
export function difficultyLine(active: HudState['difficulty']): string {
  return DIFFICULTY_NAMES
    .map((name, i) => {
      const label = `${i + 1} ${name.toUpperCase()}`;
      return name === active ? `[${label}]` : label;
    })
    .join('   ');
}

// ──────────────────────────────────────────────────────────
// HudRenderer
// ──────────────────────────────────────────────────────────

export class HudRenderer {
  private scoreText: Text;
  private bestText: Text;
  private levelText: Text;
  private bannerText: Text;
  private flash: Graphics;
  private pausedText: Text;

  // Menu / game over overlay
  private overlay: Container;
  private overlayTitle: Text;
  private overlayBody: Text;
  private overlayHint: Text;

  private lastScoreDisplay = '';
  private lastBestDisplay = '';
  private lastLevelDisplay = '';
  private lastOverlayKey = '';

  constructor(private readonly container: Container) {
    this.scoreText = this.addText('', HUD_TEXT_STYLE, MARGIN, MARGIN);
    this.bestText = this.addText('', HUD_TEXT_STYLE, SCREEN_W - MARGIN, MARGIN);
    this.bestText.anchor.set(1, 0);
    this.levelText = this.addText('', HUD_TEXT_STYLE_SMALL, MARGIN, MARGIN + 30);

    this.flash = new Graphics();
    this.flash.rect(0, 0, SCREEN_W, SCREEN_H).fill({ color: 0xffffff, alpha: FLASH_ALPHA });
    this.flash.visible = false;
    this.container.addChild(this.flash);

    this.bannerText = this.addText('', BANNER_STYLE, SCREEN_W / 2, SCREEN_H * 0.4);
    this.bannerText.anchor.set(0.5);
    this.bannerText.visible = false;

    this.pausedText = this.addText('PAUSED', BANNER_STYLE, SCREEN_W / 2, SCREEN_H / 2);
    this.pausedText.anchor.set(0.5);
    this.pausedText.visible = false;

    this.overlay = new Container();
    const panel = new Graphics();
    panel.rect(0, 0, SCREEN_W, SCREEN_H).fill({ color: 0x000000, alpha: PANEL_ALPHA });
    this.overlay.addChild(panel);
    this.overlayTitle = this.addText(TITLE, TITLE_STYLE, SCREEN_W / 2, SCREEN_H * 0.3, this.overlay);
    this.overlayBody = this.addText('', HUD_TEXT_STYLE, SCREEN_W / 2, SCREEN_H * 0.5, this.overlay);
    this.overlayHint = this.addText('', HUD_TEXT_STYLE_SMALL, SCREEN_W / 2, SCREEN_H * 0.7, this.overlay);
    for (const t of [this.overlayTitle, this.overlayBody, this.overlayHint]) t.anchor.set(0.5);
    this.container.addChild(this.overlay);
  }

  render(frame: FrameResult, soundOn: boolean): void {
    const { hud, phase } = frame;

    // Score / best / level (top corners)
    const scoreDisplay = `SCORE ${hud.score}`;
    if (scoreDisplay !== this.lastScoreDisplay) {
      this.scoreText.text = scoreDisplay;
      this.lastScoreDisplay = scoreDisplay;
    }
    const bestDisplay = `BEST ${hud.highScore}`;
    if (bestDisplay !== this.lastBestDisplay) {
      this.bestText.text = bestDisplay;
      this.lastBestDisplay = bestDisplay;
    }
    const jump = hud.airborne ? 'AIR' : hud.jumpReady ? 'JUMP READY' : 'COOLDOWN';
    const levelDisplay = `LEVEL ${hud.level}  x${hud.speedFactor.toFixed(2)}  ${jump}  ${soundOn ? '' : 'MUTED'}`;
    if (levelDisplay !== this.lastLevelDisplay) {
      this.levelText.text = levelDisplay;
      this.lastLevelDisplay = levelDisplay;
    }

    // Level-up banner and flash, only while the run is live
    const effects = phase === GamePhase.Playing ? levelUpEffects(hud) : { banner: false, flash: false };
    this.bannerText.visible = effects.banner;
    if (effects.banner) this.bannerText.text = `LEVEL ${hud.level}`;
    this.flash.visible = effects.flash;

    this.pausedText.visible = phase === GamePhase.Paused;
    this.renderOverlay(phase, hud);
  }

  private renderOverlay(phase: GamePhase, hud: HudState): void {
    const visible = phase === GamePhase.Menu || phase === GamePhase.GameOver;
    this.overlay.visible = visible;
    if (!visible) return;

    const key = `${phase}|${hud.score}|${hud.highScore}|${hud.difficulty}|${hud.newHighScore}`;
    if (key === this.lastOverlayKey) return;
    this.lastOverlayKey = key;

    if (phase === GamePhase.Menu) {
      this.overlayTitle.text = TITLE;
      this.overlayBody.text = difficultyLine(hud.difficulty);
      this.overlayHint.text = 'ENTER start   ←/→ steer   SPACE jump   P pause   M sound';
    } else {
      this.overlayTitle.text = 'GAME OVER';
      this.overlayBody.text = hud.newHighScore ? `NEW HIGH SCORE ${hud.score}` : `SCORE ${hud.score}   BEST ${hud.highScore}`;
      this.overlayHint.text = 'ENTER for menu';
    }
  }

  private addText(
    text: string,
    style: typeof HUD_TEXT_STYLE | typeof HUD_TEXT_STYLE_SMALL | typeof BANNER_STYLE | typeof TITLE_STYLE,
    x: number,
    y: number,
    parent: Container = this.container,
  ): Text {
    const t = new Text({ text, style });
    t.x = x;
    t.y = y;
    parent.addChild(t);
    return t;
  }
}
