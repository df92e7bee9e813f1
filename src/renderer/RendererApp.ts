import { Application, Container } from 'pixi.js';
import { GameController } from '../engine/GameController';
import { REFERENCE_VIEWPORT } from '../engine/constants';
import { createLogger } from '../utils/log';
import { GameLoop } from './GameLoop';
import { initInputHandler } from './InputHandler';
import { HudRenderer } from './HudRenderer';
import { PixiDisplay } from './PixiDisplay';
import { SoundManager } from './SoundManager';
import { LocalStorageHighScoreStore } from './HighScoreStorage';

const log = createLogger('renderer');

/** Uniform scale and letterbox offset fitting the logical viewport into the window. */
export function fitViewport(screenW: number, screenH: number): { scale: number; x: number; y: number } {
  const scale = Math.min(screenW / REFERENCE_VIEWPORT.width, screenH / REFERENCE_VIEWPORT.height);
  return {
    scale,
    x: (screenW - REFERENCE_VIEWPORT.width * scale) / 2,
    y: (screenH - REFERENCE_VIEWPORT.height * scale) / 2,
  };
}

export class RendererApp {
  private app = new Application();
  /** Logical 1024x800 scene, scaled to the window */
  private scene = new Container();
  private sound = new SoundManager();

  async init(): Promise<void> {
    // Step 1: Init PixiJS Application (async in v8)
    await this.app.init({
      resizeTo: window,
      backgroundColor: 0x000000,
      antialias: true,
      autoDensity: true,
      resolution: window.devicePixelRatio || 1,
    });
    document.body.appendChild(this.app.canvas);
    this.app.stage.addChild(this.scene);

    // Step 2: Input
    initInputHandler(this.app.canvas);

    // Step 3: Engine
    const controller = new GameController({
      store: new LocalStorageHighScoreStore(),
      logger: createLogger('game'),
    });

    // Step 4: Layers: road scene below, HUD on top
    const display = new PixiDisplay(this.scene);
    const hudContainer = new Container();
    this.scene.addChild(hudContainer);
    const hud = new HudRenderer(hudContainer);

    // Step 5: Loop wiring
    const gameLoop = new GameLoop(controller);
    gameLoop.onRender((frame) => {
      display.draw(frame.commands);
      hud.render(frame, this.sound.enabled);
      this.sound.update(frame);
    });
    gameLoop.onMuteToggle(() => {
      const on = this.sound.toggle();
      log.info(`sound ${on ? 'on' : 'off'}`);
    });
    controller.onEvent((event) => {
      this.sound.handleEvent(event);
      if (event.type === 'warning') log.warn(`${event.kind}: ${event.message}`);
    });

    // Initialize audio on first keydown/click (browser autoplay policy)
    const initAudio = (): void => {
      this.sound.init();
      window.removeEventListener('keydown', initAudio);
      window.removeEventListener('pointerdown', initAudio);
    };
    window.addEventListener('keydown', initAudio);
    window.addEventListener('pointerdown', initAudio);

    // Step 6: Fullscreen toggle (F)
    window.addEventListener('keydown', (e: KeyboardEvent) => {
      if (e.code !== 'KeyF') return;
      e.preventDefault();
      const request = document.fullscreenElement
        ? document.exitFullscreen()
        : this.app.canvas.requestFullscreen();
      request.catch((err: unknown) => log.debug('fullscreen request rejected', { error: String(err) }));
    });

    // Step 7: Keep the logical viewport fitted to the window
    this.layout();
    this.app.renderer.on('resize', () => this.layout());

    this.app.ticker.add((ticker) => {
      gameLoop.tick(ticker.deltaMS);
    });
    log.info('renderer ready');
  }

  private layout(): void {
    const { scale, x, y } = fitViewport(this.app.screen.width, this.app.screen.height);
    this.scene.scale.set(scale);
    this.scene.position.set(x, y);
  }
}
