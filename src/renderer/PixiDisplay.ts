import { Container, Graphics } from 'pixi.js';
import type { DrawCommand } from '../engine/types';

/**
 * Paints the engine's draw list into a single Graphics object, in list order.
 * The whole road scene is rebuilt every frame; there is no retained geometry.
 */
export class PixiDisplay {
  readonly graphics = new Graphics();

  constructor(parent: Container) {
    parent.addChild(this.graphics);
  }

  /**
   * Replace the picture with `commands`. A null list (failed tick) leaves the
   * previous picture up.
   * @returns Whether anything was redrawn
   */
  draw(commands: readonly DrawCommand[] | null): boolean {
    if (!commands) return false;

    const g = this.graphics;
    g.clear();
    for (const cmd of commands) {
      if (cmd.shape === 'rect') {
        g.rect(cmd.x, cmd.y, cmd.width, cmd.height).fill({ color: cmd.color, alpha: cmd.alpha });
        continue;
      }
      g.poly([...cmd.points], true).fill({ color: cmd.color, alpha: cmd.alpha });
      if (cmd.outline) {
        g.stroke({ color: cmd.outline.color, width: cmd.outline.width });
      }
    }
    return true;
  }
}
