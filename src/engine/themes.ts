/**
 * Colour themes, one per level: the active theme is level mod 4.
 * Road colours step through grey, amber, mint and cyan as the run goes on.
 */

import type { Theme } from './types';
import { THEME_COUNT } from './constants';

export const THEMES: readonly Theme[] = [
  {
    name: 'graphite',
    sky: 0x05050f,
    ground: 0x101018,
    road: 0xaaaaaa,
    roadAlt: 0x8e8e8e,
    rumble: 0xffffff,
    rumbleAlt: 0x444444,
    block: 0xff2222,
    blockFace: 0xaa0000,
    hazard: 0xff8800,
    player: 0xb300ff,
    playerOutline: 0xffffff,
  },
  {
    name: 'amber',
    sky: 0x120800,
    ground: 0x1c1204,
    road: 0xffcc00,
    roadAlt: 0xd9a900,
    rumble: 0xffffff,
    rumbleAlt: 0x7a4d00,
    block: 0xff2222,
    blockFace: 0xaa0000,
    hazard: 0xff00aa,
    player: 0xb300ff,
    playerOutline: 0xffffff,
  },
  {
    name: 'mint',
    sky: 0x00100a,
    ground: 0x04180f,
    road: 0x00ff99,
    roadAlt: 0x00cc7a,
    rumble: 0xffffff,
    rumbleAlt: 0x006640,
    block: 0xff2222,
    blockFace: 0xaa0000,
    hazard: 0xff8800,
    player: 0xb300ff,
    playerOutline: 0xffffff,
  },
  {
    name: 'cyan',
    sky: 0x000a14,
    ground: 0x04121c,
    road: 0x00ccff,
    roadAlt: 0x00a3cc,
    rumble: 0xffffff,
    rumbleAlt: 0x005c73,
    block: 0xff2222,
    blockFace: 0xaa0000,
    hazard: 0xff8800,
    player: 0xb300ff,
    playerOutline: 0xffffff,
  },
];

/** Theme for a theme index or level; wraps modulo the theme count. */
export function themeFor(index: number): Theme {
  const wrapped = ((Math.floor(index) % THEME_COUNT) + THEME_COUNT) % THEME_COUNT;
  return THEMES[wrapped];
}
