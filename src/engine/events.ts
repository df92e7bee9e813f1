/**
 * Discrete events the controller hands to collaborators (audio, HUD,
 * persistence, logging). Fire-and-forget: nothing a listener returns or
 * does feeds back into the run.
 */

import type { DifficultyName, GameOutcome } from './types';
import type { WarningKind } from './errors';
import type { GamePhase } from './GameController';

export type GameEvent =
  | { readonly type: 'game-started'; readonly difficulty: DifficultyName; readonly seed: number }
  | { readonly type: 'collision'; readonly obstacleId: number; readonly score: number }
  | { readonly type: 'score-milestone'; readonly level: number; readonly score: number }
  | { readonly type: 'jump' }
  | { readonly type: 'phase-changed'; readonly from: GamePhase; readonly to: GamePhase }
  | { readonly type: 'high-score'; readonly outcome: GameOutcome }
  | { readonly type: 'warning'; readonly kind: WarningKind; readonly message: string };

export type GameEventType = GameEvent['type'];

export type GameEventListener = (event: GameEvent) => void;
