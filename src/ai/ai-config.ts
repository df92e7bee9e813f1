/**
 * AI Configuration: observation scaling, reward weights and episode limits
 * for the headless environment. Engine-side only (no network).
 */

/** Observation normalization constants. */
export const OBS = {
  /** Rows ahead of the player beyond which an obstacle reads as "none" (1.0) */
  lookahead: 30,
  /** Speed factor that maps to 1.0 */
  maxSpeedFactor: 4,
} as const;

/** Action values beyond these thresholds count as a held key / a press. */
export const ACTION = {
  steerThreshold: 0.33,
  jumpThreshold: 0.5,
} as const;

export interface RewardConfig {
  /** Per score point gained */
  progress: number;
  /** Once, on the crash that ends the episode */
  crashPenalty: number;
  /** Per jump started */
  jumpCost: number;
}

export interface EpisodeConfig {
  maxSteps: number;
}

export interface AiConfig {
  weights: RewardConfig;
  episode: EpisodeConfig;
}

export const DEFAULT_AI_CONFIG = {
  weights: {
    progress: 1.0,
    crashPenalty: -10,
    jumpCost: -0.05,
  },
  episode: {
    maxSteps: 20_000,
  },
} as const satisfies AiConfig;
