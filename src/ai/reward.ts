/**
 * Reward Computation: per-tick reward with per-component breakdown.
 * Pure: everything it needs comes from the step result.
 */

import type { RunStepResult } from '../engine/world';
import type { RewardConfig } from './ai-config';

export interface RewardBreakdown {
  progress: number;
  crash: number;
  jump: number;
  total: number;
}

export function computeReward(step: RunStepResult, config: RewardConfig): RewardBreakdown {
  const progress = step.scoreGained * config.progress;
  const crash = step.verdict.kind === 'hit' ? config.crashPenalty : 0;
  const jump = step.jumped ? config.jumpCost : 0;
  return { progress, crash, jump, total: progress + crash + jump };
}
