/**
 * Distribution strategy registry.
 *
 * Each strategy declares which audio data it needs; the plan builder only asks
 * the AudioAnalysisService for that, so rhythm detection never runs for an
 * even or energy plan.
 *
 * To add a strategy: extend STRATEGY_NAMES in @beatcut/shared, write the
 * allocator in this directory and register it below.
 */

import type { ClipDescriptor, DistributedClip, StrategyName } from '@beatcut/shared';
import { isStrategyName } from '@beatcut/shared';
import type { AudioAnalysisService } from '../types';
import type { EngineLogger } from '../logger';
import type { RandomSource } from '../random';
import { distributeEven } from './even';
import { distributeByRhythm } from './rhythm';
import { distributeByEnergy } from './energy';

export interface StrategyContext {
  clips: readonly ClipDescriptor[];
  audioPath: string;
  targetDuration: number;
  minClipDuration: number;
  energySegmentCount: number;
  audio: AudioAnalysisService;
  random: RandomSource;
  logger: EngineLogger;
}

export interface StrategyDefinition {
  readonly name: StrategyName;
  readonly description: string;
  run(context: StrategyContext): Promise<DistributedClip[]>;
}

export const STRATEGY_REGISTRY: Record<StrategyName, StrategyDefinition> = {
  rhythm: {
    name: 'rhythm',
    description: 'Cut on detected onsets, at least minClipDuration apart',
    async run(ctx) {
      const points = await ctx.audio.rhythmPoints(ctx.audioPath);
      return distributeByRhythm(ctx.clips, points, {
        targetDuration: ctx.targetDuration,
        minClipDuration: ctx.minClipDuration,
        random: ctx.random,
        logger: ctx.logger,
      });
    },
  },
  energy: {
    name: 'energy',
    description: 'Match clip length to the loudness of equal audio segments',
    async run(ctx) {
      const segments = await ctx.audio.energySegments(ctx.audioPath, ctx.energySegmentCount);
      return distributeByEnergy(ctx.clips, segments);
    },
  },
  even: {
    name: 'even',
    description: 'Equal slots for every clip',
    async run(ctx) {
      return distributeEven(ctx.clips, ctx.targetDuration, {
        minClipDuration: ctx.minClipDuration,
        random: ctx.random,
      });
    },
  },
};

/** Unknown or missing names fall back to 'even'. */
export function resolveStrategyName(name: unknown, logger?: EngineLogger): StrategyName {
  if (isStrategyName(name)) return name;
  logger?.warn({ strategy: name }, "Unknown distribution strategy, using 'even'");
  return 'even';
}

export { distributeEven, distributeByRhythm, distributeByEnergy };
export { filterRhythmPoints } from './rhythm';
export { extendClipPool, totalDuration, placeClip, EPSILON } from './common';
export type { EvenOptions } from './even';
export type { RhythmOptions } from './rhythm';
