import type { ClipDescriptor, DistributedClip, EditPlan, StrategyName } from '@beatcut/shared';
import type { PlanDeps } from './types';
import { analyzeClips } from './clipAnalyzer';
import { NoValidClipsError } from './errors';
import { defaultLogger } from './logger';
import { STRATEGY_REGISTRY, resolveStrategyName, distributeEven, totalDuration } from './strategies';

export const DEFAULT_ENERGY_SEGMENT_COUNT = 8;

function freezePlan(plan: {
  clips: ClipDescriptor[];
  audioPath: string | null;
  audioDuration: number;
  strategy: StrategyName;
  distributedClips: DistributedClip[];
}): EditPlan {
  return Object.freeze({
    ...plan,
    clips: Object.freeze(plan.clips.map((c) => Object.freeze(c))),
    distributedClips: Object.freeze(plan.distributedClips.map((c) => Object.freeze(c))),
  });
}

/**
 * Analyse the clips, measure the music and lay the clips out with the chosen
 * strategy. Throws NoValidClipsError before any audio work when no clip
 * survives analysis.
 */
export async function buildEditPlan(
  clipRefs: readonly string[],
  audioRef: string,
  strategy: StrategyName | string,
  minClipDuration: number,
  deps: PlanDeps
): Promise<EditPlan> {
  const logger = deps.logger ?? defaultLogger;

  const clips = await analyzeClips(clipRefs, deps);
  if (clips.length === 0) throw new NoValidClipsError(clipRefs.length);

  const strategyName = resolveStrategyName(strategy, logger);
  const targetDuration = await deps.audio.duration(audioRef);

  const distributedClips = await STRATEGY_REGISTRY[strategyName].run({
    clips,
    audioPath: audioRef,
    targetDuration,
    minClipDuration,
    energySegmentCount: deps.energySegmentCount ?? DEFAULT_ENERGY_SEGMENT_COUNT,
    audio: deps.audio,
    random: deps.random ?? Math.random,
    logger,
  });

  logger.info(
    { strategy: strategyName, clips: clips.length, distributed: distributedClips.length, targetDuration },
    'Edit plan built'
  );

  return freezePlan({ clips, audioPath: audioRef, audioDuration: targetDuration, strategy: strategyName, distributedClips });
}

export interface TargetedPlanOptions {
  /** Desired output length in seconds */
  targetDuration: number;
  /** Optional music; the plan is capped to its length */
  audioRef?: string;
  minClipDuration?: number;
}

/**
 * Even layout against a requested length instead of the music's length.
 * Without audio the plan is capped to the total clip material and carries
 * `audioPath: null`.
 */
export async function buildTargetedEditPlan(
  clipRefs: readonly string[],
  options: TargetedPlanOptions,
  deps: PlanDeps
): Promise<EditPlan> {
  const logger = deps.logger ?? defaultLogger;
  const { targetDuration, audioRef, minClipDuration = 1.0 } = options;

  const clips = await analyzeClips(clipRefs, deps);
  if (clips.length === 0) throw new NoValidClipsError(clipRefs.length);

  const cap = audioRef !== undefined
    ? await deps.audio.duration(audioRef)
    : totalDuration(clips);
  const effectiveDuration = Math.min(targetDuration, cap);

  const distributedClips = distributeEven(clips, effectiveDuration, {
    minClipDuration,
    random: deps.random ?? Math.random,
  });

  logger.info(
    { clips: clips.length, distributed: distributedClips.length, targetDuration, effectiveDuration },
    'Targeted edit plan built'
  );

  return freezePlan({
    clips,
    audioPath: audioRef ?? null,
    audioDuration: effectiveDuration,
    strategy: 'even',
    distributedClips,
  });
}
