import type { ClipDescriptor, DistributedClip, RhythmTimeline } from '@beatcut/shared';
import { defaultLogger, type EngineLogger } from '../logger';
import type { RandomSource } from '../random';
import { extendClipPool, placeClip } from './common';
import { distributeEven } from './even';

/** Below this much slack a clip is always cut from its start. */
const MIN_RANDOM_SLACK = 1.0;

/** Fewer surviving rhythm points than this cannot drive meaningful cuts. */
const MIN_RHYTHM_POINTS = 3;

export interface RhythmOptions {
  /** Timeline length; defaults to the last rhythm point */
  targetDuration?: number;
  /** Minimum spacing between cuts (default 2.0) */
  minClipDuration?: number;
  random?: RandomSource;
  logger?: EngineLogger;
}

/**
 * Greedy spacing filter: keep a point only if it lies at least `minSpacing`
 * after the last kept point. The first point is always kept.
 */
export function filterRhythmPoints(points: RhythmTimeline, minSpacing: number): number[] {
  if (points.length === 0) return [];
  const kept = [points[0]];
  for (let i = 1; i < points.length; i++) {
    if (points[i] - kept[kept.length - 1] >= minSpacing) kept.push(points[i]);
  }
  return kept;
}

/**
 * Cut on the beat: each pair of consecutive (filtered) rhythm points becomes
 * one output interval, filled round-robin from the clip pool.
 */
export function distributeByRhythm(
  clips: readonly ClipDescriptor[],
  rhythmPoints: RhythmTimeline,
  options: RhythmOptions = {}
): DistributedClip[] {
  const {
    minClipDuration = 2.0,
    random = Math.random,
    logger = defaultLogger,
  } = options;
  if (clips.length === 0 || rhythmPoints.length === 0) return [];

  const targetDuration = options.targetDuration ?? rhythmPoints[rhythmPoints.length - 1];
  const points = filterRhythmPoints(rhythmPoints, minClipDuration);

  if (points.length < MIN_RHYTHM_POINTS) {
    logger.warn(
      { rhythmPoints: rhythmPoints.length, kept: points.length, minClipDuration },
      'Too few rhythm points after spacing filter, falling back to even distribution'
    );
    return distributeEven(clips, targetDuration, { minClipDuration, random });
  }

  const pool = extendClipPool(clips, targetDuration, random);
  const distributed: DistributedClip[] = [];
  let next = 0;

  for (let i = 0; i < points.length - 1; i++) {
    const start = points[i];
    if (start >= targetDuration) break;

    const rawEnd = points[i + 1];
    const end = Math.min(rawEnd, targetDuration);
    const slot = end - start;

    if (slot >= minClipDuration) {
      const clip = pool[next % pool.length];
      next++;

      if (clip.durationSeconds > slot) {
        const slack = clip.durationSeconds - slot;
        const offset = slack > MIN_RANDOM_SLACK ? random() * slack : 0;
        distributed.push(placeClip(clip, offset, offset + slot, start));
      } else if (clip.durationSeconds > 0) {
        // Too short for the interval: use it whole, centred
        const padding = (slot - clip.durationSeconds) / 2;
        distributed.push(placeClip(clip, 0, clip.durationSeconds, start + padding));
      }
    }

    if (rawEnd >= targetDuration) break;
  }

  if (distributed.length === 0) {
    logger.warn(
      { intervals: points.length - 1, minClipDuration },
      'No rhythm interval was long enough, falling back to even distribution'
    );
    return distributeEven(clips, targetDuration, { minClipDuration, random });
  }

  return distributed;
}
