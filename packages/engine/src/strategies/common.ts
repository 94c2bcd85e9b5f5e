import type { ClipDescriptor, DistributedClip } from '@beatcut/shared';
import { shuffle, type RandomSource } from '../random';

/** Tolerance for floating point timeline arithmetic (seconds). */
export const EPSILON = 1e-6;

export function totalDuration(clips: readonly ClipDescriptor[]): number {
  return clips.reduce((sum, c) => sum + c.durationSeconds, 0);
}

/**
 * Repeat the candidate list until it can fill the target. Each repetition is
 * freshly shuffled so the output does not loop the same sequence.
 * The returned pool's total duration strictly exceeds `targetDuration` unless
 * the candidates were already long enough or have no duration at all.
 */
export function extendClipPool<T extends ClipDescriptor>(
  clips: readonly T[],
  targetDuration: number,
  random: RandomSource = Math.random
): T[] {
  const unit = totalDuration(clips);
  if (unit >= targetDuration || unit <= 0) return [...clips];

  const pool = [...clips];
  let poolDuration = unit;
  while (poolDuration <= targetDuration) {
    pool.push(...shuffle(clips, random));
    poolDuration += unit;
  }
  return pool;
}

type SegmentInfo = Pick<DistributedClip, 'segmentEnergy' | 'segmentTempo'>;

/** Map [sourceStart, sourceEnd] of a clip onto the timeline at outputStart. */
export function placeClip(
  clip: ClipDescriptor,
  sourceStart: number,
  sourceEnd: number,
  outputStart: number,
  segment?: SegmentInfo
): DistributedClip {
  return Object.freeze({
    ...clip,
    ...segment,
    sourceStart,
    sourceEnd,
    outputStart,
    outputEnd: outputStart + (sourceEnd - sourceStart),
  });
}
