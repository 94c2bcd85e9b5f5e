import type { ClipDescriptor, DistributedClip } from '@beatcut/shared';
import { sample, type RandomSource } from '../random';
import { EPSILON, extendClipPool, placeClip } from './common';

export interface EvenOptions {
  /** Shortest slot a clip may get; caps how many clips are used (default 1.0) */
  minClipDuration?: number;
  random?: RandomSource;
}

/**
 * Give every clip an equal slot of the target and lay them back to back,
 * each clip used from its start.
 */
export function distributeEven(
  clips: readonly ClipDescriptor[],
  targetDuration: number,
  options: EvenOptions = {}
): DistributedClip[] {
  const { minClipDuration = 1.0, random = Math.random } = options;
  if (clips.length === 0 || !(targetDuration > 0)) return [];

  let pool = extendClipPool(clips, targetDuration, random);

  if (minClipDuration > 0 && pool.length > targetDuration / minClipDuration) {
    const maxCount = Math.max(1, Math.floor(targetDuration / minClipDuration));
    pool = sample(pool, maxCount, random);
  }

  const slotDuration = targetDuration / pool.length;
  const distributed: DistributedClip[] = [];
  let cursor = 0;

  for (const clip of pool) {
    const remaining = targetDuration - cursor;
    if (remaining <= EPSILON) break;

    const used = Math.min(clip.durationSeconds, slotDuration, remaining);
    if (used <= 0) continue;

    distributed.push(placeClip(clip, 0, used, cursor));
    cursor += used;
  }

  return distributed;
}
