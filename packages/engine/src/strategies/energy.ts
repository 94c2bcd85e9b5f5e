import type { ClipDescriptor, DistributedClip, EnergySegment } from '@beatcut/shared';
import { placeClip } from './common';

/**
 * Pair clips with energy segments by rank: both lists are sorted ascending
 * (clips by duration, segments by energy) and zipped index for index, so
 * quieter segments tend to get shorter clips. Clips wrap around when segments
 * outnumber them. The result is ordered by segment start time.
 */
export function distributeByEnergy(
  clips: readonly ClipDescriptor[],
  segments: readonly EnergySegment[]
): DistributedClip[] {
  if (clips.length === 0 || segments.length === 0) return [];

  const sortedClips = [...clips].sort((a, b) => a.durationSeconds - b.durationSeconds);
  const sortedSegments = [...segments].sort((a, b) => a.energy - b.energy);

  const distributed = sortedSegments.map((segment, i) => {
    const clip = sortedClips[i % sortedClips.length];
    const used = Math.min(clip.durationSeconds, segment.duration);
    return placeClip(clip, 0, used, segment.startTime, {
      segmentEnergy: segment.energy,
      segmentTempo: segment.tempo,
    });
  });

  return distributed.sort((a, b) => a.outputStart - b.outputStart);
}
