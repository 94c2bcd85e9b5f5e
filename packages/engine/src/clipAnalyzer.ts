import type { ClipDescriptor } from '@beatcut/shared';
import type { AnalyzeDeps, MediaProbe } from './types';
import { defaultLogger } from './logger';
import { attempt, err, ok, partition, type Result } from './result';
import { mapWithConcurrency } from './concurrency';

export const DEFAULT_PROBE_CONCURRENCY = 4;

export function describeClip(index: number, sourcePath: string, probe: MediaProbe): Result<ClipDescriptor, Error> {
  if (!Number.isFinite(probe.duration) || probe.duration < 0) {
    return err(new Error(`Invalid duration: ${probe.duration}`));
  }
  const video = probe.streams.find((s) => s.codecType === 'video');
  return ok(Object.freeze({
    index,
    sourcePath,
    durationSeconds: probe.duration,
    width: video?.width ?? 0,
    height: video?.height ?? 0,
    fps: video?.fps ?? 0,
    hasAudio: probe.streams.some((s) => s.codecType === 'audio'),
  }));
}

/**
 * Probe every clip reference, at most `probeConcurrency` at a time. Clips
 * that cannot be probed are logged and left out; the returned list keeps
 * input order and may be empty.
 */
export async function analyzeClips(
  clipRefs: readonly string[],
  deps: AnalyzeDeps
): Promise<ClipDescriptor[]> {
  const logger = deps.logger ?? defaultLogger;

  const results = await mapWithConcurrency(
    clipRefs,
    deps.probeConcurrency ?? DEFAULT_PROBE_CONCURRENCY,
    async (sourcePath, index) => {
      const probed = await attempt(() => deps.media.probe(sourcePath));
      const described: Result<ClipDescriptor, Error> = probed.ok ? describeClip(index, sourcePath, probed.value) : probed;
      if (!described.ok) {
        logger.warn({ clip: sourcePath, index, err: described.error.message }, 'Skipping clip that failed analysis');
      }
      return described;
    }
  );

  const { values } = partition(results);
  logger.info({ total: clipRefs.length, valid: values.length }, 'Clip analysis complete');
  return values;
}
