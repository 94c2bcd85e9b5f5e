import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { EnergySegment, RhythmTimeline } from '@beatcut/shared';
import type { AudioAnalysisService, EngineLogger } from '@beatcut/engine';
import * as ws from './workspace';
import { extractWav, probeFile } from './ffmpegService';
import { computeWaveform } from './waveform';
import { computeEnergySegments, detectOnsets, toRhythmTimeline, type Envelope } from './audioFeatures';

const BUCKETS_PER_SECOND = 100;

/**
 * Decode `audioPath` into the analysis directory, reduce it to an RMS
 * envelope and delete the WAV again.
 */
export async function loadEnvelope(audioPath: string): Promise<Envelope> {
  fs.mkdirSync(ws.getAnalysisDir(), { recursive: true });
  const wavPath = path.join(ws.getAnalysisDir(), `${uuidv4()}.wav`);
  try {
    await extractWav(audioPath, wavPath);
    const wf = computeWaveform(wavPath, BUCKETS_PER_SECOND);
    return { samples: wf.samples, bucketsPerSecond: wf.sampleRate, duration: wf.duration };
  } finally {
    fs.rmSync(wavPath, { force: true });
  }
}

/**
 * AudioAnalysisService over ffmpeg. The envelope of each file is computed
 * once per service instance; a failed analysis is not cached.
 */
export function createAudioAnalysis(logger?: EngineLogger): AudioAnalysisService {
  const envelopes = new Map<string, Promise<Envelope>>();

  const envelopeOf = (audioPath: string): Promise<Envelope> => {
    const cached = envelopes.get(audioPath);
    if (cached) return cached;
    const pending = loadEnvelope(audioPath).catch((e: unknown) => {
      envelopes.delete(audioPath);
      throw e;
    });
    envelopes.set(audioPath, pending);
    return pending;
  };

  return {
    async duration(audioPath: string): Promise<number> {
      const { duration } = await probeFile(audioPath);
      if (!Number.isFinite(duration) || duration <= 0) {
        throw new Error(`Cannot determine duration of ${audioPath}`);
      }
      return duration;
    },

    async rhythmPoints(audioPath: string): Promise<RhythmTimeline> {
      const onsets = detectOnsets(await envelopeOf(audioPath));
      const points = toRhythmTimeline(onsets);
      logger?.info({ audio: audioPath, onsets: onsets.length, points: points.length }, 'Rhythm points detected');
      return points;
    },

    async energySegments(audioPath: string, count: number): Promise<EnergySegment[]> {
      const envelope = await envelopeOf(audioPath);
      const segments = computeEnergySegments(envelope, detectOnsets(envelope), count);
      logger?.info({ audio: audioPath, segments: segments.length }, 'Energy segments computed');
      return segments;
    },
  };
}
