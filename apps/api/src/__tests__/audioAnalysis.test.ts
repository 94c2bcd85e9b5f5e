import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { MediaProbe } from '@beatcut/engine';

let tmpDir: string;

vi.mock('../config', () => ({
  config: {
    workspaceDir: '',
    ffmpegBin: 'ffmpeg',
    ffprobeBin: 'ffprobe',
    port: 3001,
    host: '0.0.0.0',
    corsOrigin: 'http://localhost:3000',
    logLevel: 'silent',
    outputWidth: 1280,
    outputHeight: 720,
    outputFps: 30,
    musicVolume: 0.8,
    energySegmentCount: 8,
    trimConcurrency: 2,
    probeConcurrency: 4,
  },
}));

vi.mock('../services/ffmpegService', () => ({
  extractWav: vi.fn(),
  probeFile: vi.fn(),
}));

import { config } from '../config';
import { extractWav, probeFile } from '../services/ffmpegService';
import { createAudioAnalysis } from '../services/audioAnalysis';
import { buildWav, burstSamples } from './wav';

const extractWavMock = vi.mocked(extractWav);
const probeFileMock = vi.mocked(probeFile);

// 5s at 8kHz with a loud burst at every whole second from 1 to 4
const SONG = buildWav({ sampleRate: 8000, samples: burstSamples(8000, 5, [1, 2, 3, 4]) });

function probeWithDuration(duration: number): MediaProbe {
  return { duration, size: 100, streams: [{ codecType: 'audio' }] };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'beatcut-audio-'));
  config.workspaceDir = tmpDir;
  extractWavMock.mockReset();
  extractWavMock.mockImplementation(async (_input: string, output: string) => {
    fs.writeFileSync(output, SONG);
    return output;
  });
  probeFileMock.mockReset();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('createAudioAnalysis', () => {
  it('detects a rhythm point at every burst', async () => {
    const audio = createAudioAnalysis();
    expect(await audio.rhythmPoints('/m/song.mp3')).toEqual([0, 1, 2, 3, 4]);
  });

  it('computes energy segments over the whole song', async () => {
    const segments = await createAudioAnalysis().energySegments('/m/song.mp3', 5);

    expect(segments.map((s) => s.startTime)).toEqual([0, 1, 2, 3, 4]);
    expect(segments.map((s) => s.energy)).toEqual([0, 0.05, 0.05, 0.05, 0.05]);
    expect(segments.every((s) => s.duration === 1 && s.tempo === 0)).toBe(true);
  });

  it('decodes each file once and removes the WAV', async () => {
    const audio = createAudioAnalysis();
    await audio.rhythmPoints('/m/song.mp3');
    await audio.energySegments('/m/song.mp3', 4);

    expect(extractWavMock).toHaveBeenCalledTimes(1);
    expect(fs.readdirSync(path.join(tmpDir, 'analysis'))).toEqual([]);
  });

  it('does not cache a failed decode', async () => {
    extractWavMock.mockRejectedValueOnce(new Error('ffmpeg exited with code 1'));
    const audio = createAudioAnalysis();

    await expect(audio.rhythmPoints('/m/song.mp3')).rejects.toThrow('ffmpeg exited with code 1');
    expect(await audio.rhythmPoints('/m/song.mp3')).toEqual([0, 1, 2, 3, 4]);
    expect(extractWavMock).toHaveBeenCalledTimes(2);
  });

  it('reads the duration from the probe', async () => {
    probeFileMock.mockResolvedValue(probeWithDuration(12.25));
    expect(await createAudioAnalysis().duration('/m/song.mp3')).toBe(12.25);
  });

  it('rejects audio without a usable duration', async () => {
    probeFileMock.mockResolvedValue(probeWithDuration(Number.NaN));
    await expect(createAudioAnalysis().duration('/m/song.mp3')).rejects.toThrow(
      'Cannot determine duration of /m/song.mp3'
    );
  });
});
