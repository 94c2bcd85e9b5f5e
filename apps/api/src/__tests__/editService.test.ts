import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

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

import { config } from '../config';
import * as ws from '../services/workspace';
import * as jq from '../services/jobQueue';
import { runAutoEdit, runSmartEdit } from '../services/editService';
import { fakeServices } from './fakes';

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'beatcut-edit-'));
  config.workspaceDir = tmpDir;
  ws.ensureWorkspace();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('runAutoEdit', () => {
  it('renders into the outputs directory and logs each stage', async () => {
    const job = jq.createJob('autoEdit');
    const outcome = await runAutoEdit(
      job.id,
      {
        clipPaths: ['a.mp4', 'b.mp4'],
        audioPath: 'song.mp3',
        strategy: 'even',
        transitionType: null,
        transitionDuration: 0.5,
        minClipDuration: 2,
      },
      fakeServices(),
      logger
    );

    expect(outcome.outputPath).toBe(`outputs/${job.id}.mp4`);
    expect(fs.readFileSync(path.join(tmpDir, outcome.outputPath), 'utf8')).toBe('a.mp4 0-3\nb.mp4 0-3\nsong.mp3 6\n');
    expect(outcome.result).toMatchObject({ duration: 3, clipCount: 2, strategy: 'even', transitionType: null });
    expect(fs.readdirSync(ws.getScratchDir())).toEqual([]);
    expect(ws.readJobLog(job.id)).toEqual([
      '[analyze] 2 clips, music song.mp3',
      '[plan] strategy=even clips=2 duration=6.00s',
      '[trim] 30%',
      '[fold] 85%',
      '[mux] 95%',
      '[validate] 100%',
    ]);
    expect(jq.getJob(job.id)?.progress).toBe(100);
  });

  it('applies the requested transition', async () => {
    const job = jq.createJob('autoEdit');
    const svc = fakeServices();
    await runAutoEdit(
      job.id,
      {
        clipPaths: ['a.mp4', 'b.mp4'],
        audioPath: 'song.mp3',
        strategy: 'even',
        transitionType: 'wipe',
        transitionDuration: 0.5,
        minClipDuration: 2,
      },
      svc,
      logger
    );

    expect(svc.media.calls).toContain('transition wipe');
  });

  it('rejects media references that escape the media directory', async () => {
    const job = jq.createJob('autoEdit');
    await expect(
      runAutoEdit(
        job.id,
        {
          clipPaths: ['../jobs/a.mp4'],
          audioPath: 'song.mp3',
          strategy: 'rhythm',
          transitionType: null,
          transitionDuration: 0,
          minClipDuration: 2,
        },
        fakeServices(),
        logger
      )
    ).rejects.toThrow('Path traversal detected');
  });
});

describe('runSmartEdit', () => {
  it('renders without music when no audio is given', async () => {
    const job = jq.createJob('smartEdit');
    const svc = fakeServices();
    const outcome = await runSmartEdit(
      job.id,
      { clipPaths: ['a.mp4', 'b.mp4'], targetDuration: 30, audioPath: null, transitionType: null, transitionDuration: 0 },
      svc,
      logger
    );

    expect(fs.readFileSync(path.join(tmpDir, outcome.outputPath), 'utf8')).toBe('a.mp4 0-6\nb.mp4 0-6\n');
    expect(svc.media.calls).not.toContain('mux');
    expect(svc.audio.duration).not.toHaveBeenCalled();
  });

  it('caps the edit to the music length', async () => {
    const job = jq.createJob('smartEdit');
    const outcome = await runSmartEdit(
      job.id,
      { clipPaths: ['a.mp4', 'b.mp4'], targetDuration: 30, audioPath: 'song.mp3', transitionType: null, transitionDuration: 0 },
      fakeServices(8),
      logger
    );

    expect(fs.readFileSync(path.join(tmpDir, outcome.outputPath), 'utf8')).toBe('a.mp4 0-4\nb.mp4 0-4\nsong.mp3 8\n');
  });
});
