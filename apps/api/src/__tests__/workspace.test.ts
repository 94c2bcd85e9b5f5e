import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Job } from '@beatcut/shared';

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

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'beatcut-ws-'));
  config.workspaceDir = tmpDir;
  ws.ensureWorkspace();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeJob(id: string, status: Job['status'] = 'QUEUED'): Job {
  const now = new Date().toISOString();
  return {
    id,
    type: 'autoEdit',
    status,
    progress: 0,
    createdAt: now,
    updatedAt: now,
  };
}

// ─── Layout ──────────────────────────────────────────────────────────────────

describe('ensureWorkspace', () => {
  it('creates every workspace directory', () => {
    expect(fs.readdirSync(tmpDir).sort()).toEqual(['analysis', 'jobs', 'media', 'outputs', 'scratch']);
  });
});

// ─── safeResolve ─────────────────────────────────────────────────────────────

describe('safeResolve', () => {
  it('allows paths within workspace', () => {
    expect(ws.safeResolve('outputs/a.mp4')).toBe(path.join(tmpDir, 'outputs', 'a.mp4'));
  });

  it('throws on path traversal', () => {
    expect(() => ws.safeResolve('../../../etc/passwd')).toThrow('Path traversal detected');
    expect(() => ws.safeResolve('../../secret')).toThrow('Path traversal detected');
  });

  it('resolves against a custom base', () => {
    expect(ws.safeResolve('x.mp4', ws.getMediaDir())).toBe(path.join(tmpDir, 'media', 'x.mp4'));
    expect(() => ws.safeResolve('../jobs/x', ws.getMediaDir())).toThrow('Path traversal detected');
  });
});

describe('resolveMediaPath', () => {
  it('resolves relative references inside the media directory', () => {
    expect(ws.resolveMediaPath('clips/a.mp4')).toBe(path.join(tmpDir, 'media', 'clips', 'a.mp4'));
  });

  it('keeps absolute paths', () => {
    expect(ws.resolveMediaPath('/data/clips/../a.mp4')).toBe(path.normalize('/data/a.mp4'));
  });

  it('rejects relative references that escape the media directory', () => {
    expect(() => ws.resolveMediaPath('../outputs/x.mp4')).toThrow('Path traversal detected');
  });
});

describe('resolveOutputPath', () => {
  it('resolves files inside outputs/', () => {
    expect(ws.resolveOutputPath('outputs/j1.mp4')).toBe(path.join(tmpDir, 'outputs', 'j1.mp4'));
  });

  it('refuses workspace files outside outputs/', () => {
    expect(() => ws.resolveOutputPath('jobs/j1/job.json')).toThrow('Not an output file: jobs/j1/job.json');
    expect(() => ws.resolveOutputPath('../etc/passwd')).toThrow('Path traversal detected');
  });
});

describe('toWorkspaceRelative', () => {
  it('returns a forward-slash path relative to the workspace', () => {
    expect(ws.toWorkspaceRelative(path.join(tmpDir, 'outputs', 'j1.mp4'))).toBe('outputs/j1.mp4');
  });
});

// ─── Jobs ────────────────────────────────────────────────────────────────────

describe('Jobs', () => {
  it('readJob returns null for missing job', () => {
    expect(ws.readJob('nonexistent')).toBeNull();
  });

  it('writeJob and readJob round-trip', () => {
    const job = makeJob('job-1');
    ws.writeJob(job);
    expect(ws.readJob('job-1')).toEqual(job);
  });

  it('readJob returns null on corrupted or foreign JSON', () => {
    fs.mkdirSync(ws.getJobDir('bad'), { recursive: true });
    fs.writeFileSync(path.join(ws.getJobDir('bad'), 'job.json'), 'corrupted{{{');
    expect(ws.readJob('bad')).toBeNull();

    fs.writeFileSync(path.join(ws.getJobDir('bad'), 'job.json'), '{"name":"not a job"}');
    expect(ws.readJob('bad')).toBeNull();
  });

  it('appendJobLog and readJobLog', () => {
    ws.appendJobLog('job-2', 'line one');
    ws.appendJobLog('job-2', 'line two');
    expect(ws.readJobLog('job-2')).toEqual(['line one', 'line two']);
  });

  it('listJobs returns readable jobs newest first', () => {
    ws.writeJob({ ...makeJob('old'), createdAt: '2026-01-01T00:00:00.000Z' });
    ws.writeJob({ ...makeJob('new'), createdAt: '2026-03-01T00:00:00.000Z' });
    fs.mkdirSync(ws.getJobDir('broken'), { recursive: true });
    fs.writeFileSync(path.join(ws.getJobDir('broken'), 'job.json'), '{');

    expect(ws.listJobs().map((j) => j.id)).toEqual(['new', 'old']);
  });

  it('readJobLog returns [] for missing log', () => {
    expect(ws.readJobLog('no-log')).toEqual([]);
  });
});

describe('cleanupStaleJobs', () => {
  it('marks in-flight jobs as ERROR and leaves finished ones alone', () => {
    ws.writeJob(makeJob('running', 'RUNNING'));
    ws.writeJob(makeJob('queued', 'QUEUED'));
    ws.writeJob(makeJob('done', 'DONE'));

    ws.cleanupStaleJobs();

    expect(ws.readJob('running')).toMatchObject({ status: 'ERROR', error: 'Server restarted while job was running' });
    expect(ws.readJob('queued')?.status).toBe('ERROR');
    expect(ws.readJob('done')?.status).toBe('DONE');
  });

  it('removes leftover scratch directories', () => {
    const leftover = path.join(ws.getScratchDir(), 'final-1234');
    fs.mkdirSync(leftover);
    fs.writeFileSync(path.join(leftover, 'trim-000.mp4'), 'x');

    ws.cleanupStaleJobs();

    expect(fs.readdirSync(ws.getScratchDir())).toEqual([]);
  });
});
