import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ExecutionStage } from '@beatcut/shared';
import { executePlan } from '../planExecutor';
import type { ExecuteDeps } from '../types';
import {
  AudioMuxFailureError,
  FoldFailureError,
  InvalidOutputError,
  TrimFailureError,
} from '../errors';
import { FakeMedia, makePlan, testLogger, type FakeMediaOptions } from './fakes';

let tmpDir: string;
let scratchRoot: string;
let outputPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'beatcut-exec-'));
  scratchRoot = path.join(tmpDir, 'scratch');
  fs.mkdirSync(scratchRoot);
  outputPath = path.join(tmpDir, 'out', 'final.mp4');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const threeClips = () => makePlan([
  ['a.mp4', 0, 2],
  ['b.mp4', 0, 2],
  ['c.mp4', 1, 3],
]);

function run(options: FakeMediaOptions, plan = threeClips(), transition: 'fade' | null = null, extra: Pick<ExecuteDeps, 'trimConcurrency' | 'onProgress'> = {}) {
  const media = new FakeMedia(options);
  const promise = executePlan(plan, outputPath, transition, 0.5, {
    media,
    scratchRoot,
    logger: testLogger(),
    ...extra,
  });
  return { media, promise };
}

const output = () => fs.readFileSync(outputPath, 'utf8');
const scratchEntries = () => fs.readdirSync(scratchRoot);

describe('executePlan', () => {
  it('concatenates the trims in one pass and adds the music', async () => {
    const { media, promise } = run({});
    const result = await promise;

    expect(output()).toBe(
      'clip a.mp4 0-2\nclip b.mp4 0-2\nclip c.mp4 1-3\naudio song.mp3 6\n'
    );
    expect(result).toMatchObject({
      outputPath,
      duration: 4,
      clipCount: 3,
      strategy: 'even',
      transitionType: null,
      warnings: [],
      droppedClips: [],
    });
    expect(result.size).toBe(Buffer.byteLength(output()));
    expect(media.calls.filter((c) => c.startsWith('concat'))).toEqual(['concat 3']);
    expect(scratchEntries()).toEqual([]);
  });

  it('folds pairwise with transitions', async () => {
    const { media, promise } = run({}, threeClips(), 'fade');
    const result = await promise;

    expect(output()).toBe(
      'clip a.mp4 0-2\nxfade fade\nclip b.mp4 0-2\nxfade fade\nclip c.mp4 1-3\naudio song.mp3 6\n'
    );
    expect(result.transitionType).toBe('fade');
    expect(media.calls.filter((c) => c.startsWith('transition'))).toEqual(['transition fade 0.5', 'transition fade 0.5']);
    expect(media.calls.some((c) => c.startsWith('concat'))).toBe(false);
  });

  it('produces the plain concat output when every transition fails', async () => {
    const withoutTransitions = await run({}).promise;
    const plain = output();
    fs.rmSync(outputPath);

    const result = await run({ failTransition: true }, threeClips(), 'fade').promise;

    expect(output()).toBe(plain);
    expect(result.duration).toBe(withoutTransitions.duration);
    expect(result.size).toBe(withoutTransitions.size);
    expect(result.clipCount).toBe(withoutTransitions.clipCount);
    expect(result.warnings.map((w) => [w.kind, w.index])).toEqual([
      ['transitionFallback', 1],
      ['transitionFallback', 2],
    ]);
    expect(scratchEntries()).toEqual([]);
  });

  it('skips transitions when the duration is zero', async () => {
    const media = new FakeMedia();
    const result = await executePlan(threeClips(), outputPath, 'fade', 0, { media, scratchRoot, logger: testLogger() });

    expect(result.transitionType).toBeNull();
    expect(media.calls.some((c) => c.startsWith('transition'))).toBe(false);
  });

  it('drops clips whose trim fails', async () => {
    const result = await run({ failTrim: ['b.mp4'] }).promise;

    expect(output()).toBe('clip a.mp4 0-2\nclip c.mp4 1-3\naudio song.mp3 6\n');
    expect(result.clipCount).toBe(2);
    expect(result.droppedClips).toEqual([1]);
  });

  it('uses a single surviving trim as is', async () => {
    const plan = makePlan([['a.mp4', 0, 2]], null);
    const { media, promise } = run({}, plan);
    const result = await promise;

    expect(output()).toBe('clip a.mp4 0-2\n');
    expect(result.duration).toBe(1);
    expect(media.calls.some((c) => c.startsWith('concat') || c.startsWith('mux'))).toBe(false);
  });

  it('keeps plan order with parallel trims', async () => {
    const plan = makePlan([
      ['a.mp4', 0, 1],
      ['b.mp4', 0, 1],
      ['c.mp4', 0, 1],
      ['d.mp4', 0, 1],
    ], null);
    await run({}, plan, null, { trimConcurrency: 3 }).promise;

    expect(output()).toBe('clip a.mp4 0-1\nclip b.mp4 0-1\nclip c.mp4 0-1\nclip d.mp4 0-1\n');
  });

  it('reports progress up to completion', async () => {
    const stages: Array<[ExecutionStage, number]> = [];
    await run({}, threeClips(), null, { onProgress: (stage, f) => { stages.push([stage, f]); } }).promise;

    expect(stages.filter(([s]) => s === 'trim')).toHaveLength(3);
    expect(stages[stages.length - 1]).toEqual(['validate', 1]);
  });

  it('keeps running when the progress callback throws', async () => {
    const logger = testLogger();
    const result = await executePlan(threeClips(), outputPath, null, 0, {
      media: new FakeMedia(),
      scratchRoot,
      logger,
      trimConcurrency: 2,
      onProgress: () => {
        throw new Error('listener gone');
      },
    });

    expect(result.clipCount).toBe(3);
    expect(output()).toBe('clip a.mp4 0-2\nclip b.mp4 0-2\nclip c.mp4 1-3\naudio song.mp3 6\n');
    expect(logger.warn).toHaveBeenCalledWith({ stage: 'trim', err: 'listener gone' }, 'Progress callback failed');
    expect(scratchEntries()).toEqual([]);
  });

  it('throws TrimFailureError when no clip can be trimmed', async () => {
    const { promise } = run({ failTrim: ['a.mp4', 'b.mp4', 'c.mp4'] });

    await expect(promise).rejects.toBeInstanceOf(TrimFailureError);
    await expect(promise).rejects.toMatchObject({ stage: 'trim' });
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(scratchEntries()).toEqual([]);
  });

  it('throws TrimFailureError for an empty plan', async () => {
    const { promise } = run({}, makePlan([]));
    await expect(promise).rejects.toThrow('Edit plan contains no distributed clips');
  });

  it('drops a clip whose transition and concat fallback both fail', async () => {
    const { promise } = run({ failTransition: true, failConcatWith: ['trim-001.mp4'] }, threeClips(), 'fade');
    const result = await promise;

    expect(output()).toBe('clip a.mp4 0-2\nclip c.mp4 1-3\naudio song.mp3 6\n');
    expect(result.clipCount).toBe(2);
    expect(result.droppedClips).toEqual([1]);
    expect(result.warnings.map((w) => [w.kind, w.index])).toEqual([
      ['transitionFallback', 1],
      ['clipDropped', 1],
      ['transitionFallback', 2],
    ]);
    expect(result.warnings[1].message).toBe('Clip 1 could not be joined and was left out: pair concat failed');
    expect(scratchEntries()).toEqual([]);
  });

  it('keeps only the first clip when every join fails', async () => {
    const result = await run({ failTransition: true, failConcat: true }, threeClips(), 'fade').promise;

    expect(output()).toBe('clip a.mp4 0-2\naudio song.mp3 6\n');
    expect(result.clipCount).toBe(1);
    expect(result.droppedClips).toEqual([1, 2]);
  });

  it('reports trim and fold drops together in plan order', async () => {
    const result = await run(
      { failTrim: ['a.mp4'], failTransition: true, failConcatWith: ['trim-002.mp4'] },
      threeClips(),
      'fade'
    ).promise;

    expect(output()).toBe('clip b.mp4 0-2\naudio song.mp3 6\n');
    expect(result.droppedClips).toEqual([0, 2]);
    expect(result.clipCount).toBe(1);
  });

  it('throws FoldFailureError when the one-pass concat fails', async () => {
    const { promise } = run({ failConcat: true });
    await expect(promise).rejects.toBeInstanceOf(FoldFailureError);
  });

  it('throws AudioMuxFailureError and leaves no output', async () => {
    const { promise } = run({ failMux: true });

    await expect(promise).rejects.toBeInstanceOf(AudioMuxFailureError);
    await expect(promise).rejects.toMatchObject({ stage: 'mux', audioPath: 'song.mp3' });
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(scratchEntries()).toEqual([]);
  });

  it('throws InvalidOutputError for an empty artifact and leaves no output', async () => {
    const { promise } = run({ emptyOutputs: true });

    await expect(promise).rejects.toBeInstanceOf(InvalidOutputError);
    await expect(promise).rejects.toMatchObject({ stage: 'validate' });
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(scratchEntries()).toEqual([]);
  });
});
