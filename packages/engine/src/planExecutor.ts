/**
 * Plan Execution Engine
 *
 * Turns an EditPlan into one video file:
 *
 *   trim (per clip) → fold (concat or transitions) → mux audio → validate → move into place
 *
 * All intermediate files live in a ScratchSpace that is disposed on every exit
 * path. Per-clip trim failures and failed joins are absorbed by dropping the
 * clip; a stage that ends up with nothing usable throws its typed error.
 */

import fs from 'fs';
import path from 'path';
import type { EditPlan, ExecutionResult, ExecutionStage, TransitionType } from '@beatcut/shared';
import type { ExecuteDeps, MediaOperations, MediaProbe } from './types';
import {
  AudioMuxFailureError,
  ClipDroppedWarning,
  FoldFailureError,
  InvalidOutputError,
  TransitionFallbackWarning,
  TrimFailureError,
  type ClipFailure,
} from './errors';
import { defaultLogger, type EngineLogger } from './logger';
import { mapWithConcurrency } from './concurrency';
import { attempt, toError } from './result';
import { ScratchSpace } from './scratch';

// Share of overall progress reached when each stage completes
const STAGE_PROGRESS: Record<ExecutionStage, number> = {
  analyze: 0,
  trim: 0.6,
  fold: 0.85,
  mux: 0.95,
  validate: 1,
};

interface TrimmedClip {
  index: number;     // into plan.distributedClips
  path: string;
}

type FoldWarning = TransitionFallbackWarning | ClipDroppedWarning;

interface FoldResult {
  path: string;
  warnings: FoldWarning[];
  /** Trimmed clips left out of the output, as indices into plan.distributedClips */
  dropped: number[];
}

type ProgressReporter = (stage: ExecutionStage, fraction: number) => void;

// A failing callback must not abort the pipeline or strand running trims
function progressReporter(deps: ExecuteDeps, logger: EngineLogger): ProgressReporter {
  return (stage, fraction) => {
    if (!deps.onProgress) return;
    try {
      deps.onProgress(stage, fraction);
    } catch (e) {
      logger.warn({ stage, err: toError(e).message }, 'Progress callback failed');
    }
  };
}

const seq = (i: number) => String(i).padStart(3, '0');

async function trimAll(
  plan: EditPlan,
  scratch: ScratchSpace,
  deps: ExecuteDeps,
  logger: EngineLogger,
  report: ProgressReporter
): Promise<{ trimmed: TrimmedClip[]; failures: ClipFailure[] }> {
  const total = plan.distributedClips.length;
  let done = 0;

  const outcomes = await mapWithConcurrency(plan.distributedClips, deps.trimConcurrency ?? 1, async (clip, index) => {
    const out = scratch.file(`trim-${seq(index)}.mp4`);
    const result = await attempt(() => deps.media.trim(clip.sourcePath, clip.sourceStart, clip.sourceEnd, out));
    done++;
    report('trim', (done / total) * STAGE_PROGRESS.trim);
    if (!result.ok) {
      logger.warn(
        { clip: clip.sourcePath, index, stage: 'trim', err: result.error.message },
        'Trim failed, dropping clip'
      );
    }
    return { index, clip, result };
  });

  const trimmed: TrimmedClip[] = [];
  const failures: ClipFailure[] = [];
  for (const { index, clip, result } of outcomes) {
    if (result.ok) trimmed.push({ index, path: result.value });
    else failures.push({ index, sourcePath: clip.sourcePath, message: result.error.message });
  }
  return { trimmed, failures };
}

async function concatAll(media: MediaOperations, trimmed: readonly TrimmedClip[], out: string): Promise<string> {
  const result = await attempt(() => media.concat(trimmed.map((t) => t.path), out));
  if (!result.ok) {
    throw new FoldFailureError(`Failed to concatenate ${trimmed.length} clips: ${result.error.message}`, result.error);
  }
  return result.value;
}

/**
 * Left fold over the trimmed clips: `current` holds the output so far and
 * `cursor` the next clip to join onto it. A failed transition is replaced by
 * a plain two-file concat for that pair only; when that fails as well the
 * incoming clip is dropped and `current` carries on unchanged.
 */
async function foldWithTransitions(
  trimmed: readonly TrimmedClip[],
  transitionType: TransitionType,
  transitionDuration: number,
  scratch: ScratchSpace,
  media: MediaOperations,
  logger: EngineLogger
): Promise<FoldResult> {
  const warnings: FoldWarning[] = [];
  const dropped: number[] = [];
  let current = trimmed[0].path;

  for (let cursor = 1; cursor < trimmed.length; cursor++) {
    const next = trimmed[cursor];
    const out = scratch.file(`fold-${seq(cursor)}.mp4`);

    const transitioned = await attempt(() =>
      media.transition(current, next.path, transitionType, transitionDuration, out)
    );
    if (transitioned.ok) {
      current = transitioned.value;
      continue;
    }

    const fallback = new TransitionFallbackWarning(next.index, transitionType, transitioned.error);
    warnings.push(fallback);
    logger.warn({ index: next.index, stage: 'fold', transitionType }, fallback.message);

    const concatenated = await attempt(() => media.concat([current, next.path], out));
    if (concatenated.ok) {
      current = concatenated.value;
      continue;
    }

    const drop = new ClipDroppedWarning(next.index, concatenated.error);
    warnings.push(drop);
    dropped.push(next.index);
    logger.warn({ index: next.index, stage: 'fold' }, drop.message);
  }

  return { path: current, warnings, dropped };
}

async function validateOutput(media: MediaOperations, artifact: string): Promise<MediaProbe> {
  const probed = await attempt(() => media.probe(artifact));
  if (!probed.ok) throw new InvalidOutputError(artifact, 'probe failed', probed.error);
  const probe = probed.value;
  if (!(probe.duration > 0)) throw new InvalidOutputError(artifact, `duration ${probe.duration}`);
  if (probe.streams.length === 0) throw new InvalidOutputError(artifact, 'no streams');
  return probe;
}

async function moveIntoPlace(src: string, dest: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(dest), { recursive: true });
  try {
    await fs.promises.rename(src, dest);
  } catch (e) {
    if (!(e instanceof Error && 'code' in e && e.code === 'EXDEV')) throw e;
    await fs.promises.copyFile(src, dest);
    await fs.promises.rm(src, { force: true });
  }
}

/**
 * Render `plan` to `outputPath`. Transitions are used when `transitionType`
 * is set and `transitionDuration` is positive.
 *
 * @throws TrimFailureError | FoldFailureError | AudioMuxFailureError | InvalidOutputError
 */
export async function executePlan(
  plan: EditPlan,
  outputPath: string,
  transitionType: TransitionType | null,
  transitionDuration: number,
  deps: ExecuteDeps
): Promise<ExecutionResult> {
  const logger = deps.logger ?? defaultLogger;
  const report = progressReporter(deps, logger);
  const effectiveTransition = transitionType !== null && transitionDuration > 0 ? transitionType : null;
  const scratch = await ScratchSpace.create(
    deps.scratchRoot,
    path.basename(outputPath, path.extname(outputPath)),
    logger
  );

  logger.info(
    { clips: plan.distributedClips.length, strategy: plan.strategy, transitionType: effectiveTransition, scratch: scratch.dir },
    'Executing edit plan'
  );

  try {
    const { trimmed, failures } = await trimAll(plan, scratch, deps, logger, report);
    if (trimmed.length === 0) throw new TrimFailureError(failures);

    let folded: FoldResult;
    if (trimmed.length === 1) {
      folded = { path: trimmed[0].path, warnings: [], dropped: [] };
    } else if (effectiveTransition === null) {
      folded = { path: await concatAll(deps.media, trimmed, scratch.file('concat.mp4')), warnings: [], dropped: [] };
    } else {
      folded = await foldWithTransitions(trimmed, effectiveTransition, transitionDuration, scratch, deps.media, logger);
    }
    report('fold', STAGE_PROGRESS.fold);

    let artifact = folded.path;
    if (plan.audioPath !== null) {
      const audioPath = plan.audioPath;
      const muxed = await attempt(() =>
        deps.media.muxAudio(folded.path, audioPath, plan.audioDuration, scratch.file('muxed.mp4'))
      );
      if (!muxed.ok) throw new AudioMuxFailureError(audioPath, muxed.error);
      artifact = muxed.value;
    }
    report('mux', STAGE_PROGRESS.mux);

    const probe = await validateOutput(deps.media, artifact);
    await moveIntoPlace(artifact, outputPath);
    report('validate', STAGE_PROGRESS.validate);

    const result: ExecutionResult = {
      outputPath,
      duration: probe.duration,
      size: probe.size,
      clipCount: trimmed.length - folded.dropped.length,
      strategy: plan.strategy,
      transitionType: effectiveTransition,
      warnings: folded.warnings.map((w) => w.toJSON()),
      droppedClips: [...failures.map((f) => f.index), ...folded.dropped].sort((a, b) => a - b),
    };
    logger.info(
      { outputPath, duration: result.duration, clipCount: result.clipCount, warnings: result.warnings.length },
      'Edit plan executed'
    );
    return result;
  } finally {
    await scratch.dispose();
  }
}
