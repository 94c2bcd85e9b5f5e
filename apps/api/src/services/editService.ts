import path from 'path';
import type { EditPlan, StrategyName, TransitionType } from '@beatcut/shared';
import {
  buildEditPlan,
  buildTargetedEditPlan,
  executePlan,
  type AudioAnalysisService,
  type EngineLogger,
  type MediaOperations,
} from '@beatcut/engine';
import { config } from '../config';
import * as ws from './workspace';
import * as jq from './jobQueue';
import { createMediaOperations } from './ffmpegService';
import { createAudioAnalysis } from './audioAnalysis';

export interface EditServices {
  media: MediaOperations;
  audio: AudioAnalysisService;
}

export function createEditServices(logger?: EngineLogger): EditServices {
  return { media: createMediaOperations(logger), audio: createAudioAnalysis(logger) };
}

/** Auto-edit parameters after request validation and defaults */
export interface AutoEditParams {
  clipPaths: string[];
  audioPath: string;
  strategy: StrategyName;
  transitionType: TransitionType | null;
  transitionDuration: number;
  minClipDuration: number;
}

export interface SmartEditParams {
  clipPaths: string[];
  targetDuration: number;
  audioPath: string | null;
  transitionType: TransitionType | null;
  transitionDuration: number;
}

// Share of job progress reserved for analysis and planning
const PLAN_PROGRESS = 10;

async function renderPlan(
  jobId: string,
  plan: EditPlan,
  transitionType: TransitionType | null,
  transitionDuration: number,
  services: EditServices,
  logger: EngineLogger
): Promise<jq.JobOutcome> {
  jq.setJobProgress(jobId, PLAN_PROGRESS);
  ws.appendJobLog(
    jobId,
    `[plan] strategy=${plan.strategy} clips=${plan.distributedClips.length} duration=${plan.audioDuration.toFixed(2)}s`
  );

  const outputAbs = path.join(ws.getOutputsDir(), `${jobId}.mp4`);
  let lastStage = '';
  const result = await executePlan(plan, outputAbs, transitionType, transitionDuration, {
    media: services.media,
    scratchRoot: ws.getScratchDir(),
    logger,
    trimConcurrency: config.trimConcurrency,
    onProgress: (stage, fraction) => {
      jq.setJobProgress(jobId, PLAN_PROGRESS + fraction * (100 - PLAN_PROGRESS));
      if (stage !== lastStage) {
        ws.appendJobLog(jobId, `[${stage}] ${Math.round(fraction * 100)}%`);
        lastStage = stage;
      }
    },
  });

  return { outputPath: ws.toWorkspaceRelative(outputAbs), result };
}

export async function runAutoEdit(
  jobId: string,
  params: AutoEditParams,
  services: EditServices,
  logger: EngineLogger
): Promise<jq.JobOutcome> {
  const clipPaths = params.clipPaths.map(ws.resolveMediaPath);
  const audioPath = ws.resolveMediaPath(params.audioPath);
  ws.appendJobLog(jobId, `[analyze] ${clipPaths.length} clips, music ${path.basename(audioPath)}`);

  const plan = await buildEditPlan(clipPaths, audioPath, params.strategy, params.minClipDuration, {
    media: services.media,
    audio: services.audio,
    logger,
    energySegmentCount: config.energySegmentCount,
    probeConcurrency: config.probeConcurrency,
  });
  return renderPlan(jobId, plan, params.transitionType, params.transitionDuration, services, logger);
}

export async function runSmartEdit(
  jobId: string,
  params: SmartEditParams,
  services: EditServices,
  logger: EngineLogger
): Promise<jq.JobOutcome> {
  const clipPaths = params.clipPaths.map(ws.resolveMediaPath);
  const audioRef = params.audioPath === null ? undefined : ws.resolveMediaPath(params.audioPath);
  ws.appendJobLog(jobId, `[analyze] ${clipPaths.length} clips, target ${params.targetDuration}s`);

  const plan = await buildTargetedEditPlan(
    clipPaths,
    { targetDuration: params.targetDuration, audioRef },
    { media: services.media, audio: services.audio, logger, probeConcurrency: config.probeConcurrency }
  );
  return renderPlan(jobId, plan, params.transitionType, params.transitionDuration, services, logger);
}
