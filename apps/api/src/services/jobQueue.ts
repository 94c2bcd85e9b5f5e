import { v4 as uuidv4 } from 'uuid';
import type { ExecutionResult, ExecutionStage, Job, JobStatus, JobType } from '@beatcut/shared';
import { EditEngineError } from '@beatcut/engine';
import * as ws from './workspace';

// In-memory map for quick status checks (persisted to disk too)
const activeJobs = new Map<string, Job>();

export function createJob(type: JobType): Job {
  const now = new Date().toISOString();
  const job: Job = {
    id: uuidv4(),
    type,
    status: 'QUEUED',
    progress: 0,
    createdAt: now,
    updatedAt: now,
  };
  activeJobs.set(job.id, job);
  ws.writeJob(job);
  return job;
}

export function getJob(jobId: string): Job | null {
  return activeJobs.get(jobId) ?? ws.readJob(jobId);
}

export interface JobFilter {
  status?: JobStatus;
  type?: JobType;
  limit?: number;
}

/** Jobs newest first; jobs still in memory win over their persisted copy */
export function listJobs(filter: JobFilter = {}): Job[] {
  const jobs = ws.listJobs()
    .map((job) => activeJobs.get(job.id) ?? job)
    .filter((job) => (filter.status === undefined || job.status === filter.status)
      && (filter.type === undefined || job.type === filter.type));
  return filter.limit === undefined ? jobs : jobs.slice(0, filter.limit);
}

function updateJob(jobId: string, updates: Partial<Job>) {
  const job = getJob(jobId);
  if (!job) return;
  const updated: Job = { ...job, ...updates, updatedAt: new Date().toISOString() };
  activeJobs.set(jobId, updated);
  ws.writeJob(updated);
}

export function setJobRunning(jobId: string) {
  updateJob(jobId, { status: 'RUNNING', progress: 0 });
}

export function setJobProgress(jobId: string, progress: number) {
  updateJob(jobId, { progress: Math.round(Math.min(100, Math.max(0, progress))) });
}

export function setJobDone(jobId: string, outputPath: string, result: ExecutionResult) {
  updateJob(jobId, { status: 'DONE', progress: 100, outputPath, result });
}

export function setJobError(jobId: string, error: string, errorStage?: ExecutionStage) {
  updateJob(jobId, { status: 'ERROR', error, errorStage });
}

export type CancelOutcome =
  | { ok: true; job: Job }
  | { ok: false; reason: 'not_found' }
  | { ok: false; reason: 'not_cancellable'; status: JobStatus };

/**
 * Cancel a job that has not started yet. A plan that is already executing
 * runs to completion.
 */
export function cancelJob(jobId: string): CancelOutcome {
  const job = getJob(jobId);
  if (!job) return { ok: false, reason: 'not_found' };
  if (job.status !== 'QUEUED') return { ok: false, reason: 'not_cancellable', status: job.status };

  updateJob(jobId, { status: 'CANCELLED' });
  ws.appendJobLog(jobId, '[job] cancelled');
  const cancelled = getJob(jobId);
  return cancelled ? { ok: true, job: cancelled } : { ok: false, reason: 'not_found' };
}

export interface JobOutcome {
  /** Workspace-relative path of the produced file */
  outputPath: string;
  result: ExecutionResult;
}

/**
 * Run `work` as the body of job `jobId`. Resolves once the job reached DONE
 * or ERROR; failures are recorded on the job and in its log, never rethrown.
 * Jobs cancelled while queued are skipped.
 */
export async function runJob(jobId: string, work: () => Promise<JobOutcome>): Promise<void> {
  if (getJob(jobId)?.status === 'CANCELLED') return;
  setJobRunning(jobId);
  ws.appendJobLog(jobId, `[job] started`);
  try {
    const { outputPath, result } = await work();
    for (const warning of result.warnings) {
      ws.appendJobLog(jobId, `[warn] ${warning.message}`);
    }
    ws.appendJobLog(jobId, `[job] done: ${outputPath} (${result.duration.toFixed(2)}s, ${result.clipCount} clips)`);
    setJobDone(jobId, outputPath, result);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const stage = e instanceof EditEngineError ? e.stage : undefined;
    ws.appendJobLog(jobId, `ERROR${stage ? ` [${stage}]` : ''}: ${message}`);
    setJobError(jobId, message, stage);
  }
}
