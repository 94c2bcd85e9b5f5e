import fs from 'fs';
import path from 'path';
import { config } from '../config';
import type { Job } from '@beatcut/shared';

// Use a function so config.workspaceDir mutations (e.g. in tests) are reflected.
export function getWorkspaceDir() {
  return config.workspaceDir;
}

/** Uploaded clips and music; relative media references resolve here */
export function getMediaDir() {
  return path.join(getWorkspaceDir(), 'media');
}

export function getOutputsDir() {
  return path.join(getWorkspaceDir(), 'outputs');
}

/** Root of the per-execution scratch directories */
export function getScratchDir() {
  return path.join(getWorkspaceDir(), 'scratch');
}

/** Intermediate files of audio analysis (decoded WAV) */
export function getAnalysisDir() {
  return path.join(getWorkspaceDir(), 'analysis');
}

export function getJobsDir() {
  return path.join(getWorkspaceDir(), 'jobs');
}

export function getJobDir(jobId: string) {
  return path.join(getWorkspaceDir(), 'jobs', jobId);
}

export function ensureWorkspace() {
  const ws = getWorkspaceDir();
  try {
    for (const dir of [ws, getMediaDir(), getOutputsDir(), getScratchDir(), getAnalysisDir(), getJobsDir()]) {
      fs.mkdirSync(dir, { recursive: true });
    }
  } catch (e) {
    throw new Error(`Failed to initialise workspace at ${ws}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

// ─── Path safety ─────────────────────────────────────────────────────────────

/**
 * Resolve a path against `base` (default: the workspace) and assert it stays inside it.
 * Throws if path traversal is detected.
 */
export function safeResolve(relative: string, base = getWorkspaceDir()): string {
  const root = path.resolve(base);
  const resolved = path.resolve(root, relative);
  if (!resolved.startsWith(root + path.sep) && resolved !== root) {
    throw new Error(`Path traversal detected: ${relative}`);
  }
  return resolved;
}

/**
 * Media references are local paths. Absolute paths are used as given,
 * relative ones must stay inside the media directory.
 */
export function resolveMediaPath(ref: string): string {
  return path.isAbsolute(ref) ? path.normalize(ref) : safeResolve(ref, getMediaDir());
}

/** Absolute path of a job output; it must live directly or deeper inside outputs/ */
export function resolveOutputPath(relative: string): string {
  const resolved = safeResolve(relative);
  if (!resolved.startsWith(path.resolve(getOutputsDir()) + path.sep)) {
    throw new Error(`Not an output file: ${relative}`);
  }
  return resolved;
}

/** Workspace-relative form of a path inside the workspace, with forward slashes */
export function toWorkspaceRelative(absolutePath: string): string {
  return path.relative(getWorkspaceDir(), absolutePath).split(path.sep).join('/');
}

// ─── Jobs ────────────────────────────────────────────────────────────────────

function isJob(value: unknown): value is Job {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'status' in value &&
    typeof value.status === 'string'
  );
}

export function readJob(jobId: string): Job | null {
  const p = path.join(getJobDir(jobId), 'job.json');
  if (!fs.existsSync(p)) return null;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
    return isJob(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Every readable job on disk, newest first */
export function listJobs(): Job[] {
  const dir = getJobsDir();
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .map(readJob)
    .filter((job): job is Job => job !== null)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export function writeJob(job: Job) {
  const dir = getJobDir(job.id);
  fs.mkdirSync(dir, { recursive: true });
  const p = path.join(dir, 'job.json');
  const tmp = p + '.tmp';
  fs.writeFileSync(tmp, JSON.stringify(job, null, 2));
  fs.renameSync(tmp, p); // atomic write
}

export function appendJobLog(jobId: string, line: string) {
  const dir = getJobDir(jobId);
  fs.mkdirSync(dir, { recursive: true });
  fs.appendFileSync(path.join(dir, 'log.txt'), line + '\n');
}

export function readJobLog(jobId: string): string[] {
  const p = path.join(getJobDir(jobId), 'log.txt');
  if (!fs.existsSync(p)) return [];
  // Read at most last 64KB to avoid memory spikes on large log files
  const stat = fs.statSync(p);
  const MAX = 65536;
  const fd = fs.openSync(p, 'r');
  const readSize = Math.min(stat.size, MAX);
  const buf = Buffer.alloc(readSize);
  try {
    fs.readSync(fd, buf, 0, readSize, Math.max(0, stat.size - readSize));
  } finally {
    fs.closeSync(fd);
  }
  return buf.toString('utf8').split('\n').filter(Boolean).slice(-200);
}

// ─── Startup cleanup ─────────────────────────────────────────────────────────

/**
 * Mark any RUNNING or QUEUED jobs as ERROR (server restarted while they were
 * in flight) and remove scratch directories they left behind.
 */
export function cleanupStaleJobs() {
  const dir = getJobsDir();
  if (fs.existsSync(dir)) {
    for (const jobId of fs.readdirSync(dir)) {
      const job = readJob(jobId);
      if (job && (job.status === 'RUNNING' || job.status === 'QUEUED')) {
        writeJob({
          ...job,
          status: 'ERROR',
          error: 'Server restarted while job was running',
          updatedAt: new Date().toISOString(),
        });
      }
    }
  }

  const scratch = getScratchDir();
  if (fs.existsSync(scratch)) {
    for (const entry of fs.readdirSync(scratch)) {
      fs.rmSync(path.join(scratch, entry), { recursive: true, force: true });
    }
  }
}
