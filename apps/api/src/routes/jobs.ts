import { FastifyInstance } from 'fastify';
import path from 'path';
import fs from 'fs';
import { JOB_STATUSES, JOB_TYPES, isJobStatus, isJobType } from '@beatcut/shared';
import type { Job, JobListResponse, JobStatusResponse, JobView } from '@beatcut/shared';
import * as ws from '../services/workspace';
import * as jq from '../services/jobQueue';

const STATUS_LOG_LINES = 20;
const LIST_LIMIT = { default: 50, max: 500 };

type IdParams = { Params: { id: string } };
type ListQuery = { Querystring: { status?: string; type?: string; limit?: string } };

export function toJobView(job: Job): JobView {
  const view: JobView = {
    id: job.id,
    type: job.type,
    status: job.status,
    progress: job.progress,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    warnings: job.result?.warnings ?? [],
  };
  if (job.error !== undefined) view.error = job.error;
  if (job.errorStage !== undefined) view.errorStage = job.errorStage;
  if (job.status === 'DONE' && job.outputPath) view.downloadUrl = `/api/jobs/${job.id}/output`;
  if (job.result) {
    // outputPath is a server path; clients download through downloadUrl
    const { outputPath: _outputPath, warnings: _warnings, ...summary } = job.result;
    view.result = summary;
  }
  return view;
}

function parseLimit(raw: string | undefined): number | null {
  if (raw === undefined) return LIST_LIMIT.default;
  const limit = Number(raw);
  return Number.isInteger(limit) && limit >= 1 && limit <= LIST_LIMIT.max ? limit : null;
}

export async function jobsRoutes(app: FastifyInstance) {
  // GET /jobs - newest first, optionally filtered
  app.get<ListQuery>('/jobs', async (req, reply) => {
    const { status, type } = req.query;
    if (status !== undefined && !isJobStatus(status)) {
      return reply.code(400).send({ error: `status must be one of: ${JOB_STATUSES.join(', ')}` });
    }
    if (type !== undefined && !isJobType(type)) {
      return reply.code(400).send({ error: `type must be one of: ${JOB_TYPES.join(', ')}` });
    }
    const limit = parseLimit(req.query.limit);
    if (limit === null) {
      return reply.code(400).send({ error: `limit must be an integer from 1 to ${LIST_LIMIT.max}` });
    }

    const body: JobListResponse = { jobs: jq.listJobs({ status, type, limit }).map(toJobView) };
    return reply.send(body);
  });

  // GET /jobs/:id/status
  app.get<IdParams>('/jobs/:id/status', async (req, reply) => {
    const job = jq.getJob(req.params.id);
    if (!job) return reply.code(404).send({ error: 'Job not found' });

    const body: JobStatusResponse = {
      job: toJobView(job),
      lastLogLines: ws.readJobLog(job.id).slice(-STATUS_LOG_LINES),
    };
    return reply.send(body);
  });

  // GET /jobs/:id/log
  app.get<IdParams>('/jobs/:id/log', async (req, reply) => {
    const job = jq.getJob(req.params.id);
    if (!job) return reply.code(404).send({ error: 'Job not found' });
    return reply.send({ lines: ws.readJobLog(job.id) });
  });

  // POST /jobs/:id/cancel - only jobs that have not started
  app.post<IdParams>('/jobs/:id/cancel', async (req, reply) => {
    const outcome = jq.cancelJob(req.params.id);
    if (outcome.ok) {
      req.log.info({ jobId: outcome.job.id }, 'Job cancelled');
      return reply.send({ job: toJobView(outcome.job) });
    }
    if (outcome.reason === 'not_found') return reply.code(404).send({ error: 'Job not found' });
    return reply.code(409).send({ error: `Job is ${outcome.status} and can no longer be cancelled` });
  });

  // GET /jobs/:id/output - the rendered video of a DONE job
  app.get<IdParams>('/jobs/:id/output', async (req, reply) => {
    const job = jq.getJob(req.params.id);
    if (!job) return reply.code(404).send({ error: 'Job not found' });
    if (job.status !== 'DONE' || !job.outputPath) {
      return reply.code(409).send({ error: `Job is ${job.status}, no output available` });
    }

    let filePath: string;
    try {
      filePath = ws.resolveOutputPath(job.outputPath);
    } catch {
      return reply.code(403).send({ error: 'Invalid output path' });
    }
    if (!fs.existsSync(filePath)) {
      return reply.code(410).send({ error: 'Output file no longer exists' });
    }

    return reply
      .header('Content-Disposition', `attachment; filename="${path.basename(filePath)}"`)
      .header('Content-Length', fs.statSync(filePath).size)
      .type('video/mp4')
      .send(fs.createReadStream(filePath));
  });
}
