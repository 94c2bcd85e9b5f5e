import { FastifyInstance } from 'fastify';
import { STRATEGY_NAMES, TRANSITION_TYPES, isStrategyName, isTransitionType } from '@beatcut/shared';
import type { StrategyName, TransitionType } from '@beatcut/shared';
import * as jq from '../services/jobQueue';
import {
  createEditServices,
  runAutoEdit,
  runSmartEdit,
  type AutoEditParams,
  type EditServices,
  type SmartEditParams,
} from '../services/editService';

export const EDIT_DEFAULTS = {
  strategy: 'rhythm' satisfies StrategyName,
  transitionType: 'fade' satisfies TransitionType,
  transitionDuration: 0.5,
  minClipDuration: 2.0,
  targetDuration: 30,
} as const;

export const LIMITS = {
  transitionDuration: { min: 0, max: 2 },
  minClipDuration: { min: 0.5, max: 10 },
} as const;

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseClipPaths(body: Body): Parsed<string[]> {
  const { clipPaths } = body;
  if (!Array.isArray(clipPaths) || clipPaths.length === 0) {
    return { ok: false, error: 'clipPaths must be a non-empty array of paths' };
  }
  const paths: string[] = [];
  for (const p of clipPaths) {
    if (typeof p !== 'string' || p.trim() === '') {
      return { ok: false, error: 'clipPaths must contain only non-empty strings' };
    }
    paths.push(p);
  }
  return { ok: true, value: paths };
}

function parseNumber(body: Body, key: string, fallback: number, min: number, max: number, exclusiveMin = false): Parsed<number> {
  const value = body[key];
  if (value === undefined) return { ok: true, value: fallback };
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return { ok: false, error: `${key} must be a number` };
  }
  if ((exclusiveMin ? value <= min : value < min) || value > max) {
    const lower = exclusiveMin ? `greater than ${min}` : `at least ${min}`;
    return { ok: false, error: `${key} must be ${lower}${Number.isFinite(max) ? ` and at most ${max}` : ''}` };
  }
  return { ok: true, value };
}

function parseTransitionType(body: Body): Parsed<TransitionType | null> {
  const value = body.transitionType;
  if (value === undefined) return { ok: true, value: EDIT_DEFAULTS.transitionType };
  if (value === null || value === 'none') return { ok: true, value: null };
  if (!isTransitionType(value)) {
    return { ok: false, error: `transitionType must be one of: ${TRANSITION_TYPES.join(', ')}, or null` };
  }
  return { ok: true, value };
}

export function parseAutoEditRequest(raw: unknown): Parsed<AutoEditParams> {
  if (!isBody(raw)) return { ok: false, error: 'Request body must be a JSON object' };

  const clipPaths = parseClipPaths(raw);
  if (!clipPaths.ok) return clipPaths;

  const { audioPath } = raw;
  if (typeof audioPath !== 'string' || audioPath.trim() === '') {
    return { ok: false, error: 'audioPath is required' };
  }

  const requested = raw.strategy ?? EDIT_DEFAULTS.strategy;
  if (!isStrategyName(requested)) {
    return { ok: false, error: `strategy must be one of: ${STRATEGY_NAMES.join(', ')}` };
  }

  const transitionType = parseTransitionType(raw);
  if (!transitionType.ok) return transitionType;

  const { transitionDuration: td, minClipDuration: mc } = LIMITS;
  const transitionDuration = parseNumber(raw, 'transitionDuration', EDIT_DEFAULTS.transitionDuration, td.min, td.max);
  if (!transitionDuration.ok) return transitionDuration;

  const minClipDuration = parseNumber(raw, 'minClipDuration', EDIT_DEFAULTS.minClipDuration, mc.min, mc.max);
  if (!minClipDuration.ok) return minClipDuration;

  return {
    ok: true,
    value: {
      clipPaths: clipPaths.value,
      audioPath,
      strategy: requested,
      transitionType: transitionType.value,
      transitionDuration: transitionDuration.value,
      minClipDuration: minClipDuration.value,
    },
  };
}

export function parseSmartEditRequest(raw: unknown): Parsed<SmartEditParams> {
  if (!isBody(raw)) return { ok: false, error: 'Request body must be a JSON object' };

  const clipPaths = parseClipPaths(raw);
  if (!clipPaths.ok) return clipPaths;

  const targetDuration = parseNumber(raw, 'targetDuration', EDIT_DEFAULTS.targetDuration, 0, Infinity, true);
  if (!targetDuration.ok) return targetDuration;

  let audioPath: string | null = null;
  if (raw.audioPath !== undefined && raw.audioPath !== null) {
    const ref = raw.audioPath;
    if (typeof ref !== 'string' || ref.trim() === '') {
      return { ok: false, error: 'audioPath must be a non-empty string' };
    }
    audioPath = ref;
  }

  const transitionType = parseTransitionType(raw);
  if (!transitionType.ok) return transitionType;

  const { transitionDuration: td } = LIMITS;
  const transitionDuration = parseNumber(raw, 'transitionDuration', EDIT_DEFAULTS.transitionDuration, td.min, td.max);
  if (!transitionDuration.ok) return transitionDuration;

  return {
    ok: true,
    value: {
      clipPaths: clipPaths.value,
      targetDuration: targetDuration.value,
      audioPath,
      transitionType: transitionType.value,
      transitionDuration: transitionDuration.value,
    },
  };
}

export type EditRoutesOptions = {
  /** Media backends; defaults to ffmpeg-based services logging through app.log */
  services?: EditServices;
};

export async function editRoutes(app: FastifyInstance, opts: EditRoutesOptions) {
  const services = opts.services ?? createEditServices(app.log);

  // POST /auto-edit
  app.post('/auto-edit', async (req, reply) => {
    const parsed = parseAutoEditRequest(req.body);
    if (!parsed.ok) return reply.code(400).send({ error: parsed.error });

    const job = jq.createJob('autoEdit');
    const log = app.log.child({ jobId: job.id });
    log.info({ clips: parsed.value.clipPaths.length, strategy: parsed.value.strategy }, 'Auto-edit job queued');

    setImmediate(() => {
      void jq.runJob(job.id, () => runAutoEdit(job.id, parsed.value, services, log));
    });

    return reply.code(202).send({ jobId: job.id });
  });

  // POST /smart-edit
  app.post('/smart-edit', async (req, reply) => {
    const parsed = parseSmartEditRequest(req.body);
    if (!parsed.ok) return reply.code(400).send({ error: parsed.error });

    const job = jq.createJob('smartEdit');
    const log = app.log.child({ jobId: job.id });
    log.info({ clips: parsed.value.clipPaths.length, targetDuration: parsed.value.targetDuration }, 'Smart-edit job queued');

    setImmediate(() => {
      void jq.runJob(job.id, () => runSmartEdit(job.id, parsed.value, services, log));
    });

    return reply.code(202).send({ jobId: job.id });
  });
}
