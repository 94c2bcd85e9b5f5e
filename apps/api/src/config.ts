import path from 'path';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const config = {
  port: parseInt(process.env.PORT ?? '3001', 10),
  host: process.env.HOST ?? '0.0.0.0',
  workspaceDir: process.env.WORKSPACE_DIR ?? path.join(process.cwd(), 'workspace'),
  ffmpegBin: process.env.FFMPEG_BIN ?? 'ffmpeg',
  ffprobeBin: process.env.FFPROBE_BIN ?? 'ffprobe',
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  // Every trimmed clip is normalised to this format before joining
  outputWidth: numberFromEnv('OUTPUT_WIDTH', 1280),
  outputHeight: numberFromEnv('OUTPUT_HEIGHT', 720),
  outputFps: numberFromEnv('OUTPUT_FPS', 30),

  musicVolume: numberFromEnv('MUSIC_VOLUME', 0.8),
  energySegmentCount: numberFromEnv('ENERGY_SEGMENT_COUNT', 8),
  trimConcurrency: numberFromEnv('TRIM_CONCURRENCY', 2),
  probeConcurrency: numberFromEnv('PROBE_CONCURRENCY', 4),
};
