import { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import path from 'path';
import fs from 'fs';
import { pipeline } from 'stream/promises';
import * as ws from '../services/workspace';
import type { MediaProbe } from '@beatcut/engine';
import * as ffmpeg from '../services/ffmpegService';

// Allowed file extensions for upload
const ALLOWED_EXTENSIONS = new Set([
  '.mp4', '.mov', '.avi', '.mkv', '.webm', '.m4v',  // video
  '.mp3', '.wav', '.m4a', '.aac', '.flac', '.ogg',  // audio
]);

export interface MediaFile {
  /** Reference to pass as clipPaths / audioPath */
  filename: string;
  size: number;
}

function timestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export async function mediaRoutes(app: FastifyInstance) {
  // POST /media - upload one clip or music file into the media directory
  app.post('/media', async (req, reply) => {
    const data = await req.file();
    if (!data) {
      return reply.code(400).send({ error: 'No file uploaded' });
    }

    const ext = path.extname(data.filename).toLowerCase();
    if (!ALLOWED_EXTENSIONS.has(ext)) {
      // Drain the stream to prevent hanging
      data.file.resume();
      return reply.code(400).send({
        error: `File type not allowed: ${ext}. Allowed: ${[...ALLOWED_EXTENSIONS].join(', ')}`,
      });
    }

    const filename = `${timestamp(new Date())}_${uuidv4().slice(0, 8)}${ext}`;
    const filePath = path.join(ws.getMediaDir(), filename);
    fs.mkdirSync(ws.getMediaDir(), { recursive: true });

    try {
      await pipeline(data.file, fs.createWriteStream(filePath));
    } catch (e) {
      fs.rmSync(filePath, { force: true });
      return reply.code(500).send({ error: 'Failed to save file', details: e instanceof Error ? e.message : String(e) });
    }

    let probe: MediaProbe;
    try {
      probe = await ffmpeg.probeFile(filePath);
    } catch (e) {
      fs.rmSync(filePath, { force: true });
      return reply.code(400).send({
        error: 'Cannot probe file (is it a valid video/audio?)',
        details: e instanceof Error ? e.message : String(e),
      });
    }

    const hasVideo = probe.streams.some((s) => s.codecType === 'video');
    const hasAudio = probe.streams.some((s) => s.codecType === 'audio');
    if (!hasVideo && !hasAudio) {
      fs.rmSync(filePath, { force: true });
      return reply.code(400).send({ error: 'File has no audio or video streams' });
    }

    req.log.info({ filename, originalFilename: data.filename }, 'Media uploaded');
    return reply.code(201).send({
      filename,
      originalFilename: data.filename,
      size: fs.statSync(filePath).size,
      type: hasVideo ? 'video' : 'audio',
      duration: probe.duration,
    });
  });

  // GET /media
  app.get('/media', async (_req, reply) => {
    const dir = ws.getMediaDir();
    const files: MediaFile[] = fs.existsSync(dir)
      ? fs.readdirSync(dir)
          .filter((f) => ALLOWED_EXTENSIONS.has(path.extname(f).toLowerCase()))
          .sort()
          .map((filename) => ({ filename, size: fs.statSync(path.join(dir, filename)).size }))
      : [];
    return reply.send({ files });
  });
}
