/**
 * FFmpeg Media Service
 *
 * Implements the engine's MediaOperations on top of the ffmpeg/ffprobe
 * binaries named in config. Every call spawns one process and resolves with
 * the output path the engine asked for.
 *
 * Trims re-encode to one uniform format (config.outputWidth x outputHeight,
 * config.outputFps, yuv420p, H.264, no audio) so that the concat demuxer and
 * the xfade-based transitions accept every intermediate file.
 */

import { spawn } from 'child_process';
import fs from 'fs';
import { findTransition } from '@beatcut/transitions';
import type { EngineLogger, MediaOperations, MediaProbe, MediaStreamInfo } from '@beatcut/engine';
import { config } from '../config';

// ─── Process runner ──────────────────────────────────────────────────────────

const STDERR_TAIL_LINES = 5;

export class MediaCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderrTail: string
  ) {
    super(`${command} exited with code ${exitCode}${stderrTail ? `: ${stderrTail}` : ''}`);
    this.name = 'MediaCommandError';
  }
}

export function runCommand(cmd: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (d: Buffer) => {
      stdout += d.toString();
    });
    child.stderr.on('data', (d: Buffer) => {
      stderr += d.toString();
    });

    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const tail = stderr.split('\n').filter(Boolean).slice(-STDERR_TAIL_LINES).join(' | ');
      reject(new MediaCommandError(cmd, code, tail));
    });
  });
}

// ─── Probe ───────────────────────────────────────────────────────────────────

interface FfprobeStream {
  codec_type?: string;
  width?: number;
  height?: number;
  r_frame_rate?: string;
}

interface FfprobeOutput {
  streams?: FfprobeStream[];
  format?: { duration?: string; size?: string };
}

function parseFrameRate(rate: string | undefined): number | undefined {
  if (!rate) return undefined;
  const [num, den] = rate.split('/').map(Number);
  return den > 0 ? num / den : undefined;
}

function toStreamInfo(stream: FfprobeStream): MediaStreamInfo {
  if (stream.codec_type === 'video') {
    return {
      codecType: 'video',
      width: stream.width,
      height: stream.height,
      fps: parseFrameRate(stream.r_frame_rate),
    };
  }
  return { codecType: stream.codec_type === 'audio' ? 'audio' : 'other' };
}

export function parseProbeOutput(raw: string): MediaProbe {
  const data: FfprobeOutput = JSON.parse(raw);
  const format = data.format ?? {};
  return {
    // Missing duration stays NaN so the clip analyzer rejects the file
    duration: parseFloat(format.duration ?? 'NaN'),
    size: parseInt(format.size ?? '0', 10),
    streams: (data.streams ?? []).map(toStreamInfo),
  };
}

export async function probeFile(filePath: string): Promise<MediaProbe> {
  const { stdout } = await runCommand(config.ffprobeBin, [
    '-v', 'quiet',
    '-print_format', 'json',
    '-show_streams',
    '-show_format',
    filePath,
  ]);
  return parseProbeOutput(stdout);
}

// ─── Argument builders ───────────────────────────────────────────────────────

const fmt = (n: number) => n.toFixed(3);

const ENCODE_ARGS = ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '23', '-pix_fmt', 'yuv420p'];

export function normaliseFilter(): string {
  const W = config.outputWidth;
  const H = config.outputHeight;
  return [
    `scale=${W}:${H}:force_original_aspect_ratio=decrease`,
    `pad=${W}:${H}:(ow-iw)/2:(oh-ih)/2:color=black`,
    'setsar=1',
    `fps=${config.outputFps}`,
    'format=yuv420p',
  ].join(',');
}

export function buildTrimArgs(inputPath: string, start: number, end: number, outputPath: string): string[] {
  return [
    '-y',
    '-ss', fmt(start),
    '-i', inputPath,
    '-t', fmt(end - start),
    '-vf', normaliseFilter(),
    ...ENCODE_ARGS,
    '-an',
    outputPath,
  ];
}

/** Line for the concat demuxer's list file; single quotes are escaped */
export function concatListLine(filePath: string): string {
  return `file '${filePath.replace(/'/g, "'\\''")}'`;
}

export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return ['-y', '-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath];
}

export function buildTransitionArgs(
  pathA: string,
  pathB: string,
  filters: string[],
  outputPad: string,
  outputPath: string
): string[] {
  return [
    '-y',
    '-i', pathA,
    '-i', pathB,
    '-filter_complex', filters.join(';'),
    '-map', `[${outputPad}]`,
    ...ENCODE_ARGS,
    '-an',
    outputPath,
  ];
}

export function buildMuxArgs(videoPath: string, audioPath: string, durationCap: number, outputPath: string): string[] {
  return [
    '-y',
    '-i', videoPath,
    // Loop the music so it always covers the video; atrim cuts it to the cap
    '-stream_loop', '-1',
    '-i', audioPath,
    '-filter_complex', `[1:a]atrim=0:${fmt(durationCap)},asetpts=PTS-STARTPTS,volume=${config.musicVolume}[a]`,
    '-map', '0:v',
    '-map', '[a]',
    '-c:v', 'copy',
    '-c:a', 'aac',
    '-b:a', '192k',
    '-shortest',
    outputPath,
  ];
}

export function buildExtractWavArgs(inputPath: string, outputPath: string): string[] {
  return ['-y', '-i', inputPath, '-vn', '-ac', '1', '-ar', '22050', '-f', 'wav', outputPath];
}

// ─── MediaOperations ─────────────────────────────────────────────────────────

/**
 * MediaOperations backed by ffmpeg. `logger` receives one debug line per
 * spawned command.
 */
export function createMediaOperations(logger?: EngineLogger): MediaOperations {
  const ffmpeg = async (args: string[], outputPath: string): Promise<string> => {
    logger?.debug({ cmd: config.ffmpegBin, args }, 'ffmpeg');
    await runCommand(config.ffmpegBin, args);
    return outputPath;
  };

  return {
    probe: probeFile,

    trim(inputPath, start, end, outputPath) {
      if (!(end > start)) {
        return Promise.reject(new Error(`Empty trim range ${start}-${end} for ${inputPath}`));
      }
      return ffmpeg(buildTrimArgs(inputPath, start, end, outputPath), outputPath);
    },

    async concat(inputPaths, outputPath) {
      const listPath = `${outputPath}.list.txt`;
      fs.writeFileSync(listPath, inputPaths.map(concatListLine).join('\n') + '\n');
      try {
        return await ffmpeg(buildConcatArgs(listPath, outputPath), outputPath);
      } finally {
        fs.rmSync(listPath, { force: true });
      }
    },

    async transition(pathA, pathB, kind, duration, outputPath) {
      const [a, b] = await Promise.all([probeFile(pathA), probeFile(pathB)]);
      if (!(a.duration > 0) || !(b.duration > 0)) {
        throw new Error(`Cannot build '${kind}' transition: input durations ${a.duration}s and ${b.duration}s`);
      }
      const { filters, outputPad } = findTransition(kind).buildFilter({
        durationA: a.duration,
        durationB: b.duration,
        duration,
      });
      return ffmpeg(buildTransitionArgs(pathA, pathB, filters, outputPad, outputPath), outputPath);
    },

    muxAudio(videoPath, audioPath, durationCap, outputPath) {
      return ffmpeg(buildMuxArgs(videoPath, audioPath, durationCap, outputPath), outputPath);
    },
  };
}

/** Decode the audio track of any media file to mono 16-bit WAV */
export async function extractWav(inputPath: string, outputPath: string): Promise<string> {
  await runCommand(config.ffmpegBin, buildExtractWavArgs(inputPath, outputPath));
  return outputPath;
}
