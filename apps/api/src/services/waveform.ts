import fs from 'fs';

export interface WaveformResult {
  /** RMS per bucket, normalised to 0..1 */
  samples: number[];
  /** Seconds of audio in the file */
  duration: number;
  /** Buckets per second */
  sampleRate: number;
}

function readSample(buf: Buffer, offset: number, bitsPerSample: number): number {
  switch (bitsPerSample) {
    case 8:
      return (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return buf.readInt16LE(offset) / 32768;
    case 32:
      return buf.readFloatLE(offset);
    default:
      return 0;
  }
}

/**
 * Compute an RMS envelope from a PCM WAV file.
 * Returns ~100 buckets/second (configurable via bucketsPerSecond); all
 * channels are mixed down.
 */
export function computeWaveform(wavPath: string, bucketsPerSecond = 100): WaveformResult {
  const buf = fs.readFileSync(wavPath);

  if (buf.length < 12 || buf.subarray(0, 4).toString('ascii') !== 'RIFF') {
    throw new Error('Not a valid WAV file');
  }

  // Walk the chunks: 'fmt ' describes the samples, 'data' holds them
  let format: { audioFormat: number; numChannels: number; sampleRate: number; bitsPerSample: number } | null = null;
  let dataOffset = 0;
  let dataSize = 0;
  let offset = 12;
  while (offset + 8 <= buf.length) {
    const chunkName = buf.subarray(offset, offset + 4).toString('ascii');
    const chunkSize = buf.readUInt32LE(offset + 4);
    if (chunkName === 'fmt ') {
      format = {
        audioFormat: buf.readUInt16LE(offset + 8),
        numChannels: buf.readUInt16LE(offset + 10),
        sampleRate: buf.readUInt32LE(offset + 12),
        bitsPerSample: buf.readUInt16LE(offset + 22),
      };
    } else if (chunkName === 'data') {
      dataOffset = offset + 8;
      // ffmpeg writes 0xFFFFFFFF when streaming to a pipe
      dataSize = Math.min(chunkSize, buf.length - dataOffset);
      break;
    }
    offset += 8 + chunkSize + (chunkSize % 2);
  }

  if (!format) {
    throw new Error('No fmt chunk found in WAV');
  }
  // 1 = integer PCM, 3 = IEEE float
  if (format.audioFormat !== 1 && format.audioFormat !== 3) {
    throw new Error('Only PCM WAV supported for waveform');
  }
  if (dataSize === 0) {
    throw new Error('No data chunk found in WAV');
  }

  const { numChannels, sampleRate, bitsPerSample } = format;
  const bytesPerSample = bitsPerSample / 8;
  const frameSize = bytesPerSample * numChannels;
  const totalFrames = Math.floor(dataSize / frameSize);
  const duration = totalFrames / sampleRate;

  const framesPerBucket = Math.max(1, Math.floor(sampleRate / bucketsPerSecond));
  const numBuckets = Math.ceil(totalFrames / framesPerBucket);
  const result: number[] = [];

  for (let b = 0; b < numBuckets; b++) {
    const start = b * framesPerBucket;
    const end = Math.min(start + framesPerBucket, totalFrames);
    let sumSquares = 0;

    for (let i = start; i < end; i++) {
      const frameOffset = dataOffset + i * frameSize;
      let mixed = 0;
      for (let c = 0; c < numChannels; c++) {
        mixed += readSample(buf, frameOffset + c * bytesPerSample, bitsPerSample);
      }
      mixed /= numChannels;
      sumSquares += mixed * mixed;
    }

    const count = end - start;
    result.push(count > 0 ? Math.sqrt(sumSquares / count) : 0);
  }

  // Normalize to 0..1
  const max = result.reduce((m, v) => Math.max(m, v), 0.001);
  const normalized = result.map((v) => Math.min(v / max, 1));

  return { samples: normalized, duration, sampleRate: bucketsPerSecond };
}
