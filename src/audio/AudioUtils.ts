import { spawn } from 'child_process';
import type { AudioClip } from '../whisper/types';
import { InvalidAudioError } from '../utils/errors';

/**
 * Audio Utility Functions
 *
 * WAV parsing and writing, downmixing, resampling through ffmpeg and RMS,
 * all on float samples in [-1, 1].
 */

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
const FFMPEG_STDERR_TAIL = 2000;

interface WavFormat {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

/**
 * Decode a WAV file (16-bit PCM or 32-bit float, any channel count)
 *
 * @throws InvalidAudioError for anything else
 */
export function decodeWav(wavData: Buffer): AudioClip {
  if (wavData.length < 12 || wavData.toString('ascii', 0, 4) !== 'RIFF') {
    throw new InvalidAudioError('Invalid WAV file: missing RIFF header');
  }
  if (wavData.toString('ascii', 8, 12) !== 'WAVE') {
    throw new InvalidAudioError('Invalid WAV file: missing WAVE format');
  }

  let offset = 12;
  let format: WavFormat | undefined;

  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString('ascii', offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      let formatTag = wavData.readUInt16LE(body);
      if (formatTag === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26) {
        // first two bytes of the SubFormat GUID hold the real tag
        formatTag = wavData.readUInt16LE(body + 24);
      }
      format = {
        formatTag,
        channels: wavData.readUInt16LE(body + 2),
        sampleRate: wavData.readUInt32LE(body + 4),
        bitsPerSample: wavData.readUInt16LE(body + 14)
      };
    } else if (chunkId === 'data') {
      if (!format) {
        throw new InvalidAudioError('Invalid WAV file: data chunk before fmt chunk');
      }
      const end = Math.min(wavData.length, body + chunkSize);
      return deinterleave(wavData.subarray(body, end), format);
    }

    // chunks are word aligned
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new InvalidAudioError('Invalid WAV file: missing data chunk');
}

function deinterleave(data: Buffer, format: WavFormat): AudioClip {
  const { formatTag, channels, sampleRate, bitsPerSample } = format;
  if (channels < 1 || sampleRate < 1) {
    throw new InvalidAudioError(`Invalid WAV file: ${channels} channels at ${sampleRate} Hz`);
  }

  let read: (byteOffset: number) => number;
  if (formatTag === WAVE_FORMAT_PCM && bitsPerSample === 16) {
    read = (byteOffset) => data.readInt16LE(byteOffset) / 32768;
  } else if (formatTag === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32) {
    read = (byteOffset) => data.readFloatLE(byteOffset);
  } else {
    throw new InvalidAudioError(`Unsupported WAV encoding: format ${formatTag}, ${bitsPerSample} bits`);
  }

  const bytesPerSample = bitsPerSample / 8;
  const frameSize = bytesPerSample * channels;
  const frames = Math.floor(data.length / frameSize);
  const out = Array.from({ length: channels }, () => new Float32Array(frames));

  for (let frame = 0; frame < frames; frame++) {
    for (let channel = 0; channel < channels; channel++) {
      out[channel][frame] = read(frame * frameSize + channel * bytesPerSample);
    }
  }

  return { sampleRate, channels: out };
}

/**
 * Encode mono float samples as a 16-bit PCM WAV file
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const headerSize = 44;
  const dataSize = samples.length * 2;
  const wavBuffer = Buffer.alloc(headerSize + dataSize);

  wavBuffer.write('RIFF', 0);
  wavBuffer.writeUInt32LE(36 + dataSize, 4);
  wavBuffer.write('WAVE', 8);

  wavBuffer.write('fmt ', 12);
  wavBuffer.writeUInt32LE(16, 16);
  wavBuffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  wavBuffer.writeUInt16LE(1, 22); // mono
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(sampleRate * 2, 28); // byte rate
  wavBuffer.writeUInt16LE(2, 32); // block align
  wavBuffer.writeUInt16LE(16, 34);

  wavBuffer.write('data', 36);
  wavBuffer.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    wavBuffer.writeInt16LE(Math.round(clamped * 32767), headerSize + i * 2);
  }

  return wavBuffer;
}

/**
 * Average all channels into one
 */
export function downmix(channels: readonly Float32Array[]): Float32Array {
  if (channels.length === 0) return new Float32Array(0);
  if (channels.length === 1) return channels[0];

  const length = Math.min(...channels.map((channel) => channel.length));
  const mono = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    let sum = 0;
    for (const channel of channels) sum += channel[i];
    mono[i] = sum / channels.length;
  }
  return mono;
}

/**
 * Resample mono float audio using ffmpeg
 *
 * @param ffmpegPath - ffmpeg binary, resolved through PATH by default
 */
export async function resampleFloat32(
  samples: Float32Array,
  fromRate: number,
  toRate: number,
  ffmpegPath: string = 'ffmpeg'
): Promise<Float32Array> {
  if (fromRate === toRate) {
    return samples;
  }

  const output = await new Promise<Buffer>((resolve, reject) => {
    const ffmpeg = spawn(ffmpegPath, [
      '-hide_banner',
      '-nostats',
      '-loglevel',
      'error',
      '-f',
      'f32le', // Input format
      '-ar',
      fromRate.toString(),
      '-ac',
      '1',
      '-i',
      'pipe:0',
      '-f',
      'f32le', // Output format
      '-ar',
      toRate.toString(),
      '-ac',
      '1',
      'pipe:1'
    ]);

    const chunks: Buffer[] = [];
    let stderrTail = '';

    ffmpeg.stdout.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    ffmpeg.stderr.on('data', (chunk: Buffer) => {
      stderrTail = (stderrTail + chunk.toString()).slice(-FFMPEG_STDERR_TAIL);
    });

    ffmpeg.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(chunks));
      } else {
        const detail = stderrTail.trim();
        reject(new Error(`ffmpeg resampling exited with code ${code}${detail ? `: ${detail}` : ''}`));
      }
    });

    ffmpeg.on('error', (err) => {
      reject(new Error(`ffmpeg error: ${err.message}`));
    });

    ffmpeg.stdin.on('error', (err) => {
      reject(new Error(`ffmpeg stdin error: ${err.message}`));
    });

    ffmpeg.stdin.end(Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength));
  });

  const resampled = new Float32Array(Math.floor(output.length / 4));
  for (let i = 0; i < resampled.length; i++) {
    resampled[i] = output.readFloatLE(i * 4);
  }
  return resampled;
}

/**
 * Root mean square of `samples[start, start + length)`
 */
export function calculateRms(samples: Float32Array, start = 0, length = samples.length - start): number {
  if (length <= 0) return 0;
  let sumSquares = 0;
  for (let i = start; i < start + length; i++) {
    sumSquares += samples[i] * samples[i];
  }
  return Math.sqrt(sumSquares / length);
}

export function getAudioDurationMs(sampleCount: number, sampleRate: number): number {
  return (sampleCount / sampleRate) * 1000;
}
