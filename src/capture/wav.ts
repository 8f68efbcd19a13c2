/**
 * PCM16 WAV encoding for transcription uploads.
 *
 * The container is always the canonical 44-byte layout: RIFF descriptor,
 * a 16-byte `fmt ` chunk declaring PCM, then a single `data` chunk.
 */

import type { TrimmedClip } from './types.js';
import { InvalidAudioError } from '../core/errors.js';

export const WAV_HEADER_BYTES = 44;
const PCM_FORMAT = 1;
const BITS_PER_SAMPLE = 16;
const PCM16_SCALE = 32767;

/** Quantize one float sample to a signed 16-bit integer. */
export function toPcm16(sample: number): number {
  if (Number.isNaN(sample)) return 0;
  const clamped = Math.max(-1, Math.min(1, sample));
  return Math.round(clamped * PCM16_SCALE);
}

export function encodeWav(clip: TrimmedClip): Buffer {
  const { samples, channels, sampleRate } = clip;
  if (samples.length !== clip.frameCount * channels) {
    throw new InvalidAudioError(
      `Sample count ${samples.length} does not match ${clip.frameCount} frames x ${channels} channels`,
    );
  }

  const blockAlign = channels * (BITS_PER_SAMPLE / 8);
  const dataLength = samples.length * 2;
  const out = Buffer.alloc(WAV_HEADER_BYTES + dataLength);

  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(36 + dataLength, 4);
  out.write('WAVE', 8, 'ascii');
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(PCM_FORMAT, 20);
  out.writeUInt16LE(channels, 22);
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(sampleRate * blockAlign, 28);
  out.writeUInt16LE(blockAlign, 32);
  out.writeUInt16LE(BITS_PER_SAMPLE, 34);
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataLength, 40);

  let offset = WAV_HEADER_BYTES;
  for (let i = 0; i < samples.length; i++) {
    out.writeInt16LE(toPcm16(samples[i]), offset);
    offset += 2;
  }
  return out;
}

/**
 * Read a PCM16 RIFF/WAVE container back into float samples. Chunks other
 * than `fmt ` and `data` are skipped.
 */
export function decodeWav(bytes: Uint8Array): TrimmedClip {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (buf.length < 12 || buf.toString('ascii', 0, 4) !== 'RIFF' || buf.toString('ascii', 8, 12) !== 'WAVE') {
    throw new InvalidAudioError('Not a RIFF/WAVE container');
  }

  let channels = 0;
  let sampleRate = 0;
  let data: Buffer | null = null;
  let offset = 12;

  while (offset + 8 <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (size < 16 || body + 16 > buf.length) {
        throw new InvalidAudioError('Truncated fmt chunk');
      }
      const format = buf.readUInt16LE(body);
      const bits = buf.readUInt16LE(body + 14);
      if (format !== PCM_FORMAT || bits !== BITS_PER_SAMPLE) {
        throw new InvalidAudioError(`Unsupported encoding: format ${format}, ${bits}-bit`);
      }
      channels = buf.readUInt16LE(body + 2);
      sampleRate = buf.readUInt32LE(body + 4);
    } else if (id === 'data') {
      data = buf.subarray(body, Math.min(body + size, buf.length));
      break;
    }
    // chunks are word-aligned
    offset = body + size + (size % 2);
  }

  if (channels === 0 || sampleRate === 0) {
    throw new InvalidAudioError('Missing fmt chunk');
  }
  if (!data) {
    throw new InvalidAudioError('Missing data chunk');
  }

  const blockAlign = channels * 2;
  const frameCount = Math.floor(data.length / blockAlign);
  const samples = new Float32Array(frameCount * channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data.readInt16LE(i * 2) / PCM16_SCALE;
  }
  return { samples, frameCount, channels, sampleRate };
}
