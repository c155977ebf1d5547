/**
 * Signed 8-bit quantization
 *
 * Rescales a sound so its own minimum lands on -128 and its own
 * maximum on 127. The rescale is per sound: two sounds of different
 * loudness come out equally loud, only the shape is kept.
 */

import type { AudioFormat, Sound } from '../../types/index.js';
import { MAX_AMPLITUDE } from '../synthesis/SineWave.js';

const BYTE_MIN = -MAX_AMPLITUDE;
const BYTE_MAX = MAX_AMPLITUDE - 1;

/**
 * Convert the sample buffer into signed bytes squashed into [-128, 127].
 *
 * A buffer with no spread (empty, one sample, silence, any constant)
 * has nothing to rescale and quantizes to all zeros.
 */
export function quantize(sound: Sound): Int8Array {
  const { buffer } = sound;
  const bytes = new Int8Array(buffer.length);

  let minS = Infinity;
  let maxS = -Infinity;
  for (const sample of buffer) {
    if (sample < minS) minS = sample;
    if (sample > maxS) maxS = sample;
  }

  const range = maxS - minS;
  if (!(range > 0) || !Number.isFinite(range)) {
    return bytes;
  }

  const newRange = MAX_AMPLITUDE * 2 - 1;
  const scale = newRange / range;
  for (let i = 0; i < buffer.length; i++) {
    const value = Math.round((buffer[i] - minS) * scale + BYTE_MIN);
    bytes[i] = Math.max(BYTE_MIN, Math.min(BYTE_MAX, value));
  }

  return bytes;
}

/**
 * Format of the bytes quantize() produces for a sound.
 */
export function audioFormatOf(sound: Sound): AudioFormat {
  return {
    sampleRate: sound.sampleRate,
    bitDepth: 8,
    channels: 1,
    signed: true,
    littleEndian: true,
  };
}
