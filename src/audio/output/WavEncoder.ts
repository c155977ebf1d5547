/**
 * RIFF/WAVE encoding for quantized 8-bit mono audio.
 *
 * WAVE stores 8-bit PCM unsigned (silence = 128), so every signed
 * sample is written offset by +128. Header layout follows the
 * canonical 44-byte PCM header.
 */

import type { AudioFormat } from '../../types/index.js';

export const WAV_HEADER_SIZE = 44;

const PCM_FORMAT = 1;
const FMT_CHUNK_SIZE = 16;

export function encodeWav(bytes: Int8Array, format: AudioFormat): Uint8Array {
  const sampleRate = Math.round(format.sampleRate);
  const bytesPerSample = format.bitDepth / 8;
  const blockAlign = format.channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;
  const dataLength = bytes.length;
  // Chunks are word aligned
  const padding = dataLength % 2;
  const totalLength = WAV_HEADER_SIZE + dataLength + padding;

  const out = new Uint8Array(totalLength);
  const view = new DataView(out.buffer);

  writeString(view, 0, 'RIFF');
  view.setUint32(4, totalLength - 8, true);
  writeString(view, 8, 'WAVE');
  writeString(view, 12, 'fmt ');
  view.setUint32(16, FMT_CHUNK_SIZE, true);
  view.setUint16(20, PCM_FORMAT, true);
  view.setUint16(22, format.channels, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, format.bitDepth, true);
  writeString(view, 36, 'data');
  view.setUint32(40, dataLength, true);

  for (let i = 0; i < dataLength; i++) {
    out[WAV_HEADER_SIZE + i] = bytes[i] + 128;
  }

  return out;
}

function writeString(view: DataView, offset: number, text: string): void {
  for (let index = 0; index < text.length; index += 1) {
    view.setUint8(offset + index, text.charCodeAt(index));
  }
}
