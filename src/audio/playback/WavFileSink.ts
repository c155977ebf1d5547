import fs from 'fs/promises';
import { PlaybackUnavailableError } from '../../errors.js';
import type { AudioFormat } from '../../types/index.js';
import { encodeWav } from '../output/WavEncoder.js';
import type { PlaybackSink } from './PlaybackSink.js';

/**
 * Writes the audio to a .wav file instead of a device.
 */
export class WavFileSink implements PlaybackSink {
  readonly name = 'wav-file';
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async play(bytes: Int8Array, format: AudioFormat): Promise<void> {
    const wav = encodeWav(bytes, format);
    try {
      await fs.writeFile(this.filePath, wav);
    } catch (error) {
      throw new PlaybackUnavailableError(`Cannot write ${this.filePath}`, { cause: error });
    }
  }
}
