/**
 * Raw PCM sink
 *
 * Writes signed 8-bit mono samples to a writable stream and ends it.
 * Pointed at stdout this plays through any raw PCM player, e.g.
 *
 *   soundwave score.csv | aplay -t raw -f S8 -c 1 -r 44100
 *
 * The player has to be told the rate; a sound at any other rate than
 * 44100 Hz gets the matching flags printed on stderr.
 *
 * The stream is ended after one play(), so use one sink per stream.
 */

import { finished } from 'node:stream/promises';
import type { Writable } from 'node:stream';
import { PlaybackUnavailableError } from '../../errors.js';
import { DEFAULT_SAMPLE_RATE } from '../synthesis/SineWave.js';
import type { AudioFormat } from '../../types/index.js';
import type { PlaybackSink } from './PlaybackSink.js';

export class StreamSink implements PlaybackSink {
  readonly name = 'stream';
  private output: Writable;

  constructor(output: Writable) {
    this.output = output;
  }

  async play(bytes: Int8Array, format: AudioFormat): Promise<void> {
    if (format.sampleRate !== DEFAULT_SAMPLE_RATE) {
      console.warn(
        `Stream is ${format.sampleRate} Hz, play it with: aplay -t raw -f S8 -c 1 -r ${Math.round(format.sampleRate)}`
      );
    }
    const chunk = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    try {
      const done = finished(this.output, { readable: false });
      this.output.end(chunk);
      await done;
    } catch (error) {
      throw new PlaybackUnavailableError('Output stream unavailable', { cause: error });
    }
  }
}
