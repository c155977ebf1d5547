import type { AudioFormat } from '../../types/index.js';

/**
 * Anything that can take quantized audio and play it: a pipe into an
 * audio player, a file, an HTTP response.
 *
 * play() resolves once the audio has been fully handed over (drained)
 * and rejects with PlaybackUnavailableError when the sink cannot take it.
 */
export interface PlaybackSink {
  readonly name: string;
  play(bytes: Int8Array, format: AudioFormat): Promise<void>;
}
