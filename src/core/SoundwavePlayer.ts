/**
 * Soundwave Player
 *
 * Drives the pipeline end to end: score → sound → signed bytes → sink.
 * Synthesis and quantization run synchronously up front, so bad input
 * fails before anything reaches the sink. Only the hand-over to the
 * sink is asynchronous, and the caller decides whether to wait for it.
 */

import { loadScoreFile, type ScoreLoaderOptions } from '../audio/score/ScoreLoader.js';
import { audioFormatOf, quantize } from '../audio/output/Quantizer.js';
import { durationOf } from '../audio/synthesis/Sound.js';
import type { PlaybackSink } from '../audio/playback/PlaybackSink.js';
import type { PlaybackInfo, Sound } from '../types/index.js';

export interface SoundwavePlayerConfig extends ScoreLoaderOptions {
  /** Log playback start and end */
  verbose: boolean;
}

const DEFAULT_PLAYER_CONFIG: SoundwavePlayerConfig = {
  verbose: false,
  logSkipped: false,
};

export class SoundwavePlayer {
  private sink: PlaybackSink;
  private config: SoundwavePlayerConfig;

  constructor(sink: PlaybackSink, config: Partial<SoundwavePlayerConfig> = {}) {
    this.sink = sink;
    this.config = { ...DEFAULT_PLAYER_CONFIG, ...config };
  }

  /**
   * Quantize a sound and hand it to the sink.
   *
   * Quantization happens before this returns; the returned promise
   * settles when the sink has drained.
   */
  play(sound: Sound): Promise<PlaybackInfo> {
    const bytes = quantize(sound);
    const format = audioFormatOf(sound);
    const info: PlaybackInfo = {
      sampleCount: bytes.length,
      duration: durationOf(sound),
      sampleRate: sound.sampleRate,
    };

    if (this.config.verbose) {
      console.log(`Playing ${info.duration.toFixed(2)}s (${info.sampleCount} samples) on ${this.sink.name}`);
    }

    return this.sink.play(bytes, format).then(() => {
      if (this.config.verbose) {
        console.log(`Playback on ${this.sink.name} complete`);
      }
      return info;
    });
  }

  /**
   * Load a score file and play it.
   */
  async playScoreFile(filePath: string): Promise<PlaybackInfo> {
    const sound = await loadScoreFile(filePath, { logSkipped: this.config.logSkipped });
    return this.play(sound);
  }
}
