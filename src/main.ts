/**
 * soundwave <score.csv> [--out <file.wav>]
 *
 * Plays a score. Without --out the raw signed 8-bit PCM goes to stdout:
 *
 *   soundwave data/scale.csv | aplay -t raw -f S8 -c 1 -r 44100
 */

import { SoundwavePlayer } from './core/SoundwavePlayer.js';
import { StreamSink } from './audio/playback/StreamSink.js';
import { WavFileSink } from './audio/playback/WavFileSink.js';
import type { PlaybackSink } from './audio/playback/PlaybackSink.js';

export interface CliOptions {
  scorePath: string;
  outPath?: string;
}

export function parseArgs(argv: readonly string[]): CliOptions | null {
  let scorePath: string | undefined;
  let outPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--out' || arg === '-o') {
      outPath = argv[++i];
      if (!outPath) return null;
    } else if (!scorePath) {
      scorePath = arg;
    } else {
      return null;
    }
  }

  return scorePath ? { scorePath, outPath } : null;
}

export async function run(argv: readonly string[]): Promise<number> {
  const options = parseArgs(argv);
  if (!options) {
    console.error('Usage: soundwave <score.csv> [--out <file.wav>]');
    return 2;
  }

  // Logs go to stderr whenever stdout carries the audio
  const sink: PlaybackSink = options.outPath
    ? new WavFileSink(options.outPath)
    : new StreamSink(process.stdout);
  const player = new SoundwavePlayer(sink, {
    verbose: Boolean(options.outPath),
    logSkipped: process.env.SOUNDWAVE_LOG_SKIPPED === '1',
  });

  try {
    const info = await player.playScoreFile(options.scorePath);
    if (options.outPath) {
      console.log(`Wrote ${info.sampleCount} samples to ${options.outPath}`);
    }
    return 0;
  } catch (error) {
    console.error('Playback error:', error instanceof Error ? error.message : error);
    return 1;
  }
}
