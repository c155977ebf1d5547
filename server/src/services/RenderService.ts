import {
  synthesizeNote,
  parseScoreLine,
  loadScore,
  quantize,
  audioFormatOf,
  encodeWav,
  durationOf,
  isSoundwaveError,
  type Sound,
  type ScoreRecord,
} from '../../../src/index.js';
import type { ServerConfig } from '../config.js';
import type { NoteQuery, RenderResult } from '../types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

type RenderConfig = Pick<ServerConfig, 'maxNoteSeconds' | 'maxScoreSeconds' | 'logSkipped'>;

export class RenderService {
  private config: RenderConfig;

  constructor(config: RenderConfig) {
    this.config = config;
  }

  renderNote(query: NoteQuery): RenderResult {
    const key = (query.key ?? '').trim();
    const accidental = (query.accidental ?? 'n').trim();
    const octaveText = (query.octave ?? '0').trim();
    const duration = Number(query.duration);

    if (!key) {
      return { success: false, error: 'Query parameter "key" is required' };
    }
    if (!INTEGER_PATTERN.test(octaveText)) {
      return { success: false, error: 'Query parameter "octave" must be an integer' };
    }
    if (!query.duration || !Number.isFinite(duration) || duration <= 0) {
      return { success: false, error: 'Query parameter "duration" must be a positive number of seconds' };
    }
    if (duration > this.config.maxNoteSeconds) {
      return { success: false, error: `Notes are limited to ${this.config.maxNoteSeconds} seconds` };
    }

    return this.render(() =>
      synthesizeNote(key, accidental, Number.parseInt(octaveText, 10), duration)
    );
  }

  /**
   * Lines are parsed here so the length limits apply before any
   * samples are allocated.
   */
  renderScore(text: string): RenderResult {
    const entries: Array<string | ScoreRecord> = [];
    let totalSeconds = 0;

    for (const line of text.split('\n')) {
      const record = parseScoreLine(line);
      if (!record) {
        // Left for the loader to skip (and log)
        entries.push(line);
        continue;
      }
      if (record.duration > this.config.maxNoteSeconds) {
        return { success: false, error: `Notes are limited to ${this.config.maxNoteSeconds} seconds` };
      }
      totalSeconds += record.duration;
      if (totalSeconds > this.config.maxScoreSeconds) {
        return { success: false, error: `Scores are limited to ${this.config.maxScoreSeconds} seconds` };
      }
      entries.push(record);
    }

    return this.render(() => loadScore(entries, { logSkipped: this.config.logSkipped }));
  }

  /**
   * Input errors come back as a failed result; anything else is a bug
   * and propagates.
   */
  private render(build: () => Sound): RenderResult {
    let sound: Sound;
    try {
      sound = build();
    } catch (error) {
      if (isSoundwaveError(error)) {
        return { success: false, error: error.message };
      }
      throw error;
    }

    const bytes = quantize(sound);
    return {
      success: true,
      wav: encodeWav(bytes, audioFormatOf(sound)),
      sampleCount: bytes.length,
      duration: durationOf(sound),
    };
  }
}
