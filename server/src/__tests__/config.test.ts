import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      maxScoreBytes: 65536,
      maxNoteSeconds: 10,
      maxScoreSeconds: 120,
      logSkipped: false,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({ PORT: '8080', MAX_SCORE_BYTES: '1024', MAX_NOTE_SECONDS: '2.5', MAX_SCORE_SECONDS: '30', SOUNDWAVE_LOG_SKIPPED: '1' })
    ).toEqual({
      port: 8080,
      maxScoreBytes: 1024,
      maxNoteSeconds: 2.5,
      maxScoreSeconds: 30,
      logSkipped: true,
    });
  });

  it('ignores values that are not positive numbers', () => {
    const config = loadConfig({ PORT: 'abc', MAX_SCORE_BYTES: '-5', MAX_NOTE_SECONDS: '0' });
    expect(config.port).toBe(3001);
    expect(config.maxScoreBytes).toBe(65536);
    expect(config.maxNoteSeconds).toBe(10);
  });
});
