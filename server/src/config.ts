export interface ServerConfig {
  port: number;
  /** Largest accepted score body */
  maxScoreBytes: number;
  /** Longest single note /api/note will render, in seconds */
  maxNoteSeconds: number;
  /** Longest score /api/score will render, in seconds */
  maxScoreSeconds: number;
  /** Log skipped score lines */
  logSkipped: boolean;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: numberFromEnv(env.PORT, 3001),
    maxScoreBytes: numberFromEnv(env.MAX_SCORE_BYTES, 64 * 1024),
    maxNoteSeconds: numberFromEnv(env.MAX_NOTE_SECONDS, 10),
    maxScoreSeconds: numberFromEnv(env.MAX_SCORE_SECONDS, 120),
    logSkipped: env.SOUNDWAVE_LOG_SKIPPED === '1',
  };
}
