/**
 * Score loading
 *
 * A score is plain text, one note per line:
 *
 *   <whiteKey>,<accidental>,<octave>,<durationSeconds>
 *
 * e.g. "C,#,1,0.25". Lines that do not have exactly four fields, or
 * whose octave or duration is not a number, are skipped rather than
 * failing the whole score.
 */

import fs from 'fs/promises';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { synthesizeNote } from '../synthesis/NoteSynth.js';
import { concatenate } from '../synthesis/Sound.js';
import { EmptyCompositionError } from '../../errors.js';
import type { ScoreRecord, Sound } from '../../types/index.js';

const FIELD_COUNT = 4;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface ScoreLoaderOptions {
  /** Log each skipped line with console.warn (stderr) */
  logSkipped: boolean;
}

const DEFAULT_OPTIONS: ScoreLoaderOptions = {
  logSkipped: false,
};

/**
 * Parse one score line. Returns null when the line is not a note.
 */
export function parseScoreLine(line: string): ScoreRecord | null {
  const elements = line.replace(/\r$/, '').split(',');
  // Trailing empty fields (e.g. "A,n,0,0.5,") don't count
  while (elements.length > 0 && elements[elements.length - 1] === '') {
    elements.pop();
  }
  if (elements.length !== FIELD_COUNT) return null;

  const [keyField, accidentalField, octaveField, durationField] = elements;
  const whiteKey = keyField.trim().charAt(0);
  const accidental = accidentalField.trim().charAt(0);
  if (!whiteKey) return null;

  const octaveText = octaveField.trim();
  if (!INTEGER_PATTERN.test(octaveText)) return null;
  const octave = Number.parseInt(octaveText, 10);

  const durationText = durationField.trim();
  if (!DECIMAL_PATTERN.test(durationText)) return null;
  const duration = Number(durationText);
  if (!Number.isFinite(duration) || duration < 0) return null;

  return { whiteKey, accidental, octave, duration };
}

/**
 * Build one sound from a sequence of score lines or records, in order.
 *
 * @throws EmptyCompositionError when no line is a valid note
 * @throws InvalidKeyError when a well-formed line names a key outside A-G
 */
export function loadScore(
  source: Iterable<string | ScoreRecord>,
  options: Partial<ScoreLoaderOptions> = {}
): Sound {
  const { logSkipped } = { ...DEFAULT_OPTIONS, ...options };
  const notes: Sound[] = [];

  let lineNumber = 0;
  for (const entry of source) {
    lineNumber++;
    const record = typeof entry === 'string' ? parseScoreLine(entry) : entry;
    if (!record) {
      if (logSkipped) {
        console.warn(`Skipping score line ${lineNumber}: ${JSON.stringify(entry)}`);
      }
      continue;
    }
    notes.push(synthesizeNote(record.whiteKey, record.accidental, record.octave, record.duration));
  }

  if (notes.length === 0) {
    throw new EmptyCompositionError('Score contains no valid note records');
  }

  return concatenate(notes);
}

export function loadScoreText(text: string, options: Partial<ScoreLoaderOptions> = {}): Sound {
  return loadScore(text.split('\n'), options);
}

export async function loadScoreFile(
  filePath: string,
  options: Partial<ScoreLoaderOptions> = {}
): Promise<Sound> {
  const text = await fs.readFile(filePath, 'utf-8');
  return loadScoreText(text, options);
}

/**
 * Read a score line by line from a stream (a file stream, stdin, ...).
 */
export async function loadScoreStream(
  input: Readable,
  options: Partial<ScoreLoaderOptions> = {}
): Promise<Sound> {
  const lines: string[] = [];
  const reader = createInterface({ input, crlfDelay: Infinity });
  for await (const line of reader) {
    lines.push(line);
  }
  return loadScore(lines, options);
}
