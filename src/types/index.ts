/**
 * Soundwave Type Definitions
 *
 * Shared value types for the synthesis pipeline and its playback sinks.
 */

/**
 * The seven natural note names (piano white keys)
 */
export type WhiteKey = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';

/**
 * Immutable mono sound. Only created through the factories in
 * audio/synthesis/Sound.
 */
export interface Sound {
  readonly buffer: readonly number[];
  readonly sampleRate: number;        // Samples per second
}

/**
 * One line of a score
 */
export interface ScoreRecord {
  whiteKey: string;
  accidental: string;                 // 'b' flat, '#' sharp, else natural
  octave: number;                     // 0 = octave containing A440
  duration: number;                   // In seconds
}

/**
 * Format handed to a playback sink along with the quantized bytes
 */
export interface AudioFormat {
  sampleRate: number;
  bitDepth: 8;
  channels: 1;
  signed: true;
  littleEndian: true;
}

/**
 * Playback result info
 */
export interface PlaybackInfo {
  sampleCount: number;
  duration: number;                   // In seconds
  sampleRate: number;
}
