import { describe, it, expect, vi, afterEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { StreamSink } from '../StreamSink.js';
import { PlaybackUnavailableError } from '../../../errors.js';
import type { AudioFormat } from '../../../types/index.js';

const format: AudioFormat = {
  sampleRate: 44100,
  bitDepth: 8,
  channels: 1,
  signed: true,
  littleEndian: true,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('StreamSink', () => {
  it('stays quiet at the default rate', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await new StreamSink(new PassThrough()).play(new Int8Array([0]), format);
    expect(warn).not.toHaveBeenCalled();
  });

  it('prints the player flags for any other rate', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await new StreamSink(new PassThrough()).play(new Int8Array([0]), { ...format, sampleRate: 8000 });
    expect(warn).toHaveBeenCalledWith('Stream is 8000 Hz, play it with: aplay -t raw -f S8 -c 1 -r 8000');
  });

  it('writes the signed bytes as-is and ends the stream', async () => {
    const output = new PassThrough();
    const sink = new StreamSink(output);

    await sink.play(new Int8Array([-128, -1, 0, 127]), format);

    const written: Buffer = output.read();
    expect(Array.from(written)).toEqual([0x80, 0xff, 0x00, 0x7f]);
    expect(output.writableEnded).toBe(true);
  });

  it('writes only the view of a shared buffer', async () => {
    const output = new PassThrough();
    const backing = new Int8Array([9, 9, 1, 2, 9]);

    await new StreamSink(output).play(backing.subarray(2, 4), format);

    const written: Buffer = output.read();
    expect(Array.from(written)).toEqual([1, 2]);
  });

  it('rejects with PlaybackUnavailableError when the stream fails', async () => {
    const broken = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('device busy'));
      },
    });

    const playback = new StreamSink(broken).play(new Int8Array([1, 2, 3]), format);

    const error: unknown = await playback.catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(PlaybackUnavailableError);
    expect(error).toHaveProperty('code', 'PLAYBACK_UNAVAILABLE');
    expect(error).toHaveProperty('cause.message', 'device busy');
  });
});
