import { describe, it, expect, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@dualcut/utils';
import { ProbeError } from '@dualcut/core';
import { FFProbe } from './ffprobe.js';

const MISSING = '/nonexistent/dualcut-test/recording.mkv';

function result(partial: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false, ...partial };
}

function probeWith(run: CommandRunner['run']) {
  const runMock = vi.fn(run);
  const probe = new FFProbe('ffprobe', { run: runMock, stream: vi.fn() });
  return { probe, run: runMock };
}

describe('FFProbe.describe', () => {
  it('selects the first video stream with dimensions', async () => {
    const stdout = JSON.stringify({
      streams: [
        { codec_name: 'aac', codec_type: 'audio' },
        { codec_name: 'mjpeg', codec_type: 'video' },
        { codec_name: 'h264', codec_type: 'video', width: 3840, height: 1080 },
      ],
    });
    const { probe, run } = probeWith(async () => result({ stdout }));

    await expect(probe.describe(MISSING)).resolves.toEqual({
      path: MISSING,
      width: 3840,
      height: 1080,
      codec: 'h264',
      fileSize: undefined,
    });
    expect(run).toHaveBeenCalledWith(
      'ffprobe',
      ['-v', 'error', '-show_entries', 'stream=width,height,codec_name,codec_type', '-of', 'json', MISSING],
      { timeout: 60000 }
    );
  });

  it('reports a missing codec name as unknown', async () => {
    const stdout = JSON.stringify({ streams: [{ codec_type: 'video', width: 1920, height: 1080 }] });
    const { probe } = probeWith(async () => result({ stdout }));

    const video = await probe.describe(MISSING);
    expect(video.codec).toBe('unknown');
  });

  it('fails when no video stream carries dimensions', async () => {
    const stdout = JSON.stringify({ streams: [{ codec_name: 'aac', codec_type: 'audio' }] });
    const { probe } = probeWith(async () => result({ stdout }));

    await expect(probe.describe(MISSING)).rejects.toThrow('Failed to analyze video: No video stream found in file');
  });

  it('fails on malformed JSON', async () => {
    const { probe } = probeWith(async () => result({ stdout: 'not json' }));
    await expect(probe.describe(MISSING)).rejects.toBeInstanceOf(ProbeError);
  });

  it('fails on a non-zero exit with the diagnostic text', async () => {
    const { probe } = probeWith(async () =>
      result({ exitCode: 1, stderr: `${MISSING}: No such file or directory\n` })
    );
    await expect(probe.describe(MISSING)).rejects.toThrow(
      `Failed to analyze video: ${MISSING}: No such file or directory`
    );
  });

  it('fails when ffprobe cannot be spawned', async () => {
    const { probe } = probeWith(async () => {
      throw new Error('spawn ffprobe ENOENT');
    });
    await expect(probe.describe(MISSING)).rejects.toThrow('Failed to analyze video: spawn ffprobe ENOENT');
  });
});

describe('FFProbe.duration', () => {
  it('parses a plain float of seconds', async () => {
    const { probe } = probeWith(async () => result({ stdout: '645.200000\n' }));
    await expect(probe.duration(MISSING)).resolves.toBe(645.2);
  });

  it('rejects output that is not a number', async () => {
    const { probe } = probeWith(async () => result({ stdout: 'N/A\n' }));
    await expect(probe.duration(MISSING)).rejects.toThrow('Failed to analyze video: Failed to parse duration: N/A');
  });
});
