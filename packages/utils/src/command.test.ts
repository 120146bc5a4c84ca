import { describe, it, expect } from 'vitest';
import { executeCommand, streamCommand } from './command.js';

/**
 * Arguments that run a small script on the current Node binary
 */
function script(source: string): string[] {
  return ['-e', source];
}

function writeStderr(text: string): string {
  return `process.stderr.write(${JSON.stringify(text)});`;
}

describe('streamCommand', () => {
  it('delivers carriage-return and newline separated lines in order', async () => {
    const lines: string[] = [];

    const result = await streamCommand(
      process.execPath,
      script(
        `${writeStderr('frame=1\rframe=2\r\nDur')}` +
          `setTimeout(() => { ${writeStderr('ation: 00:00:05.00\ntail')} process.exitCode = 3; }, 20);`
      ),
      { onLine: (line) => lines.push(line) }
    );

    expect(lines).toEqual(['frame=1', 'frame=2', 'Duration: 00:00:05.00', 'tail']);
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('frame=1\rframe=2\r\nDuration: 00:00:05.00\ntail');
    expect(result.timedOut).toBe(false);
  });

  it('passes a zero exit code through', async () => {
    const lines: string[] = [];

    const result = await streamCommand(process.execPath, script(writeStderr('done\n')), {
      onLine: (line) => lines.push(line),
    });

    expect(result.exitCode).toBe(0);
    expect(lines).toEqual(['done']);
  });

  it('rejects when the command cannot be spawned', async () => {
    await expect(
      streamCommand('/nonexistent/dualcut-test/engine', [], { onLine: () => undefined })
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('kills a command that outlives its timeout', async () => {
    const result = await streamCommand(process.execPath, script('setTimeout(() => {}, 10000);'), {
      onLine: () => undefined,
      timeout: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(128);
  });
});

describe('executeCommand', () => {
  it('collects stdout and the exit code', async () => {
    const result = await executeCommand(
      process.execPath,
      script('process.stdout.write("ffmpeg version 6.1"); process.exitCode = 2;')
    );

    expect(result.stdout).toBe('ffmpeg version 6.1');
    expect(result.exitCode).toBe(2);
  });
});
