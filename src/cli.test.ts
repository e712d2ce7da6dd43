import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, stat, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { EventEmitter } from 'node:events';
import {
  FORWARDED_SIGNALS,
  forwardSignals,
  parseCliArgs,
  runCli,
  USAGE,
  type CommandRunner,
} from './cli.js';
import { ValidationError } from './shared/errors/index.js';

describe('parseCliArgs', () => {
  it('splits the lock path from the command', () => {
    expect(parseCliArgs(['/tmp/job.lock', '--', 'make', '-j4', 'all'])).toEqual({
      lockPath: '/tmp/job.lock',
      command: 'make',
      args: ['-j4', 'all'],
      timings: { pollIntervalMs: undefined, updateIntervalMs: undefined, staleMs: undefined },
      breakStale: false,
    });
  });

  it('parses timing flags and --break-stale', () => {
    const options = parseCliArgs([
      '--poll',
      '20ms',
      '--stale',
      '2s',
      '--break-stale',
      '/tmp/job.lock',
      '--',
      'true',
    ]);

    expect(options.timings).toEqual({ pollIntervalMs: 20, updateIntervalMs: undefined, staleMs: 2000 });
    expect(options.breakStale).toBe(true);
  });

  it('falls back to the environment and lets flags win', () => {
    const env = { DIRLOCK_POLL_INTERVAL: '50ms', DIRLOCK_STALE: '10s' };
    const options = parseCliArgs(['--stale', '3s', '/tmp/job.lock', '--', 'true'], env);

    expect(options.timings).toEqual({ pollIntervalMs: 50, updateIntervalMs: undefined, staleMs: 3000 });
  });

  it('keeps flags after the separator as command arguments', () => {
    const options = parseCliArgs(['/tmp/job.lock', '--', 'ls', '--poll', '--']);
    expect(options.command).toBe('ls');
    expect(options.args).toEqual(['--poll', '--']);
  });

  it('rejects malformed invocations', () => {
    expect(() => parseCliArgs(['/tmp/job.lock', 'make'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['/tmp/job.lock', '--'])).toThrow('missing command after "--"');
    expect(() => parseCliArgs(['--', 'make'])).toThrow('expected exactly one lock path, got 0');
    expect(() => parseCliArgs(['--poll', 'soon', '/tmp/job.lock', '--', 'make'])).toThrow(
      '--poll: invalid duration: soon'
    );
    expect(() => parseCliArgs(['--bogus', '/tmp/job.lock', '--', 'make'])).toThrow(ValidationError);
  });
});

describe('runCli', () => {
  let tmpDir: string;
  let lines: string[];

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'dirlock-cli-'));
    lines = [];
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  const stderr = (line: string) => {
    lines.push(line);
  };

  it('runs the command under the lock and returns its exit code', async () => {
    const lockPath = join(tmpDir, 'run.lock');
    const calls: Array<{ command: string; args: string[]; held: boolean }> = [];
    const exec: CommandRunner = async (command, args) => {
      const held = (await stat(lockPath)).isDirectory();
      calls.push({ command, args, held });
      return 3;
    };

    const code = await runCli([lockPath, '--', 'deploy', '--dry-run'], { env: {}, exec, stderr });

    expect(code).toBe(3);
    expect(calls).toEqual([{ command: 'deploy', args: ['--dry-run'], held: true }]);
    await expect(stat(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('prints usage and exits 2 on bad arguments', async () => {
    const code = await runCli(['only-a-path'], { env: {}, stderr });

    expect(code).toBe(2);
    expect(lines).toEqual(['dirlock: missing "--" before the command', USAGE]);
  });

  it('exits 2 on inconsistent timings', async () => {
    const lockPath = join(tmpDir, 'timings.lock');
    const code = await runCli(['--update', '2s', '--stale', '1s', lockPath, '--', 'true'], {
      env: {},
      stderr,
    });

    expect(code).toBe(2);
    expect(lines).toEqual(['dirlock: updateIntervalMs (2000) must be smaller than staleMs (1000)']);
  });

  it('exits 1 on a stale lock', async () => {
    const lockPath = join(tmpDir, 'stale.lock');
    await mkdir(lockPath);
    const exec: CommandRunner = async () => 0;

    const code = await runCli(['--poll', '10ms', '--stale', '50ms', lockPath, '--', 'true'], {
      env: {},
      exec,
      stderr,
    });

    expect(code).toBe(1);
    expect(lines).toEqual([`dirlock: Stale lock detected: ${lockPath}`]);
  });

  it('breaks a stale lock with --break-stale', async () => {
    const lockPath = join(tmpDir, 'broken.lock');
    await mkdir(lockPath);
    const exec: CommandRunner = async () => 0;

    const code = await runCli(
      ['--poll', '10ms', '--stale', '50ms', '--break-stale', lockPath, '--', 'true'],
      { env: {}, exec, stderr }
    );

    expect(code).toBe(0);
    expect(lines).toEqual([]);
  });
});

describe('forwardSignals', () => {
  it('relays termination signals to the child until stopped', () => {
    const source = new EventEmitter();
    const received: string[] = [];
    const child = {
      kill: (signal: NodeJS.Signals) => {
        received.push(signal);
        return true;
      },
    };

    const stop = forwardSignals(child, source);
    expect(source.listenerCount('SIGINT')).toBe(1);
    expect(source.listenerCount('SIGTERM')).toBe(1);

    source.emit('SIGINT', 'SIGINT');
    source.emit('SIGTERM', 'SIGTERM');
    expect(received).toEqual(['SIGINT', 'SIGTERM']);

    stop();
    for (const signal of FORWARDED_SIGNALS) {
      expect(source.listenerCount(signal)).toBe(0);
    }
    source.emit('SIGHUP', 'SIGHUP');
    expect(received).toEqual(['SIGINT', 'SIGTERM']);
  });
});
