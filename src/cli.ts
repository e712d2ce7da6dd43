/**
 * dirlock CLI: run a command while holding a directory lock.
 *
 *   dirlock [--poll 10ms] [--update 30ms] [--stale 1s] [--break-stale] <lock-path> -- <command> [args...]
 *
 * Exits with the command's exit code (1 if it was killed by a signal),
 * 1 on lock errors, 2 on usage errors. SIGINT, SIGTERM and SIGHUP are passed
 * on to the command, so the lock is still released when dirlock is interrupted.
 */

import { spawn } from 'node:child_process';
import { parseArgs } from 'node:util';
import { loadLockConfig } from './domains/config/index.js';
import type { LockTimingOptions } from './domains/lock/model/timings.js';
import { DirectoryLock, type RunOptions } from './domains/lock/services/directory-lock.js';
import { removeStaleLock } from './domains/lock/services/stale-handlers.js';
import { DirLockError, ValidationError } from './shared/errors/index.js';
import { createLogger } from './shared/logging/logger.js';
import { formatDuration, parseDurationMs } from './shared/utils/duration-parser.js';

const log = createLogger('cli');

export const USAGE =
  'usage: dirlock [--poll <duration>] [--update <duration>] [--stale <duration>] [--break-stale] <lock-path> -- <command> [args...]';

export interface CliOptions {
  lockPath: string;
  command: string;
  args: string[];
  timings: LockTimingOptions;
  breakStale: boolean;
}

/** Runs the command and resolves with its exit code. */
export type CommandRunner = (command: string, args: string[]) => Promise<number>;

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  exec?: CommandRunner;
  stderr?: (line: string) => void;
}

/**
 * Parse argv (without the node and script entries).
 * Environment timings are defaults; flags override them.
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const separator = argv.indexOf('--');
  if (separator === -1) {
    throw new ValidationError('missing "--" before the command');
  }

  const [command, ...args] = argv.slice(separator + 1);
  if (command === undefined) {
    throw new ValidationError('missing command after "--"');
  }

  const { values, positionals } = parseFlags(argv.slice(0, separator));
  if (positionals.length !== 1) {
    throw new ValidationError(`expected exactly one lock path, got ${positionals.length}`);
  }

  const defaults = loadLockConfig(env);
  return {
    lockPath: positionals[0],
    command,
    args,
    timings: {
      pollIntervalMs: flagDuration('--poll', values.poll) ?? defaults.pollIntervalMs,
      updateIntervalMs: flagDuration('--update', values.update) ?? defaults.updateIntervalMs,
      staleMs: flagDuration('--stale', values.stale) ?? defaults.staleMs,
    },
    breakStale: values['break-stale'] ?? false,
  };
}

function parseFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        poll: { type: 'string' },
        update: { type: 'string' },
        stale: { type: 'string' },
        'break-stale': { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new ValidationError(err instanceof Error ? err.message : String(err));
  }
}

function flagDuration(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  try {
    return parseDurationMs(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`${flag}: ${message}`);
  }
}

/** Signals relayed to the child so dirlock outlives it and releases the lock. */
export const FORWARDED_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const satisfies readonly NodeJS.Signals[];

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Relay termination signals to `child` instead of dying on them.
 * @returns a function that removes the listeners again
 */
export function forwardSignals(
  child: { kill(signal: NodeJS.Signals): boolean },
  source: SignalSource = process
): () => void {
  const forward = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'forwarding signal to command');
    child.kill(signal);
  };

  for (const signal of FORWARDED_SIGNALS) {
    source.on(signal, forward);
  }
  return () => {
    for (const signal of FORWARDED_SIGNALS) {
      source.off(signal, forward);
    }
  };
}

export const spawnCommand: CommandRunner = (command, args) =>
  new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });
    const stopForwarding = forwardSignals(child);
    child.once('error', (err) => {
      stopForwarding();
      reject(err);
    });
    child.once('exit', (code, signal) => {
      stopForwarding();
      if (signal) {
        log.warn({ command, signal }, 'command terminated by signal');
      }
      resolve(code ?? 1);
    });
  });

export async function runCli(argv: string[], ctx: CliContext = {}): Promise<number> {
  const env = ctx.env ?? process.env;
  const exec = ctx.exec ?? spawnCommand;
  const stderr = ctx.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv, env);
  } catch (err) {
    if (err instanceof ValidationError) {
      stderr(`dirlock: ${err.message}`);
      stderr(USAGE);
      return 2;
    }
    throw err;
  }

  let lock: DirectoryLock;
  try {
    lock = new DirectoryLock(options.lockPath, { ...options.timings, logger: log });
  } catch (err) {
    if (err instanceof ValidationError) {
      stderr(`dirlock: ${err.message}`);
      return 2;
    }
    throw err;
  }

  log.debug(
    {
      path: lock.path,
      poll: formatDuration(lock.timings.pollIntervalMs),
      update: formatDuration(lock.timings.updateIntervalMs),
      stale: formatDuration(lock.timings.staleMs),
    },
    'waiting for lock'
  );

  const runOptions: RunOptions = options.breakStale ? { onStale: removeStaleLock() } : {};
  try {
    return await lock.run(() => exec(options.command, options.args), runOptions);
  } catch (err) {
    if (err instanceof DirLockError) {
      stderr(`dirlock: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
