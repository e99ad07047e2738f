// ============================================================================
// Command Executor
// ============================================================================
// Runs one external program per call, bounded by a wall-clock timeout, and
// classifies what happened. Never retries.
// ============================================================================

import { spawn } from 'child_process';
import { log } from './config.js';

export type ParsedJson = { ok: true; value: unknown } | { ok: false; error: string };

interface CommandOutcomeBase {
  /** argv as spawned, output flag included */
  argv: string[];
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type ExternalCommandResult =
  | (CommandOutcomeBase & { status: 'success'; exitCode: 0; json: ParsedJson })
  | (CommandOutcomeBase & {
      status: 'non_zero';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
    })
  | (CommandOutcomeBase & { status: 'timed_out'; timeoutMs: number })
  | (CommandOutcomeBase & { status: 'not_found' });

export type ExitStatus = ExternalCommandResult['status'];

export interface ExecuteOptions {
  timeoutMs: number;
  /**
   * Machine-readable output flag, e.g. ['--output', 'json']. Appended unless
   * argv already contains its first element.
   */
  outputFlag?: readonly string[];
  env?: Record<string, string>;
}

export type CommandRunner = (
  argv: readonly string[],
  options: ExecuteOptions
) => Promise<ExternalCommandResult>;

export function withOutputFlag(argv: readonly string[], flag?: readonly string[]): string[] {
  if (!flag || flag.length === 0 || argv.includes(flag[0])) {
    return [...argv];
  }
  return [...argv, ...flag];
}

export function parseJsonOutput(stdout: string): ParsedJson {
  try {
    return { ok: true, value: JSON.parse(stdout) };
  } catch (parseErr) {
    return {
      ok: false,
      error: parseErr instanceof Error ? parseErr.message : String(parseErr),
    };
  }
}

export const executeCommand: CommandRunner = (argvIn, options) => {
  const argv = withOutputFlag(argvIn, options.outputFlag);
  const startedAt = Date.now();
  const base = (stdout: string, stderr: string): CommandOutcomeBase => ({
    argv,
    stdout,
    stderr,
    durationMs: Date.now() - startedAt,
  });

  const [command, ...args] = argv;
  if (command === undefined) {
    const empty: ExternalCommandResult = { ...base('', 'No command given'), status: 'not_found' };
    return Promise.resolve(empty);
  }

  log(`executor: ${argv.join(' ')} (timeout ${options.timeoutMs}ms)`);

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (result: ExternalCommandResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      log(`executor: ${command} -> ${result.status} in ${result.durationMs}ms`);
      resolve(result);
    };

    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, ...options.env },
    });

    // Settle on the timer itself: a wrapper's grandchildren can hold the
    // pipes open after the child is killed, and 'close' waits for them.
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
      proc.stdout.destroy();
      proc.stderr.destroy();
      finish({ ...base(stdout, stderr), status: 'timed_out', timeoutMs: options.timeoutMs });
    }, options.timeoutMs);

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        finish({ ...base(stdout, stderr || error.message), status: 'not_found' });
        return;
      }
      finish({
        ...base(stdout, stderr || error.message),
        status: 'non_zero',
        exitCode: null,
        signal: null,
      });
    });

    proc.on('close', (code, signal) => {
      if (timedOut) {
        finish({ ...base(stdout, stderr), status: 'timed_out', timeoutMs: options.timeoutMs });
        return;
      }
      if (code !== 0) {
        finish({ ...base(stdout, stderr), status: 'non_zero', exitCode: code, signal });
        return;
      }
      finish({ ...base(stdout, stderr), status: 'success', exitCode: 0, json: parseJsonOutput(stdout) });
    });
  });
};
