import {
  CommandRunner,
  ExecuteOptions,
  ExternalCommandResult,
  parseJsonOutput,
  withOutputFlag,
} from '../../src/executor.js';

export interface RecordedCall {
  argv: string[];
  options: ExecuteOptions;
}

export type FakeResponder = (argv: string[]) => ExternalCommandResult;

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
}

/**
 * A CommandRunner that never spawns anything. Each call is answered by the
 * next responder in line; the last one repeats once the list runs out.
 */
export function createFakeRunner(...responders: FakeResponder[]): FakeRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (argvIn, options) => {
    const argv = withOutputFlag(argvIn, options.outputFlag);
    calls.push({ argv, options });
    const responder = responders[Math.min(calls.length - 1, responders.length - 1)];
    if (!responder) {
      throw new Error(`No fake response for: ${argv.join(' ')}`);
    }
    return responder(argv);
  };
  return { runner, calls };
}

// ============================================================================
// Canned results
// ============================================================================

export function jsonResult(value: unknown): FakeResponder {
  return (argv) => stdoutResult(JSON.stringify(value))(argv);
}

export function stdoutResult(stdout: string): FakeResponder {
  return (argv) => ({
    status: 'success',
    exitCode: 0,
    argv,
    stdout,
    stderr: '',
    durationMs: 5,
    json: parseJsonOutput(stdout),
  });
}

export function nonZeroResult(stderr: string, exitCode = 255, stdout = ''): FakeResponder {
  return (argv) => ({
    status: 'non_zero',
    exitCode,
    signal: null,
    argv,
    stdout,
    stderr,
    durationMs: 5,
  });
}

export function timedOutResult(timeoutMs: number): FakeResponder {
  return (argv) => ({
    status: 'timed_out',
    timeoutMs,
    argv,
    stdout: '',
    stderr: '',
    durationMs: timeoutMs,
  });
}

export function notFoundResult(): FakeResponder {
  return (argv) => ({
    status: 'not_found',
    argv,
    stdout: '',
    stderr: `spawn ${argv[0]} ENOENT`,
    durationMs: 1,
  });
}
