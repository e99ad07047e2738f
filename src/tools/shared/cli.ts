// ============================================================================
// CLI Client
// ============================================================================
// Binds a vendor CLI profile to the command executor and maps each
// classification to a typed failure, so handlers only see JSON or a failure.
// ============================================================================

import { err, ok, Result } from '../../errors.js';
import { CommandRunner, executeCommand, ExternalCommandResult } from '../../executor.js';

export interface CliProfile {
  /** Human label used in failure messages, e.g. "AWS CLI" */
  label: string;
  binary: string;
  outputFlag: readonly string[];
  timeoutMs: number;
  installHint?: string;
}

export interface CliClient {
  readonly profile: CliProfile;
  /** Run `<binary> ...args` and return its parsed JSON output */
  run(args: readonly string[]): Promise<Result<unknown>>;
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
}

export function classifyCommandResult(
  profile: CliProfile,
  result: ExternalCommandResult
): Result<unknown> {
  const command = result.argv.join(' ');

  switch (result.status) {
    case 'not_found': {
      const hint = profile.installHint ? ` ${profile.installHint}` : '';
      return err({
        kind: 'CommandNotFound',
        command,
        message: `${profile.label} not found.${hint}`,
      });
    }
    case 'timed_out':
      return err({
        kind: 'CommandTimedOut',
        command,
        timeoutMs: result.timeoutMs,
        message: `${profile.label} command timed out after ${formatSeconds(result.timeoutMs)} seconds`,
      });
    case 'non_zero': {
      const diagnostics = result.stderr || result.stdout;
      const detail = diagnostics.trim();
      return err({
        kind: 'CommandNonZeroExit',
        command,
        exitCode: result.exitCode,
        diagnostics,
        message: detail
          ? `${profile.label} command failed: ${detail}`
          : `${profile.label} command exited with code ${result.exitCode ?? result.signal ?? 'unknown'}`,
      });
    }
    case 'success':
      if (!result.json.ok) {
        return err({
          kind: 'MalformedCommandOutput',
          command,
          message: `Failed to parse JSON output: ${result.json.error}`,
        });
      }
      return ok(result.json.value);
  }
}

export function createCliClient(
  profile: CliProfile,
  runner: CommandRunner = executeCommand
): CliClient {
  return {
    profile,
    async run(args) {
      const result = await runner([profile.binary, ...args], {
        timeoutMs: profile.timeoutMs,
        outputFlag: profile.outputFlag,
      });
      return classifyCommandResult(profile, result);
    },
  };
}
