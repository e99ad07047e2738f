// ============================================================================
// Failure Taxonomy
// ============================================================================
// Handlers and normalizers return Result values instead of throwing. The
// protocol layer is the only place a failure becomes "Error: ..." text.
// ============================================================================

export type ToolFailure =
  | { kind: 'UnknownTool'; message: string; tool: string }
  | { kind: 'MissingRequiredArgument'; message: string; argument: string }
  | { kind: 'TypeMismatch'; message: string; argument: string }
  | { kind: 'CommandNotFound'; message: string; command: string }
  | { kind: 'CommandTimedOut'; message: string; command: string; timeoutMs: number }
  | {
      kind: 'CommandNonZeroExit';
      message: string;
      command: string;
      exitCode: number | null;
      /** stderr (or stdout when stderr is empty), verbatim */
      diagnostics: string;
    }
  | { kind: 'MalformedCommandOutput'; message: string; command: string }
  | { kind: 'ExtractionError'; message: string }
  | { kind: 'ResolutionError'; message: string }
  | { kind: 'HandlerError'; message: string };

export type FailureKind = ToolFailure['kind'];

export type Result<T, E = ToolFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err(error: ToolFailure): Result<never> {
  return { ok: false, error };
}

// ============================================================================
// Constructors
// ============================================================================

export const failures = {
  unknownTool: (tool: string): ToolFailure => ({
    kind: 'UnknownTool',
    tool,
    message: `Unknown tool: ${tool}`,
  }),

  missingArgument: (argument: string, message?: string): ToolFailure => ({
    kind: 'MissingRequiredArgument',
    argument,
    message: message ?? `Missing required argument: ${argument}`,
  }),

  typeMismatch: (argument: string, reason: string): ToolFailure => ({
    kind: 'TypeMismatch',
    argument,
    message: `Invalid argument ${argument}: ${reason}`,
  }),

  extraction: (message: string): ToolFailure => ({ kind: 'ExtractionError', message }),

  resolution: (message: string): ToolFailure => ({ kind: 'ResolutionError', message }),

  handler: (error: unknown): ToolFailure => ({
    kind: 'HandlerError',
    message: error instanceof Error ? error.message : String(error),
  }),
};

/** Prefix the host looks for to tell a failed call from a summary */
export const ERROR_PREFIX = 'Error: ';

export function formatFailure(failure: ToolFailure): string {
  return `${ERROR_PREFIX}${failure.message}`;
}
