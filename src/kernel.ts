// ============================================================================
// Tool Kernel
// ============================================================================
// The kernel owns the tool registry for one server instance: descriptors,
// compiled argument validators, dispatch, and dispatch events. It is built
// once at startup and never mutated afterwards.
// ============================================================================

import { EventEmitter } from 'events';
import { log } from './config.js';
import { err, failures, FailureKind } from './errors.js';
import type { ToolArgs, ToolDescriptor, ToolOutcome, ToolResponse, ToolSpec } from './tools/types.js';
import {
  ArgsValidator,
  compileArgsValidator,
  findSchemaProblems,
  renderOutcome,
  validateArgs,
} from './tools/shared/index.js';

// ============================================================================
// Dispatch Events
// ============================================================================

export interface DispatchEvent {
  type: 'dispatch' | 'result' | 'error';
  tool: string;
  timestamp: string;
  duration_ms?: number;
  /** Set on 'error' events */
  failure?: FailureKind;
  error?: string;
}

export type DispatchEventType = DispatchEvent['type'];

export interface ToolKernel {
  /** Registered tools in declaration order */
  tools: readonly ToolSpec[];

  /** Descriptors for the tools/list response, declaration order */
  listTools(): ToolDescriptor[];

  /**
   * Validate arguments and run the handler. Never throws: every failure,
   * including an unknown tool or a handler exception, comes back as a
   * failed outcome.
   */
  dispatch(name: string, args: ToolArgs): Promise<ToolOutcome>;

  /** dispatch(), rendered to the wire shape */
  invoke(name: string, args: ToolArgs): Promise<ToolResponse>;

  on(event: DispatchEventType, listener: (evt: DispatchEvent) => void): void;

  toolCount: number;
}

interface RegisteredTool {
  spec: ToolSpec;
  validator: ArgsValidator;
}

/**
 * Check registry invariants: unique names, non-empty descriptions, and
 * `required` naming only declared properties.
 */
export function findRegistryProblems(tools: readonly ToolSpec[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const { definition } of tools) {
    if (!definition.name) {
      problems.push('Tool with empty name');
      continue;
    }
    if (seen.has(definition.name)) {
      problems.push(`Duplicate tool name: ${definition.name}`);
    }
    seen.add(definition.name);

    if (!definition.description.trim()) {
      problems.push(`${definition.name}: description is empty`);
    }
    for (const problem of findSchemaProblems(definition.inputSchema)) {
      problems.push(`${definition.name}: ${problem}`);
    }
  }
  return problems;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    const nested: unknown = child;
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Create the tool kernel. Call once at startup.
 */
export function createKernel(tools: readonly ToolSpec[]): ToolKernel {
  const problems = findRegistryProblems(tools);
  if (problems.length > 0) {
    throw new Error(`Invalid tool registry:\n  - ${problems.join('\n  - ')}`);
  }

  const registry = new Map<string, RegisteredTool>(
    tools.map(spec => [
      spec.definition.name,
      { spec, validator: compileArgsValidator(spec.definition.inputSchema) },
    ])
  );
  // Descriptors are published as-is, so nothing downstream may edit them
  const descriptors = tools.map(t => deepFreeze(t.definition));

  log(`Kernel: loaded ${tools.length} tools`);

  // EventEmitter throws on .emit('error') without a listener
  const emitter = new EventEmitter();
  emitter.on('error', () => {});

  function emit(event: DispatchEvent): void {
    emitter.emit(event.type, event);
  }

  async function dispatch(name: string, args: ToolArgs): Promise<ToolOutcome> {
    const startTime = Date.now();
    const finish = (outcome: ToolOutcome): ToolOutcome => {
      const duration_ms = Date.now() - startTime;
      const timestamp = new Date().toISOString();
      if (outcome.ok) {
        emit({ type: 'result', tool: name, timestamp, duration_ms });
      } else {
        log(`Kernel: ${name} failed (${outcome.error.kind}): ${outcome.error.message}`);
        emit({
          type: 'error', tool: name, timestamp, duration_ms,
          failure: outcome.error.kind,
          error: outcome.error.message,
        });
      }
      return outcome;
    };

    emit({ type: 'dispatch', tool: name, timestamp: new Date().toISOString() });

    const entry = registry.get(name);
    if (!entry) {
      return finish(err(failures.unknownTool(name)));
    }

    const validated = validateArgs(entry.validator, args);
    if (!validated.ok) {
      return finish(validated);
    }

    log(`Kernel: dispatch ${name}`);
    try {
      return finish(await entry.spec.handler(validated.value));
    } catch (error) {
      return finish(err(failures.handler(error)));
    }
  }

  return {
    tools,
    listTools: () => [...descriptors],
    dispatch,
    invoke: async (name, args) => renderOutcome(await dispatch(name, args)),
    on: (event, listener) => {
      emitter.on(event, listener);
    },
    toolCount: tools.length,
  };
}
