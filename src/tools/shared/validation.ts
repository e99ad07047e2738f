// ============================================================================
// Validation Helpers
// ============================================================================
// Compiles each tool's SchemaNode into a zod validator so arguments are checked
// before the handler runs, plus typed accessors for handlers.
// ============================================================================

import { z, ZodIssue, ZodIssueCode, ZodTypeAny } from 'zod';
import { err, failures, ok, Result, ToolFailure } from '../../errors.js';
import type { ObjectSchemaNode, SchemaNode, ToolArgs } from '../types.js';

export type ArgsValidator = ZodTypeAny;

function compileString(node: SchemaNode): ZodTypeAny {
  let schema = z.string();
  if (node.pattern !== undefined) {
    schema = schema.regex(new RegExp(node.pattern), `must match pattern ${node.pattern}`);
  }
  return withEnum(schema, node);
}

function compileNumber(node: SchemaNode): ZodTypeAny {
  let schema = z.number();
  if (node.minimum !== undefined) schema = schema.min(node.minimum);
  if (node.maximum !== undefined) schema = schema.max(node.maximum);
  return withEnum(schema, node);
}

function withEnum(schema: ZodTypeAny, node: SchemaNode): ZodTypeAny {
  const allowed = node.enum;
  if (!allowed || allowed.length === 0) return schema;
  return schema.refine(
    (value) => allowed.some((candidate) => candidate === value),
    { message: `must be one of: ${allowed.join(', ')}` }
  );
}

function compileObject(node: SchemaNode): ZodTypeAny {
  const required = new Set(node.required ?? []);
  const shape: Record<string, ZodTypeAny> = {};

  for (const [key, property] of Object.entries(node.properties ?? {})) {
    const compiled = compileSchema(property);
    if (property.default !== undefined) {
      shape[key] = compiled.default(property.default);
    } else if (required.has(key)) {
      shape[key] = compiled;
    } else {
      shape[key] = compiled.optional();
    }
  }

  // Unknown arguments are passed through untouched
  return z.object(shape).passthrough();
}

export function compileSchema(node: SchemaNode): ZodTypeAny {
  switch (node.type) {
    case 'string':
      return compileString(node);
    case 'number':
      return compileNumber(node);
    case 'boolean':
      return withEnum(z.boolean(), node);
    case 'array':
      return z.array(node.items ? compileSchema(node.items) : z.unknown());
    case 'object':
      return compileObject(node);
  }
}

/**
 * Check that a descriptor is internally consistent: every required name is a
 * declared property, at every level of nesting.
 */
export function findSchemaProblems(node: SchemaNode, at = 'inputSchema'): string[] {
  const problems: string[] = [];
  const properties = node.properties ?? {};

  for (const name of node.required ?? []) {
    if (!(name in properties)) {
      problems.push(`${at}.required lists "${name}" which is not a property`);
    }
  }
  for (const [key, property] of Object.entries(properties)) {
    problems.push(...findSchemaProblems(property, `${at}.properties.${key}`));
  }
  if (node.items) {
    problems.push(...findSchemaProblems(node.items, `${at}.items`));
  }
  return problems;
}

export function compileArgsValidator(schema: ObjectSchemaNode): ArgsValidator {
  return compileObject(schema);
}

/** Hosts send null for "not provided"; treat it as absent */
export function stripNulls(args: ToolArgs): ToolArgs {
  return Object.fromEntries(Object.entries(args).filter(([, value]) => value !== null));
}

function isMissing(issue: ZodIssue): boolean {
  return issue.code === ZodIssueCode.invalid_type && issue.received === 'undefined';
}

function issuePath(issue: ZodIssue): string {
  return issue.path.length > 0 ? issue.path.join('.') : 'arguments';
}

export function toValidationFailure(issues: ZodIssue[]): ToolFailure {
  const missing = issues.filter(isMissing).map(issuePath);
  if (missing.length > 0) {
    const label = missing.length > 1 ? 'arguments' : 'argument';
    return failures.missingArgument(missing.join(', '), `Missing required ${label}: ${missing.join(', ')}`);
  }
  const [first] = issues;
  if (first === undefined) {
    return failures.typeMismatch('arguments', 'validation failed');
  }
  return failures.typeMismatch(issuePath(first), first.message);
}

export function validateArgs(validator: ArgsValidator, args: ToolArgs): Result<ToolArgs> {
  const parsed = validator.safeParse(stripNulls(args));
  if (!parsed.success) {
    return err(toValidationFailure(parsed.error.issues));
  }
  const data: ToolArgs = parsed.data;
  return ok(data);
}

// ============================================================================
// Typed Accessors
// ============================================================================

export function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  return typeof value === 'number' ? value : undefined;
}

export function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function optionalStringArray(args: ToolArgs, key: string): string[] | undefined {
  const value = args[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Read a string the schema marks as required. Only fails if a handler is
 * called without the validation pass.
 */
export function requireString(args: ToolArgs, key: string): Result<string> {
  const value = optionalString(args, key);
  if (value === undefined || value === '') {
    return err(failures.missingArgument(key));
  }
  return ok(value);
}
