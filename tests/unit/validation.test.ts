import { describe, it, expect } from 'vitest';
import {
  compileArgsValidator,
  findSchemaProblems,
  optionalStringArray,
  requireString,
  validateArgs,
} from '../../src/tools/shared/validation.js';
import type { ObjectSchemaNode } from '../../src/tools/types.js';

const schema: ObjectSchemaNode = {
  type: 'object',
  properties: {
    instance_id: { type: 'string', pattern: '^i-[a-f0-9]+$' },
    include_raw: { type: 'boolean', default: false },
    score: { type: 'number', minimum: 0, maximum: 10 },
    severity: { type: 'string', enum: ['Critical', 'High'] },
    ids: { type: 'array', items: { type: 'string' } },
  },
  required: ['instance_id'],
};

const validator = compileArgsValidator(schema);

describe('validateArgs', () => {
  it('should accept valid arguments and fill defaults', () => {
    expect(validateArgs(validator, { instance_id: 'i-0abc' })).toEqual({
      ok: true,
      value: { instance_id: 'i-0abc', include_raw: false },
    });
  });

  it('should report a missing required argument', () => {
    expect(validateArgs(validator, {})).toEqual({
      ok: false,
      error: {
        kind: 'MissingRequiredArgument',
        argument: 'instance_id',
        message: 'Missing required argument: instance_id',
      },
    });
  });

  it('should list every missing argument in one failure', () => {
    const both = compileArgsValidator({
      type: 'object',
      properties: { a: { type: 'string' }, b: { type: 'number' } },
      required: ['a', 'b'],
    });

    const result = validateArgs(both, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Missing required arguments: a, b');
  });

  it('should reject values that do not match the pattern', () => {
    expect(validateArgs(validator, { instance_id: 'web-1' })).toEqual({
      ok: false,
      error: {
        kind: 'TypeMismatch',
        argument: 'instance_id',
        message: 'Invalid argument instance_id: must match pattern ^i-[a-f0-9]+$',
      },
    });
  });

  it('should reject the wrong type', () => {
    const result = validateArgs(validator, { instance_id: 42 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('TypeMismatch');
    expect(result.error.message).toBe('Invalid argument instance_id: Expected string, received number');
  });

  it('should reject values outside an enum', () => {
    const result = validateArgs(validator, { instance_id: 'i-1', severity: 'Severe' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid argument severity: must be one of: Critical, High');
  });

  it('should enforce numeric bounds', () => {
    const result = validateArgs(validator, { instance_id: 'i-1', score: 11 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('TypeMismatch');
    expect(result.error.message.startsWith('Invalid argument score: ')).toBe(true);
  });

  it('should point at the offending array element', () => {
    const result = validateArgs(validator, { instance_id: 'i-1', ids: ['sg-1', 2] });

    expect(result.ok).toBe(false);
    if (result.ok || result.error.kind !== 'TypeMismatch') return;
    expect(result.error.argument).toBe('ids.1');
  });

  it('should treat null as absent', () => {
    expect(validateArgs(validator, { instance_id: 'i-1', include_raw: null, score: null })).toEqual({
      ok: true,
      value: { instance_id: 'i-1', include_raw: false },
    });
  });

  it('should pass unknown arguments through', () => {
    const result = validateArgs(validator, { instance_id: 'i-1', verbose: true });

    expect(result.ok && result.value.verbose).toBe(true);
  });
});

describe('findSchemaProblems', () => {
  it('should accept a consistent schema', () => {
    expect(findSchemaProblems(schema)).toEqual([]);
  });

  it('should flag required names that are not properties, at any depth', () => {
    expect(
      findSchemaProblems({
        type: 'object',
        properties: {
          filter: { type: 'object', properties: {}, required: ['kind'] },
        },
        required: ['cve_id'],
      })
    ).toEqual([
      'inputSchema.required lists "cve_id" which is not a property',
      'inputSchema.properties.filter.required lists "kind" which is not a property',
    ]);
  });
});

describe('accessors', () => {
  it('should treat an empty required string as missing', () => {
    expect(requireString({ cve_id: '' }, 'cve_id')).toEqual({
      ok: false,
      error: {
        kind: 'MissingRequiredArgument',
        argument: 'cve_id',
        message: 'Missing required argument: cve_id',
      },
    });
    expect(requireString({ cve_id: 'CVE-2024-0001' }, 'cve_id')).toEqual({ ok: true, value: 'CVE-2024-0001' });
  });

  it('should keep only the strings of an array', () => {
    expect(optionalStringArray({ ids: ['sg-1', 3, 'sg-2'] }, 'ids')).toEqual(['sg-1', 'sg-2']);
    expect(optionalStringArray({ ids: 'sg-1' }, 'ids')).toBeUndefined();
  });
});
