// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the tool catalogs and the kernel.
// ============================================================================

import type { Result } from '../errors.js';

export type JsonLiteral = string | number | boolean | null;

export type SchemaType = 'object' | 'string' | 'number' | 'boolean' | 'array';

/**
 * JSON-schema-like descriptor. Published to the host as-is and compiled to
 * a validator by the kernel.
 */
export type SchemaNode = {
  type: SchemaType;
  description?: string;
  properties?: Record<string, SchemaNode>;
  items?: SchemaNode;
  required?: string[];
  enum?: JsonLiteral[];
  pattern?: string;
  minimum?: number;
  maximum?: number;
  default?: JsonLiteral;
};

export type ObjectSchemaNode = SchemaNode & {
  type: 'object';
  properties: Record<string, SchemaNode>;
  required?: string[];
};

/** MCP tool descriptor as returned from tools/list */
export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ObjectSchemaNode;
};

export type ToolArgs = Record<string, unknown>;

/** What a handler produces: a JSON-serializable payload or a typed failure */
export type ToolOutcome = Result<unknown>;

/**
 * Standard MCP tool result format. A type alias (not an interface) so it
 * stays assignable to the SDK's open-ended result types.
 */
export type ToolResponse = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * Tool specification combining definition and handler.
 * Handlers receive arguments that already passed the schema check.
 */
export interface ToolSpec {
  definition: ToolDescriptor;
  handler: (args: ToolArgs) => Promise<ToolOutcome>;
}
