// ============================================================================
// Response Helpers
// ============================================================================
// Outcome constructors for handlers and the rendering used at the protocol edge.
// ============================================================================

import { ok, formatFailure, ToolFailure } from '../../errors.js';
import { ToolOutcome, ToolResponse } from '../types.js';

/**
 * Wrap a payload as a successful outcome
 */
export function toolSuccess(data: unknown): ToolOutcome {
  return ok(data);
}

/**
 * Render a failure as the single "Error: " text block
 */
export function toolError(failure: ToolFailure): ToolResponse {
  return {
    content: [{
      type: 'text',
      text: formatFailure(failure),
    }],
    isError: true,
  };
}

export function renderOutcome(outcome: ToolOutcome): ToolResponse {
  if (!outcome.ok) {
    return toolError(outcome.error);
  }
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(outcome.value, null, 2),
    }],
  };
}
