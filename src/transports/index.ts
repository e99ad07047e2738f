// ============================================================================
// Transport Layer: public API
// ============================================================================

export type { TransportAdapter, ServerInfo } from './types.js';
export { createMcpServer } from './mcp.js';
export { createSerialQueue } from './serial.js';
export type { SerialQueue } from './serial.js';
export { StdioAdapter } from './stdio.js';
