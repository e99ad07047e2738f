// ============================================================================
// Transport Adapter Interface
// ============================================================================

import type { ToolKernel } from '../kernel.js';

/** Identity the server reports during the initialize handshake */
export interface ServerInfo {
  name: string;
  version: string;
}

/**
 * A transport adapter exposes the kernel over one protocol framing. Adapters
 * create their own MCP Server, connect their own transport, and manage their
 * own lifecycle.
 */
export interface TransportAdapter {
  readonly name: string;
  start(kernel: ToolKernel, info: ServerInfo): Promise<void>;
  stop(): Promise<void>;
  /** Register a callback for when the peer disconnects */
  onClosed(callback: () => void): void;
}
