// ============================================================================
// Stdio Transport Adapter
// ============================================================================
// One session per process: handshake, then sequential tool traffic until the
// host closes stdin.
// ============================================================================

import type { Readable, Writable } from 'stream';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { ServerInfo, TransportAdapter } from './types.js';
import { createMcpServer } from './mcp.js';

export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: Server | null = null;
  private closedCallbacks: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly stdin: Readable = process.stdin,
    private readonly stdout: Writable = process.stdout
  ) {}

  async start(kernel: ToolKernel, info: ServerInfo): Promise<void> {
    this.server = createMcpServer(kernel, info);
    const transport = new StdioServerTransport(this.stdin, this.stdout);

    // The transport does not notice EOF on its own
    this.stdin.once('end', () => this.markClosed('stdin ended'));
    this.server.onclose = () => this.markClosed('transport closed');

    await this.server.connect(transport);
    log(`${info.name} MCP server running on stdio`);
  }

  async stop(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await server.close();
    }
  }

  onClosed(callback: () => void): void {
    this.closedCallbacks.push(callback);
  }

  private markClosed(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    log(`Session ended: ${reason}`);
    for (const callback of this.closedCallbacks) {
      callback();
    }
  }
}
