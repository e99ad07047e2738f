// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with ListTools + CallTool handlers wired to the kernel.
// The SDK performs the initialize handshake before either handler is reached.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import { createSerialQueue, SerialQueue } from './serial.js';
import type { ServerInfo } from './types.js';

/**
 * Create an MCP Server wired to the given kernel. Requests are answered
 * strictly in arrival order through `queue`.
 */
export function createMcpServer(
  kernel: ToolKernel,
  info: ServerInfo,
  queue: SerialQueue = createSerialQueue()
): Server {
  const server = new Server(info, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () =>
    queue.run(async () => ({ tools: kernel.listTools() }))
  );

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args ?? {}, null, 2));

    return queue.run(() => kernel.invoke(name, args ?? {}));
  });

  return server;
}
