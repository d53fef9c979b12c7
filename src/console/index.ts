#!/usr/bin/env node
/**
 * tabletalk MCP Server
 *
 * Conversational analysis of uploaded CSV / Excel datasets. Each question
 * runs through the query executor and is recorded in its session, success
 * or not.
 *
 * Transport: stdio (stdout carries JSON-RPC, logs go to stderr)
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createDefaultAnalystEngine, type AnalystService } from './analyst/engine.js';
import { registerAnalystTools } from './analyst/tools/analyst-tools.js';

// =============================================================================
// MCP SERVER INSTANCE
// =============================================================================

const server = new McpServer({
  name: 'tabletalk',
  version: '0.1.0',
});

// =============================================================================
// STDIO TRANSPORT
// =============================================================================

async function runStdio(service: AnalystService): Promise<void> {
  // Register analyst tools (ingest_dataset, create_session, submit_query, get_history, analyst_status)
  registerAnalystTools(server, service);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('tabletalk running on stdio');
}

// =============================================================================
// SHUTDOWN HANDLERS
// =============================================================================

function setupShutdownHandlers(service: AnalystService): void {
  const shutdown = () => {
    console.error('[Shutdown] Closing database...');
    service.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// =============================================================================
// ENTRY POINT
// =============================================================================

async function main(): Promise<void> {
  const service = createDefaultAnalystEngine();
  setupShutdownHandlers(service);
  return runStdio(service);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
