#!/usr/bin/env node

/**
 * Stdio entry point. stdout carries the protocol, so all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';
import { createServer } from './server.js';

dotenv.config();

async function main(): Promise<void> {
  console.error('Starting Tollgate MCP Server...');

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('Tollgate MCP Server running on stdio');

  process.on('SIGINT', () => {
    console.error('Shutting down...');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
