/**
 * Tollgate MCP Server
 * Exposes policy validation, middleware generation and request evaluation via Model Context Protocol
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { PolicyValidateTool } from './tools/policy-validate.js';
import { PolicyGenerateTool } from './tools/policy-generate.js';
import { PolicyEvaluateTool } from './tools/policy-evaluate.js';
import type { ToolDefinition } from './tools/types.js';

export interface PolicyTools {
  validate: PolicyValidateTool;
  generate: PolicyGenerateTool;
  evaluate: PolicyEvaluateTool;
}

export function createTools(clock?: () => number): PolicyTools {
  return {
    validate: new PolicyValidateTool(),
    generate: new PolicyGenerateTool(),
    evaluate: new PolicyEvaluateTool(clock),
  };
}

export function listTools(tools: PolicyTools): ToolDefinition[] {
  return [tools.validate.getDefinition(), tools.generate.getDefinition(), tools.evaluate.getDefinition()];
}

/**
 * Run one tool call. Failures become an error result rather than a protocol error.
 */
export async function callTool(tools: PolicyTools, name: string, args: unknown): Promise<CallToolResult> {
  try {
    let result: unknown;
    switch (name) {
      case 'policy_validate':
        result = await tools.validate.validate(args);
        break;
      case 'policy_generate':
        result = await tools.generate.generate(args);
        break;
      case 'policy_evaluate':
        result = await tools.evaluate.evaluate(args);
        break;
      default:
        throw new Error(`Unknown tool: ${name}`);
    }

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${errorMessage}`,
        },
      ],
      isError: true,
    };
  }
}

export function createServer(tools: PolicyTools = createTools()): Server {
  const server = new Server(
    {
      name: 'tollgate-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listTools(tools) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(tools, name, args);
  });

  return server;
}

export { PolicyValidateTool, PolicyGenerateTool, PolicyEvaluateTool };
export type { ValidateToolResult } from './tools/policy-validate.js';
export type { GenerateToolResult } from './tools/policy-generate.js';
export type { EvaluateToolResult } from './tools/policy-evaluate.js';
export type { ToolDefinition } from './tools/types.js';
