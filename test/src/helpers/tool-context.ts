/**
 * In-process tool context for calling tool handlers without an MCP server.
 */

import type { CallToolResult, ToolContext } from '../../../src/lib/tool-types.js';

export interface TestToolContext extends ToolContext {
  messages: string[];
}

export function createTestContext(): TestToolContext {
  const messages: string[] = [];
  return {
    messages,
    successResponse: (_action, text) => ({
      content: [{ type: 'text', text }],
    }),
    errorResponse: (_action, error) => ({
      content: [{ type: 'text', text: error }],
      isError: true,
    }),
    log: (message) => {
      messages.push(message);
    },
  };
}

/**
 * Text of the first content block of a tool result.
 */
export function textOf(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === 'text' ? first.text : '';
}
