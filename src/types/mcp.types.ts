/**
 * MCP (Model Context Protocol) Type Definitions
 * Provides proper typing for MCP SDK interactions
 */

/**
 * MCP Tool Response interface
 * Standard response format for all MCP tool handlers
 */
export interface MCPToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  [key: string]: unknown;
}

/**
 * MCP Tool definition as advertised by tools/list
 */
export interface MCPToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: 'string' | 'number'; description: string }>;
    required: string[];
  };
  [key: string]: unknown;
}

/**
 * MCP Resource definition as advertised by resources/list
 */
export interface MCPResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  [key: string]: unknown;
}

export type ToolArguments = Record<string, unknown>;
