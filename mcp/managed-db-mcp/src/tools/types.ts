import type { ManagedDbClient } from '../client/api-client.js';

/** Result of one tool call, as returned over HTTP and mapped to MCP content. */
export interface ToolResult {
  success: boolean;
  /** Display text shown to the user. */
  text: string;
  /** Decoded upstream response body. */
  data?: unknown;
  error?: string;
  /** Upstream HTTP status, for API errors. */
  status_code?: number;
}

export interface ToolOutput {
  text: string;
  data?: unknown;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolDefinition extends ToolDescriptor {
  /** Validate `args` and perform the call. Throws BridgeError on failure. */
  run: (client: ManagedDbClient, args: unknown) => Promise<ToolOutput>;
}
