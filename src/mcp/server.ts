/**
 * VPC Atlas — MCP Server
 *
 * Serves the diagram tools over the Model Context Protocol: newline
 * delimited JSON-RPC on stdin and stdout. Logs go to stderr.
 *
 * Client config:
 *   {
 *     "mcpServers": {
 *       "vpc-atlas": { "command": "vpc-atlas", "args": ["--regions", "us-east-1", "mcp"] }
 *     }
 *   }
 */

import { createInterface } from "node:readline";
import { formatErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import { VERSION } from "../version.js";
import type { ToolDefinition, ToolResult } from "./tool-registry.js";

// =============================================================================
// Protocol Types
// =============================================================================

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id?: number | string;
  method: string;
  params?: Record<string, unknown>;
};

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: number | string | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
};

export type ToolCallResult = {
  content: ToolResult["content"];
  isError: boolean;
};

export const PROTOCOL_VERSION = "2024-11-05";
export const SERVER_NAME = "vpc-atlas";

const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const METHOD_NOT_FOUND = -32601;
const INTERNAL_ERROR = -32603;

// =============================================================================
// Server Implementation
// =============================================================================

export class McpServer {
  private tools: ToolDefinition[];
  private toolMap: Map<string, ToolDefinition>;

  constructor(tools: ToolDefinition[]) {
    this.tools = tools;
    this.toolMap = new Map(tools.map((t) => [t.name, t]));
  }

  /**
   * Handle a JSON-RPC request. Returns null for notifications.
   */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;
    try {
      switch (request.method) {
        case "initialize":
          return respond(id, {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: { name: SERVER_NAME, version: VERSION },
          });

        case "notifications/initialized":
        case "notifications/cancelled":
          return null;

        case "tools/list":
          return respond(id, {
            tools: this.tools.map((t) => ({
              name: t.name,
              description: t.description,
              inputSchema: t.parameters,
            })),
          });

        case "tools/call": {
          const name = request.params?.name;
          const args = request.params?.arguments;
          return respond(
            id,
            await this.callTool(typeof name === "string" ? name : "", isRecord(args) ? args : {}),
          );
        }

        // No resources or prompts are exposed.
        case "resources/list":
          return respond(id, { resources: [] });

        case "prompts/list":
          return respond(id, { prompts: [] });

        case "ping":
          return respond(id, {});

        default:
          return failure(id, METHOD_NOT_FOUND, `Method not found: ${request.method}`);
      }
    } catch (err) {
      return failure(id, INTERNAL_ERROR, `Internal error: ${formatErrorMessage(err)}`);
    }
  }

  /**
   * Run one tool. Unknown tools and tool failures become error results,
   * not protocol errors.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const tool = this.toolMap.get(name);
    if (!tool) {
      return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
    }

    try {
      const result = await tool.execute(args);
      return { content: result.content, isError: false };
    } catch (err) {
      return { content: [{ type: "text", text: `Tool error: ${formatErrorMessage(err)}` }], isError: true };
    }
  }
}

function respond(id: number | string | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

function failure(id: number | string | null, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isRecord(value) || value.jsonrpc !== "2.0" || typeof value.method !== "string") return false;
  if (value.id !== undefined && typeof value.id !== "number" && typeof value.id !== "string") return false;
  return value.params === undefined || isRecord(value.params);
}

// =============================================================================
// Stdio Transport
// =============================================================================

export type StdioOptions = {
  input?: NodeJS.ReadableStream;
  output?: { write(chunk: string): unknown };
  logger?: Logger;
};

/**
 * Serve requests line by line until the input closes.
 */
export async function serveStdio(server: McpServer, options: StdioOptions = {}): Promise<void> {
  const logger = options.logger ?? createSilentLogger();
  const output = options.output ?? process.stdout;
  const rl = createInterface({ input: options.input ?? process.stdin, terminal: false });

  const write = (message: JsonRpcResponse) => {
    output.write(JSON.stringify(message) + "\n");
  };

  logger.info("MCP server listening on stdio");

  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      write(failure(null, PARSE_ERROR, "Parse error"));
      continue;
    }

    if (!isJsonRpcRequest(parsed)) {
      write(failure(null, INVALID_REQUEST, "Invalid Request"));
      continue;
    }

    logger.debug("Request", { method: parsed.method });
    const response = await server.handleRequest(parsed);
    if (response) write(response);
  }

  logger.info("stdin closed, shutting down");
}
