/**
 * JSON-RPC 2.0 handling for tool servers.
 *
 * Methods:
 * - tools/list: Return available tool definitions
 * - tools/call: Execute a tool with arguments
 */

import { createLogger } from "@/lib/logger";
import { toolDefinitions } from "@/lib/mcp/tool-definitions";
import {
  type JsonRpcResponse,
  type McpToolResult,
  type ToolResult,
  JSON_RPC_ERRORS,
  McpError,
  jsonRpcRequestSchema,
  toolCallParamsSchema,
  toolResultText,
} from "@/lib/mcp/types";
import type { ToolDispatcher } from "@/lib/tool-dispatcher";

const log = createLogger("MCP");

/**
 * Create a JSON-RPC 2.0 success response.
 */
function createJsonRpcResponse(
  id: string | number | null,
  result: unknown
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

/**
 * Create a JSON-RPC 2.0 error response.
 */
export function createJsonRpcError(
  id: string | number | null,
  code: number,
  message: string,
  data?: unknown
): JsonRpcResponse {
  return {
    jsonrpc: "2.0",
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

/**
 * Tool failures are results with isError set, not protocol errors.
 */
function toMcpToolResult(result: ToolResult): McpToolResult {
  return {
    content: [{ type: "text", text: toolResultText(result) }],
    ...(result.ok ? {} : { isError: true }),
  };
}

/**
 * Answer one decoded JSON-RPC request body.
 */
export function handleJsonRpc(
  dispatcher: ToolDispatcher,
  body: unknown
): JsonRpcResponse {
  const startTime = Date.now();

  const parsed = jsonRpcRequestSchema.safeParse(body);
  if (!parsed.success) {
    return createJsonRpcError(
      null,
      JSON_RPC_ERRORS.INVALID_REQUEST,
      "Invalid JSON-RPC request"
    );
  }
  const rpcRequest = parsed.data;

  try {
    let result: unknown;
    let label = "list";

    switch (rpcRequest.method) {
      case "tools/list":
        result = { tools: toolDefinitions };
        break;

      case "tools/call": {
        const params = toolCallParamsSchema.safeParse(rpcRequest.params);
        if (!params.success) {
          throw new McpError(
            JSON_RPC_ERRORS.INVALID_PARAMS,
            "Invalid tool call params"
          );
        }
        label = params.data.name;
        result = toMcpToolResult(dispatcher.dispatch(params.data));
        break;
      }

      default:
        return createJsonRpcError(
          rpcRequest.id,
          JSON_RPC_ERRORS.METHOD_NOT_FOUND,
          `Method not found: ${rpcRequest.method}`
        );
    }

    log.info(`${rpcRequest.method} (${label}) - ${Date.now() - startTime}ms`);
    return createJsonRpcResponse(rpcRequest.id, result);
  } catch (error) {
    // Handle MCP errors
    if (error instanceof McpError) {
      return createJsonRpcError(rpcRequest.id, error.code, error.message);
    }

    // Log unexpected errors
    log.error("Unexpected error:", error);
    return createJsonRpcError(
      rpcRequest.id,
      JSON_RPC_ERRORS.INTERNAL_ERROR,
      "Internal error"
    );
  }
}

/**
 * Answer one raw line of JSON-RPC text; undecodable input is a parse error.
 */
export function handleJsonRpcText(
  dispatcher: ToolDispatcher,
  text: string
): JsonRpcResponse {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return createJsonRpcError(null, JSON_RPC_ERRORS.PARSE_ERROR, "Parse error");
  }
  return handleJsonRpc(dispatcher, body);
}
