/**
 * Tool protocol types.
 *
 * JSON-RPC 2.0 envelope types for the stdio server, and the tool call
 * request/result types shared by the dispatcher and the text parser.
 */

import { z } from "zod";

import { InvalidArgumentError, MissingArgumentError } from "@/lib/errors";

// =============================================================================
// JSON-RPC 2.0 Protocol Types
// =============================================================================

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: string | number | null;
  method: string;
  params?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

// Standard JSON-RPC 2.0 error codes
export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/** tools/call result content */
export interface McpToolResult {
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

// =============================================================================
// Tool call types
// =============================================================================

export interface ToolCallRequest {
  name: string;
  arguments: Record<string, unknown>;
}

export type ToolResult =
  | { ok: true; text: string }
  | { ok: false; message: string };

export function toolSuccess(text: string): ToolResult {
  return { ok: true, text };
}

export function toolFailure(message: string): ToolResult {
  return { ok: false, message };
}

/**
 * Text shown to callers without structured error support.
 */
export function toolResultText(result: ToolResult): string {
  return result.ok ? result.text : `Error: ${result.message}`;
}

// =============================================================================
// Argument access
// =============================================================================

const numberArgumentSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?$/, { message: "expected a number" })
    .transform(Number),
]);

/**
 * Typed reads over a loosely-typed arguments object. Each read takes the
 * accepted names in priority order; the first present one wins.
 */
export class ToolArguments {
  constructor(private readonly values: Record<string, unknown>) {}

  has(name: string): boolean {
    const value = this.values[name];
    return value !== undefined && value !== null;
  }

  raw(name: string): unknown {
    return this.values[name];
  }

  /** First non-blank string among names, trimmed */
  string(...names: string[]): string | undefined {
    for (const name of names) {
      const value = this.values[name];
      if (typeof value === "string" && value.trim() !== "") {
        return value.trim();
      }
    }
    return undefined;
  }

  /**
   * @throws MissingArgumentError naming the first accepted name
   */
  requireString(...names: string[]): string {
    const value = this.string(...names);
    if (value === undefined) {
      throw new MissingArgumentError(names[0] ?? "argument");
    }
    return value;
  }

  /**
   * First present numeric argument. Numeric strings are accepted.
   * @throws InvalidArgumentError when the value is not a number
   */
  number(...names: string[]): number | undefined {
    for (const name of names) {
      if (!this.has(name)) continue;
      const parsed = numberArgumentSchema.safeParse(this.values[name]);
      if (!parsed.success) {
        throw new InvalidArgumentError(name, "expected a number");
      }
      return parsed.data;
    }
    return undefined;
  }

  /** Like number(), rejecting zero and negatives */
  positiveNumber(...names: string[]): number | undefined {
    const value = this.number(...names);
    if (value !== undefined && value <= 0) {
      throw new InvalidArgumentError(names[0] ?? "argument", "must be positive");
    }
    return value;
  }

  positiveInteger(...names: string[]): number | undefined {
    const value = this.positiveNumber(...names);
    if (value !== undefined && !Number.isInteger(value)) {
      throw new InvalidArgumentError(names[0] ?? "argument", "must be a whole number");
    }
    return value;
  }
}

// =============================================================================
// Zod Validation Schemas
// =============================================================================

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string().max(256), z.number(), z.null()]),
  method: z.string().max(64),
  params: z.unknown().optional(),
});

export const toolCallRequestSchema = z.object({
  name: z.string().min(1).max(64),
  arguments: z.record(z.string().max(64), z.unknown()),
});

/** tools/call params: arguments may be omitted */
export const toolCallParamsSchema = z.object({
  name: z.string().min(1).max(64),
  arguments: z.record(z.string().max(64), z.unknown()).default({}),
});

// =============================================================================
// Error Helper
// =============================================================================

export class McpError extends Error {
  code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
    this.name = "McpError";
  }
}
