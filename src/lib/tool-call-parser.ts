/**
 * Extraction of a tool call embedded in model output, e.g.
 *   Let me look that up. {"name": "search_airports", "arguments": {"query": "Nice"}}
 */

import { createLogger } from "@/lib/logger";
import { toolCallRequestSchema, type ToolCallRequest } from "@/lib/mcp/types";

const log = createLogger("ToolCallParser");

const CALL_START = /\{\s*"name"/;

/**
 * End index (inclusive) of the JSON object starting at start, or -1 when
 * its braces never balance. Braces inside JSON strings are ignored.
 */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === "{") depth++;
    else if (char === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * First well-formed {"name": ..., "arguments": {...}} object in text,
 * or null. Never throws.
 */
export function parseToolCall(text: string): ToolCallRequest | null {
  const match = CALL_START.exec(text);
  if (!match) return null;

  const end = matchingBrace(text, match.index);
  if (end < 0) {
    log.debug("Tool call braces never close");
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text.slice(match.index, end + 1));
  } catch (error) {
    log.debug("Tool call is not valid JSON:", error);
    return null;
  }

  const parsed = toolCallRequestSchema.safeParse(decoded);
  if (!parsed.success) {
    log.debug(`Tool call rejected: ${parsed.error.issues[0].message}`);
    return null;
  }
  return parsed.data;
}
