/**
 * Tool server over stdio: one JSON-RPC 2.0 request per line in, one
 * response per line out. Logs go to stderr.
 *
 * Run with: npm run mcp
 */

import { createInterface } from "node:readline";

import { loadConfig } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { createLogger, logToStderr, setLogLevel } from "@/lib/logger";
import { handleJsonRpcText } from "@/lib/mcp/json-rpc";
import { ToolDispatcher } from "@/lib/tool-dispatcher";

logToStderr();
const log = createLogger("MCP");

function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const dispatcher = ToolDispatcher.fromConfig(config);
  const lines = createInterface({ input: process.stdin, terminal: false });

  lines.on("line", (line) => {
    if (!line.trim()) return;
    const response = handleJsonRpcText(dispatcher, line);
    process.stdout.write(`${JSON.stringify(response)}\n`);
  });

  lines.on("close", () => {
    dispatcher.close();
    log.info("stdin closed, shutting down");
  });

  process.on("SIGINT", () => lines.close());
  process.on("SIGTERM", () => lines.close());

  log.info("Listening on stdio");
}

try {
  main();
} catch (error) {
  log.error(`Startup failed: ${getErrorMessage(error)}`);
  process.exitCode = 1;
}
