/**
 * Routes tool calls to their handlers and turns every failure into a
 * ToolResult error.
 */

import { AirportQueryEngine } from "@/lib/airport-query";
import { DEFAULT_TOOL_SETTINGS, type EngineConfig } from "@/lib/config";
import {
  MalformedToolCallError,
  NotInitializedError,
  ToolError,
  UnknownToolError,
  getErrorMessage,
} from "@/lib/errors";
import { LocationResolver } from "@/lib/location-resolver";
import { createLogger } from "@/lib/logger";
import { isToolName } from "@/lib/mcp/tool-definitions";
import {
  ToolArguments,
  toolFailure,
  type ToolCallRequest,
  type ToolResult,
} from "@/lib/mcp/types";
import { RulesLookup } from "@/lib/rules-lookup";
import { openDataSources, type DataSources } from "@/lib/stores/data-sources";
import { parseToolCall } from "@/lib/tool-call-parser";
import {
  TOOL_HANDLERS,
  type ToolContext,
  type ToolSettings,
} from "@/lib/tool-handlers";

const log = createLogger("ToolDispatcher");

export type DispatcherState = "uninitialized" | "ready" | "closed";

export class ToolDispatcher {
  private context: ToolContext | null = null;
  private release: (() => void) | null = null;
  private currentState: DispatcherState = "uninitialized";
  private readonly settings: ToolSettings;

  constructor(settings: Partial<ToolSettings> = {}) {
    this.settings = { ...DEFAULT_TOOL_SETTINGS, ...settings };
  }

  /**
   * A ready dispatcher over the data sources named in config. Closing the
   * dispatcher closes them.
   */
  static fromConfig(config: EngineConfig): ToolDispatcher {
    const dispatcher = new ToolDispatcher({
      searchLimit: config.searchLimit,
      routeCorridorNm: config.routeCorridorNm,
      nearLocationRadiusNm: config.nearLocationRadiusNm,
    });
    const sources = openDataSources(config);
    dispatcher.initialize(sources, () => sources.close());
    return dispatcher;
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  /**
   * @param release called once by close()
   */
  initialize(sources: DataSources, release?: () => void): void {
    if (this.currentState === "closed") {
      throw new Error("Tool dispatcher has been closed");
    }
    this.release?.();

    const engine = new AirportQueryEngine(sources.airports);
    this.context = {
      engine,
      resolver: new LocationResolver(engine, sources.gazetteer),
      notifications: sources.notifications,
      rules: sources.rules ? new RulesLookup(sources.rules) : undefined,
      settings: this.settings,
    };
    this.release = release ?? null;
    this.currentState = "ready";
    log.info("Ready");
  }

  dispatch(request: ToolCallRequest): ToolResult {
    const startTime = Date.now();
    try {
      const context = this.requireReady();
      if (!isToolName(request.name)) {
        throw new UnknownToolError(request.name);
      }

      const result = TOOL_HANDLERS[request.name](
        new ToolArguments(request.arguments),
        context
      );
      log.info(`${request.name} - ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      if (error instanceof ToolError) {
        log.warn(`${request.name} failed: ${error.message}`);
        return toolFailure(error.message);
      }
      log.error("Tool execution error:", error);
      return toolFailure(`Tool execution failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Dispatch the first tool call found in free text.
   */
  dispatchText(text: string): ToolResult {
    const request = parseToolCall(text);
    if (!request) {
      return toolFailure(new MalformedToolCallError().message);
    }
    return this.dispatch(request);
  }

  close(): void {
    if (this.currentState === "closed") return;
    this.release?.();
    this.release = null;
    this.context = null;
    this.currentState = "closed";
    log.info("Closed");
  }

  private requireReady(): ToolContext {
    if (this.currentState !== "ready" || !this.context) {
      throw new NotInitializedError();
    }
    return this.context;
  }
}
