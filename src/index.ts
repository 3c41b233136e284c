export { AirportQueryEngine, DEFAULT_SEARCH_LIMIT } from "./lib/airport-query";
export { loadConfig, DEFAULT_TOOL_SETTINGS, type EngineConfig } from "./lib/config";
export * from "./lib/errors";
export {
  applyFilters,
  activeFilterCount,
  describeFilters,
  parseFilterSpec,
} from "./lib/filter-engine";
export { distanceNm, parseCoordinateLiteral, trackPosition } from "./lib/geo";
export {
  LocationResolver,
  type ResolvedAnchor,
  type ResolvedLocation,
  type ResolveOptions,
} from "./lib/location-resolver";
export { createLogger, logToStderr, setLogLevel, type LogLevel } from "./lib/logger";
export { handleJsonRpc, handleJsonRpcText } from "./lib/mcp/json-rpc";
export { TOOL_NAMES, toolDefinitions, type ToolName } from "./lib/mcp/tool-definitions";
export {
  toolResultText,
  type JsonRpcResponse,
  type ToolCallRequest,
  type ToolResult,
} from "./lib/mcp/types";
export {
  BUCKET_COLORS,
  bucketColor,
  bucketLabel,
  bucketSortOrder,
  classifyNotification,
} from "./lib/notification-classifier";
export { formatWireLine } from "./lib/response-formatter";
export { RulesLookup } from "./lib/rules-lookup";
export { JsonAirportStore, type AirportStore } from "./lib/stores/airport-store";
export {
  openDataSources,
  withDataSources,
  type DataSources,
} from "./lib/stores/data-sources";
export { SqliteGazetteerStore, type GazetteerStore } from "./lib/stores/gazetteer-store";
export {
  SqliteNotificationStore,
  type NotificationStore,
} from "./lib/stores/notification-store";
export { loadRulesDocument } from "./lib/stores/rules-document";
export { parseToolCall } from "./lib/tool-call-parser";
export { ToolDispatcher, type DispatcherState } from "./lib/tool-dispatcher";
export type * from "./types/airport";
export type * from "./types/filters";
export type * from "./types/gazetteer";
export type * from "./types/notification";
export type * from "./types/rules";
