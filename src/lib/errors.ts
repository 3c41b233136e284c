/**
 * Error taxonomy for the tool engine.
 *
 * Handlers throw these; the dispatcher turns them into ToolResult errors
 * so nothing escapes past a tool call.
 */

export type ToolErrorCode =
  | "NOT_INITIALIZED"
  | "MISSING_ARGUMENT"
  | "INVALID_ARGUMENT"
  | "LOCATION_NOT_FOUND"
  | "AIRPORT_NOT_FOUND"
  | "UNKNOWN_TOOL"
  | "DATA_SOURCE_UNAVAILABLE"
  | "MALFORMED_TOOL_CALL";

export class ToolError extends Error {
  code: ToolErrorCode;

  constructor(code: ToolErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "ToolError";
  }
}

export class NotInitializedError extends ToolError {
  constructor() {
    super("NOT_INITIALIZED", "Tool dispatcher not initialized");
    this.name = "NotInitializedError";
  }
}

export class MissingArgumentError extends ToolError {
  argument: string;

  constructor(argument: string) {
    super("MISSING_ARGUMENT", `Missing '${argument}' argument`);
    this.argument = argument;
    this.name = "MissingArgumentError";
  }
}

export class InvalidArgumentError extends ToolError {
  argument: string;

  constructor(argument: string, reason: string) {
    super("INVALID_ARGUMENT", `Invalid '${argument}' argument: ${reason}`);
    this.argument = argument;
    this.name = "InvalidArgumentError";
  }
}

export class LocationNotFoundError extends ToolError {
  query: string;

  constructor(query: string) {
    super("LOCATION_NOT_FOUND", `Could not find location: ${query}`);
    this.query = query;
    this.name = "LocationNotFoundError";
  }
}

export class AirportNotFoundError extends ToolError {
  icao: string;

  constructor(icao: string) {
    super("AIRPORT_NOT_FOUND", `Airport not found: ${icao}`);
    this.icao = icao;
    this.name = "AirportNotFoundError";
  }
}

export class UnknownToolError extends ToolError {
  tool: string;

  constructor(tool: string) {
    super("UNKNOWN_TOOL", `Unknown tool: ${tool}`);
    this.tool = tool;
    this.name = "UnknownToolError";
  }
}

export class DataSourceUnavailableError extends ToolError {
  source: string;

  constructor(source: string, cause?: unknown) {
    super(
      "DATA_SOURCE_UNAVAILABLE",
      cause === undefined
        ? `${source} not available`
        : `${source} not available: ${getErrorMessage(cause)}`
    );
    this.source = source;
    this.name = "DataSourceUnavailableError";
  }
}

export class MalformedToolCallError extends ToolError {
  constructor() {
    super("MALFORMED_TOOL_CALL", "No well-formed tool call found");
    this.name = "MalformedToolCallError";
  }
}

/**
 * Run a store query, reporting anything but a ToolError as the source
 * being unavailable.
 */
export function guardDataSource<T>(source: string, query: () => T): T {
  try {
    return query();
  } catch (error) {
    if (error instanceof ToolError) throw error;
    throw new DataSourceUnavailableError(source, error);
  }
}

/**
 * Raised at startup when the environment holds an invalid setting.
 */
export class ConfigError extends Error {
  variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.variable = variable;
    this.name = "ConfigError";
  }
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}
