/**
 * Tool definitions for the tools/list response.
 *
 * These JSON Schema definitions describe the available tools
 * so AI assistants can discover and use them correctly.
 */

export const TOOL_NAMES = [
  "search_airports",
  "get_airport_details",
  "find_airports_near_route",
  "find_airports_near_location",
  "get_border_crossing_airports",
  "list_rules_for_country",
  "compare_rules_between_countries",
  "find_airports_by_notification",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

const filtersProperty = {
  type: "object",
  description: "Optional airport filters; all given filters must match",
  properties: {
    country: { type: "string", description: 'ISO-2 country code (e.g., "FR")' },
    has_procedures: { type: "boolean" },
    has_aip_data: { type: "boolean" },
    has_hard_runway: { type: "boolean" },
    has_lighted_runway: { type: "boolean" },
    point_of_entry: {
      type: "boolean",
      description: "Border crossing (customs) airports only",
    },
    has_avgas: { type: "boolean" },
    has_jet_a: { type: "boolean" },
    min_runway_length_ft: { type: "number" },
    max_runway_length_ft: { type: "number" },
    has_ils: { type: "boolean" },
    has_rnav: { type: "boolean" },
    has_precision_approach: { type: "boolean" },
    aip_field: {
      type: "string",
      description: "Only airports publishing this AIP field",
    },
    max_landing_fee: { type: "number" },
    max_hours_notice: {
      type: "integer",
      description: "Maximum customs/PPR notice in hours",
    },
    exclude_large_airports: { type: "boolean" },
    trip_distance: {
      type: "object",
      description: "Distance band in nm from an origin airport",
      properties: {
        from: { type: "string", description: "Origin ICAO code" },
        min: { type: "number" },
        max: { type: "number" },
      },
      required: ["from"],
    },
  },
} as const;

const countryProperty = {
  type: "string",
  description: 'ISO-2 country code (e.g., "FR", "GB")',
} as const;

export const toolDefinitions: ToolDefinition[] = [
  {
    name: "search_airports",
    description:
      "Search airports by ICAO code, name or city. Exact matches rank first, then prefix and substring matches.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: 'ICAO code, airport name or city (e.g., "Nice", "LFMN")',
        },
        limit: {
          type: "integer",
          description: "Maximum results (default: 10)",
          default: 10,
        },
        filters: filtersProperty,
      },
      required: ["query"],
    },
  },
  {
    name: "get_airport_details",
    description:
      "Full details for one airport: location, elevation, runways, procedures, border crossing and notification requirements.",
    inputSchema: {
      type: "object",
      properties: {
        icao: { type: "string", description: 'ICAO code (e.g., "EGLL")' },
      },
      required: ["icao"],
    },
  },
  {
    name: "find_airports_near_route",
    description:
      "Airports within a corridor either side of the great-circle route between two airports or places, ordered along the route.",
    inputSchema: {
      type: "object",
      properties: {
        from: {
          type: "string",
          description: "Departure ICAO code or place name",
        },
        to: {
          type: "string",
          description: "Destination ICAO code or place name",
        },
        max_distance_nm: {
          type: "number",
          description: "Corridor half-width in nautical miles (default: 50)",
          default: 50,
        },
        filters: filtersProperty,
      },
      required: ["from", "to"],
    },
  },
  {
    name: "find_airports_near_location",
    description:
      "Airports within a radius of a place, airport or coordinate, closest first. Optionally limited to airports with short customs notice.",
    inputSchema: {
      type: "object",
      properties: {
        location_query: {
          type: "string",
          description:
            'Place name, ICAO code or "lat, lon" (e.g., "Bromley", "LFPO", "48.85, 2.35")',
        },
        max_distance_nm: {
          type: "number",
          description: "Search radius in nautical miles (default: 50)",
          default: 50,
        },
        max_hours_notice: {
          type: "integer",
          description: "Only airports needing at most this many hours notice",
        },
        filters: filtersProperty,
      },
      required: ["location_query"],
    },
  },
  {
    name: "get_border_crossing_airports",
    description:
      "Airports designated as border crossing points (customs available), optionally in one country.",
    inputSchema: {
      type: "object",
      properties: {
        country: countryProperty,
        filters: filtersProperty,
      },
    },
  },
  {
    name: "list_rules_for_country",
    description:
      "General aviation rules and procedures answered for one country.",
    inputSchema: {
      type: "object",
      properties: {
        country: countryProperty,
      },
      required: ["country"],
    },
  },
  {
    name: "compare_rules_between_countries",
    description: "Side-by-side comparison of two countries' aviation rules.",
    inputSchema: {
      type: "object",
      properties: {
        country1: countryProperty,
        country2: countryProperty,
      },
      required: ["country1", "country2"],
    },
  },
  {
    name: "find_airports_by_notification",
    description:
      "Airports by customs/PPR notification requirement, shortest notice first.",
    inputSchema: {
      type: "object",
      properties: {
        max_hours: {
          type: "integer",
          description: "Maximum hours of advance notice",
        },
        country: countryProperty,
        limit: {
          type: "integer",
          description: "Maximum results (default: 20)",
          default: 20,
        },
      },
    },
  },
];
