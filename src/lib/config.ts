/**
 * Environment-driven configuration.
 */

import { z } from "zod";

import { ConfigError } from "@/lib/errors";
import type { LogLevel } from "@/lib/logger";

const positiveInt = z.coerce.number().int().positive();
const positiveNumber = z.coerce.number().positive();

const configSchema = z.object({
  AIRPORTS_JSON: z.string().min(1).default("data/airports.json"),
  RULES_JSON: z.string().min(1).default("data/rules.json"),
  GAZETTEER_DB: z.string().min(1).default("data/european_cities.db"),
  NOTIFICATIONS_DB: z.string().min(1).default("data/ga_notifications.db"),
  LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("info"),
  SEARCH_LIMIT: positiveInt.max(100).default(10),
  ROUTE_CORRIDOR_NM: positiveNumber.max(500).default(50),
  NEAR_LOCATION_RADIUS_NM: positiveNumber.max(500).default(50),
});

export interface EngineConfig {
  airportsPath: string;
  rulesPath: string;
  gazetteerPath: string;
  notificationsPath: string;
  logLevel: LogLevel;
  searchLimit: number;
  routeCorridorNm: number;
  nearLocationRadiusNm: number;
}

export const DEFAULT_TOOL_SETTINGS = {
  searchLimit: 10,
  routeCorridorNm: 50,
  nearLocationRadiusNm: 50,
} as const;

/**
 * Read and validate settings from the environment.
 * Empty strings count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const firstError = parsed.error.issues[0];
    throw new ConfigError(String(firstError.path[0]), firstError.message);
  }

  const values = parsed.data;
  return {
    airportsPath: values.AIRPORTS_JSON,
    rulesPath: values.RULES_JSON,
    gazetteerPath: values.GAZETTEER_DB,
    notificationsPath: values.NOTIFICATIONS_DB,
    logLevel: values.LOG_LEVEL,
    searchLimit: values.SEARCH_LIMIT,
    routeCorridorNm: values.ROUTE_CORRIDOR_NM,
    nearLocationRadiusNm: values.NEAR_LOCATION_RADIUS_NM,
  };
}
