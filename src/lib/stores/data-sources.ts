/**
 * Opens every store the engine reads from, and guarantees they are closed.
 */

import { existsSync } from "node:fs";

import type { EngineConfig } from "@/lib/config";
import { DataSourceUnavailableError, getErrorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { JsonAirportStore, type AirportStore } from "@/lib/stores/airport-store";
import {
  SqliteGazetteerStore,
  type GazetteerStore,
} from "@/lib/stores/gazetteer-store";
import {
  SqliteNotificationStore,
  type NotificationStore,
} from "@/lib/stores/notification-store";
import { loadRulesDocument } from "@/lib/stores/rules-document";
import type { RulesDocument } from "@/types/rules";

const log = createLogger("DataSources");

export interface DataSources {
  airports: AirportStore;
  gazetteer?: GazetteerStore;
  notifications?: NotificationStore;
  rules?: RulesDocument;
}

export interface OpenDataSources extends DataSources {
  close(): void;
}

function openOptional<T>(
  label: string,
  path: string,
  open: (path: string) => T
): T | undefined {
  if (!existsSync(path)) {
    log.warn(`${label} not found at ${path}; related tools will be unavailable`);
    return undefined;
  }
  try {
    const store = open(path);
    log.info(`${label} opened: ${path}`);
    return store;
  } catch (error) {
    log.error(`Failed to open ${label} at ${path}:`, getErrorMessage(error));
    return undefined;
  }
}

/**
 * Open the airport snapshot (required) and the optional stores.
 */
export function openDataSources(config: EngineConfig): OpenDataSources {
  let airports: AirportStore;
  try {
    airports = JsonAirportStore.fromFile(config.airportsPath);
  } catch (error) {
    throw new DataSourceUnavailableError("Airport data source", error);
  }
  log.info(`Loaded ${airports.all().length} airports from ${config.airportsPath}`);

  const gazetteer = openOptional("Gazetteer", config.gazetteerPath, (p) =>
    SqliteGazetteerStore.open(p)
  );
  const notifications = openOptional(
    "Notifications database",
    config.notificationsPath,
    (p) => SqliteNotificationStore.open(p)
  );
  const rules = openOptional("Rules document", config.rulesPath, (p) =>
    loadRulesDocument(p)
  );

  return {
    airports,
    gazetteer,
    notifications,
    rules,
    close() {
      gazetteer?.close();
      notifications?.close();
    },
  };
}

/**
 * Run fn with open data sources, closing them on every exit path.
 */
export async function withDataSources<T>(
  config: EngineConfig,
  fn: (sources: DataSources) => T | Promise<T>
): Promise<T> {
  const sources = openDataSources(config);
  try {
    return await fn(sources);
  } finally {
    sources.close();
  }
}
