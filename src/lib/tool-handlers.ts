/**
 * The eight tool handlers. Each reads its arguments, queries the engine
 * components and renders the result text.
 */

import type { AirportQueryEngine } from "@/lib/airport-query";
import {
  AirportNotFoundError,
  DataSourceUnavailableError,
  LocationNotFoundError,
  getErrorMessage,
  guardDataSource,
} from "@/lib/errors";
import {
  activeFilterCount,
  applyFilters,
  parseFilterSpec,
} from "@/lib/filter-engine";
import type { LocationResolver, ResolvedAnchor } from "@/lib/location-resolver";
import { createLogger } from "@/lib/logger";
import type { ToolName } from "@/lib/mcp/tool-definitions";
import {
  toolFailure,
  toolSuccess,
  type ToolArguments,
  type ToolResult,
} from "@/lib/mcp/types";
import {
  bucketForHours,
  bucketSortOrder,
  classifyNotification,
} from "@/lib/notification-classifier";
import {
  formatAirportDetails,
  formatAirportList,
  formatBorderCrossingResult,
  formatNearLocationResult,
  formatNotificationList,
  formatRouteResult,
  formatRuleComparison,
  formatRulesForCountry,
  noNotificationMatchesMessage,
} from "@/lib/response-formatter";
import type { RulesLookup } from "@/lib/rules-lookup";
import type { NotificationStore } from "@/lib/stores/notification-store";
import type { Airport } from "@/types/airport";
import type { FilterContext, FilterSpec } from "@/types/filters";
import type { NotificationRecord } from "@/types/notification";

const log = createLogger("ToolHandlers");

export const MAX_SEARCH_LIMIT = 100;
export const MAX_BORDER_CROSSING_RESULTS = 50;
export const DEFAULT_NOTIFICATION_LIMIT = 20;
const MAX_NOTIFICATION_LIMIT = 100;

export interface ToolSettings {
  searchLimit: number;
  routeCorridorNm: number;
  nearLocationRadiusNm: number;
}

/** Everything a handler may query once the dispatcher is ready */
export interface ToolContext {
  engine: AirportQueryEngine;
  resolver: LocationResolver;
  notifications?: NotificationStore;
  rules?: RulesLookup;
  settings: ToolSettings;
}

export type ToolHandler = (args: ToolArguments, context: ToolContext) => ToolResult;

// =============================================================================
// Shared helpers
// =============================================================================

const NOTIFICATIONS = "Notifications database";

function requireNotifications(context: ToolContext): NotificationStore {
  if (!context.notifications) {
    throw new DataSourceUnavailableError(NOTIFICATIONS);
  }
  return context.notifications;
}

function queryNotifications<T>(
  context: ToolContext,
  query: (store: NotificationStore) => T
): T {
  const store = requireNotifications(context);
  return guardDataSource(NOTIFICATIONS, () => query(store));
}

/**
 * Notification data used only to annotate output. A failing store leaves
 * the annotation out rather than failing the tool.
 */
function notificationEnrichment<T>(
  context: ToolContext,
  query: (store: NotificationStore) => T
): T | undefined {
  if (!context.notifications) return undefined;
  try {
    return queryNotifications(context, query);
  } catch (error) {
    log.warn(`Skipping notification data: ${getErrorMessage(error)}`);
    return undefined;
  }
}

function requireRules(context: ToolContext): RulesLookup {
  if (!context.rules) {
    throw new DataSourceUnavailableError("Rules data");
  }
  return context.rules;
}

/**
 * Auxiliary lookups for the filters that need them, computed only when
 * the filter is present.
 */
function filterContext(
  context: ToolContext,
  candidates: readonly Airport[],
  spec: FilterSpec
): FilterContext {
  const result: FilterContext = {};
  if (spec.pointOfEntry !== undefined) {
    result.borderCrossingIcaos = context.engine.borderCrossingIcaos();
  }
  if (spec.hasAvgas !== undefined || spec.hasJetA !== undefined) {
    result.fuelTypes = context.engine.fuelTypesByIcao(candidates);
  }
  if (spec.maxLandingFee !== undefined) {
    result.landingFees = context.engine.landingFeesByIcao(candidates);
  }
  if (spec.tripDistance) {
    const origin = context.engine.findByCode(spec.tripDistance.from);
    if (origin) {
      result.tripOrigin = origin.coordinate;
    } else {
      log.warn(`Trip distance origin ${spec.tripDistance.from} not found; filter ignored`);
    }
  }
  if (spec.maxHoursNotice !== undefined) {
    const maxHours = spec.maxHoursNotice;
    const records = queryNotifications(context, (store) => store.queryByMaxHours(maxHours));
    result.notificationIcaos = new Set(records.map((r) => r.icao));
  }
  return result;
}

function filterAirports(
  context: ToolContext,
  candidates: readonly Airport[],
  spec: FilterSpec
): Airport[] {
  return applyFilters(candidates, spec, filterContext(context, candidates, spec));
}

/** ICAO codes of the candidates that pass spec, for order-preserving filtering */
function passingIcaos(
  context: ToolContext,
  candidates: readonly Airport[],
  spec: FilterSpec
): Set<string> {
  return new Set(filterAirports(context, candidates, spec).map((a) => a.icao));
}

const AIRPORT_CODE = /^[A-Za-z0-9]{4}$/;

/**
 * An airport for a route endpoint: the airport itself when the text is a
 * known code, otherwise the nearest airport to the place it names.
 */
function resolveEndpoint(context: ToolContext, query: string): ResolvedAnchor {
  try {
    return context.resolver.resolveAnchor(query);
  } catch (error) {
    if (error instanceof LocationNotFoundError && AIRPORT_CODE.test(query)) {
      throw new AirportNotFoundError(query.toUpperCase());
    }
    throw error;
  }
}

function substitutionNote(query: string, anchor: ResolvedAnchor): string {
  return `${query} resolved to ${anchor.location.canonicalName}; using nearest airport ${anchor.airport.icao} (${anchor.airport.name}), ${anchor.distanceNm.toFixed(1)} nm away`;
}

function capped(value: number | undefined, fallback: number, max: number): number {
  return Math.min(value ?? fallback, max);
}

// =============================================================================
// Airport tools
// =============================================================================

const searchAirports: ToolHandler = (args, context) => {
  const query = args.string("query", "city", "name", "icao") ?? "";
  const limit = capped(
    args.positiveInteger("limit"),
    context.settings.searchLimit,
    MAX_SEARCH_LIMIT
  );
  const spec = parseFilterSpec(args.raw("filters"));

  if (activeFilterCount(spec) === 0) {
    return toolSuccess(formatAirportList(context.engine.searchByText(query, limit)));
  }

  const candidates = query
    ? context.engine.searchByText(query, Number.MAX_SAFE_INTEGER)
    : context.engine.all();
  return toolSuccess(
    formatAirportList(filterAirports(context, candidates, spec).slice(0, limit))
  );
};

const getAirportDetails: ToolHandler = (args, context) => {
  const airport = context.engine.getAirport(args.requireString("icao"));
  return toolSuccess(
    formatAirportDetails(airport, {
      notification: notificationEnrichment(context, (store) => store.get(airport.icao)),
    })
  );
};

const findAirportsNearRoute: ToolHandler = (args, context) => {
  const fromQuery = args.requireString("from", "from_location");
  const toQuery = args.requireString("to", "to_location");
  const corridorNm =
    args.positiveNumber("max_distance_nm") ?? context.settings.routeCorridorNm;
  const spec = parseFilterSpec(args.raw("filters"));

  const from = resolveEndpoint(context, fromQuery);
  const to = resolveEndpoint(context, toQuery);

  let route = context.engine.alongRoute(from.airport.icao, to.airport.icao, corridorNm);
  const keep = passingIcaos(
    context,
    route.map((r) => r.airport),
    spec
  );
  route = route.filter((r) => keep.has(r.airport.icao));

  const notes: string[] = [];
  if (from.substituted) notes.push(substitutionNote(fromQuery, from));
  if (to.substituted) notes.push(substitutionNote(toQuery, to));

  return toolSuccess(
    formatRouteResult({
      from: from.substituted ? fromQuery : from.airport.icao,
      to: to.substituted ? toQuery : to.airport.icao,
      corridorNm,
      airports: route,
      notes,
    })
  );
};

const findAirportsNearLocation: ToolHandler = (args, context) => {
  const query = args.requireString("location_query", "location", "query");
  const radiusNm =
    args.positiveNumber("max_distance_nm") ?? context.settings.nearLocationRadiusNm;
  const maxHoursNotice = args.positiveInteger("max_hours_notice", "max_hours");

  const spec = parseFilterSpec(args.raw("filters"));
  if (maxHoursNotice !== undefined) {
    spec.maxHoursNotice = maxHoursNotice;
  }

  const location = context.resolver.resolve(query);
  const nearby = context.engine.withinRadius(location.coordinate, radiusNm);
  const keep = passingIcaos(
    context,
    nearby.map((n) => n.airport),
    spec
  );

  const notifications = new Map<string, NotificationRecord>();
  const maxHours = spec.maxHoursNotice;
  const records = notificationEnrichment(context, (store) => store.queryByMaxHours(maxHours));
  for (const record of records ?? []) {
    notifications.set(record.icao, record);
  }

  return toolSuccess(
    formatNearLocationResult({
      query,
      radiusNm,
      maxHoursNotice: spec.maxHoursNotice,
      airports: nearby.filter((n) => keep.has(n.airport.icao)),
      notifications,
    })
  );
};

const getBorderCrossingAirports: ToolHandler = (args, context) => {
  const filters = parseFilterSpec(args.raw("filters"));
  const country = args.string("country")?.toUpperCase() ?? filters.country;
  const spec: FilterSpec = { ...filters, country, pointOfEntry: true };

  const candidates = context.engine.byField("pointOfEntry", (poe) => poe);
  const airports = filterAirports(context, candidates, spec).slice(
    0,
    MAX_BORDER_CROSSING_RESULTS
  );
  return toolSuccess(formatBorderCrossingResult(airports, country));
};

// =============================================================================
// Rules tools
// =============================================================================

const listRulesForCountry: ToolHandler = (args, context) => {
  const country = args.requireString("country", "country_code").toUpperCase();
  const entries = requireRules(context).byCountry(country);
  if (entries.length === 0) {
    return toolFailure(`No rules found for country: ${country}`);
  }
  return toolSuccess(formatRulesForCountry(country, entries));
};

const compareRulesBetweenCountries: ToolHandler = (args, context) => {
  const first = args.requireString("country1").toUpperCase();
  const second = args.requireString("country2").toUpperCase();
  const rows = requireRules(context).compare(first, second);
  return toolSuccess(formatRuleComparison(first, second, rows));
};

// =============================================================================
// Notification tool
// =============================================================================

/**
 * Whether a record's bucket is no harder than a plain notice of maxHours.
 * "unknown" never qualifies; H24 is left out when only easy airports are
 * asked for.
 */
function withinNoticeBucket(record: NotificationRecord, maxHours: number): boolean {
  const bucket = classifyNotification(record);
  const limit = bucketForHours(maxHours);
  if (bucket === "unknown") return false;
  if (bucket === "h24") return limit !== "easy";
  return bucketSortOrder(bucket) <= bucketSortOrder(limit);
}

function inCountry(context: ToolContext, icao: string, country: string): boolean {
  const airport = context.engine.findByCode(icao);
  return airport ? airport.country.toUpperCase() === country : icao.startsWith(country);
}

const findAirportsByNotification: ToolHandler = (args, context) => {
  const maxHours = args.positiveInteger("max_hours", "max_hours_notice");
  const country = args.string("country")?.toUpperCase();
  const limit = capped(
    args.positiveInteger("limit"),
    DEFAULT_NOTIFICATION_LIMIT,
    MAX_NOTIFICATION_LIMIT
  );

  log.debug(`Notification query: maxHours=${maxHours ?? "any"}, country=${country ?? "any"}`);

  // The limit applies after bucket and country filtering
  const records = queryNotifications(context, (store) => store.queryByMaxHours(maxHours))
    .filter((r) => maxHours === undefined || withinNoticeBucket(r, maxHours))
    .filter((r) => !country || inCountry(context, r.icao, country))
    .slice(0, limit);

  const query = { maxHours, country };
  if (records.length === 0) {
    return toolFailure(noNotificationMatchesMessage(query));
  }
  return toolSuccess(formatNotificationList(records, query));
};

export const TOOL_HANDLERS: Readonly<Record<ToolName, ToolHandler>> = {
  search_airports: searchAirports,
  get_airport_details: getAirportDetails,
  find_airports_near_route: findAirportsNearRoute,
  find_airports_near_location: findAirportsNearLocation,
  get_border_crossing_airports: getBorderCrossingAirports,
  list_rules_for_country: listRulesForCountry,
  compare_rules_between_countries: compareRulesBetweenCountries,
  find_airports_by_notification: findAirportsByNotification,
};
