/**
 * Text templates for tool output.
 *
 * Map renderers pull coordinates out of airport lines with a regex, so the
 * wire line format is fixed: "<ICAO> (<name>) - <lat>°, <lon>°" with four
 * decimals.
 */

import { bucketLabel, classifyNotification } from "@/lib/notification-classifier";
import type { Airport, AirportWithDistance, RouteAirport } from "@/types/airport";
import type { NotificationRecord } from "@/types/notification";
import type { RuleComparison, RuleEntry } from "@/types/rules";

/** Airports listed by the route and near-location tools */
export const MAX_LISTED_AIRPORTS = 20;

export function formatWireLine(airport: Airport): string {
  const { latitude, longitude } = airport.coordinate;
  return `${airport.icao} (${airport.name}) - ${latitude.toFixed(4)}°, ${longitude.toFixed(4)}°`;
}

/** "- ICAO: Name (City, CC)" */
export function formatAirportSummary(airport: Airport): string {
  let line = `- ${airport.icao}: ${airport.name}`;
  if (airport.city) {
    line += airport.country
      ? ` (${airport.city}, ${airport.country})`
      : ` (${airport.city})`;
  }
  return line;
}

export function formatAirportList(airports: readonly Airport[]): string {
  if (airports.length === 0) {
    return "No airports found.";
  }
  return airports.map((a) => `${formatAirportSummary(a)}\n`).join("");
}

function formatNotice(record: NotificationRecord): string {
  if (record.hoursNotice !== undefined) return `${record.hoursNotice}h notice`;
  if (record.isH24) return "H24";
  if (record.isOnRequest) return "on request";
  return record.type.replace(/_/g, " ");
}

function approachSummary(airport: Airport): string {
  const types = [
    ...new Set(
      airport.procedures
        .filter((p) => p.type === "approach" && p.approachType)
        .map((p) => p.approachType)
    ),
  ];
  const count = airport.procedures.length;
  return types.length > 0 ? `${count} (${types.join(", ")})` : String(count);
}

export interface AirportDetailsExtras {
  notification?: NotificationRecord;
}

export function formatAirportDetails(
  airport: Airport,
  extras: AirportDetailsExtras = {}
): string {
  const { latitude, longitude } = airport.coordinate;
  let output = `${airport.icao} - ${airport.name}\n`;
  output += `Location: ${airport.city}, ${airport.country}\n`;
  output += `Coordinates: ${latitude.toFixed(4)}, ${longitude.toFixed(4)}\n`;
  output += `Elevation: ${airport.elevationFt} ft\n`;
  output += `Type: ${airport.type}\n`;

  if (airport.runways.length > 0) {
    output += "Runways:\n";
    for (const runway of airport.runways) {
      output += `  - ${runway.le.ident}/${runway.he.ident}: ${runway.lengthFt}ft x ${runway.widthFt}ft`;
      if (runway.surface) output += ` (${runway.surface})`;
      if (runway.closed) output += " [closed]";
      output += "\n";
    }
  }

  if (airport.procedures.length > 0) {
    output += `Procedures: ${approachSummary(airport)}\n`;
  }
  if (airport.pointOfEntry) {
    output += "Border crossing: yes\n";
  }

  const notification = extras.notification;
  if (notification) {
    output += `Notification: ${formatNotice(notification)}`;
    if (notification.summary) output += `, ${notification.summary}`;
    output += ` [${bucketLabel(classifyNotification(notification))}]\n`;
  }

  return output;
}

export interface RouteOutput {
  from: string;
  to: string;
  corridorNm: number;
  airports: readonly RouteAirport[];
  /** Shown when an endpoint was a place name rather than an airport */
  notes?: readonly string[];
}

export function formatRouteResult(route: RouteOutput): string {
  let output = `Airports along route ${route.from} → ${route.to} (within ${route.corridorNm} nm):\n`;
  for (const { airport } of route.airports.slice(0, MAX_LISTED_AIRPORTS)) {
    output += `- ${formatWireLine(airport)}\n`;
  }
  for (const note of route.notes ?? []) {
    output += `Note: ${note}\n`;
  }
  return output;
}

export interface NearLocationOutput {
  query: string;
  radiusNm: number;
  maxHoursNotice?: number;
  airports: readonly AirportWithDistance[];
  notifications: ReadonlyMap<string, NotificationRecord>;
}

export function formatNearLocationResult(result: NearLocationOutput): string {
  let output = `Airports near ${result.query} (within ${result.radiusNm} nm)`;
  if (result.maxHoursNotice !== undefined) {
    output += ` with max ${result.maxHoursNotice}h notice`;
  }
  output += ":\n";

  if (result.airports.length === 0) {
    return `${output}No airports found matching the criteria.\n`;
  }

  for (const { airport } of result.airports.slice(0, MAX_LISTED_AIRPORTS)) {
    output += `- ${formatWireLine(airport)}`;
    const info = result.notifications.get(airport.icao);
    if (info?.hoursNotice !== undefined) {
      output += ` - ${info.hoursNotice}h notice`;
      if (info.summary) output += `, ${info.summary}`;
    }
    output += "\n";
  }
  return output;
}

export function formatBorderCrossingResult(
  airports: readonly Airport[],
  country?: string
): string {
  let output = "Border Crossing Airports";
  if (country) output += ` in ${country}`;
  output += ":\n";
  return output + airports.map((a) => `${formatAirportSummary(a)}\n`).join("");
}

export function formatRulesForCountry(
  country: string,
  entries: readonly RuleEntry[]
): string {
  let output = `Aviation Rules for ${country}:\n`;
  for (const entry of entries) {
    output += `- ${entry.question}: ${entry.answer}\n`;
  }
  return output;
}

export function formatRuleComparison(
  first: string,
  second: string,
  rows: readonly RuleComparison[]
): string {
  let output = `Rule Comparison: ${first} vs ${second}\n\n`;
  for (const row of rows) {
    output += `**${row.question}**\n`;
    output += `- ${first}: ${row.first}\n`;
    output += `- ${second}: ${row.second}\n\n`;
  }
  return output;
}

export interface NotificationQuery {
  maxHours?: number;
  country?: string;
}

export function formatNotificationList(
  records: readonly NotificationRecord[],
  query: NotificationQuery = {}
): string {
  let output = "Airports with notification requirements";
  if (query.maxHours !== undefined) output += ` (max ${query.maxHours}h notice)`;
  if (query.country) output += ` in ${query.country}`;
  output += ":\n\n";

  for (const record of records) {
    output += `• ${record.icao}`;
    if (record.hoursNotice !== undefined) output += ` - ${record.hoursNotice}h notice`;
    if (record.summary) output += `, ${record.summary}`;
    const start = record.operatingHoursStart;
    const end = record.operatingHoursEnd;
    if (start !== undefined && end !== undefined && (start || end)) {
      output += ` (hours: ${start}-${end})`;
    }
    output += "\n";
  }
  return output;
}

export function noNotificationMatchesMessage(query: NotificationQuery): string {
  let message = "No airports found with notification requirements";
  if (query.maxHours !== undefined) message += ` under ${query.maxHours} hours`;
  if (query.country) message += ` in ${query.country}`;
  return message;
}
