/**
 * Builders and in-memory stores shared by the test suites.
 */

import { JsonAirportStore } from "@/lib/stores/airport-store";
import type { GazetteerStore } from "@/lib/stores/gazetteer-store";
import type { NotificationStore } from "@/lib/stores/notification-store";
import type { Airport, Runway } from "@/types/airport";
import type { GeocodeEntry } from "@/types/gazetteer";
import type { NotificationRecord } from "@/types/notification";

export function makeRunway(overrides: Partial<Runway> = {}): Runway {
  return {
    lengthFt: 3000,
    widthFt: 60,
    surface: "ASP",
    lighted: false,
    closed: false,
    le: { ident: "09" },
    he: { ident: "27" },
    ...overrides,
  };
}

export function makeAirport(
  icao: string,
  latitude: number,
  longitude: number,
  overrides: Partial<Airport> = {}
): Airport {
  return {
    icao,
    name: `${icao} Airfield`,
    city: "",
    country: "FR",
    coordinate: { latitude, longitude },
    elevationFt: 0,
    type: "small_airport",
    runways: [],
    procedures: [],
    aipEntries: [],
    pointOfEntry: false,
    ...overrides,
  };
}

export function makeAirportStore(airports: Airport[]): JsonAirportStore {
  return new JsonAirportStore(airports);
}

export function makeCity(
  name: string,
  latitude: number,
  longitude: number,
  countryCode: string,
  population: number,
  alternateNames: string[] = []
): GeocodeEntry {
  return {
    name,
    coordinate: { latitude, longitude },
    countryCode,
    population,
    alternateNames,
  };
}

/** Gazetteer over a fixed list, with the same match rules as the SQLite store */
export class InMemoryGazetteer implements GazetteerStore {
  closed = false;
  calls = 0;

  constructor(private readonly entries: GeocodeEntry[]) {}

  exactMatch(name: string, limit: number): GeocodeEntry[] {
    const needle = name.trim().toLowerCase();
    return this.find((e) => e.name.toLowerCase() === needle, limit);
  }

  prefixMatch(prefix: string, limit: number): GeocodeEntry[] {
    const needle = prefix.trim().toLowerCase();
    return this.find((e) => e.name.toLowerCase().startsWith(needle), limit);
  }

  substringMatch(text: string, limit: number): GeocodeEntry[] {
    const needle = text.trim().toLowerCase();
    return this.find(
      (e) => e.alternateNames.some((n) => n.toLowerCase().includes(needle)),
      limit
    );
  }

  close(): void {
    this.closed = true;
  }

  private find(match: (e: GeocodeEntry) => boolean, limit: number): GeocodeEntry[] {
    this.calls++;
    return this.entries
      .filter(match)
      .sort((a, b) => b.population - a.population)
      .slice(0, limit);
  }
}

export function makeNotification(
  icao: string,
  type: NotificationRecord["type"],
  hoursNotice?: number,
  overrides: Partial<NotificationRecord> = {}
): NotificationRecord {
  return {
    icao,
    type,
    isH24: type === "h24",
    isOnRequest: type === "on_request",
    ...(hoursNotice !== undefined ? { hoursNotice } : {}),
    ...overrides,
  };
}

/** Notification store over a fixed list, in insertion order */
export class InMemoryNotificationStore implements NotificationStore {
  closed = false;

  constructor(private readonly records: NotificationRecord[]) {}

  queryByMaxHours(maxHours?: number, limit?: number): NotificationRecord[] {
    const seen = new Set<string>();
    const result = this.records
      .filter(
        (r) =>
          r.hoursNotice !== undefined &&
          r.hoursNotice > 0 &&
          (maxHours === undefined || r.hoursNotice <= maxHours)
      )
      .map((r, index) => ({ r, index }))
      .sort((a, b) => (a.r.hoursNotice ?? 0) - (b.r.hoursNotice ?? 0) || a.index - b.index)
      .map(({ r }) => r)
      .slice(0, limit);
    return result.filter((r) => {
      if (seen.has(r.icao)) return false;
      seen.add(r.icao);
      return true;
    });
  }

  groupByIcao(): ReadonlyMap<string, NotificationRecord> {
    const grouped = new Map<string, NotificationRecord>();
    for (const r of this.records) {
      if (!grouped.has(r.icao)) grouped.set(r.icao, r);
    }
    return grouped;
  }

  get(icao: string): NotificationRecord | undefined {
    return this.groupByIcao().get(icao.toUpperCase());
  }

  close(): void {
    this.closed = true;
  }
}
