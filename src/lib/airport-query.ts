/**
 * Read-only queries over the airport snapshot: text search, radius and
 * nearest lookups, route corridors and attribute scans.
 */

import { AirportNotFoundError, guardDataSource } from "@/lib/errors";
import { distanceNm, trackPosition } from "@/lib/geo";
import type { AirportStore } from "@/lib/stores/airport-store";
import type {
  Airport,
  AirportWithDistance,
  Coordinate,
  RouteAirport,
} from "@/types/airport";

export const DEFAULT_SEARCH_LIMIT = 10;

/** Match quality for text search; lower ranks first */
enum MatchRank {
  ExactCode = 0,
  ExactName = 1,
  CodePrefix = 2,
  NamePrefix = 3,
  Substring = 4,
}

function rankMatch(airport: Airport, needle: string): MatchRank | null {
  const code = airport.icao.toLowerCase();
  const name = airport.name.toLowerCase();
  const city = airport.city.toLowerCase();

  if (code === needle) return MatchRank.ExactCode;
  if (name === needle || city === needle) return MatchRank.ExactName;
  if (code.startsWith(needle)) return MatchRank.CodePrefix;
  if (name.startsWith(needle) || city.startsWith(needle)) {
    return MatchRank.NamePrefix;
  }
  if (code.includes(needle) || name.includes(needle) || city.includes(needle)) {
    return MatchRank.Substring;
  }
  return null;
}

const FUEL_FIELD = /fuel/i;
const LANDING_FEE_FIELD = /landing\s*(fee|charge)/i;

export class AirportQueryEngine {
  constructor(private readonly store: AirportStore) {}

  /**
   * Case-insensitive search on code, name and city.
   * Exact matches rank above prefix matches, which rank above substrings;
   * snapshot order is kept within a rank.
   */
  searchByText(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Airport[] {
    const needle = query.trim().toLowerCase();
    if (!needle || limit <= 0) return [];

    const candidates = this.guard(() => this.store.textSearch(needle));
    const ranked: Array<{ airport: Airport; rank: MatchRank; index: number }> = [];
    candidates.forEach((airport, index) => {
      const rank = rankMatch(airport, needle);
      if (rank !== null) ranked.push({ airport, rank, index });
    });

    return ranked
      .sort((a, b) => a.rank - b.rank || a.index - b.index)
      .slice(0, limit)
      .map((r) => r.airport);
  }

  findByCode(icao: string): Airport | undefined {
    return this.guard(() => this.store.lookupByCode(icao.trim().toUpperCase()));
  }

  /**
   * @throws AirportNotFoundError when the code is not in the snapshot
   */
  getAirport(icao: string): Airport {
    const code = icao.trim().toUpperCase();
    const airport = this.findByCode(code);
    if (!airport) {
      throw new AirportNotFoundError(code);
    }
    return airport;
  }

  /**
   * Airports within radiusNm (inclusive) of center, closest first.
   */
  withinRadius(center: Coordinate, radiusNm: number): AirportWithDistance[] {
    if (radiusNm < 0) return [];
    return this.guard(() => this.store.spatialQuery(center, radiusNm))
      .filter((r) => r.distanceNm <= radiusNm)
      .sort((a, b) => a.distanceNm - b.distanceNm);
  }

  /**
   * The n airports closest to center, optionally within maxRadiusNm.
   */
  nearestN(
    center: Coordinate,
    n: number,
    maxRadiusNm?: number
  ): AirportWithDistance[] {
    if (n <= 0) return [];

    const all =
      maxRadiusNm !== undefined
        ? this.withinRadius(center, maxRadiusNm)
        : this.guard(() => this.store.all())
            .map((airport) => ({
              airport,
              distanceNm: distanceNm(center, airport.coordinate),
            }))
            .sort((a, b) => a.distanceNm - b.distanceNm);

    return all.slice(0, n);
  }

  /**
   * Airports within corridorWidthNm of the great-circle segment between two
   * airports, ordered by progress along the route. The endpoints themselves
   * are left out.
   */
  alongRoute(
    fromIcao: string,
    toIcao: string,
    corridorWidthNm: number
  ): RouteAirport[] {
    const from = this.getAirport(fromIcao);
    const to = this.getAirport(toIcao);
    return this.alongSegment(from.coordinate, to.coordinate, corridorWidthNm, [
      from.icao,
      to.icao,
    ]);
  }

  alongSegment(
    start: Coordinate,
    end: Coordinate,
    corridorWidthNm: number,
    excludeIcaos: readonly string[] = []
  ): RouteAirport[] {
    const excluded = new Set(excludeIcaos);
    const results: RouteAirport[] = [];

    for (const airport of this.guard(() => this.store.all())) {
      if (excluded.has(airport.icao)) continue;

      const position = trackPosition(airport.coordinate, start, end);
      if (position.segmentDistanceNm > corridorWidthNm) continue;

      results.push({
        airport,
        segmentDistanceNm: position.segmentDistanceNm,
        alongTrackDistanceNm: Math.min(
          position.routeLengthNm,
          Math.max(0, position.alongTrackNm)
        ),
      });
    }

    return results.sort(
      (a, b) =>
        a.alongTrackDistanceNm - b.alongTrackDistanceNm ||
        a.segmentDistanceNm - b.segmentDistanceNm
    );
  }

  /**
   * Generic attribute scan over one airport field.
   */
  byField<K extends keyof Airport>(
    fieldName: K,
    predicate: (value: Airport[K], airport: Airport) => boolean
  ): Airport[] {
    return this.guard(() =>
      this.store.attributeScan((airport) => predicate(airport[fieldName], airport))
    );
  }

  borderCrossingIcaos(): Set<string> {
    return new Set(this.byField("pointOfEntry", (poe) => poe).map((a) => a.icao));
  }

  /**
   * Fuel types published in AIP entries, keyed by ICAO.
   * Airports without any fuel entry are absent from the map.
   */
  fuelTypesByIcao(airports: readonly Airport[]): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const airport of airports) {
      const entries = airport.aipEntries.filter(
        (e) => FUEL_FIELD.test(e.field) || FUEL_FIELD.test(e.standardField ?? "")
      );
      if (entries.length === 0) continue;

      // "NIL" entries leave an empty list: published, but nothing on offer
      result.set(
        airport.icao,
        entries
          .flatMap((e) => e.value.split(/[,;/]/))
          .map((f) => f.trim())
          .filter((f) => f.length > 0 && !/^(nil|none|no)$/i.test(f))
      );
    }
    return result;
  }

  /**
   * First amount published in a landing fee AIP entry, keyed by ICAO.
   */
  landingFeesByIcao(airports: readonly Airport[]): Map<string, number> {
    const result = new Map<string, number>();
    for (const airport of airports) {
      for (const entry of airport.aipEntries) {
        if (!LANDING_FEE_FIELD.test(`${entry.field} ${entry.standardField ?? ""}`)) {
          continue;
        }
        const amount = /\d+(?:[.,]\d+)?/.exec(entry.value);
        if (amount) {
          result.set(airport.icao, Number(amount[0].replace(",", ".")));
          break;
        }
      }
    }
    return result;
  }

  all(): readonly Airport[] {
    return this.guard(() => this.store.all());
  }

  private guard<T>(query: () => T): T {
    return guardDataSource("Airport data source", query);
  }
}
