/**
 * Free-text location resolution.
 *
 * Strategies are tried in order and the first one that produces a location
 * wins:
 * 1. icao-code     - a 4-letter code found in the airport snapshot
 * 2. coordinates   - a "lat, lon" literal
 * 3. gazetteer     - exact name, then name prefix, then alternate-name substring
 * 4. airport-search - best airport name/city match
 */

import type { AirportQueryEngine } from "@/lib/airport-query";
import { LocationNotFoundError, guardDataSource } from "@/lib/errors";
import { parseCoordinateLiteral } from "@/lib/geo";
import { createLogger } from "@/lib/logger";
import type { GazetteerStore } from "@/lib/stores/gazetteer-store";
import type { Airport, Coordinate } from "@/types/airport";
import type { GeocodeEntry } from "@/types/gazetteer";

const log = createLogger("LocationResolver");

export type LocationSource =
  | "icao-code"
  | "coordinates"
  | "gazetteer"
  | "airport-search";

export interface ResolvedLocation {
  coordinate: Coordinate;
  canonicalName: string;
  /** Set when the location is an airport */
  icao?: string;
  countryCode?: string;
  source: LocationSource;
}

export interface ResolveOptions {
  /**
   * ISO-2 country the caller believes the place is in. Accepted but not yet
   * applied: how a hint should weigh against population is undecided.
   */
  countryHint?: string;
}

export interface LocationStrategy {
  name: LocationSource;
  resolve(query: string, options: ResolveOptions): ResolvedLocation | null;
}

/** Airport standing in for a location that is not itself an airport */
export interface ResolvedAnchor {
  location: ResolvedLocation;
  airport: Airport;
  /** Distance from the resolved location to the anchor airport */
  distanceNm: number;
  /** True when the anchor is the nearest airport rather than the location itself */
  substituted: boolean;
}

const ICAO_PATTERN = /^[A-Za-z]{4}$/;
const GAZETTEER_CANDIDATES = 10;
export const ANCHOR_SEARCH_RADIUS_NM = 100;

function airportLocation(airport: Airport, source: LocationSource): ResolvedLocation {
  return {
    coordinate: airport.coordinate,
    canonicalName: airport.name,
    icao: airport.icao,
    countryCode: airport.country || undefined,
    source,
  };
}

export function icaoCodeStrategy(engine: AirportQueryEngine): LocationStrategy {
  return {
    name: "icao-code",
    resolve(query) {
      if (!ICAO_PATTERN.test(query)) return null;
      const airport = engine.findByCode(query.toUpperCase());
      return airport ? airportLocation(airport, "icao-code") : null;
    },
  };
}

export function coordinateStrategy(): LocationStrategy {
  return {
    name: "coordinates",
    resolve(query) {
      const coordinate = parseCoordinateLiteral(query);
      if (!coordinate) return null;
      return {
        coordinate,
        canonicalName: `${coordinate.latitude.toFixed(4)}, ${coordinate.longitude.toFixed(4)}`,
        source: "coordinates",
      };
    },
  };
}

function mostPopulous(hits: readonly GeocodeEntry[]): GeocodeEntry | undefined {
  let best: GeocodeEntry | undefined;
  for (const hit of hits) {
    if (!best || hit.population > best.population) best = hit;
  }
  return best;
}

export function gazetteerStrategy(gazetteer: GazetteerStore): LocationStrategy {
  const steps: Array<{
    label: string;
    lookup: (query: string) => GeocodeEntry[];
  }> = [
    { label: "exact", lookup: (q) => gazetteer.exactMatch(q, GAZETTEER_CANDIDATES) },
    { label: "prefix", lookup: (q) => gazetteer.prefixMatch(q, GAZETTEER_CANDIDATES) },
    {
      label: "alternate name",
      lookup: (q) => gazetteer.substringMatch(q, GAZETTEER_CANDIDATES),
    },
  ];

  return {
    name: "gazetteer",
    resolve(query) {
      for (const step of steps) {
        const hits = guardDataSource("Gazetteer", () => step.lookup(query));
        if (hits.length === 0) continue;

        const hit = mostPopulous(hits);
        if (!hit) continue;

        log.debug(`'${query}' matched ${hit.name} (${hit.countryCode}) by ${step.label}`);
        return {
          coordinate: hit.coordinate,
          canonicalName: hit.name,
          countryCode: hit.countryCode,
          source: "gazetteer",
        };
      }
      return null;
    },
  };
}

export function airportSearchStrategy(engine: AirportQueryEngine): LocationStrategy {
  return {
    name: "airport-search",
    resolve(query) {
      const [airport] = engine.searchByText(query, 1);
      return airport ? airportLocation(airport, "airport-search") : null;
    },
  };
}

export class LocationResolver {
  private readonly strategies: readonly LocationStrategy[];

  constructor(
    private readonly engine: AirportQueryEngine,
    gazetteer?: GazetteerStore,
    strategies?: readonly LocationStrategy[]
  ) {
    this.strategies = strategies ?? [
      icaoCodeStrategy(engine),
      coordinateStrategy(),
      ...(gazetteer ? [gazetteerStrategy(gazetteer)] : []),
      airportSearchStrategy(engine),
    ];
  }

  /**
   * @throws LocationNotFoundError when no strategy recognises the query
   */
  resolve(query: string, options: ResolveOptions = {}): ResolvedLocation {
    const trimmed = query.trim();
    if (trimmed) {
      for (const strategy of this.strategies) {
        const location = strategy.resolve(trimmed, options);
        if (location) {
          log.debug(`Resolved '${trimmed}' via ${strategy.name}`);
          return location;
        }
      }
    }
    log.info(`No location found for '${trimmed}'`);
    throw new LocationNotFoundError(trimmed);
  }

  /**
   * Resolve to an airport. Locations that are not airports are anchored on
   * the nearest airport within ANCHOR_SEARCH_RADIUS_NM, preferring one in
   * the same country.
   */
  resolveAnchor(query: string, options: ResolveOptions = {}): ResolvedAnchor {
    const location = this.resolve(query, options);

    if (location.icao) {
      return {
        location,
        airport: this.engine.getAirport(location.icao),
        distanceNm: 0,
        substituted: false,
      };
    }

    const nearby = this.engine.withinRadius(location.coordinate, ANCHOR_SEARCH_RADIUS_NM);
    const country = location.countryCode?.toUpperCase();
    const anchor =
      (country
        ? nearby.find((n) => n.airport.country.toUpperCase() === country)
        : undefined) ?? nearby[0];

    if (!anchor) {
      throw new LocationNotFoundError(query.trim());
    }

    return {
      location,
      airport: anchor.airport,
      distanceNm: anchor.distanceNm,
      substituted: true,
    };
  }
}
