/**
 * Airport snapshot store backed by data/airports.json.
 *
 * The snapshot is loaded and validated once; every query after that is an
 * in-memory read.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import { distanceNm } from "@/lib/geo";
import type {
  Airport,
  AirportWithDistance,
  Coordinate,
} from "@/types/airport";

export interface AirportStore {
  lookupByCode(icao: string): Airport | undefined;
  /** Airports whose code, name or city contains the query (case-insensitive), in snapshot order */
  textSearch(query: string): Airport[];
  /** Airports within radiusNm of center, closest first */
  spatialQuery(center: Coordinate, radiusNm: number): AirportWithDistance[];
  attributeScan(predicate: (airport: Airport) => boolean): Airport[];
  all(): readonly Airport[];
}

const runwayEndSchema = z.object({
  ident: z.string(),
  headingDeg: z.number().optional(),
});

const airportSchema = z.object({
  icao: z.string().regex(/^[A-Z0-9]{4}$/),
  name: z.string(),
  city: z.string().default(""),
  country: z.string().default(""),
  coordinate: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  }),
  elevationFt: z.number().default(0),
  type: z
    .enum([
      "large_airport",
      "medium_airport",
      "small_airport",
      "heliport",
      "seaplane_base",
      "closed",
      "other",
    ])
    .default("other"),
  runways: z
    .array(
      z.object({
        lengthFt: z.number(),
        widthFt: z.number().default(0),
        surface: z.string().default(""),
        lighted: z.boolean().default(false),
        closed: z.boolean().default(false),
        le: runwayEndSchema,
        he: runwayEndSchema,
      })
    )
    .default([]),
  procedures: z
    .array(
      z.object({
        type: z.enum(["approach", "departure", "arrival"]),
        approachType: z.string().optional(),
        precisionCategory: z
          .enum(["precision", "apv", "non_precision"])
          .optional(),
        runway: z.string().optional(),
      })
    )
    .default([]),
  aipEntries: z
    .array(
      z.object({
        section: z.string(),
        field: z.string(),
        value: z.string(),
        standardField: z.string().optional(),
      })
    )
    .default([]),
  pointOfEntry: z.boolean().default(false),
});

export const airportSnapshotSchema = z.object({
  airports: z.array(airportSchema),
});

export class JsonAirportStore implements AirportStore {
  private readonly airports: readonly Airport[];
  private readonly byCode: Map<string, Airport>;

  constructor(airports: readonly Airport[]) {
    this.airports = airports;
    this.byCode = new Map(airports.map((a) => [a.icao.toUpperCase(), a]));
  }

  /**
   * Load and validate a snapshot file.
   */
  static fromFile(path: string): JsonAirportStore {
    const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
    return new JsonAirportStore(airportSnapshotSchema.parse(raw).airports);
  }

  lookupByCode(icao: string): Airport | undefined {
    return this.byCode.get(icao.trim().toUpperCase());
  }

  textSearch(query: string): Airport[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    return this.airports.filter(
      (a) =>
        a.icao.toLowerCase().includes(needle) ||
        a.name.toLowerCase().includes(needle) ||
        a.city.toLowerCase().includes(needle)
    );
  }

  spatialQuery(center: Coordinate, radiusNm: number): AirportWithDistance[] {
    const results: AirportWithDistance[] = [];
    for (const airport of this.airports) {
      const d = distanceNm(center, airport.coordinate);
      if (d <= radiusNm) {
        results.push({ airport, distanceNm: d });
      }
    }
    return results.sort((a, b) => a.distanceNm - b.distanceNm);
  }

  attributeScan(predicate: (airport: Airport) => boolean): Airport[] {
    return this.airports.filter(predicate);
  }

  all(): readonly Airport[] {
    return this.airports;
  }
}
