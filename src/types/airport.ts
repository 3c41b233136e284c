/**
 * Airport snapshot structures matching data/airports.json
 */

export interface Coordinate {
  /** Degrees north (negative for south) */
  latitude: number;
  /** Degrees east (negative for west) */
  longitude: number;
}

export type AirportType =
  | "large_airport"
  | "medium_airport"
  | "small_airport"
  | "heliport"
  | "seaplane_base"
  | "closed"
  | "other";

export interface RunwayEnd {
  /** Runway designator (e.g., "07L") */
  ident: string;
  headingDeg?: number;
}

export interface Runway {
  lengthFt: number;
  widthFt: number;
  /** Surface as published (e.g., "ASP", "grass") */
  surface: string;
  lighted: boolean;
  closed: boolean;
  le: RunwayEnd;
  he: RunwayEnd;
}

export type ProcedureType = "approach" | "departure" | "arrival";

export type PrecisionCategory = "precision" | "apv" | "non_precision";

export interface Procedure {
  type: ProcedureType;
  /** Approach family (e.g., "ILS", "RNAV", "VOR") */
  approachType?: string;
  precisionCategory?: PrecisionCategory;
  runway?: string;
}

/** Aeronautical Information Publication field/value pair */
export interface AipEntry {
  section: string;
  field: string;
  value: string;
  standardField?: string;
}

export interface Airport {
  /** ICAO 4-letter code (e.g., "LFPO") */
  icao: string;
  name: string;
  city: string;
  /** ISO 2-letter country code (e.g., "FR") */
  country: string;
  coordinate: Coordinate;
  elevationFt: number;
  type: AirportType;
  runways: Runway[];
  procedures: Procedure[];
  aipEntries: AipEntry[];
  /** Customs / border crossing available */
  pointOfEntry: boolean;
}

/** Airport tagged with its distance from a reference point */
export interface AirportWithDistance {
  airport: Airport;
  distanceNm: number;
}

/** Airport tagged with its position relative to a route segment */
export interface RouteAirport {
  airport: Airport;
  /** Distance to the closest point of the route segment */
  segmentDistanceNm: number;
  /** Progress along the route from the departure point */
  alongTrackDistanceNm: number;
}
