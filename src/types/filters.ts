import type { Coordinate } from "@/types/airport";

/** Distance band around an origin airport */
export interface TripDistance {
  /** Origin ICAO code */
  from: string;
  minNm?: number;
  maxNm?: number;
}

/**
 * Airport filter criteria.
 *
 * Every field is optional; an absent field places no constraint and
 * present fields combine with AND.
 */
export interface FilterSpec {
  country?: string;
  hasProcedures?: boolean;
  hasAipData?: boolean;
  hasHardRunway?: boolean;
  hasLightedRunway?: boolean;
  pointOfEntry?: boolean;
  hasAvgas?: boolean;
  hasJetA?: boolean;
  minRunwayLengthFt?: number;
  maxRunwayLengthFt?: number;
  hasIls?: boolean;
  hasRnav?: boolean;
  hasPrecisionApproach?: boolean;
  /** Only airports publishing this AIP field (matched on field or standard field) */
  aipField?: string;
  /** Maximum C172-equivalent landing fee */
  maxLandingFee?: number;
  /** Maximum advance notice in hours (needs notificationIcaos in the context) */
  maxHoursNotice?: number;
  excludeLargeAirports?: boolean;
  /** Only airports within a distance band of an origin (needs tripOrigin in the context) */
  tripDistance?: TripDistance;
}

/**
 * Auxiliary data some predicates need, supplied alongside the spec.
 */
export interface FilterContext {
  borderCrossingIcaos?: ReadonlySet<string>;
  /** Airports qualifying under maxHoursNotice */
  notificationIcaos?: ReadonlySet<string>;
  /** Fuel types on offer, keyed by ICAO */
  fuelTypes?: ReadonlyMap<string, readonly string[]>;
  /** Landing fee in local currency, keyed by ICAO */
  landingFees?: ReadonlyMap<string, number>;
  /** Coordinate of the tripDistance origin, when it is a known airport */
  tripOrigin?: Coordinate;
}
