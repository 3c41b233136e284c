import type { Coordinate } from "@/types/airport";

/**
 * A place from the offline gazetteer (GeoNames cities extract)
 */
export interface GeocodeEntry {
  name: string;
  coordinate: Coordinate;
  /** ISO 2-letter country code */
  countryCode: string;
  population: number;
  alternateNames: string[];
}
