/**
 * Airport filtering.
 *
 * Each FilterSpec field maps to an independent pure predicate and the
 * overall filter is their conjunction. Predicates run cheapest first, but
 * the result never depends on the order.
 */

import { z } from "zod";

import { InvalidArgumentError } from "@/lib/errors";
import { distanceNm } from "@/lib/geo";
import { createLogger } from "@/lib/logger";
import type { Airport, Runway } from "@/types/airport";
import type { FilterContext, FilterSpec } from "@/types/filters";

const log = createLogger("Filters");

type FilterKey = keyof FilterSpec;

type BoundPredicate = (airport: Airport) => boolean;

interface FilterPredicate {
  key: FilterKey;
  /** Relative cost; lower runs first */
  cost: number;
  /** The predicate for this spec, or null when the field is absent */
  bind(spec: FilterSpec, context: FilterContext): BoundPredicate | null;
}

// =============================================================================
// Airport helpers
// =============================================================================

const SOFT_SURFACE = /unpaved|grass|turf|dirt|gravel|sand|soil|water|snow|ice/i;
const HARD_SURFACE = /asp|con|pem|bit|tarmac|paved|hard|mac/i;

export function isHardSurface(surface: string): boolean {
  if (SOFT_SURFACE.test(surface)) return false;
  return HARD_SURFACE.test(surface);
}

function openRunways(airport: Airport): Runway[] {
  return airport.runways.filter((r) => !r.closed);
}

export function longestRunwayFt(airport: Airport): number | undefined {
  const lengths = openRunways(airport).map((r) => r.lengthFt);
  return lengths.length > 0 ? Math.max(...lengths) : undefined;
}

function hasApproach(airport: Airport, pattern: RegExp): boolean {
  return airport.procedures.some(
    (p) => p.type === "approach" && p.approachType !== undefined && pattern.test(p.approachType)
  );
}

const ILS = /^ILS/i;
const RNAV = /RNAV|RNP|GNSS|GPS|LPV/i;
const AVGAS = /avgas|100ll|ul91/i;
const JET_A = /jet\s*-?\s*a|jeta1/i;

function fuelOffered(
  airport: Airport,
  context: FilterContext,
  pattern: RegExp
): boolean {
  const fuels = context.fuelTypes?.get(airport.icao);
  // No fuel data for this airport: leave it in
  if (!fuels) return true;
  return fuels.some((f) => pattern.test(f));
}

// =============================================================================
// Predicates
// =============================================================================

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function predicate<K extends FilterKey>(p: {
  key: K;
  cost: number;
  test: (
    airport: Airport,
    value: NonNullable<FilterSpec[K]>,
    context: FilterContext
  ) => boolean;
}): FilterPredicate {
  return {
    key: p.key,
    cost: p.cost,
    bind(spec, context) {
      const value = spec[p.key];
      if (value == null || !isPresent(value)) return null;
      return (airport) => p.test(airport, value, context);
    },
  };
}

const PREDICATES = [
  predicate({
    key: "country",
    cost: 0,
    test: (a, value) => a.country.toUpperCase() === value.toUpperCase(),
  }),
  predicate({
    key: "pointOfEntry",
    cost: 0,
    test: (a, value, ctx) =>
      (ctx.borderCrossingIcaos
        ? ctx.borderCrossingIcaos.has(a.icao)
        : a.pointOfEntry) === value,
  }),
  predicate({
    key: "excludeLargeAirports",
    cost: 0,
    test: (a, value) => !value || a.type !== "large_airport",
  }),
  predicate({
    key: "hasProcedures",
    cost: 1,
    test: (a, value) => (a.procedures.length > 0) === value,
  }),
  predicate({
    key: "hasAipData",
    cost: 1,
    test: (a, value) => (a.aipEntries.length > 0) === value,
  }),
  predicate({
    key: "hasHardRunway",
    cost: 2,
    test: (a, value) =>
      openRunways(a).some((r) => isHardSurface(r.surface)) === value,
  }),
  predicate({
    key: "hasLightedRunway",
    cost: 2,
    test: (a, value) => openRunways(a).some((r) => r.lighted) === value,
  }),
  predicate({
    key: "minRunwayLengthFt",
    cost: 2,
    test: (a, value) => {
      const longest = longestRunwayFt(a);
      return longest !== undefined && longest >= value;
    },
  }),
  predicate({
    key: "maxRunwayLengthFt",
    cost: 2,
    test: (a, value) => {
      const longest = longestRunwayFt(a);
      return longest !== undefined && longest <= value;
    },
  }),
  predicate({
    key: "hasIls",
    cost: 3,
    test: (a, value) => hasApproach(a, ILS) === value,
  }),
  predicate({
    key: "hasRnav",
    cost: 3,
    test: (a, value) => hasApproach(a, RNAV) === value,
  }),
  predicate({
    key: "hasPrecisionApproach",
    cost: 3,
    test: (a, value) =>
      a.procedures.some((p) => p.precisionCategory === "precision") === value,
  }),
  predicate({
    key: "aipField",
    cost: 4,
    test: (a, value) => {
      const needle = value.toLowerCase();
      return a.aipEntries.some(
        (e) =>
          e.value.trim() !== "" &&
          (e.field.toLowerCase().includes(needle) ||
            (e.standardField?.toLowerCase().includes(needle) ?? false))
      );
    },
  }),
  predicate({
    key: "tripDistance",
    cost: 4,
    test: (a, value, ctx) => {
      // Unknown origin: leave it to the caller
      if (!ctx.tripOrigin) return true;
      const d = distanceNm(ctx.tripOrigin, a.coordinate);
      return (
        (value.minNm === undefined || d >= value.minNm) &&
        (value.maxNm === undefined || d <= value.maxNm)
      );
    },
  }),
  predicate({
    key: "hasAvgas",
    cost: 5,
    test: (a, value, ctx) => !value || fuelOffered(a, ctx, AVGAS),
  }),
  predicate({
    key: "hasJetA",
    cost: 5,
    test: (a, value, ctx) => !value || fuelOffered(a, ctx, JET_A),
  }),
  predicate({
    key: "maxLandingFee",
    cost: 5,
    test: (a, value, ctx) => {
      const fee = ctx.landingFees?.get(a.icao);
      return fee === undefined || fee <= value;
    },
  }),
  predicate({
    key: "maxHoursNotice",
    cost: 5,
    test: (a, _value, ctx) =>
      ctx.notificationIcaos ? ctx.notificationIcaos.has(a.icao) : true,
  }),
].sort((a, b) => a.cost - b.cost);

/**
 * Keep the candidates that satisfy every present field of spec.
 */
export function applyFilters(
  candidates: readonly Airport[],
  spec: FilterSpec,
  context: FilterContext = {}
): Airport[] {
  const active: BoundPredicate[] = [];
  for (const p of PREDICATES) {
    const bound = p.bind(spec, context);
    if (bound) active.push(bound);
  }

  if (active.length === 0) {
    return [...candidates];
  }

  const result = candidates.filter((airport) => active.every((test) => test(airport)));
  log.debug(
    `Applied ${describeFilters(spec)}: ${candidates.length} → ${result.length} airports`
  );
  return result;
}

export function activeFilterCount(spec: FilterSpec): number {
  return PREDICATES.filter((p) => isPresent(spec[p.key])).length;
}

/**
 * Human-readable summary of the active filters.
 */
export function describeFilters(spec: FilterSpec): string {
  const parts: string[] = [];
  if (spec.country) parts.push(`Country: ${spec.country.toUpperCase()}`);
  if (spec.hasProcedures !== undefined) {
    parts.push(spec.hasProcedures ? "Has procedures" : "No procedures");
  }
  if (spec.hasAipData !== undefined) {
    parts.push(spec.hasAipData ? "Has AIP data" : "No AIP data");
  }
  if (spec.hasHardRunway !== undefined) {
    parts.push(spec.hasHardRunway ? "Hard runway" : "No hard runway");
  }
  if (spec.hasLightedRunway !== undefined) {
    parts.push(spec.hasLightedRunway ? "Lighted runway" : "No lighted runway");
  }
  if (spec.pointOfEntry !== undefined) {
    parts.push(spec.pointOfEntry ? "Border crossing" : "No border crossing");
  }
  if (spec.excludeLargeAirports) parts.push("Excluding large airports");
  if (spec.minRunwayLengthFt !== undefined) {
    parts.push(`Runway ≥ ${spec.minRunwayLengthFt}ft`);
  }
  if (spec.maxRunwayLengthFt !== undefined) {
    parts.push(`Runway ≤ ${spec.maxRunwayLengthFt}ft`);
  }
  if (spec.hasIls !== undefined) parts.push(spec.hasIls ? "Has ILS" : "No ILS");
  if (spec.hasRnav !== undefined) parts.push(spec.hasRnav ? "Has RNAV" : "No RNAV");
  if (spec.hasPrecisionApproach !== undefined) {
    parts.push(
      spec.hasPrecisionApproach ? "Precision approach" : "No precision approach"
    );
  }
  if (spec.aipField) parts.push(`AIP field: ${spec.aipField}`);
  if (spec.hasAvgas) parts.push("AVGAS");
  if (spec.hasJetA) parts.push("Jet-A");
  if (spec.maxLandingFee !== undefined) {
    parts.push(`Landing fee ≤ ${spec.maxLandingFee}`);
  }
  if (spec.maxHoursNotice !== undefined) {
    parts.push(`Notice ≤ ${spec.maxHoursNotice}h`);
  }
  if (spec.tripDistance) {
    const { from, minNm, maxNm } = spec.tripDistance;
    let band = "";
    if (minNm !== undefined && maxNm !== undefined) band = `: ${minNm}-${maxNm} nm`;
    else if (maxNm !== undefined) band = `: ≤ ${maxNm} nm`;
    else if (minNm !== undefined) band = `: ≥ ${minNm} nm`;
    parts.push(`Trip distance from ${from}${band}`);
  }
  return parts.length === 0 ? "No filters" : parts.join(", ");
}

// =============================================================================
// Argument parsing
// =============================================================================

const looseBoolean = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((v) => v === "true"),
]);

const nonNegative = z.coerce.number().nonnegative();

const filterArgumentsSchema = z.object({
  country: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, { message: "expected ISO-2 country code" })
    .transform((c) => c.toUpperCase())
    .optional(),
  has_procedures: looseBoolean.optional(),
  has_aip_data: looseBoolean.optional(),
  has_hard_runway: looseBoolean.optional(),
  has_lighted_runway: looseBoolean.optional(),
  point_of_entry: looseBoolean.optional(),
  has_avgas: looseBoolean.optional(),
  has_jet_a: looseBoolean.optional(),
  min_runway_length_ft: nonNegative.optional(),
  max_runway_length_ft: nonNegative.optional(),
  has_ils: looseBoolean.optional(),
  has_rnav: looseBoolean.optional(),
  has_precision_approach: looseBoolean.optional(),
  aip_field: z.string().trim().min(1).optional(),
  max_landing_fee: nonNegative.optional(),
  max_hours_notice: z.coerce.number().int().positive().optional(),
  exclude_large_airports: looseBoolean.optional(),
  trip_distance: z
    .object({
      from: z.string().trim().min(1).transform((c) => c.toUpperCase()),
      min: nonNegative.optional(),
      max: nonNegative.optional(),
    })
    .optional(),
});

export const FILTER_ARGUMENT_NAMES = Object.keys(filterArgumentsSchema.shape);

/**
 * Parse a snake_case filters object from a tool call.
 * Unknown filter names are ignored with a warning.
 */
export function parseFilterSpec(raw: unknown): FilterSpec {
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new InvalidArgumentError("filters", "expected an object");
  }

  const unknownKeys = Object.keys(raw).filter(
    (k) => !FILTER_ARGUMENT_NAMES.includes(k)
  );
  if (unknownKeys.length > 0) {
    log.warn(`Unknown filters ignored: ${unknownKeys.join(", ")}`);
  }

  const parsed = filterArgumentsSchema.safeParse(raw);
  if (!parsed.success) {
    const firstError = parsed.error.issues[0];
    throw new InvalidArgumentError(
      `filters.${firstError.path.join(".")}`,
      firstError.message
    );
  }

  const f = parsed.data;
  const spec: FilterSpec = {
    country: f.country,
    hasProcedures: f.has_procedures,
    hasAipData: f.has_aip_data,
    hasHardRunway: f.has_hard_runway,
    hasLightedRunway: f.has_lighted_runway,
    pointOfEntry: f.point_of_entry,
    hasAvgas: f.has_avgas,
    hasJetA: f.has_jet_a,
    minRunwayLengthFt: f.min_runway_length_ft,
    maxRunwayLengthFt: f.max_runway_length_ft,
    hasIls: f.has_ils,
    hasRnav: f.has_rnav,
    hasPrecisionApproach: f.has_precision_approach,
    aipField: f.aip_field,
    maxLandingFee: f.max_landing_fee,
    maxHoursNotice: f.max_hours_notice,
    excludeLargeAirports: f.exclude_large_airports,
    tripDistance: f.trip_distance && {
      from: f.trip_distance.from,
      minNm: f.trip_distance.min,
      maxNm: f.trip_distance.max,
    },
  };
  return spec;
}
