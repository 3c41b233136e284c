/**
 * Great-circle helpers in nautical miles, on top of turf.
 */

import { bearing, distance, point, radiansToLength } from "@turf/turf";

import type { Coordinate } from "@/types/airport";

function toPoint(coordinate: Coordinate) {
  return point([coordinate.longitude, coordinate.latitude]);
}

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(-1, value));
}

/**
 * Great-circle (haversine) distance between two points.
 */
export function distanceNm(from: Coordinate, to: Coordinate): number {
  return distance(toPoint(from), toPoint(to), { units: "nauticalmiles" });
}

export interface TrackPosition {
  /** Signed perpendicular distance from the great circle (positive = right of track) */
  crossTrackNm: number;
  /** Signed distance along the great circle from the start, at the foot of the perpendicular */
  alongTrackNm: number;
  /** Distance to the closest point of the start→end segment */
  segmentDistanceNm: number;
  /** Length of the start→end segment */
  routeLengthNm: number;
}

/**
 * Locate a point relative to the great-circle segment start→end.
 */
export function trackPosition(
  target: Coordinate,
  start: Coordinate,
  end: Coordinate
): TrackPosition {
  const startPoint = toPoint(start);
  const targetPoint = toPoint(target);

  const d13 = distance(startPoint, targetPoint, { units: "radians" });
  const d12 = distance(startPoint, toPoint(end), { units: "radians" });
  const routeLengthNm = radiansToLength(d12, "nauticalmiles");

  if (d13 === 0) {
    return { crossTrackNm: 0, alongTrackNm: 0, segmentDistanceNm: 0, routeLengthNm };
  }
  if (d12 === 0) {
    const away = radiansToLength(d13, "nauticalmiles");
    return { crossTrackNm: away, alongTrackNm: 0, segmentDistanceNm: away, routeLengthNm };
  }

  const theta13 = toRad(bearing(startPoint, targetPoint));
  const theta12 = toRad(bearing(startPoint, toPoint(end)));
  const delta = theta13 - theta12;

  const xt = Math.asin(clampUnit(Math.sin(d13) * Math.sin(delta)));
  const atMagnitude = Math.acos(clampUnit(Math.cos(d13) / Math.cos(xt)));
  const at = Math.cos(delta) < 0 ? -atMagnitude : atMagnitude;

  let segment: number;
  if (at < 0) {
    segment = d13;
  } else if (at > d12) {
    segment = distance(toPoint(end), targetPoint, { units: "radians" });
  } else {
    segment = Math.abs(xt);
  }

  return {
    crossTrackNm: radiansToLength(xt, "nauticalmiles"),
    alongTrackNm: radiansToLength(at, "nauticalmiles"),
    segmentDistanceNm: radiansToLength(segment, "nauticalmiles"),
    routeLengthNm,
  };
}

/**
 * Parse a "lat, lon" literal (e.g., "48.8584, 2.2945").
 */
export function parseCoordinateLiteral(text: string): Coordinate | null {
  const match = text
    .trim()
    .match(/^(-?\d{1,2}(?:\.\d+)?)\s*[,;\s]\s*(-?\d{1,3}(?:\.\d+)?)$/);
  if (!match) return null;

  const latitude = Number(match[1]);
  const longitude = Number(match[2]);
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return null;
  }
  return { latitude, longitude };
}
